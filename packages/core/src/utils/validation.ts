import type { z } from 'zod';
import { accessSync, statSync, constants as fsConstants } from 'fs';
import { C4GraphError, ErrorCode, InvalidArgumentError } from '../errors.js';

/** Check that `path` names a readable file. */
export function validatePath(path: string): void {
  if (!path) {
    throw new C4GraphError(
      'Path argument is required',
      ErrorCode.INPUT_INVALID,
      'A valid path must be provided'
    );
  }

  try {
    accessSync(path, fsConstants.R_OK);
  } catch {
    throw new C4GraphError(
      `File is not accessible: ${path}`,
      ErrorCode.IO_FILE_NOT_FOUND,
      `Cannot access file: ${path}`,
      { path }
    );
  }

  if (!statSync(path).isFile()) {
    throw new C4GraphError(
      `Path is not a file: ${path}`,
      ErrorCode.IO_FILE_NOT_FOUND,
      `Expected a file but found a directory: ${path}`,
      { path }
    );
  }
}

export function validate<T>(schema: z.ZodType<T>, data: unknown, fieldName?: string): T {
  const result = schema.safeParse(data);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues
    .map((issue, idx) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `  ${String(idx + 1)}. [${path}] ${issue.message}`;
    })
    .join('\n');

  throw new C4GraphError(
    `Validation failed${fieldName ? ` for ${fieldName}` : ''}:\n${issues}`,
    ErrorCode.INPUT_INVALID,
    `Invalid data${fieldName ? ` in ${fieldName}` : ''}: ${String(result.error.issues.length)} issue(s) found`,
    { field: fieldName }
  );
}

export function isBlank(value: string | null | undefined): boolean {
  return value === null || value === undefined || value.trim().length === 0;
}

export function requireNonBlank(
  value: string | null | undefined,
  argument: string,
  message = `The ${argument} must not be null or empty.`
): string {
  if (value === null || value === undefined || isBlank(value)) {
    throw new InvalidArgumentError(message, argument);
  }
  return value;
}
