import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { dirname } from 'path';
import { validatePath, validate, isBlank, requireNonBlank } from '../validation.js';
import { C4GraphError, ErrorCode, InvalidArgumentError } from '../../errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

describe('validatePath', () => {
  it('throws on empty path', () => {
    expect(() => {
      validatePath('');
    }).toThrow(C4GraphError);
    expect(() => {
      validatePath('');
    }).toThrow('Path argument is required');
  });

  it('throws with INPUT_INVALID code on empty path', () => {
    try {
      validatePath('');
      expect.fail('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(C4GraphError);
      expect((error as C4GraphError).code).toBe(ErrorCode.INPUT_INVALID);
    }
  });

  it('succeeds for an existing file', () => {
    expect(() => {
      validatePath(__filename);
    }).not.toThrow();
  });

  it('throws IO_FILE_NOT_FOUND for a nonexistent file', () => {
    const fakePath = join(__dirname, 'missing-workspace.json');
    try {
      validatePath(fakePath);
      expect.fail('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(C4GraphError);
      const c4Err = error as C4GraphError;
      expect(c4Err.code).toBe(ErrorCode.IO_FILE_NOT_FOUND);
      expect(c4Err.message).toBe(`File is not accessible: ${fakePath}`);
    }
  });

  it('throws IO_FILE_NOT_FOUND when the path is a directory', () => {
    try {
      validatePath(__dirname);
      expect.fail('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(C4GraphError);
      const c4Err = error as C4GraphError;
      expect(c4Err.code).toBe(ErrorCode.IO_FILE_NOT_FOUND);
      expect(c4Err.message).toBe(`Path is not a file: ${__dirname}`);
    }
  });

  it('includes the path in error context', () => {
    const fakePath = join(__dirname, 'nope');
    try {
      validatePath(fakePath);
      expect.fail('should have thrown');
    } catch (error) {
      const c4Err = error as C4GraphError;
      expect(c4Err.context['path']).toBe(fakePath);
      expect(c4Err.context).not.toHaveProperty('type');
    }
  });
});

describe('validate', () => {
  const schema = z.object({
    name: z.string(),
    instances: z.number(),
  });

  it('returns parsed data for valid input', () => {
    const result = validate(schema, { name: 'API', instances: 3 });
    expect(result).toEqual({ name: 'API', instances: 3 });
  });

  it('strips unknown keys', () => {
    const result = validate(schema, { name: 'Web', instances: 1, extra: true });
    expect(result).toEqual({ name: 'Web', instances: 1 });
  });

  it('throws C4GraphError on validation failure', () => {
    expect(() => validate(schema, {})).toThrow(C4GraphError);
  });

  it('includes fieldName in error message when provided', () => {
    try {
      validate(schema, {}, 'container');
      expect.fail('should have thrown');
    } catch (error) {
      const c4Err = error as C4GraphError;
      expect(c4Err.message).toContain('for container');
    }
  });

  it('formats issues as a numbered list', () => {
    try {
      validate(schema, {});
      expect.fail('should have thrown');
    } catch (error) {
      const c4Err = error as C4GraphError;
      expect(c4Err.message).toContain('1.');
      expect(c4Err.message).toContain('[name]');
    }
  });

  it('uses (root) for top-level schema errors', () => {
    try {
      validate(z.string(), 42);
      expect.fail('should have thrown');
    } catch (error) {
      const c4Err = error as C4GraphError;
      expect(c4Err.message).toContain('(root)');
    }
  });

  it('uses INPUT_INVALID error code', () => {
    try {
      validate(schema, {});
      expect.fail('should have thrown');
    } catch (error) {
      const c4Err = error as C4GraphError;
      expect(c4Err.code).toBe(ErrorCode.INPUT_INVALID);
    }
  });

  it('includes issue count in userMessage', () => {
    try {
      validate(schema, {});
      expect.fail('should have thrown');
    } catch (error) {
      const c4Err = error as C4GraphError;
      expect(c4Err.userMessage).toContain('issue(s) found');
    }
  });

  it('includes field in context', () => {
    try {
      validate(schema, {}, 'config');
      expect.fail('should have thrown');
    } catch (error) {
      const c4Err = error as C4GraphError;
      expect(c4Err.context['field']).toBe('config');
    }
  });

  it('works without fieldName', () => {
    try {
      validate(schema, {});
      expect.fail('should have thrown');
    } catch (error) {
      const c4Err = error as C4GraphError;
      expect(c4Err.message).toContain('Validation failed');
      expect(c4Err.message).not.toContain('for ');
    }
  });
});

describe('isBlank', () => {
  it('should treat missing and whitespace-only values as blank', () => {
    expect(isBlank(undefined)).toBe(true);
    expect(isBlank(null)).toBe(true);
    expect(isBlank('')).toBe(true);
    expect(isBlank(' \t ')).toBe(true);
    expect(isBlank(' x ')).toBe(false);
  });
});

describe('requireNonBlank', () => {
  it('should return the value unchanged', () => {
    expect(requireNonBlank(' API ', 'name')).toBe(' API ');
  });

  it('should throw InvalidArgumentError naming the argument', () => {
    try {
      requireNonBlank('  ', 'technology');
      expect.fail('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidArgumentError);
      expect(error).toMatchObject({
        message: 'The technology must not be null or empty.',
        argument: 'technology',
        code: ErrorCode.INPUT_INVALID,
      });
    }
  });

  it('should use a custom message when given', () => {
    expect(() => requireNonBlank(undefined, 'id', 'An ID is required.')).toThrow(
      'An ID is required.'
    );
  });
});
