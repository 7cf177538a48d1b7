import { C4GraphError, ErrorCode, SerializationError } from '@c4graph/core';
import { Logger } from './cli-helpers.js';

function provideSuggestions(error: C4GraphError): void {
  const suggestions: Partial<Record<ErrorCode, string[]>> = {
    [ErrorCode.IO_FILE_NOT_FOUND]: [
      'Double-check the workspace file path',
      'Confirm file permissions allow reading',
      'Make sure you are in the right directory',
    ],
    [ErrorCode.MODEL_LOAD_FAILED]: [
      'Ensure the file is a workspace JSON document',
      'Every element needs an id and a name',
    ],
    [ErrorCode.MODEL_DUPLICATE_ELEMENT]: [
      'Element names must be unique within their parent',
      'Element and relationship ids must be unique across the workspace',
    ],
    [ErrorCode.CONFIG_INVALID]: ['Check the C4GRAPH_* environment variables and your .env file'],
  };
  let errorSuggestions = suggestions[error.code];
  if (error instanceof SerializationError && error.suggestions && error.suggestions.length > 0) {
    errorSuggestions = error.suggestions;
  }
  if (errorSuggestions && errorSuggestions.length > 0) {
    console.error('\n💡 Hints:');
    errorSuggestions.forEach((suggestion) => {
      Logger.info(`• ${suggestion}`);
    });
  }
}

const SENSITIVE_KEYS = new Set([
  'token',
  'apikey',
  'api_key',
  'secret',
  'password',
  'authorization',
  'credential',
]);

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

export const ErrorHandler = {
  formatError(error: unknown): void {
    if (error instanceof C4GraphError) {
      Logger.fail(error.userMessage);
      const details = Object.entries(error.context).filter(
        ([, value]) => value !== undefined && value !== null
      );
      if (details.length > 0) {
        console.error('   Extra details:');
        for (const [key, value] of details) {
          console.error(`   ${key}: ${isSensitiveKey(key) ? '***REDACTED***' : String(value)}`);
        }
      }
      console.error(`   Code: ${error.code}`);
      provideSuggestions(error);
    } else if (error instanceof Error) {
      Logger.fail(error.message);
    } else {
      Logger.fail(`Something went wrong unexpectedly: ${String(error)}`);
    }
  },
  getExitCode(error: unknown): number {
    if (error instanceof C4GraphError) {
      switch (error.code) {
        case ErrorCode.CONFIG_INVALID:
        case ErrorCode.INPUT_INVALID:
        case ErrorCode.MODEL_DUPLICATE_ELEMENT:
        case ErrorCode.MODEL_INVALID_RELATIONSHIP:
          return 2;
        case ErrorCode.IO_FILE_NOT_FOUND:
          return 3;
        default:
          return 1;
      }
    }
    return 1;
  },
  handleCliError(error: unknown): never {
    ErrorHandler.formatError(error);
    const exitCode = ErrorHandler.getExitCode(error);
    process.exit(exitCode);
  },
} as const;
