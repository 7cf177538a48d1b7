export enum ErrorCode {
  CONFIG_INVALID = 'CONFIG_INVALID',
  IO_FILE_NOT_FOUND = 'IO_FILE_NOT_FOUND',
  INPUT_INVALID = 'INPUT_INVALID',
  MODEL_LOAD_FAILED = 'MODEL_LOAD_FAILED',
  MODEL_DUPLICATE_ELEMENT = 'MODEL_DUPLICATE_ELEMENT',
  MODEL_INVALID_RELATIONSHIP = 'MODEL_INVALID_RELATIONSHIP',
  MODEL_ELEMENT_NOT_FOUND = 'MODEL_ELEMENT_NOT_FOUND',
  INTERNAL_UNKNOWN = 'INTERNAL_UNKNOWN',
}
type ErrorContext = Record<string, string | number | boolean | null | undefined>;
export class C4GraphError extends Error {
  public readonly code: ErrorCode;
  public readonly userMessage: string;
  public readonly context: ErrorContext;
  public readonly recoverable: boolean;
  constructor(
    message: string,
    code: ErrorCode,
    userMessage?: string,
    context: ErrorContext = {},
    recoverable = false
  ) {
    super(message);
    this.name = 'C4GraphError';
    this.code = code;
    this.userMessage = userMessage ?? message;
    this.context = context;
    this.recoverable = recoverable;
    Error.captureStackTrace(this, C4GraphError);
  }
  static fromError(
    error: unknown,
    code = ErrorCode.INTERNAL_UNKNOWN,
    userMessage?: string
  ): C4GraphError {
    if (error instanceof C4GraphError) return error;
    const message = error instanceof Error ? error.message : String(error);
    const context = error instanceof Error ? { originalError: error.name } : {};
    return new C4GraphError(message, code, userMessage, context);
  }
}
export class ConfigurationError extends C4GraphError {
  constructor(message: string, configKey?: string) {
    super(
      message,
      ErrorCode.CONFIG_INVALID,
      `Configuration issue: ${message}`,
      { configKey },
      false
    );
    this.name = 'ConfigurationError';
  }
}

/** Which health-check rule rejected an argument. */
export type HealthCheckConstraint = 'name' | 'url-empty' | 'url-malformed' | 'interval' | 'timeout';

interface InvalidArgumentOptions {
  constraint?: HealthCheckConstraint;
  code?: ErrorCode;
  context?: ErrorContext;
}

/**
 * Raised synchronously at the offending call: blank names, malformed URLs,
 * negative numbers, missing relationship ends, duplicate names.
 */
export class InvalidArgumentError extends C4GraphError {
  public readonly argument: string;
  public readonly constraint?: HealthCheckConstraint;
  constructor(message: string, argument: string, options: InvalidArgumentOptions = {}) {
    super(
      message,
      options.code ?? ErrorCode.INPUT_INVALID,
      message,
      { ...options.context, argument, constraint: options.constraint },
      false
    );
    this.name = 'InvalidArgumentError';
    this.argument = argument;
    this.constraint = options.constraint;
  }
}

export class SerializationError extends C4GraphError {
  public readonly suggestions?: string[];
  constructor(
    message: string,
    userMessage?: string,
    context: ErrorContext = {},
    suggestions?: string[]
  ) {
    super(message, ErrorCode.MODEL_LOAD_FAILED, userMessage, context, false);
    this.name = 'SerializationError';
    this.suggestions = suggestions;
  }
  static fromLoadError(error: unknown): SerializationError {
    if (error instanceof SerializationError) {
      return error;
    }
    if (error instanceof Error) {
      return new SerializationError(
        error.message,
        `Could not load workspace: ${error.message}`,
        { originalError: error.name }
      );
    }
    return new SerializationError(String(error), `Could not load workspace: ${String(error)}`);
  }
}
