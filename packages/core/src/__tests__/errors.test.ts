import { describe, it, expect } from 'vitest';
import {
  C4GraphError,
  ConfigurationError,
  ErrorCode,
  InvalidArgumentError,
  SerializationError,
} from '../errors.js';

describe('C4GraphError', () => {
  it('should fall back to the message for userMessage', () => {
    const error = new C4GraphError('boom', ErrorCode.INTERNAL_UNKNOWN);

    expect(error.userMessage).toBe('boom');
    expect(error.context).toEqual({});
    expect(error.recoverable).toBe(false);
    expect(error.name).toBe('C4GraphError');
  });

  it('should return existing C4GraphErrors from fromError', () => {
    const original = new C4GraphError('boom', ErrorCode.INPUT_INVALID);
    expect(C4GraphError.fromError(original)).toBe(original);
  });

  it('should wrap other errors with their name in the context', () => {
    const wrapped = C4GraphError.fromError(new TypeError('bad type'), ErrorCode.INPUT_INVALID);

    expect(wrapped.message).toBe('bad type');
    expect(wrapped.code).toBe(ErrorCode.INPUT_INVALID);
    expect(wrapped.context).toEqual({ originalError: 'TypeError' });
  });

  it('should wrap non-error values', () => {
    const wrapped = C4GraphError.fromError('plain string');

    expect(wrapped.message).toBe('plain string');
    expect(wrapped.code).toBe(ErrorCode.INTERNAL_UNKNOWN);
  });
});

describe('ConfigurationError', () => {
  it('should prefix the user message', () => {
    const error = new ConfigurationError('bad value', 'output.format');

    expect(error.code).toBe(ErrorCode.CONFIG_INVALID);
    expect(error.userMessage).toBe('Configuration issue: bad value');
    expect(error.context).toEqual({ configKey: 'output.format' });
  });
});

describe('InvalidArgumentError', () => {
  it('should record the argument and constraint', () => {
    const error = new InvalidArgumentError('The URL must not be null or empty.', 'url', {
      constraint: 'url-empty',
    });

    expect(error).toBeInstanceOf(C4GraphError);
    expect(error.name).toBe('InvalidArgumentError');
    expect(error.code).toBe(ErrorCode.INPUT_INVALID);
    expect(error.argument).toBe('url');
    expect(error.constraint).toBe('url-empty');
    expect(error.context).toEqual({ argument: 'url', constraint: 'url-empty' });
  });

  it('should accept a more specific code', () => {
    const error = new InvalidArgumentError('duplicate', 'name', {
      code: ErrorCode.MODEL_DUPLICATE_ELEMENT,
    });

    expect(error.code).toBe(ErrorCode.MODEL_DUPLICATE_ELEMENT);
    expect(error.constraint).toBeUndefined();
  });
});

describe('SerializationError', () => {
  it('should keep an existing SerializationError', () => {
    const original = new SerializationError('dangling', undefined, {}, ['fix it']);
    expect(SerializationError.fromLoadError(original)).toBe(original);
  });

  it('should wrap other errors as load failures', () => {
    const error = SerializationError.fromLoadError(new Error('disk on fire'));

    expect(error.code).toBe(ErrorCode.MODEL_LOAD_FAILED);
    expect(error.userMessage).toBe('Could not load workspace: disk on fire');
    expect(error.context).toEqual({ originalError: 'Error' });
    expect(error.suggestions).toBeUndefined();
  });
});
