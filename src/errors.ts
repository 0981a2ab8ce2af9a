export class CodeReviewError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CodeReviewError';
  }
}

/** Bad user input: missing code, unknown dimension, unreadable file. */
export class InputError extends CodeReviewError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InputError';
  }
}

export class ConfigError extends CodeReviewError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export class GitAccessError extends CodeReviewError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GitAccessError';
  }
}

export type ApiErrorKind =
  | 'auth'
  | 'rate-limit'
  | 'timeout'
  | 'network'
  | 'server'
  | 'blocked'
  | 'invalid-response';

export class ApiError extends CodeReviewError {
  constructor(
    message: string,
    public readonly kind: ApiErrorKind,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ApiError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
