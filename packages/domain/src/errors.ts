export class RelayError extends Error {
  constructor(
    readonly code: string,
    readonly statusCode: number,
    message?: string,
    options?: { cause?: unknown }
  ) {
    super(message ?? code, options);
    this.name = new.target.name;
  }
}

export class AuthFailure extends RelayError {
  constructor(code = 'forbidden', message?: string) {
    super(code, 403, message);
  }
}

export class ValidationFailure extends RelayError {
  constructor(code: string, message?: string) {
    super(code, 400, message);
  }
}

export class UpstreamFailure extends RelayError {
  constructor(
    code: string,
    message?: string,
    readonly upstreamStatus?: number,
    options?: { cause?: unknown }
  ) {
    super(code, 502, message, options);
  }
}

export class ParseFailure extends RelayError {
  constructor(code: string, message?: string, readonly responseBody?: string) {
    super(code, 502, message);
  }
}

export class StorageFailure extends RelayError {
  constructor(code: string, options?: { cause?: unknown }) {
    super(code, 500, undefined, options);
  }
}

export class LockTimeout extends RelayError {
  constructor(readonly lockPath: string, readonly timeoutMs: number) {
    super('lock_timeout', 503, `lock ${lockPath} not acquired within ${timeoutMs}ms`);
  }
}

export function isRelayError(error: unknown): error is RelayError {
  return error instanceof RelayError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
