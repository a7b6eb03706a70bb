export class ContactNotFoundError extends Error {
  constructor(id: string) {
    super(`Contact not found: ${id}`);
    this.name = 'ContactNotFoundError';
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class StoreError extends Error {
  readonly operation: string;
  readonly path: string;

  constructor(operation: string, path: string, cause?: unknown) {
    super(`Failed to ${operation} ${path}${cause instanceof Error ? `: ${cause.message}` : ''}`, { cause });
    this.name = 'StoreError';
    this.operation = operation;
    this.path = path;
  }
}

export class ProviderError extends Error {
  readonly status?: number;
  readonly body?: string;

  constructor(provider: string, message: string, status?: number, body?: string) {
    const detail = status !== undefined ? ` (status ${status})${body ? `: ${body}` : ''}` : '';
    super(`[${provider}] ${message}${detail}`);
    this.name = 'ProviderError';
    this.status = status;
    this.body = body;
  }
}

export class SyncError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'SyncError';
  }
}

export class NotAuthenticatedError extends Error {
  constructor(message = 'Not authenticated: run the authorize command first') {
    super(message);
    this.name = 'NotAuthenticatedError';
  }
}

export class AuthorizationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'AuthorizationError';
  }
}

/** The callback's state parameter did not match the one issued with the authorization URL. */
export class StateMismatchError extends AuthorizationError {
  constructor() {
    super('State mismatch: possible CSRF attack, authorization aborted');
    this.name = 'StateMismatchError';
  }
}

export class AuthorizationCancelledError extends AuthorizationError {
  constructor() {
    super('Authorization cancelled');
    this.name = 'AuthorizationCancelledError';
  }
}

/** Node's fs errors carry a string `code`; anything else is not one of them. */
export function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

/**
 * Wrap a failed provider call. HTTP client errors (gaxios) carry the response;
 * its status and body are kept on the ProviderError.
 */
export function toProviderError(provider: string, message: string, err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;
  let status: number | undefined;
  let body: string | undefined;
  if (typeof err === 'object' && err !== null && 'response' in err) {
    const response = err.response;
    if (typeof response === 'object' && response !== null) {
      if ('status' in response && typeof response.status === 'number') status = response.status;
      if ('data' in response && response.data !== undefined) {
        body = typeof response.data === 'string' ? response.data : JSON.stringify(response.data);
      }
    }
  }
  const reason = err instanceof Error ? err.message : String(err);
  const wrapped = new ProviderError(provider, status === undefined ? `${message}: ${reason}` : message, status, body);
  wrapped.cause = err;
  return wrapped;
}
