// convert any error to ProxyError (preserves ProxyError subclasses)
export function toProxyError(error: unknown): ProxyError {
  // already a ProxyError, return as-is
  if (error instanceof ProxyError) {
    return error;
  }

  // extract message from Error or convert unknown to string
  const message =
    error instanceof Error ? error.message : String(error) || 'An unknown error occurred';

  const codedError = new (class extends ProxyError {})(message);

  // if it's an Error, preserve the original error properties
  if (error instanceof Error) {
    codedError.name = error.name;
    codedError.stack = error.stack;
  } else {
    codedError.name = 'ProxyError';
  }

  return codedError;
}

// base error class for custom errors with codes
// matches Node.js SystemError structure
export class ProxyError extends Error {
  public code: number;
  public errno: number;
  public syscall: string;

  constructor(message: string) {
    super(message);
    this.name = 'ProxyError';

    // code: numeric error code (set by subclass property initializer or defaults to -1)
    // errno: always equals code
    this.code = -1;
    this.errno = -1;
    this.syscall = 'dns-proxy';

    Object.setPrototypeOf(this, new.target.prototype);

    // Maintain proper stack trace (Node.js only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// malformed rule, pool reference or cache setting; only thrown at start-up
export class ConfigurationError extends ProxyError {
  public code = 500; // Internal Server Error

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.errno = this.code;
  }
}

// malformed wire-format query
export class ParsingError extends ProxyError {
  public code = 422; // Unprocessable Entity

  constructor(message: string) {
    super(message);
    this.name = 'ParsingError';
    this.errno = this.code;
  }
}

// the backend collaborator threw instead of answering
export class BackendError extends ProxyError {
  public code = 502; // Bad Gateway
  public pool: string;

  constructor(message: string, pool: string) {
    super(message);
    this.name = 'BackendError';
    this.errno = this.code;
    this.pool = pool;
  }
}
