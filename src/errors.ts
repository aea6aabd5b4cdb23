// wrap a thrown value as a WhoisError, the original kept as its cause
export function toWhoisError(error: unknown): WhoisError {
  if (error instanceof WhoisError) {
    return error;
  }
  if (!(error instanceof Error)) {
    return new WhoisError(String(error) || 'Unknown whois failure');
  }

  const wrapped = new WhoisError(error.message);
  wrapped.name = error.name;
  wrapped.stack = error.stack;
  wrapped.cause = error;
  return wrapped;
}

// base error class for custom errors with codes
// matches Node.js SystemError structure
export class WhoisError extends Error {
  public code: number;
  public errno: number;
  public syscall: string;

  constructor(message: string) {
    super(message);
    this.name = 'WhoisError';

    // SystemError-like properties, subclasses set code and errno together
    this.code = -1;
    this.errno = -1;
    this.syscall = 'whois';

    Object.setPrototypeOf(this, new.target.prototype);

    // Maintain proper stack trace (Node.js only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// base class for errors raised while talking to a specific whois server
export class TransportError extends WhoisError {
  public server: string;

  constructor(message: string, server: string) {
    super(message);
    this.name = 'TransportError';
    this.server = server;
  }
}

// query is empty after normalization
export class EmptyQueryError extends WhoisError {
  public code = 400; // Bad Request

  constructor(message = 'Query is empty') {
    super(message);
    this.name = 'EmptyQueryError';
    this.errno = this.code;
  }
}

// no override, no cached mapping, and discovery found no server
export class ServerNotFoundError extends WhoisError {
  public code = 404; // Not Found

  constructor(message: string) {
    super(message);
    this.name = 'ServerNotFoundError';
    this.errno = this.code;
  }
}

// connection to the whois server failed
export class ConnectError extends TransportError {
  public code = 503; // Service Unavailable

  constructor(message: string, server: string) {
    super(message, server);
    this.name = 'ConnectError';
    this.errno = this.code;
  }
}

// writing the query line failed
export class SendError extends TransportError {
  public code = 502; // Bad Gateway

  constructor(message: string, server: string) {
    super(message, server);
    this.name = 'SendError';
    this.errno = this.code;
  }
}

// reading the response failed
export class ReadError extends TransportError {
  public code = 502; // Bad Gateway

  constructor(message: string, server: string) {
    super(message, server);
    this.name = 'ReadError';
    this.errno = this.code;
  }
}

// query deadline exceeded
export class TimeoutError extends WhoisError {
  public code = 408; // Request Timeout

  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
    this.errno = this.code;
  }
}

// AbortSignal cancellation error
export class AbortError extends WhoisError {
  public code = 499; // Client Closed Request

  constructor(message: string) {
    super(message);
    this.name = 'AbortError';
    this.errno = this.code;
  }
}

// server directory could not be loaded, whois resolution is unavailable
export class DirectoryInitError extends WhoisError {
  public code = 500; // Internal Server Error

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'DirectoryInitError';
    this.errno = this.code;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

// invalid client configuration
export class ConfigurationError extends WhoisError {
  public code = 500; // Internal Server Error

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.errno = this.code;
  }
}
