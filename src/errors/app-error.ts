export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details: Record<string, unknown>;

  constructor(
    message: string,
    statusCode = 500,
    code = 'INTERNAL_ERROR',
    details: Record<string, unknown> = {},
    options?: ErrorOptions
  ) {
    super(message, options);
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Failures raised by the token gate before the origin is contacted.
 *
 * Messages are fixed per class so nothing the client submitted (token,
 * signature) or the gate computed is reflected in the response.
 */
export abstract class GateError extends AppError {}

export class ConfigError extends GateError {
  constructor(details?: Record<string, unknown>) {
    super('Gate signing configuration is unusable', 400, 'CONFIG_ERROR', details);
  }
}

export class MissingParameterError extends GateError {
  constructor(parameter: string) {
    super('Missing token parameter', 400, 'MISSING_PARAMETER', { parameter });
  }
}

export class MalformedTokenError extends GateError {
  constructor(reason: string) {
    super('Invalid token format', 403, 'MALFORMED_TOKEN', { reason });
  }
}

export class MissingClientIdentityError extends GateError {
  constructor() {
    super('Client identity unavailable', 403, 'MISSING_CLIENT_IDENTITY');
  }
}

export class InvalidSignatureError extends GateError {
  constructor() {
    super('Invalid or expired token', 403, 'INVALID_SIGNATURE');
  }
}

export class ExpiredTokenError extends GateError {
  constructor(details?: Record<string, unknown>) {
    super('Invalid or expired token', 403, 'EXPIRED_TOKEN', details);
  }
}

export class ForwardingError extends AppError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    options?: ErrorOptions
  ) {
    super(message, 500, 'FORWARDING_ERROR', details, options);
  }
}

/** The client went away before the origin answered; nothing is sent back. */
export class RequestCanceledError extends AppError {
  constructor(details?: Record<string, unknown>) {
    super('Request was canceled', 499, 'REQUEST_CANCELED', details);
  }
}

export class MethodNotAllowedError extends AppError {
  /** Value for the `Allow` response header. */
  readonly allow: string;

  constructor(method: string, allowedMethods: readonly string[]) {
    super('Method not allowed', 405, 'METHOD_NOT_ALLOWED', { method });
    this.allow = allowedMethods.join(', ');
  }
}
