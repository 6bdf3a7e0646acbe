/**
 * Error type definitions
 */

export enum ErrorType {
  CONFIG_ERROR = 'CONFIG_ERROR',
  CONNECTION_ERROR = 'CONNECTION_ERROR',
  TIMEOUT_ERROR = 'TIMEOUT_ERROR',
  SUPERSEDED_ERROR = 'SUPERSEDED_ERROR',
  REGISTRATION_ERROR = 'REGISTRATION_ERROR',
  CANCELLED_ERROR = 'CANCELLED_ERROR',
  PROTOCOL_ERROR = 'PROTOCOL_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export interface RelayErrorInfo {
  type: ErrorType;
  code: string;
  message: string;
  details?: unknown;
  recoverable: boolean;
}

export interface RelayErrorOptions {
  details?: unknown;
  recoverable?: boolean;
  cause?: unknown;
}

export class OAuthRelayError extends Error implements RelayErrorInfo {
  type: ErrorType;
  code: string;
  recoverable: boolean;
  details?: unknown;

  constructor(type: ErrorType, code: string, message: string, options?: RelayErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'OAuthRelayError';
    this.type = type;
    this.code = code;
    this.recoverable = options?.recoverable ?? true;
    this.details = options?.details;
  }

  toJSON(): RelayErrorInfo {
    return {
      type: this.type,
      code: this.code,
      message: this.message,
      details: this.details,
      recoverable: this.recoverable,
    };
  }
}

/**
 * The relay coordinator could not be reached, or dropped the connection
 */
export class OAuthConnectionError extends OAuthRelayError {
  constructor(code: string, message: string, options?: RelayErrorOptions) {
    super(ErrorType.CONNECTION_ERROR, code, message, options);
    this.name = 'OAuthConnectionError';
  }
}

/**
 * No callback arrived before the wait deadline
 */
export class OAuthTimeoutError extends OAuthRelayError {
  constructor(message: string, options?: RelayErrorOptions) {
    super(ErrorType.TIMEOUT_ERROR, 'WAIT_TIMEOUT', message, options);
    this.name = 'OAuthTimeoutError';
  }
}

/**
 * A newer single-slot registration displaced this one
 */
export class OAuthSupersededError extends OAuthRelayError {
  constructor(message = 'Registration was superseded by a newer wait without state') {
    super(ErrorType.SUPERSEDED_ERROR, 'SUPERSEDED', message);
    this.name = 'OAuthSupersededError';
  }
}

/**
 * The coordinator refused a registration
 */
export class OAuthRegistrationError extends OAuthRelayError {
  constructor(code: string, message: string, options?: RelayErrorOptions) {
    super(ErrorType.REGISTRATION_ERROR, code, message, { recoverable: false, ...options });
    this.name = 'OAuthRegistrationError';
  }
}

/**
 * The caller aborted the wait
 */
export class OAuthCancelledError extends OAuthRelayError {
  constructor(message = 'Wait for OAuth callback was cancelled', options?: RelayErrorOptions) {
    super(ErrorType.CANCELLED_ERROR, 'CANCELLED', message, options);
    this.name = 'OAuthCancelledError';
  }
}

/**
 * A malformed or out-of-sequence message on the relay socket
 */
export class ProtocolError extends OAuthRelayError {
  constructor(code: string, message: string, options?: RelayErrorOptions) {
    super(ErrorType.PROTOCOL_ERROR, code, message, { recoverable: false, ...options });
    this.name = 'ProtocolError';
  }
}

/**
 * Classify any thrown value into relay error info
 */
export function toRelayErrorInfo(error: unknown, context: string): RelayErrorInfo {
  if (error instanceof OAuthRelayError) {
    return error.toJSON();
  }

  const message = error instanceof Error ? error.message : String(error);
  const errnoCode = error instanceof Error && 'code' in error ? String(error.code) : undefined;

  if (errnoCode === 'ECONNREFUSED' || errnoCode === 'ENOENT' || errnoCode === 'ECONNRESET') {
    return {
      type: ErrorType.CONNECTION_ERROR,
      code: errnoCode,
      message: `Connection failed: ${context}`,
      details: message,
      recoverable: true,
    };
  }

  return {
    type: ErrorType.INTERNAL_ERROR,
    code: 'UNKNOWN_ERROR',
    message: `Unexpected error: ${context}`,
    details: message,
    recoverable: false,
  };
}
