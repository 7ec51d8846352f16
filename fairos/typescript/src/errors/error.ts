/**
 * Error type for the FairOS-dfs client.
 */

/**
 * Error codes for FairOS errors.
 */
export enum FairOSErrorCode {
  /** Could not connect to or resolve the server. */
  TransportUnreachable = 'transport_unreachable',
  /** Server answered with a non-2xx status and an error envelope. */
  RemoteRejected = 'remote_rejected',
  /** Response body did not match the expected shape. */
  DecodeFailed = 'decode_failed',
  /** Request was aborted by the caller. */
  Aborted = 'aborted',
  /** Configuration error. */
  Configuration = 'configuration_error',
  /** Invalid argument supplied by the caller. */
  Validation = 'validation_error',
  /** No session token is held for the user. */
  NotLoggedIn = 'not_logged_in',
  /** Expression branch the query compiler cannot express. */
  UnsupportedExpression = 'unsupported_expression',
  /** Seek stream misuse. */
  Stream = 'stream_error',
  /** Remote rejection mapped onto an entity domain. */
  Domain = 'domain_error',
}

/**
 * Entity domains that remote rejections are mapped onto.
 */
export type ErrorDomain = 'user' | 'pod' | 'filesystem' | 'kv' | 'document';

/**
 * Known domain error kinds. `error` is the catch-all of every domain.
 */
export type DomainErrorKind =
  | 'error'
  | 'username_already_exists'
  | 'invalid_username'
  | 'invalid_password';

/**
 * Additional error details.
 */
export interface FairOSErrorDetails {
  /** HTTP status code. */
  statusCode?: number;
  /** Message from the server's error envelope. */
  remoteMessage?: string;
  /** Code from the server's error envelope. */
  remoteCode?: number;
  /** Entity domain for domain errors. */
  domain?: ErrorDomain;
  /** Kind within the domain. */
  kind?: DomainErrorKind;
  /** Parameter that caused the error. */
  param?: string;
  /** Original error. */
  cause?: Error;
}

/**
 * FairOS client error.
 */
export class FairOSError extends Error {
  /** Error code. */
  readonly code: FairOSErrorCode;

  /** Additional error details. */
  readonly details: FairOSErrorDetails;

  constructor(code: FairOSErrorCode, message: string, details: FairOSErrorDetails = {}) {
    super(message);
    this.name = 'FairOSError';
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FairOSError);
    }
  }

  /**
   * Returns true if this error is likely to succeed on retry.
   * Only connection failures qualify; rejections are the server's answer.
   */
  isRetryable(): boolean {
    return this.code === FairOSErrorCode.TransportUnreachable;
  }

  /**
   * Returns true if this is a domain error of the given domain (and kind).
   */
  is(domain: ErrorDomain, kind?: DomainErrorKind): boolean {
    if (this.code !== FairOSErrorCode.Domain || this.details.domain !== domain) {
      return false;
    }
    return kind === undefined || this.details.kind === kind;
  }

  /**
   * Creates a transport failure error.
   */
  static unreachable(message: string, cause?: Error): FairOSError {
    return new FairOSError(FairOSErrorCode.TransportUnreachable, message, { cause });
  }

  /**
   * Creates a remote rejection error.
   */
  static rejected(message: string, remoteCode: number, statusCode: number): FairOSError {
    return new FairOSError(FairOSErrorCode.RemoteRejected, message, {
      remoteMessage: message,
      remoteCode,
      statusCode,
    });
  }

  /**
   * Creates a decode error.
   */
  static decode(message: string, cause?: Error): FairOSError {
    return new FairOSError(FairOSErrorCode.DecodeFailed, message, { cause });
  }

  /**
   * Creates an aborted error.
   */
  static aborted(message = 'Request aborted'): FairOSError {
    return new FairOSError(FairOSErrorCode.Aborted, message);
  }

  /**
   * Creates a configuration error.
   */
  static configuration(message: string): FairOSError {
    return new FairOSError(FairOSErrorCode.Configuration, message);
  }

  /**
   * Creates a validation error.
   */
  static validation(message: string, param?: string): FairOSError {
    return new FairOSError(FairOSErrorCode.Validation, message, { param });
  }

  /**
   * Creates a not-logged-in error.
   */
  static notLoggedIn(username: string): FairOSError {
    return new FairOSError(FairOSErrorCode.NotLoggedIn, `No session for user "${username}"`);
  }

  /**
   * Creates an unsupported expression error.
   */
  static unsupportedExpression(message: string): FairOSError {
    return new FairOSError(FairOSErrorCode.UnsupportedExpression, message);
  }

  /**
   * Creates a stream error.
   */
  static stream(message: string): FairOSError {
    return new FairOSError(FairOSErrorCode.Stream, message);
  }

  /**
   * Creates a domain error.
   */
  static domain(
    domain: ErrorDomain,
    kind: DomainErrorKind,
    message: string,
    details: FairOSErrorDetails = {}
  ): FairOSError {
    return new FairOSError(FairOSErrorCode.Domain, message, { ...details, domain, kind });
  }

  /**
   * Converts to JSON.
   */
  toJSON(): Record<string, unknown> {
    const { cause, ...details } = this.details;
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: cause ? { ...details, cause: cause.message } : details,
    };
  }
}

/**
 * Type guard for FairOSError.
 */
export function isFairOSError(error: unknown): error is FairOSError {
  return error instanceof FairOSError;
}

/**
 * Checks if an error is retryable.
 */
export function isRetryableError(error: unknown): boolean {
  if (isFairOSError(error)) {
    return error.isRetryable();
  }
  return false;
}
