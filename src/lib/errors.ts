/**
 * Error taxonomy for the relay
 * Each error carries a stable machine-readable code and the HTTP status it maps to
 */

export type ErrorStatus = 400 | 401 | 500;

export type ValidationErrorCode =
  | 'invalid_request'
  | 'invalid_body'
  | 'missing_text'
  | 'invalid_text'
  | 'empty_text'
  | 'invalid_author'
  | 'invalid_languages'
  | 'invalid_flag';

export abstract class RelayError extends Error {
  abstract readonly status: ErrorStatus;
  readonly code: string;

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Bad or missing client input. Never retried. */
export class ValidationError extends RelayError {
  readonly status = 400;

  constructor(code: ValidationErrorCode, message: string) {
    super(code, message);
  }
}

export class AuthenticationError extends RelayError {
  readonly status = 401;

  constructor(message = 'Webhook signature verification failed') {
    super('invalid_signature', message);
  }
}

/** No credential or provider configured */
export class ProviderUnavailableError extends RelayError {
  readonly status = 500;

  constructor(message = 'No translation provider is configured') {
    super('provider_unavailable', message);
  }
}

/** The provider call failed or timed out. A single attempt is made per request. */
export class ProviderError extends RelayError {
  readonly status = 500;

  constructor(message: string, options?: ErrorOptions) {
    super('provider_error', message, options);
  }
}

export class MalformedProviderResponseError extends RelayError {
  readonly status = 500;

  constructor(message: string, options?: ErrorOptions) {
    super('malformed_provider_response', message, options);
  }
}

export function isRelayError(error: unknown): error is RelayError {
  return error instanceof RelayError;
}

/**
 * Safely extracts error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }

  return 'Unknown error occurred';
}
