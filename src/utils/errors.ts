/**
 * Error hierarchy for the event kit.
 *
 * Every error carries a `statusCode` so the global error handler can answer
 * without knowing the concrete class. Messages never include secrets or tokens.
 */
export class FrameioKitError extends Error {
  statusCode = 500;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class SignatureVerificationError extends FrameioKitError {
  statusCode = 401;

  constructor(message = 'Request signature verification failed') {
    super(message);
  }
}

export class SecretResolutionError extends FrameioKitError {
  statusCode = 503;
  readonly eventType: string;

  constructor(eventType: string, message?: string, options?: { cause?: unknown }) {
    super(message ?? `Failed to resolve secret for event type '${eventType}'`, options);
    this.eventType = eventType;
    if (options?.cause instanceof InstallationNotFoundError) {
      this.statusCode = 401;
    }
  }
}

export class EventValidationError extends FrameioKitError {
  statusCode = 422;
  readonly eventType: string;
  readonly issues: string[];

  constructor(eventType: string, issues: string[]) {
    super(`Validation failed for event '${eventType}': ${issues.join('; ')}`);
    this.eventType = eventType;
    this.issues = issues;
  }
}

/** Malformed inbound request (bad JSON, missing type or timestamp). */
export class BadRequestError extends FrameioKitError {
  statusCode = 400;
}

export class HandlerNotFoundError extends FrameioKitError {
  statusCode = 404;
  readonly eventType: string;

  constructor(eventType: string) {
    super(`No handler registered for event type '${eventType}'`);
    this.eventType = eventType;
  }
}

export class ConfigurationError extends FrameioKitError {
  statusCode = 500;
}

export class OAuthError extends FrameioKitError {}

export class TokenExchangeError extends OAuthError {
  statusCode = 502;
}

/**
 * Refresh failed. The stored token has already been purged by the time this
 * is thrown; the caller must send the user through authorization again.
 */
export class TokenRefreshError extends OAuthError {
  statusCode = 401;
}

/** Non-2xx answer from the identity provider's token endpoint. */
export class OAuthHttpError extends OAuthError {
  statusCode = 502;
  readonly status: number;

  constructor(status: number, message?: string) {
    super(message ?? `Token endpoint responded with HTTP ${status}`);
    this.status = status;
  }
}

export class InvalidTokenError extends FrameioKitError {
  constructor(message = 'Encrypted data is invalid or was tampered with', options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class InstallationError extends FrameioKitError {}

export class InstallationNotFoundError extends InstallationError {
  statusCode = 404;
}

export class InstallationExistsError extends InstallationError {
  statusCode = 409;
}

/** Non-2xx answer from the Frame.io platform API. */
export class PlatformApiError extends FrameioKitError {
  statusCode = 502;
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.status = status;
  }
}

/** A handler-context accessor was used where its value is not available. */
export class ContextError extends FrameioKitError {}
