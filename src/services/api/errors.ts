export type ConnectedCarErrorCode =
  | "AUTH_INVALID"
  | "AUTH_EXPIRED"
  | "RETRY_AFTER_REFRESH"
  | "PROTOCOL"
  | "PAIRING";

export class ConnectedCarError extends Error {
  readonly code: ConnectedCarErrorCode;

  constructor(code: ConnectedCarErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Credentials were rejected; a new login needs new credentials. */
export class AuthError extends ConnectedCarError {
  constructor(message = "Invalid credentials", options?: { cause?: unknown }) {
    super("AUTH_INVALID", message, options);
  }
}

/** The session expired and could not be refreshed; log in again. */
export class AuthExpiredError extends ConnectedCarError {
  constructor(message = "Authentication expired", options?: { cause?: unknown }) {
    super("AUTH_EXPIRED", message, options);
  }
}

/**
 * The access token was refreshed after a 401. The request itself was not
 * re-sent; the caller decides whether to issue it again.
 */
export class RetryAfterRefreshError extends ConnectedCarError {
  constructor(message = "Token refreshed, retry request") {
    super("RETRY_AFTER_REFRESH", message);
  }
}

export class ProtocolError extends ConnectedCarError {
  readonly status?: number;
  readonly body?: unknown;

  constructor(
    message: string,
    details: { status?: number; body?: unknown; cause?: unknown } = {},
  ) {
    super("PROTOCOL", message, { cause: details.cause });
    this.status = details.status;
    this.body = details.body;
  }
}

export class PairingError extends ConnectedCarError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PAIRING", message, options);
  }
}

/** Raised by a transport when no HTTP response was received. */
export class TransportError extends Error {
  readonly timedOut: boolean;

  constructor(message: string, options: { timedOut?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "TransportError";
    this.timedOut = options.timedOut ?? false;
  }
}
