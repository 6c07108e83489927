/**
 * Typed errors shared by the HTTP client and the chat session.
 *
 * Every error carries a machine-readable `code`. The chat session sorts them
 * into fatal and transient failures with {@link isFatalChatError}.
 */

export type ApiErrorBody = {
  status: number;
  message: string;
};

export class TrovoError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TrovoError";
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON() {
    return {
      error: {
        code: this.code,
        message: this.message,
        details: this.details
      }
    };
  }
}

/**
 * DNS, TLS or WebSocket handshake failure while opening the chat link.
 */
export class ConnectError extends TrovoError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CONNECT_ERROR", undefined, options);
    this.name = "ConnectError";
  }
}

export type LinkErrorReason = "closed" | "errored" | "stale" | "protocol";

/**
 * Mid-session failure of an open link.
 */
export class LinkError extends TrovoError {
  constructor(
    message: string,
    public readonly reason: LinkErrorReason,
    details?: { closeCode?: number; closeReason?: string; nonce?: string | null; errorCode?: number | null },
    options?: { cause?: unknown }
  ) {
    super(message, "LINK_ERROR", details, options);
    this.name = "LinkError";
  }
}

/**
 * A single inbound frame, or a single chat entry inside a batch, could not be decoded.
 */
export class DecodeError extends TrovoError {
  constructor(
    message: string,
    public readonly raw: unknown,
    details?: unknown
  ) {
    super(message, "DECODE_ERROR", details);
    this.name = "DecodeError";
  }
}

export type AuthErrorReason = "TOKEN_EXPIRED" | "REFRESH_REJECTED" | "MISSING_TOKEN";

/**
 * The token provider cannot produce a usable access token.
 */
export class AuthError extends TrovoError {
  constructor(
    message: string,
    public readonly reason: AuthErrorReason,
    options?: { cause?: unknown }
  ) {
    super(message, "AUTH_ERROR", { reason }, options);
    this.name = "AuthError";
  }
}

type RequestErrorInit = {
  httpStatus?: number;
  apiError?: ApiErrorBody;
  cause?: unknown;
};

/**
 * Plain API request failure: network, 5xx, or a platform error that does not
 * concern the caller's credentials.
 */
export class RequestError extends TrovoError {
  readonly httpStatus: number | null;
  readonly apiError: ApiErrorBody | null;

  constructor(message: string, init: RequestErrorInit = {}) {
    super(message, "REQUEST_ERROR", { httpStatus: init.httpStatus, apiError: init.apiError }, { cause: init.cause });
    this.name = "RequestError";
    this.httpStatus = init.httpStatus ?? null;
    this.apiError = init.apiError ?? null;
  }
}

/**
 * The platform rejected the access token used for an authenticated request.
 */
export class AuthenticatedRequestError extends TrovoError {
  readonly httpStatus: number | null;
  readonly apiError: ApiErrorBody | null;

  constructor(message: string, init: RequestErrorInit = {}) {
    super(
      message,
      "AUTHENTICATED_REQUEST_ERROR",
      { httpStatus: init.httpStatus, apiError: init.apiError },
      { cause: init.cause }
    );
    this.name = "AuthenticatedRequestError";
    this.httpStatus = init.httpStatus ?? null;
    this.apiError = init.apiError ?? null;
  }
}

export class ConfigurationError extends TrovoError {
  constructor(message: string, details?: unknown) {
    super(message, "CONFIGURATION_ERROR", details);
    this.name = "ConfigurationError";
  }
}

export type ChatError =
  | ConnectError
  | LinkError
  | DecodeError
  | AuthError
  | RequestError
  | AuthenticatedRequestError;

export function isFatalChatError(error: unknown): error is AuthError | AuthenticatedRequestError {
  return error instanceof AuthError || error instanceof AuthenticatedRequestError;
}

/**
 * Narrow an unknown failure to a {@link ChatError}; anything foreign becomes a
 * transient link error.
 */
export function toChatError(error: unknown): ChatError {
  if (
    error instanceof ConnectError ||
    error instanceof LinkError ||
    error instanceof DecodeError ||
    error instanceof AuthError ||
    error instanceof RequestError ||
    error instanceof AuthenticatedRequestError
  ) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new LinkError(message, "errored", undefined, { cause: error });
}
