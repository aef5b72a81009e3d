/**
 * Base class for every failure a pending call can settle with: serialization,
 * transport, decoding, an unsuccessful API response, or cancellation.
 */
export abstract class RequestError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/** Thrown when a payload cannot be encoded as JSON. Code: `serialization_failed`. */
export class SerializationError extends RequestError {
  readonly code = "serialization_failed";
  constructor(method: string, reason: string, options?: ErrorOptions) {
    super(`Cannot serialize ${method} payload: ${reason}`, options);
  }
}

type NetworkErrorCode = "network_timeout" | "endpoint_unreachable";

/** Thrown when the transport could not complete the call. Codes: `network_timeout`, `endpoint_unreachable`. */
export class NetworkError extends RequestError {
  readonly code: NetworkErrorCode;

  constructor(code: NetworkErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.code = code;
  }
}

type ApiErrorCode = "api_error" | "retry_after" | "chat_migrated";

/** Details reported by the remote service alongside `ok: false`. */
export interface ApiErrorDetails {
  readonly method: string;
  readonly description: string;
  readonly errorCode: number;
  /** Seconds to wait before repeating the call (flood control). */
  readonly retryAfter?: number;
  /** The group moved to a supergroup with this id. */
  readonly migrateToChatId?: number;
}

/**
 * Thrown when the remote service answered with `ok: false`.
 * Codes: `retry_after` (flood control), `chat_migrated`, `api_error`.
 */
export class ApiError extends RequestError {
  readonly code: ApiErrorCode;
  readonly method: string;
  readonly description: string;
  readonly errorCode: number;
  readonly retryAfter: number | undefined;
  readonly migrateToChatId: number | undefined;

  constructor(details: ApiErrorDetails) {
    super(`${details.method} failed (${details.errorCode}): ${details.description}`);
    this.method = details.method;
    this.description = details.description;
    this.errorCode = details.errorCode;
    this.retryAfter = details.retryAfter;
    this.migrateToChatId = details.migrateToChatId;
    if (details.retryAfter !== undefined) {
      this.code = "retry_after";
    } else if (details.migrateToChatId !== undefined) {
      this.code = "chat_migrated";
    } else {
      this.code = "api_error";
    }
  }
}

/** Thrown when a response body does not match the expected envelope or output. Code: `invalid_response`. */
export class DecodeError extends RequestError {
  readonly code = "invalid_response";
  readonly method: string;

  constructor(method: string, reason: string, options?: ErrorOptions) {
    super(`Invalid ${method} response: ${reason}`, options);
    this.method = method;
  }
}

/** Settles a pending call that was cancelled before it completed. Code: `request_cancelled`. */
export class RequestCancelledError extends RequestError {
  readonly code = "request_cancelled";
  constructor() {
    super("Request was cancelled");
  }
}
