/** Base class for all domain-level errors. Provides a stable machine-readable `code`. */
export abstract class DomainError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/** Thrown when a value cannot be used as a chat identifier. Code: `invalid_chat_id`. */
export class InvalidChatIdError extends DomainError {
  readonly code = "invalid_chat_id";
  constructor(input: string, reason: string) {
    super(`Invalid chat id "${input}": ${reason}`);
  }
}

/** A single rejected field reported by {@link InvalidPayloadError}. */
export interface PayloadFieldIssue {
  readonly path: string;
  readonly message: string;
}

/** Thrown when a payload field value violates its domain rules. Code: `invalid_payload_field`. */
export class InvalidPayloadError extends DomainError {
  readonly code = "invalid_payload_field";
  readonly method: string;
  readonly issues: readonly PayloadFieldIssue[];

  constructor(method: string, issues: readonly PayloadFieldIssue[]) {
    const lines = issues.map((issue) => `  - ${issue.path}: ${issue.message}`);
    super(`Invalid ${method} payload:\n${lines.join("\n")}`);
    this.method = method;
    this.issues = issues;
  }
}

/** Thrown when a request is used after `send()` consumed it. Code: `request_consumed`. */
export class RequestConsumedError extends DomainError {
  readonly code = "request_consumed";
  constructor(method: string) {
    super(
      `The ${method} request was consumed by send(). Use sendRef() to send a request more than once`,
    );
  }
}
