import type { OutputOf, Payload, PayloadDefinition } from "../payload/payload";
import type { PendingCall } from "./pending-call";

/** Pending call returned by `send()`. */
export type SendCall<T> = PendingCall<T, "send">;

/** Pending call returned by `sendRef()`. */
export type SendRefCall<T> = PendingCall<T, "sendRef">;

/**
 * A payload bound to a transport, ready to be sent.
 *
 * Implementations must stay lazy: `send()` and `sendRef()` only describe the
 * call. Serializing, transmitting and decoding all happen inside the returned
 * pending call, once it is driven. Adaptors rely on this to delay, retry or
 * skip the inner call without it having done anything irreversible.
 */
export interface Request<D extends PayloadDefinition> {
  /**
   * The owned payload, open to mutation between `sendRef()` calls.
   * @throws RequestConsumedError after `send()`.
   */
  readonly payload: Payload<D>;

  /**
   * Send this request, consuming it.
   * @throws RequestConsumedError if the request was already consumed.
   */
  send(): SendCall<OutputOf<D>>;

  /**
   * Send this request without consuming it, so it can be changed and sent
   * again. The call sends the payload as it is at the moment of this call.
   * @throws RequestConsumedError if the request was already consumed.
   */
  sendRef(): SendRefCall<OutputOf<D>>;
}
