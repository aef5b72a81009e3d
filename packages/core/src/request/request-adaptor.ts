import type { OutputOf, Payload, PayloadDefinition } from "../payload/payload";
import { RequestConsumedError } from "../shared/domain-error";
import { type CallMode, PendingCall } from "./pending-call";
import type { Request, SendCall, SendRefCall } from "./request";

/** What an adaptor sees when one of its pending calls is driven. */
export interface Interception<D extends PayloadDefinition> {
  readonly mode: CallMode;
  /** The payload as it was when `send()`/`sendRef()` was called. */
  readonly payload: Payload<D>;
  /** Aborted when the outer call is cancelled. */
  readonly signal: AbortSignal;
  /** Drive the inner call opened for this invocation. Never calling it skips the inner request. */
  forward(): Promise<OutputOf<D>>;
}

/**
 * Base class for request decorators (throttling, retries, caching, tracing).
 *
 * When `send()` or `sendRef()` is called, the adaptor snapshots the payload
 * and opens the inner call right away. Both are free of side effects because
 * inner calls are lazy. The policy in `intercept()` only runs once the outer
 * call is driven, and decides whether, when and how often to forward.
 */
export abstract class RequestAdaptor<D extends PayloadDefinition>
  implements Request<D>
{
  protected readonly inner: Request<D>;
  private readonly method: string;
  private consumed = false;

  constructor(inner: Request<D>) {
    this.inner = inner;
    this.method = inner.payload.method;
  }

  get payload(): Payload<D> {
    this.assertUsable();
    return this.inner.payload;
  }

  send(): SendCall<OutputOf<D>> {
    this.assertUsable();
    const payload = this.inner.payload.clone();
    const call = this.openInner("send");
    this.consumed = true;
    return new PendingCall("send", (signal) =>
      this.intercept({
        mode: "send",
        payload,
        signal,
        forward: () => call.run(signal),
      }),
    );
  }

  sendRef(): SendRefCall<OutputOf<D>> {
    this.assertUsable();
    const payload = this.inner.payload.clone();
    const call = this.openInner("sendRef");
    return new PendingCall("sendRef", (signal) =>
      this.intercept({
        mode: "sendRef",
        payload,
        signal,
        forward: () => call.run(signal),
      }),
    );
  }

  /** Open the inner call handed to `forward()`. By default the same entry point as the outer call. */
  protected openInner(mode: CallMode): PendingCall<OutputOf<D>> {
    return mode === "send" ? this.inner.send() : this.inner.sendRef();
  }

  protected abstract intercept(
    interception: Interception<D>,
  ): Promise<OutputOf<D>>;

  private assertUsable(): void {
    if (this.consumed) {
      throw new RequestConsumedError(this.method);
    }
  }
}
