import { RequestCancelledError, RequestError } from "./request-error";

/** `send` consumes its request, `sendRef` leaves it reusable. */
export type CallMode = "send" | "sendRef";

/** Settled outcome of a pending call, as returned by `settle()`. */
export type CallResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: RequestError };

export type CallExecutor<T> = (signal: AbortSignal) => Promise<T>;

function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new RequestCancelledError());
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

/**
 * A lazy, single-shot call. Nothing runs until the call is awaited (or
 * `run()`/`settle()` is used); awaiting it again shares the same outcome.
 *
 * Cancelling settles the call with {@link RequestCancelledError} right away and
 * aborts the signal handed to the executor; a result that arrives afterwards
 * is discarded.
 */
export class PendingCall<T, M extends CallMode = CallMode>
  implements PromiseLike<T>
{
  readonly mode: M;
  private readonly executor: CallExecutor<T>;
  private readonly controller = new AbortController();
  private outcome: Promise<T> | undefined;

  constructor(mode: M, executor: CallExecutor<T>) {
    this.mode = mode;
    this.executor = executor;
  }

  /** True once something has driven the call. */
  get started(): boolean {
    return this.outcome !== undefined;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  then<TResult1 = T, TResult2 = never>(
    onfulfilled?: ((value: T) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null,
  ): Promise<TResult1 | TResult2> {
    return this.start().then(onfulfilled, onrejected);
  }

  catch<TResult = never>(
    onrejected?: ((reason: unknown) => TResult | PromiseLike<TResult>) | null,
  ): Promise<T | TResult> {
    return this.start().catch(onrejected);
  }

  /** Drive the call, cancelling it when `parent` aborts. Used by adaptors to drive inner calls. */
  run(parent: AbortSignal): Promise<T> {
    if (parent.aborted) {
      this.cancel();
    } else {
      parent.addEventListener("abort", () => this.cancel(), { once: true });
    }
    return this.start();
  }

  /** Drive the call and resolve with its outcome instead of rejecting on request errors. */
  async settle(): Promise<CallResult<T>> {
    try {
      return { ok: true, value: await this.start() };
    } catch (error) {
      if (error instanceof RequestError) {
        return { ok: false, error };
      }
      throw error;
    }
  }

  cancel(): void {
    this.controller.abort();
  }

  private start(): Promise<T> {
    if (!this.outcome) {
      this.outcome = this.drive();
    }
    return this.outcome;
  }

  private async drive(): Promise<T> {
    const signal = this.controller.signal;
    if (signal.aborted) {
      throw new RequestCancelledError();
    }
    return untilAborted(this.executor(signal), signal);
  }
}
