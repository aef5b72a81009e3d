import {
  ApiError,
  type Interception,
  NetworkError,
  type OutputOf,
  type PayloadDefinition,
  PendingCall,
  type Request,
  RequestAdaptor,
} from "@botwire/core";
import type { RetryConfig } from "../config/types";
import type { TypedEventEmitter } from "../events/event-emitter";
import type { Logger } from "../logger/logger";
import { type Sleep, sleep } from "./sleep";

export interface RetryOptions {
  readonly events?: TypedEventEmitter;
  readonly logger?: Logger;
  readonly sleep?: Sleep;
}

type RetryableError = ApiError | NetworkError;

/**
 * Delay before the next attempt, or `undefined` when `error` is not worth
 * retrying. `attempt` is the attempt that just failed, starting at 1.
 */
export function retryDelay(
  error: RetryableError,
  attempt: number,
  policy: RetryConfig,
): number | undefined {
  if (error instanceof ApiError) {
    return error.retryAfter === undefined ? undefined : error.retryAfter * 1000;
  }
  return Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
}

/**
 * Retries rate-limited and network failures.
 *
 * Every attempt is its own `sendRef()` on the inner request, opened when this
 * adaptor is invoked, so all attempts send the same snapshot and the inner
 * request is never consumed.
 */
export class Retry<D extends PayloadDefinition> extends RequestAdaptor<D> {
  private readonly sleep: Sleep;

  constructor(
    inner: Request<D>,
    private readonly policy: RetryConfig,
    private readonly options: RetryOptions = {},
  ) {
    super(inner);
    this.sleep = options.sleep ?? sleep;
  }

  protected override openInner(): PendingCall<OutputOf<D>> {
    const method = this.inner.payload.method;
    const attempts = Array.from({ length: this.policy.maxAttempts }, () =>
      this.inner.sendRef(),
    );
    return new PendingCall("sendRef", (signal) =>
      this.attempt(method, attempts, signal),
    );
  }

  protected intercept({ forward }: Interception<D>): Promise<OutputOf<D>> {
    return forward();
  }

  private async attempt(
    method: string,
    calls: ReadonlyArray<PendingCall<OutputOf<D>>>,
    signal: AbortSignal,
  ): Promise<OutputOf<D>> {
    let attempt = 0;
    for (const call of calls) {
      attempt++;
      try {
        return await call.run(signal);
      } catch (err) {
        if (!(err instanceof ApiError || err instanceof NetworkError)) throw err;
        const delayMs = retryDelay(err, attempt, this.policy);
        if (delayMs === undefined || attempt >= calls.length) throw err;

        this.options.logger?.info(
          `${method} attempt ${attempt} failed (${err.code}), retrying in ${delayMs}ms`,
        );
        this.options.events?.emit("request:retry", {
          method,
          attempt,
          delayMs,
          error: err,
        });
        await this.sleep(delayMs, signal);
      }
    }
    throw new RangeError("Retry needs at least one attempt");
  }
}
