import {
  type Interception,
  type OutputOf,
  type PayloadDefinition,
  type Request,
  RequestAdaptor,
  RequestCancelledError,
} from "@botwire/core";
import type { TypedEventEmitter } from "../events/event-emitter";
import type { Logger } from "../logger/logger";

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/** Logs each driven call and reports it as `request:*` events. */
export class Trace<D extends PayloadDefinition> extends RequestAdaptor<D> {
  constructor(
    inner: Request<D>,
    private readonly logger: Logger,
    private readonly events: TypedEventEmitter,
  ) {
    super(inner);
  }

  protected async intercept({
    mode,
    payload,
    forward,
  }: Interception<D>): Promise<OutputOf<D>> {
    const method = payload.method;
    const startedAt = Date.now();
    this.logger.debug(`${method} (${mode}) started`);
    this.events.emit("request:start", { method, mode });

    try {
      const value = await forward();
      const durationMs = Date.now() - startedAt;
      this.logger.info(`${method} succeeded in ${durationMs}ms`);
      this.events.emit("request:success", { method, mode, durationMs });
      return value;
    } catch (err) {
      const durationMs = Date.now() - startedAt;
      const error = toError(err);
      if (error instanceof RequestCancelledError) {
        this.logger.debug(`${method} cancelled after ${durationMs}ms`);
      } else {
        this.logger.warn(`${method} failed after ${durationMs}ms: ${error.message}`);
      }
      this.events.emit("request:failure", { method, mode, durationMs, error });
      throw err;
    }
  }
}
