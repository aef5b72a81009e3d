import {
  type Interception,
  type OutputOf,
  type PayloadDefinition,
  type Request,
  RequestAdaptor,
} from "@botwire/core";
import type { ResponseCache } from "./response-cache";

/** Answers from the cache when an equal payload already succeeded. Failures are not stored. */
export class Cache<D extends PayloadDefinition> extends RequestAdaptor<D> {
  constructor(
    inner: Request<D>,
    private readonly cache: ResponseCache<OutputOf<D>>,
  ) {
    super(inner);
  }

  protected async intercept({
    payload,
    forward,
  }: Interception<D>): Promise<OutputOf<D>> {
    const key = payload.key();
    const hit = this.cache.lookup(key);
    if (hit) return hit.value;

    const value = await forward();
    this.cache.store(key, value);
    return value;
  }
}
