import {
  ChatId,
  type Interception,
  isPlainRecord,
  type OutputOf,
  type Payload,
  type PayloadDefinition,
  type Request,
  RequestAdaptor,
} from "@botwire/core";
import type { RateLimiter } from "./rate-limiter";

function chatKeyOf<D extends PayloadDefinition>(
  payload: Payload<D>,
): string | undefined {
  const required: unknown = payload.required;
  if (!isPlainRecord(required)) return undefined;
  const chatId = required["chat_id"];
  return chatId instanceof ChatId ? chatId.toString() : undefined;
}

/** Holds each call until the shared rate limiter admits it. */
export class Throttle<D extends PayloadDefinition> extends RequestAdaptor<D> {
  constructor(
    inner: Request<D>,
    private readonly limiter: RateLimiter,
  ) {
    super(inner);
  }

  protected async intercept({
    payload,
    signal,
    forward,
  }: Interception<D>): Promise<OutputOf<D>> {
    await this.limiter.acquire(chatKeyOf(payload), signal);
    return forward();
  }
}
