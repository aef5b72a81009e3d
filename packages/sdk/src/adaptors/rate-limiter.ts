import { RequestCancelledError } from "@botwire/core";
import { Mutex } from "async-mutex";
import type { ThrottleConfig } from "../config/types";
import { type Clock, type Sleep, sleep } from "./sleep";

interface SlidingWindow {
  readonly limit: number;
  readonly windowMs: number;
}

export interface RateLimiterOptions {
  readonly clock?: Clock;
  readonly sleep?: Sleep;
}

/** Milliseconds until `hits` has room for another call, after dropping hits older than the window. */
function waitFor(hits: number[], window: SlidingWindow, now: number): number {
  while (hits.length > 0 && (hits[0] ?? now) <= now - window.windowMs) {
    hits.shift();
  }
  if (hits.length < window.limit) return 0;
  const oldest = hits[0] ?? now;
  return oldest + window.windowMs - now;
}

/**
 * Sliding-window limiter with one global window and one window per chat.
 *
 * Callers are admitted one at a time in arrival order; a caller that has to
 * wait holds the queue until its slot opens. A cancelled caller leaves the
 * queue without taking a slot.
 */
export class RateLimiter {
  private readonly mutex = new Mutex();
  private readonly global: SlidingWindow;
  private readonly perChat: SlidingWindow;
  private readonly globalHits: number[] = [];
  private readonly chatHits = new Map<string, number[]>();
  private readonly clock: Clock;
  private readonly sleep: Sleep;

  constructor(config: ThrottleConfig, options: RateLimiterOptions = {}) {
    this.global = { limit: config.globalLimit, windowMs: config.globalWindowMs };
    this.perChat = { limit: config.chatLimit, windowMs: config.chatWindowMs };
    this.clock = options.clock ?? Date.now;
    this.sleep = options.sleep ?? sleep;
  }

  /** Wait for a slot. `chatKey` is undefined for calls not aimed at a chat. */
  async acquire(chatKey: string | undefined, signal: AbortSignal): Promise<void> {
    await this.mutex.runExclusive(async () => {
      for (;;) {
        if (signal.aborted) throw new RequestCancelledError();
        const now = this.clock();
        const chat = chatKey === undefined ? undefined : this.hitsFor(chatKey);
        const wait = Math.max(
          waitFor(this.globalHits, this.global, now),
          chat ? waitFor(chat, this.perChat, now) : 0,
        );
        if (wait <= 0) {
          this.globalHits.push(now);
          chat?.push(now);
          return;
        }
        await this.sleep(wait, signal);
      }
    });
  }

  private hitsFor(chatKey: string): number[] {
    const now = this.clock();
    for (const [key, hits] of this.chatHits) {
      waitFor(hits, this.perChat, now);
      if (hits.length === 0 && key !== chatKey) this.chatHits.delete(key);
    }
    let hits = this.chatHits.get(chatKey);
    if (!hits) {
      hits = [];
      this.chatHits.set(chatKey, hits);
    }
    return hits;
  }
}
