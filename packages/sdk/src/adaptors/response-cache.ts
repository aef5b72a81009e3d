import type { Clock } from "./sleep";

interface Entry<T> {
  readonly value: T;
  readonly expiresAt: number | undefined;
}

export interface ResponseCacheOptions {
  /** Entries never expire when omitted. */
  readonly ttlMs?: number;
  readonly clock?: Clock;
}

export class ResponseCache<T> {
  private readonly entries = new Map<string, Entry<T>>();
  private readonly ttlMs: number | undefined;
  private readonly clock: Clock;

  constructor(options: ResponseCacheOptions = {}) {
    this.ttlMs = options.ttlMs;
    this.clock = options.clock ?? Date.now;
  }

  lookup(key: string): { readonly value: T } | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt !== undefined && entry.expiresAt <= this.clock()) {
      this.entries.delete(key);
      return undefined;
    }
    return { value: entry.value };
  }

  store(key: string, value: T): void {
    const expiresAt =
      this.ttlMs === undefined ? undefined : this.clock() + this.ttlMs;
    this.entries.set(key, { value, expiresAt });
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
