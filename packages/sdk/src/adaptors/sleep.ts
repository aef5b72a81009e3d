import { setTimeout as delay } from "node:timers/promises";

/** Resolves after `ms`, rejects early when `signal` aborts. */
export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export const sleep: Sleep = (ms, signal) => delay(ms, undefined, { signal });

export type Clock = () => number;
