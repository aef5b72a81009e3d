import type { CallMode } from "@botwire/core";

/** Emitted when a traced call is driven. */
export interface RequestStartEvent {
  readonly method: string;
  readonly mode: CallMode;
}

export interface RequestSuccessEvent {
  readonly method: string;
  readonly mode: CallMode;
  readonly durationMs: number;
}

export interface RequestFailureEvent {
  readonly method: string;
  readonly mode: CallMode;
  readonly durationMs: number;
  readonly error: Error;
}

/** Emitted before the retry adaptor waits for another attempt. */
export interface RequestRetryEvent {
  readonly method: string;
  /** The attempt that just failed, starting at 1. */
  readonly attempt: number;
  readonly delayMs: number;
  readonly error: Error;
}

/** Event map for `Bot.on()`. */
export interface BotEvents {
  "request:start": [RequestStartEvent];
  "request:success": [RequestSuccessEvent];
  "request:failure": [RequestFailureEvent];
  "request:retry": [RequestRetryEvent];
}

/** Valid event names for `Bot.on()`. */
export type EventName = keyof BotEvents;

/** Callback type for a specific event. */
export type EventListener<E extends EventName> = (
  ...args: BotEvents[E]
) => void;
