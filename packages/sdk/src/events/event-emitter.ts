import { EventEmitter } from "node:events";
import type { BotEvents } from "./types";

type EventMap<T> = { [K in keyof T]: unknown[] };

/** `node:events` emitter checked against an event map. */
export class TypedEventEmitter<Events extends EventMap<Events> = BotEvents> {
  private readonly emitter = new EventEmitter();

  on<E extends keyof Events & string>(
    event: E,
    listener: (...args: Events[E]) => void,
  ): void {
    // Node.js EventEmitter is not generic; the cast bridges typed listeners to the untyped emitter.
    this.emitter.on(event, listener as (...args: unknown[]) => void);
  }

  off<E extends keyof Events & string>(
    event: E,
    listener: (...args: Events[E]) => void,
  ): void {
    this.emitter.off(event, listener as (...args: unknown[]) => void);
  }

  emit<E extends keyof Events & string>(event: E, ...args: Events[E]): boolean {
    return this.emitter.emit(event, ...args);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
