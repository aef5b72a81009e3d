import type { Transport, TransportCall, TransportResponse } from "@botwire/core";
import type { Chat, ChatInviteLink, Message, User } from "../src/types/index";

export const TEST_TOKEN = "123456:test-token";

export const BOT_USER: User = {
  id: 123456,
  is_bot: true,
  first_name: "Wire",
  username: "wire_test_bot",
};

export const CHANNEL: Chat = {
  id: -1001234567890,
  type: "channel",
  title: "Release notes",
  username: "botwire_news",
};

export const INVITE_LINK: ChatInviteLink = {
  invite_link: "https://t.me/+AbCdEf",
  creator: BOT_USER,
  creates_join_request: false,
  is_primary: false,
  is_revoked: false,
  member_limit: 10,
};

export const MESSAGE: Message = {
  message_id: 77,
  date: 1700000000,
  chat: CHANNEL,
  text: "hello",
};

export function okResponse(result: unknown): TransportResponse {
  return { status: 200, body: JSON.stringify({ ok: true, result }) };
}

export function errorResponse(
  errorCode: number,
  description: string,
  parameters?: Record<string, number>,
): TransportResponse {
  return {
    status: errorCode,
    body: JSON.stringify({
      ok: false,
      error_code: errorCode,
      description,
      ...(parameters ? { parameters } : {}),
    }),
  };
}

type Reply = TransportResponse | Error | Promise<TransportResponse>;

/** Answers queued replies in order, then the fallback. Records every call. */
export class StubTransport implements Transport {
  readonly calls: TransportCall[] = [];
  private readonly queue: Reply[] = [];

  constructor(private readonly fallback?: TransportResponse) {}

  enqueue(...replies: Reply[]): this {
    this.queue.push(...replies);
    return this;
  }

  get methods(): string[] {
    return this.calls.map((call) => call.method);
  }

  async call(call: TransportCall): Promise<TransportResponse> {
    this.calls.push(call);
    const next = this.queue.shift() ?? this.fallback;
    if (next === undefined) throw new Error("no reply queued");
    if (next instanceof Error) throw next;
    return next;
  }
}

/** Sleep that resolves at once and records the requested delays. */
export function instantSleep(): {
  readonly delays: number[];
  sleep(ms: number, signal: AbortSignal): Promise<void>;
} {
  const delays: number[] = [];
  return {
    delays,
    async sleep(ms) {
      delays.push(ms);
    },
  };
}

/** Clock and sleep where sleeping moves the clock forward. */
export function fakeTime(): {
  readonly delays: number[];
  clock(): number;
  sleep(ms: number, signal: AbortSignal): Promise<void>;
} {
  let now = 0;
  const delays: number[] = [];
  return {
    delays,
    clock: () => now,
    async sleep(ms) {
      delays.push(ms);
      now += ms;
    },
  };
}
