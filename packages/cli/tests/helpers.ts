import type {
  Chat,
  ChatInviteLink,
  Message,
  Transport,
  TransportCall,
  TransportResponse,
  User,
} from "@botwire/sdk";
import { vi } from "vitest";

export const TEST_TOKEN = "123456:test-token";

export const BOT_USER: User = {
  id: 123456,
  is_bot: true,
  first_name: "Wire",
  username: "wire_test_bot",
  can_join_groups: true,
  can_read_all_group_messages: false,
};

export const CHANNEL: Chat = {
  id: -1001234567890,
  type: "channel",
  title: "Release notes",
  username: "botwire_news",
};

export const MESSAGE: Message = {
  message_id: 77,
  date: 1700000000,
  chat: CHANNEL,
  text: "hello",
};

export const INVITE_LINK: ChatInviteLink = {
  invite_link: "https://t.me/+AbCdEf",
  creator: BOT_USER,
  creates_join_request: false,
  is_primary: false,
  is_revoked: false,
  member_limit: 10,
};

export function okResponse(result: unknown): TransportResponse {
  return { status: 200, body: JSON.stringify({ ok: true, result }) };
}

export function errorResponse(errorCode: number, description: string): TransportResponse {
  return {
    status: errorCode,
    body: JSON.stringify({ ok: false, error_code: errorCode, description }),
  };
}

/** Shared by the mocked `createBotFromEnv` and the tests that inspect it. */
export class StubTransport implements Transport {
  readonly calls: TransportCall[] = [];
  private readonly queue: TransportResponse[] = [];

  enqueue(...replies: TransportResponse[]): this {
    this.queue.push(...replies);
    return this;
  }

  reset(): void {
    this.calls.length = 0;
    this.queue.length = 0;
  }

  /** Parsed JSON body of the call at `index`. */
  body(index: number): unknown {
    const call = this.calls[index];
    if (!call) throw new Error(`no call at index ${index}`);
    return JSON.parse(call.body);
  }

  async call(call: TransportCall): Promise<TransportResponse> {
    this.calls.push(call);
    const next = this.queue.shift();
    if (!next) throw new Error("no reply queued");
    return next;
  }
}

export const transport = new StubTransport();

export class ProcessExit extends Error {
  constructor(readonly code: string | number | null | undefined) {
    super(`process.exit(${String(code)})`);
  }
}

/** Replace `process.exit` so a failing command rejects instead of ending the run. */
export function mockExit() {
  return vi.spyOn(process, "exit").mockImplementation((code) => {
    throw new ProcessExit(code);
  });
}

export interface CapturedOutput {
  stdout(): string;
  stderr(): string;
}

export function captureOutput(): CapturedOutput {
  const stdoutSpy = vi.spyOn(process.stdout, "write").mockReturnValue(true);
  const stderrSpy = vi.spyOn(process.stderr, "write").mockReturnValue(true);
  return {
    stdout: () => stdoutSpy.mock.calls.map((call) => String(call[0])).join(""),
    stderr: () => stderrSpy.mock.calls.map((call) => String(call[0])).join(""),
  };
}

export function argv(...args: string[]): string[] {
  return ["node", "botwire", ...args];
}
