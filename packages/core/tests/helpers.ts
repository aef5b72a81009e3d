import { z } from "zod";
import {
  ChatId,
  definePayload,
  type Transport,
  type TransportCall,
  type TransportResponse,
} from "../src";

const chatIdField = z
  .union([z.number(), z.string(), z.instanceof(ChatId)])
  .transform((value, ctx) => {
    const problem = ChatId.problem(value);
    if (problem) {
      ctx.issues.push({ code: "custom", message: problem, input: value });
      return z.NEVER;
    }
    return ChatId.from(value);
  });

const unixTime = z
  .union([z.number().int().nonnegative(), z.date()])
  .transform((value) =>
    value instanceof Date ? Math.floor(value.getTime() / 1000) : value,
  );

export const InviteLinkSchema = z.object({
  invite_link: z.string(),
  member_limit: z.number().optional(),
});

export const CreateInviteLink = definePayload({
  method: "createChatInviteLink",
  required: z.object({ chat_id: chatIdField }),
  optional: {
    expire_date: unixTime,
    member_limit: z.number().int().min(1).max(99999),
    name: z.string().max(32),
    creates_join_request: z.boolean(),
  },
  output: InviteLinkSchema,
});

export const SendText = definePayload({
  method: "sendMessage",
  required: z.object({ chat_id: chatIdField, text: z.string().min(1) }),
  optional: {
    disable_notification: z.boolean(),
    extra: z.unknown(),
  },
  output: z.object({ message_id: z.number().int() }),
});

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

export interface Deferred<T> {
  readonly promise: Promise<T>;
  resolve(value: T): void;
  reject(reason: unknown): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Records every call; answers from a queue, then from the fallback reply. */
export class StubTransport implements Transport {
  readonly calls: TransportCall[] = [];
  private readonly queue: Array<Promise<TransportResponse>> = [];
  private fallback: TransportResponse | undefined;

  constructor(fallback?: TransportResponse) {
    this.fallback = fallback;
  }

  enqueue(reply: TransportResponse | Promise<TransportResponse>): this {
    this.queue.push(Promise.resolve(reply));
    return this;
  }

  replyWith(reply: TransportResponse): this {
    this.fallback = reply;
    return this;
  }

  call(call: TransportCall): Promise<TransportResponse> {
    this.calls.push(call);
    const next = this.queue.shift();
    if (next) return next;
    if (this.fallback) return Promise.resolve(this.fallback);
    return Promise.reject(new Error("no reply queued"));
  }
}
