import { JsonRequest } from "@botwire/core";
import { describe, expect, it } from "vitest";
import { RateLimiter } from "../../src/adaptors/rate-limiter";
import { Throttle } from "../../src/adaptors/throttle";
import { GetMe } from "../../src/payloads/get-me";
import { SendMessage } from "../../src/payloads/messages";
import { BOT_USER, fakeTime, MESSAGE, okResponse, StubTransport } from "../helpers";

const LIMITS = { globalLimit: 30, globalWindowMs: 1_000, chatLimit: 1, chatWindowMs: 60_000 };

describe("Throttle", () => {
  it("should stay lazy and take no slot until driven", async () => {
    const time = fakeTime();
    const limiter = new RateLimiter(LIMITS, time);
    const transport = new StubTransport(okResponse(MESSAGE));
    const request = new Throttle(
      new JsonRequest(transport, SendMessage.create({ chat_id: 42, text: "hi" })),
      limiter,
    );

    request.sendRef();
    await request.sendRef();

    expect(transport.calls).toHaveLength(1);
    expect(time.delays).toEqual([]);
  });

  it("should key the per-chat limit on the target chat", async () => {
    const time = fakeTime();
    const limiter = new RateLimiter(LIMITS, time);
    const transport = new StubTransport(okResponse(MESSAGE));
    const request = new Throttle(
      new JsonRequest(transport, SendMessage.create({ chat_id: 42, text: "hi" })),
      limiter,
    );

    await request.sendRef();
    request.payload.assign({ chat_id: "@botwire_news" });
    await request.sendRef();
    expect(time.delays).toEqual([]);

    request.payload.assign({ chat_id: 42 });
    await request.sendRef();
    expect(time.delays).toEqual([60_000]);
    expect(transport.calls).toHaveLength(3);
  });

  it("should share one per-chat window across username spellings", async () => {
    const time = fakeTime();
    const limiter = new RateLimiter(LIMITS, time);
    const transport = new StubTransport(okResponse(MESSAGE));
    const request = new Throttle(
      new JsonRequest(transport, SendMessage.create({ chat_id: "@Botwire_News", text: "hi" })),
      limiter,
    );

    await request.sendRef();
    request.payload.assign({ chat_id: "@botwire_news" });
    await request.sendRef();

    expect(time.delays).toEqual([60_000]);
  });

  it("should apply only the global limit to calls without a chat", async () => {
    const time = fakeTime();
    const limiter = new RateLimiter(LIMITS, time);
    const transport = new StubTransport(okResponse(BOT_USER));
    const request = new Throttle(new JsonRequest(transport, GetMe.create({})), limiter);

    await request.sendRef();
    await request.sendRef();

    expect(time.delays).toEqual([]);
  });
});
