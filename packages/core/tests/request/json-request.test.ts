import { describe, expect, it } from "vitest";
import {
  ApiError,
  DecodeError,
  JsonRequest,
  NetworkError,
  RequestCancelledError,
  RequestConsumedError,
  SerializationError,
  type TransportResponse,
} from "../../src";
import { CreateInviteLink, deferred, errorResponse, okResponse, SendText, StubTransport } from "../helpers";

const LINK = { invite_link: "https://t.me/+abc", member_limit: 10 };

describe("JsonRequest", () => {
  it("should not touch the transport until a call is awaited", () => {
    const transport = new StubTransport(okResponse(LINK));
    const request = new JsonRequest(transport, CreateInviteLink.create({ chat_id: 42 }));

    request.sendRef();
    request.send();

    expect(transport.calls).toHaveLength(0);
  });

  it("should post the method and serialized payload", async () => {
    const transport = new StubTransport(okResponse(LINK));
    const request = new JsonRequest(
      transport,
      CreateInviteLink.create({ chat_id: 42 }).set("member_limit", 10),
    );

    const link = await request.send();

    expect(link).toEqual(LINK);
    expect(transport.calls).toHaveLength(1);
    expect(transport.calls[0]?.method).toBe("createChatInviteLink");
    expect(transport.calls[0]?.body).toBe('{"chat_id":42,"member_limit":10}');
  });

  it("should give the same outcome for send and sendRef", async () => {
    const payload = CreateInviteLink.create({ chat_id: 42 }).set("name", "launch");
    const consuming = new StubTransport(okResponse(LINK));
    const borrowing = new StubTransport(okResponse(LINK));

    const viaSend = await new JsonRequest(consuming, payload.clone()).send();
    const viaSendRef = await new JsonRequest(borrowing, payload.clone()).sendRef();

    expect(viaSend).toEqual(viaSendRef);
    expect(consuming.calls[0]?.body).toBe(borrowing.calls[0]?.body);
  });

  describe("consumption", () => {
    it("should refuse any use after send", () => {
      const request = new JsonRequest(new StubTransport(), CreateInviteLink.create({ chat_id: 42 }));
      request.send();

      expect(() => request.send()).toThrow(RequestConsumedError);
      expect(() => request.sendRef()).toThrow(RequestConsumedError);
      expect(() => request.payload).toThrow(RequestConsumedError);
    });

    it("should stay reusable after sendRef", async () => {
      const transport = new StubTransport(okResponse({ message_id: 9 }));
      const request = new JsonRequest(transport, SendText.create({ chat_id: 1, text: "hello" }));

      for (const chatId of [1, 2, 3]) {
        request.payload.assign({ chat_id: chatId });
        await request.sendRef();
      }

      expect(transport.calls.map((call) => call.body)).toEqual([
        '{"chat_id":1,"text":"hello"}',
        '{"chat_id":2,"text":"hello"}',
        '{"chat_id":3,"text":"hello"}',
      ]);
    });

    it("should send the payload as it was when sendRef was called", async () => {
      const transport = new StubTransport(okResponse(LINK));
      const request = new JsonRequest(transport, CreateInviteLink.create({ chat_id: 42 }));

      const call = request.sendRef();
      request.payload.set("member_limit", 99);
      await call;

      expect(transport.calls[0]?.body).toBe('{"chat_id":42}');
    });

    it("should send the payload as it was when send was called", async () => {
      const transport = new StubTransport(okResponse(LINK));
      const payload = CreateInviteLink.create({ chat_id: 42 });

      const call = new JsonRequest(transport, payload).send();
      payload.set("member_limit", 99);
      await call;

      expect(transport.calls[0]?.body).toBe('{"chat_id":42}');
    });
  });

  describe("errors", () => {
    it("should reject with ApiError from a failed envelope", async () => {
      const transport = new StubTransport(errorResponse(403, "Forbidden: bot is not a member"));
      const request = new JsonRequest(transport, CreateInviteLink.create({ chat_id: 42 }));

      const result = await request.sendRef().settle();
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ApiError);
        expect(result.error.message).toBe(
          "createChatInviteLink failed (403): Forbidden: bot is not a member",
        );
      }
    });

    it("should reject with DecodeError when the result has the wrong shape", async () => {
      const transport = new StubTransport(okResponse({ link: "x" }));
      const request = new JsonRequest(transport, CreateInviteLink.create({ chat_id: 42 }));

      await expect(request.sendRef()).rejects.toBeInstanceOf(DecodeError);
    });

    it("should wrap transport failures in NetworkError", async () => {
      const transport = new StubTransport();
      const request = new JsonRequest(transport, CreateInviteLink.create({ chat_id: 42 }));

      const result = await request.sendRef().settle();
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(NetworkError);
        expect(result.error.code).toBe("endpoint_unreachable");
        expect(result.error.message).toBe("createChatInviteLink: no reply queued");
      }
    });

    it("should report serialization failures without calling the transport", async () => {
      const transport = new StubTransport(okResponse({ message_id: 1 }));
      const request = new JsonRequest(
        transport,
        SendText.create({ chat_id: 1, text: "hi" }).set("extra", Symbol("x")),
      );

      const call = request.sendRef();
      await expect(call).rejects.toBeInstanceOf(SerializationError);
      expect(transport.calls).toHaveLength(0);
    });
  });

  describe("cancellation", () => {
    it("should abort the transport signal and not leak into the next call", async () => {
      const first = deferred<TransportResponse>();
      const second = deferred<TransportResponse>();
      const transport = new StubTransport().enqueue(first.promise).enqueue(second.promise);
      const request = new JsonRequest(transport, CreateInviteLink.create({ chat_id: 42 }));

      const cancelled = request.sendRef();
      const cancelledOutcome = cancelled.settle();
      cancelled.cancel();

      const next = request.sendRef();
      const nextOutcome = next.then((link) => link.invite_link);

      second.resolve(okResponse({ invite_link: "https://t.me/+second" }));
      first.resolve(okResponse({ invite_link: "https://t.me/+first" }));

      const settled = await cancelledOutcome;
      expect(settled.ok).toBe(false);
      if (!settled.ok) expect(settled.error).toBeInstanceOf(RequestCancelledError);
      await expect(nextOutcome).resolves.toBe("https://t.me/+second");
      expect(transport.calls[0]?.signal.aborted).toBe(true);
      expect(transport.calls[1]?.signal.aborted).toBe(false);
    });
  });
});
