import chalk from "chalk";
import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";

import { createProgram } from "../../src/program.js";
import {
  argv,
  captureOutput,
  type CapturedOutput,
  errorResponse,
  INVITE_LINK,
  mockExit,
  okResponse,
  ProcessExit,
  transport,
} from "../helpers.js";

vi.mock("../../src/config.js", async () => {
  const { Bot } = await import("@botwire/sdk");
  const helpers = await import("../helpers.js");
  return {
    createBotFromEnv: () =>
      new Bot(
        { token: helpers.TEST_TOKEN, logLevel: "silent" },
        { transport: helpers.transport },
      ),
  };
});

describe("revoke-link command", () => {
  let output: CapturedOutput;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    transport.reset();
    output = captureOutput();
    mockExit();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("revokes the given link", async () => {
    transport.enqueue(okResponse({ ...INVITE_LINK, is_revoked: true }));

    await createProgram().parseAsync(
      argv("revoke-link", "@botwire_news", "https://t.me/+AbCdEf"),
    );

    expect(transport.calls[0]?.method).toBe("revokeChatInviteLink");
    expect(transport.body(0)).toEqual({
      chat_id: "@botwire_news",
      invite_link: "https://t.me/+AbCdEf",
    });
    expect(output.stdout()).toContain("Invite link revoked\n");
  });

  it("explains a missing admin right", async () => {
    transport.enqueue(errorResponse(403, "Forbidden: bot is not a member of the channel chat"));

    await expect(
      createProgram().parseAsync(
        argv("revoke-link", "@botwire_news", "https://t.me/+AbCdEf"),
      ),
    ).rejects.toEqual(new ProcessExit(3));

    expect(output.stderr()).toContain(
      "Hint: Make sure the bot is a member of the chat and has the rights this call needs.",
    );
  });
});
