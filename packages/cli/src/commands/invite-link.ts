import type { Command } from "commander";

import { formatInviteLink } from "../output/formatter.js";
import { parseInteger, runBotCall } from "./run.js";

interface InviteLinkOptions {
  readonly name?: string;
  readonly expireDate?: number;
  readonly memberLimit?: number;
  readonly joinRequest: boolean;
}

export function registerInviteLinkCommand(program: Command): void {
  program
    .command("invite-link")
    .description("Create an additional invite link for a chat")
    .argument("<chatId>", "Numeric chat id or @channelusername")
    .option("--name <name>", "Link name, up to 32 characters")
    .option("--expire-date <unix>", "Expiry as Unix seconds", parseInteger)
    .option("--member-limit <n>", "Members that can join through the link (1-99999)", parseInteger)
    .option("--join-request", "Require admin approval to join", false)
    .action(
      async (chatId: string, opts: InviteLinkOptions, command: Command) => {
        await runBotCall({
          command,
          method: "createChatInviteLink",
          call: (bot) => {
            const request = bot.createChatInviteLink(chatId);
            const payload = request.payload;
            if (opts.name !== undefined) payload.set("name", opts.name);
            if (opts.expireDate !== undefined) payload.set("expire_date", opts.expireDate);
            if (opts.memberLimit !== undefined) payload.set("member_limit", opts.memberLimit);
            if (opts.joinRequest) payload.set("creates_join_request", true);
            return request.send();
          },
          format: formatInviteLink,
        });
      },
    );
}
