import type { Command } from "commander";

import { formatInviteLink } from "../output/formatter.js";
import { runBotCall } from "./run.js";

export function registerRevokeLinkCommand(program: Command): void {
  program
    .command("revoke-link")
    .description("Revoke an invite link created by the bot")
    .argument("<chatId>", "Numeric chat id or @channelusername")
    .argument("<inviteLink>", "The link to revoke")
    .action(
      async (
        chatId: string,
        inviteLink: string,
        _opts: Record<string, unknown>,
        command: Command,
      ) => {
        await runBotCall({
          command,
          method: "revokeChatInviteLink",
          call: (bot) => bot.revokeChatInviteLink(chatId, inviteLink).send(),
          format: formatInviteLink,
        });
      },
    );
}
