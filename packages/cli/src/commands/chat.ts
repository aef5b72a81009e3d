import type { Command } from "commander";

import { formatChat } from "../output/formatter.js";
import { runBotCall } from "./run.js";

export function registerChatCommand(program: Command): void {
  program
    .command("chat")
    .description("Show information about a chat")
    .argument("<chatId>", "Numeric chat id or @channelusername")
    .action(
      async (chatId: string, _opts: Record<string, unknown>, command: Command) => {
        await runBotCall({
          command,
          method: "getChat",
          call: (bot) => bot.getChat(chatId).send(),
          format: formatChat,
        });
      },
    );
}
