import type { Command } from "commander";

import { formatUser } from "../output/formatter.js";
import { runBotCall } from "./run.js";

export function registerMeCommand(program: Command): void {
  program
    .command("me")
    .description("Show the bot's own account")
    .action(async (_opts: Record<string, unknown>, command: Command) => {
      await runBotCall({
        command,
        method: "getMe",
        call: (bot) => bot.getMe().send(),
        format: formatUser,
      });
    });
}
