import { Command } from "commander";

import { registerChatCommand } from "./commands/chat.js";
import { registerInviteLinkCommand } from "./commands/invite-link.js";
import { registerMeCommand } from "./commands/me.js";
import { registerRevokeLinkCommand } from "./commands/revoke-link.js";
import { registerSendCommand } from "./commands/send.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("botwire")
    .version("0.1.0")
    .description("Botwire CLI: call the Telegram Bot API from the terminal")
    .option("-j, --json", "Output as JSON envelope", false);

  registerMeCommand(program);
  registerChatCommand(program);
  registerSendCommand(program);
  registerInviteLinkCommand(program);
  registerRevokeLinkCommand(program);

  return program;
}
