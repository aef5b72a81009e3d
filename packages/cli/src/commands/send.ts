import { PARSE_MODES } from "@botwire/sdk";
import { type Command, Option } from "commander";

import { formatMessage } from "../output/formatter.js";
import { runBotCall } from "./run.js";

interface SendOptions {
  readonly parseMode?: string;
  readonly silent: boolean;
}

export function registerSendCommand(program: Command): void {
  program
    .command("send")
    .description("Send a text message")
    .argument("<chatId>", "Numeric chat id or @channelusername")
    .argument("<text>", "Message text (1-4096 characters)")
    .addOption(
      new Option("--parse-mode <mode>", "Text formatting").choices(PARSE_MODES),
    )
    .option("--silent", "Deliver without a notification sound", false)
    .action(
      async (chatId: string, text: string, opts: SendOptions, command: Command) => {
        await runBotCall({
          command,
          method: "sendMessage",
          call: (bot) => {
            const request = bot.sendMessage(chatId, text);
            const parseMode = PARSE_MODES.find((mode) => mode === opts.parseMode);
            if (parseMode) request.payload.set("parse_mode", parseMode);
            if (opts.silent) request.payload.set("disable_notification", true);
            return request.send();
          },
          format: formatMessage,
        });
      },
    );
}
