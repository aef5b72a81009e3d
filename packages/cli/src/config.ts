import "dotenv/config";

import { Bot, type BotConfig, type LogLevelConfig } from "@botwire/sdk";

function parseLogLevel(value: string | undefined): LogLevelConfig | undefined {
  if (
    value === "debug" ||
    value === "info" ||
    value === "warn" ||
    value === "error" ||
    value === "silent"
  )
    return value;
  return undefined;
}

/** Reads `BOTWIRE_TOKEN`, `BOTWIRE_API_URL` and `BOTWIRE_LOG_LEVEL` (a `.env` file is loaded first). */
export function createBotFromEnv(): Bot {
  const config: BotConfig = {
    token: process.env.BOTWIRE_TOKEN ?? "",
    apiUrl: process.env.BOTWIRE_API_URL || undefined,
    logLevel: parseLogLevel(process.env.BOTWIRE_LOG_LEVEL),
  };

  return new Bot(config);
}
