import type { Bot } from "@botwire/sdk";
import { type Command, InvalidArgumentError } from "commander";

import { createBotFromEnv } from "../config.js";
import { handleCliError } from "../output/errors.js";
import { formatJsonOutput } from "../output/json.js";

interface RunOptions<T> {
  readonly command: Command;
  /** Remote method name reported in JSON metadata. */
  readonly method: string;
  readonly call: (bot: Bot) => PromiseLike<T>;
  readonly format: (result: T) => string;
}

export function isJsonMode(command: Command): boolean {
  const globalOpts = command.parent?.opts<{ json: boolean }>();
  return globalOpts?.json ?? false;
}

/** commander argument parser for whole numbers. */
export function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new InvalidArgumentError(`Expected an integer, got "${value}".`);
  }
  return Number(value);
}

export async function runBotCall<T>(options: RunOptions<T>): Promise<void> {
  const jsonMode = isJsonMode(options.command);
  let bot: Bot | undefined;
  try {
    bot = createBotFromEnv();
    const startTime = Date.now();
    const result = await options.call(bot);
    const duration = Date.now() - startTime;

    if (jsonMode) {
      const output = formatJsonOutput({
        success: true,
        data: result,
        metadata: { method: options.method, duration },
      });
      process.stdout.write(`${output}\n`);
    } else {
      process.stdout.write(`${options.format(result)}\n`);
    }
  } catch (error: unknown) {
    handleCliError(error, { jsonMode });
  } finally {
    bot?.close();
  }
}
