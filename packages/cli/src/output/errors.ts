import {
  ApiError,
  BotwireError,
  DecodeError,
  InvalidChatIdError,
  InvalidPayloadError,
  NetworkError,
  RequestError,
  SerializationError,
} from "@botwire/sdk";
import { CommanderError } from "commander";
import chalk from "chalk";

import { formatJsonError } from "./json.js";

export interface ErrorHandlerOptions {
  readonly jsonMode: boolean;
}

export const EXIT_CODES = {
  general: 1,
  configuration: 2,
  api: 3,
  network: 4,
  invalidInput: 5,
} as const;

function isInvalidInput(error: unknown): boolean {
  return (
    error instanceof InvalidPayloadError ||
    error instanceof InvalidChatIdError ||
    error instanceof SerializationError ||
    error instanceof DecodeError ||
    error instanceof CommanderError
  );
}

function getExitCode(error: unknown): number {
  if (error instanceof BotwireError) return EXIT_CODES.configuration;
  if (error instanceof ApiError) return EXIT_CODES.api;
  if (error instanceof NetworkError) return EXIT_CODES.network;
  if (isInvalidInput(error)) return EXIT_CODES.invalidInput;
  return EXIT_CODES.general;
}

function getErrorCode(error: unknown): string {
  if (
    error instanceof BotwireError ||
    error instanceof RequestError ||
    error instanceof InvalidPayloadError ||
    error instanceof InvalidChatIdError
  ) {
    return error.code;
  }
  if (error instanceof CommanderError) return "invalid_argument";
  return "unknown_error";
}

function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

function getApiSuggestion(error: ApiError): string | undefined {
  if (error.retryAfter !== undefined) {
    return `Telegram asks to wait ${error.retryAfter}s before the next call.`;
  }
  if (error.migrateToChatId !== undefined) {
    return `The group was upgraded. Use chat id ${error.migrateToChatId} instead.`;
  }
  if (error.errorCode === 401) {
    return "Check that BOTWIRE_TOKEN is the token BotFather gave you.";
  }
  if (error.errorCode === 403) {
    return "Make sure the bot is a member of the chat and has the rights this call needs.";
  }
  return undefined;
}

function getSuggestion(error: unknown): string | undefined {
  if (error instanceof BotwireError) {
    return "Set BOTWIRE_TOKEN in your environment or .env file.";
  }
  if (error instanceof ApiError) return getApiSuggestion(error);
  if (error instanceof NetworkError) {
    return "Check your internet connection or BOTWIRE_API_URL and try again.";
  }
  if (error instanceof DecodeError) {
    return "The server answered with something unexpected. Check BOTWIRE_API_URL.";
  }
  return undefined;
}

function formatHumanError(error: unknown): string {
  const lines = [`${chalk.red.bold("Error: ")}${getErrorMessage(error)}`];

  const suggestion = getSuggestion(error);
  if (suggestion) {
    lines.push("");
    lines.push(`${chalk.dim("Hint: ")}${suggestion}`);
  }

  return lines.join("\n");
}

export function handleCliError(
  error: unknown,
  options: ErrorHandlerOptions,
): never {
  const exitCode = getExitCode(error);

  if (options.jsonMode) {
    const json = formatJsonError(getErrorCode(error), getErrorMessage(error));
    process.stdout.write(`${json}\n`);
  } else {
    process.stderr.write(`${formatHumanError(error)}\n`);
  }

  process.exit(exitCode);
}
