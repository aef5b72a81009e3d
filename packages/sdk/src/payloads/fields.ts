import { ChatId } from "@botwire/core";
import { z } from "zod";

export const PARSE_MODES = ["HTML", "Markdown", "MarkdownV2"] as const;

/** Accepts a numeric id, a numeric string, an `@username` or a ChatId. */
export const chatIdField = z
  .union([z.number(), z.string(), z.instanceof(ChatId)])
  .transform((value, ctx) => {
    const problem = ChatId.problem(value);
    if (problem) {
      ctx.issues.push({ code: "custom", message: problem, input: value });
      return z.NEVER;
    }
    return ChatId.from(value);
  });

/** Unix seconds, or a Date converted to them. */
export const unixTimeField = z
  .union([z.number().int().nonnegative(), z.date()])
  .transform((value) =>
    value instanceof Date ? Math.floor(value.getTime() / 1000) : value,
  );

export const parseModeField = z.enum(PARSE_MODES);
export const messageTextField = z.string().min(1).max(4096);
export const messageIdField = z.number().int().positive();
export const memberLimitField = z.number().int().min(1).max(99_999);
export const linkNameField = z.string().max(32);
export const inviteLinkField = z.string().min(1);

export type ParseMode = z.output<typeof parseModeField>;
