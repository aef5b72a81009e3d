import { z } from "zod";

export const ChatTypeSchema = z.enum(["private", "group", "supergroup", "channel"]);

export const ChatSchema = z.object({
  id: z.number().int(),
  type: ChatTypeSchema,
  title: z.string().optional(),
  username: z.string().optional(),
  first_name: z.string().optional(),
  last_name: z.string().optional(),
  description: z.string().optional(),
  invite_link: z.string().optional(),
});

export type ChatType = z.output<typeof ChatTypeSchema>;
export type Chat = z.output<typeof ChatSchema>;
