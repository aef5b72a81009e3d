import { z } from "zod";
import { ChatSchema } from "./chat";
import { UserSchema } from "./user";

export const MessageSchema = z.object({
  message_id: z.number().int(),
  date: z.number().int(),
  chat: ChatSchema,
  from: UserSchema.optional(),
  text: z.string().optional(),
});

export type Message = z.output<typeof MessageSchema>;
