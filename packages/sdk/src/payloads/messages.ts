import { type DefinitionOf, definePayload } from "@botwire/core";
import { z } from "zod";
import { MessageSchema } from "../types/message";
import {
  chatIdField,
  messageIdField,
  messageTextField,
  parseModeField,
} from "./fields";

export const SendMessage = definePayload({
  method: "sendMessage",
  required: z.object({ chat_id: chatIdField, text: messageTextField }),
  optional: {
    parse_mode: parseModeField,
    disable_notification: z.boolean(),
    protect_content: z.boolean(),
    reply_to_message_id: messageIdField,
  },
  output: MessageSchema,
});

export const DeleteMessage = definePayload({
  method: "deleteMessage",
  required: z.object({ chat_id: chatIdField, message_id: messageIdField }),
  optional: {},
  output: z.literal(true),
});

export type SendMessageDefinition = DefinitionOf<typeof SendMessage>;
export type DeleteMessageDefinition = DefinitionOf<typeof DeleteMessage>;
