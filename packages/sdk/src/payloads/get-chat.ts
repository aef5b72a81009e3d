import { type DefinitionOf, definePayload } from "@botwire/core";
import { z } from "zod";
import { ChatSchema } from "../types/chat";
import { chatIdField } from "./fields";

export const GetChat = definePayload({
  method: "getChat",
  required: z.object({ chat_id: chatIdField }),
  optional: {},
  output: ChatSchema,
});

export type GetChatDefinition = DefinitionOf<typeof GetChat>;
