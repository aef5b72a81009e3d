import { type DefinitionOf, definePayload } from "@botwire/core";
import { z } from "zod";
import { ChatInviteLinkSchema } from "../types/chat-invite-link";
import {
  chatIdField,
  inviteLinkField,
  linkNameField,
  memberLimitField,
  unixTimeField,
} from "./fields";

const linkSettings = {
  name: linkNameField,
  expire_date: unixTimeField,
  member_limit: memberLimitField,
  creates_join_request: z.boolean(),
};

export const CreateChatInviteLink = definePayload({
  method: "createChatInviteLink",
  required: z.object({ chat_id: chatIdField }),
  optional: linkSettings,
  output: ChatInviteLinkSchema,
});

export const EditChatInviteLink = definePayload({
  method: "editChatInviteLink",
  required: z.object({ chat_id: chatIdField, invite_link: inviteLinkField }),
  optional: linkSettings,
  output: ChatInviteLinkSchema,
});

export const RevokeChatInviteLink = definePayload({
  method: "revokeChatInviteLink",
  required: z.object({ chat_id: chatIdField, invite_link: inviteLinkField }),
  optional: {},
  output: ChatInviteLinkSchema,
});

/** Generates a new primary link; the previous one is revoked. */
export const ExportChatInviteLink = definePayload({
  method: "exportChatInviteLink",
  required: z.object({ chat_id: chatIdField }),
  optional: {},
  output: z.string(),
});

export type CreateChatInviteLinkDefinition = DefinitionOf<typeof CreateChatInviteLink>;
export type EditChatInviteLinkDefinition = DefinitionOf<typeof EditChatInviteLink>;
export type RevokeChatInviteLinkDefinition = DefinitionOf<typeof RevokeChatInviteLink>;
export type ExportChatInviteLinkDefinition = DefinitionOf<typeof ExportChatInviteLink>;
