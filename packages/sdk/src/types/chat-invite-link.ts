import { z } from "zod";
import { UserSchema } from "./user";

export const ChatInviteLinkSchema = z.object({
  invite_link: z.string(),
  creator: UserSchema,
  creates_join_request: z.boolean(),
  is_primary: z.boolean(),
  is_revoked: z.boolean(),
  name: z.string().optional(),
  expire_date: z.number().int().optional(),
  member_limit: z.number().int().optional(),
  pending_join_request_count: z.number().int().optional(),
});

export type ChatInviteLink = z.output<typeof ChatInviteLinkSchema>;
