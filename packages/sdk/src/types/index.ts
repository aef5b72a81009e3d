export { type Chat, ChatSchema, type ChatType, ChatTypeSchema } from "./chat";
export { type ChatInviteLink, ChatInviteLinkSchema } from "./chat-invite-link";
export { type Message, MessageSchema } from "./message";
export { type User, UserSchema } from "./user";
