export { PARSE_MODES, type ParseMode } from "./fields";
export { GetChat, type GetChatDefinition } from "./get-chat";
export { GetMe, type GetMeDefinition } from "./get-me";
export {
  CreateChatInviteLink,
  type CreateChatInviteLinkDefinition,
  EditChatInviteLink,
  type EditChatInviteLinkDefinition,
  ExportChatInviteLink,
  type ExportChatInviteLinkDefinition,
  RevokeChatInviteLink,
  type RevokeChatInviteLinkDefinition,
} from "./invite-links";
export {
  DeleteMessage,
  type DeleteMessageDefinition,
  SendMessage,
  type SendMessageDefinition,
} from "./messages";
