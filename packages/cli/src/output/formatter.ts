import type { Chat, ChatInviteLink, Message, User } from "@botwire/sdk";
import chalk from "chalk";

const LABEL_WIDTH = 11;
const MAX_TEXT_PREVIEW = 200;

function row(label: string, value: string | number): string {
  return `  ${`${label}:`.padEnd(LABEL_WIDTH)}${value}`;
}

function formatDate(unixSeconds: number): string {
  return new Date(unixSeconds * 1000).toISOString().replace(".000Z", "Z");
}

function fullName(first: string | undefined, last: string | undefined): string | undefined {
  const parts = [first, last].filter((part) => part);
  return parts.length > 0 ? parts.join(" ") : undefined;
}

export function formatUser(user: User): string {
  const lines = [chalk.bold(user.is_bot ? "Bot" : "User")];
  lines.push(row("ID", user.id));
  lines.push(row("Name", fullName(user.first_name, user.last_name) ?? user.first_name));
  if (user.username) lines.push(row("Username", `@${user.username}`));
  if (user.is_bot) {
    lines.push(row("Groups", user.can_join_groups ? "can join" : "cannot join"));
    lines.push(row("Privacy", user.can_read_all_group_messages ? "reads all messages" : "enabled"));
  }
  return lines.join("\n");
}

export function formatChat(chat: Chat): string {
  const lines = [chalk.bold("Chat")];
  lines.push(row("ID", chat.id));
  lines.push(row("Type", chat.type));
  const title = chat.title ?? fullName(chat.first_name, chat.last_name);
  if (title) lines.push(row("Title", title));
  if (chat.username) lines.push(row("Username", `@${chat.username}`));
  if (chat.invite_link) lines.push(row("Link", chat.invite_link));
  if (chat.description) {
    lines.push("");
    lines.push(chalk.dim(chat.description));
  }
  return lines.join("\n");
}

export function formatMessage(message: Message): string {
  const lines = [chalk.bold.green("Message sent")];
  lines.push(row("ID", message.message_id));
  lines.push(row("Chat", message.chat.title ?? String(message.chat.id)));
  lines.push(row("Date", formatDate(message.date)));
  if (message.text) {
    const text =
      message.text.length > MAX_TEXT_PREVIEW
        ? `${message.text.slice(0, MAX_TEXT_PREVIEW)}...`
        : message.text;
    lines.push("");
    lines.push(text);
  }
  return lines.join("\n");
}

export function formatInviteLink(link: ChatInviteLink): string {
  const heading = link.is_revoked
    ? chalk.bold.yellow("Invite link revoked")
    : chalk.bold.green("Invite link");
  const lines = [heading];
  lines.push(row("Link", link.invite_link));
  if (link.name) lines.push(row("Name", link.name));
  lines.push(row("Expires", link.expire_date === undefined ? "never" : formatDate(link.expire_date)));
  lines.push(row("Limit", link.member_limit ?? "none"));
  if (link.creates_join_request) lines.push(row("Approval", "required"));
  return lines.join("\n");
}
