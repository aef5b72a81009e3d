import {
  type ChatIdLike,
  JsonRequest,
  type Payload,
  type PayloadDefinition,
  type Request,
  type Transport,
} from "@botwire/core";
import { HttpTransport } from "@botwire/transport";
import { Cache } from "./adaptors/cache";
import { RateLimiter } from "./adaptors/rate-limiter";
import { ResponseCache } from "./adaptors/response-cache";
import { Retry } from "./adaptors/retry";
import type { Clock, Sleep } from "./adaptors/sleep";
import { Throttle } from "./adaptors/throttle";
import { Trace } from "./adaptors/trace";
import { validateConfig } from "./config/schema";
import type { BotConfig, ValidatedConfig } from "./config/types";
import { TypedEventEmitter } from "./events/event-emitter";
import type { EventListener, EventName } from "./events/types";
import { createLogger, type Logger } from "./logger/logger";
import { GetChat, type GetChatDefinition } from "./payloads/get-chat";
import { GetMe, type GetMeDefinition } from "./payloads/get-me";
import {
  CreateChatInviteLink,
  type CreateChatInviteLinkDefinition,
  EditChatInviteLink,
  type EditChatInviteLinkDefinition,
  ExportChatInviteLink,
  type ExportChatInviteLinkDefinition,
  RevokeChatInviteLink,
  type RevokeChatInviteLinkDefinition,
} from "./payloads/invite-links";
import {
  DeleteMessage,
  type DeleteMessageDefinition,
  SendMessage,
  type SendMessageDefinition,
} from "./payloads/messages";
import type { User } from "./types/user";

export interface BotOptions {
  /** Replaces the HTTP transport built from the config. */
  readonly transport?: Transport;
  /** Used by the retry and throttle adaptors to wait. */
  readonly sleep?: Sleep;
  /** Time source of the rate limiter. */
  readonly clock?: Clock;
}

/**
 * Entry point of the SDK. Every method returns a request that has not been
 * sent yet: adjust `request.payload`, then `await request.send()` (or
 * `sendRef()` to keep the request for later).
 *
 * @example
 * ```ts
 * const bot = new Bot({ token: process.env.BOTWIRE_TOKEN ?? "" });
 * const request = bot.createChatInviteLink("@my_channel");
 * request.payload.set("member_limit", 10);
 * const link = await request.send();
 * ```
 */
export class Bot {
  private readonly config: ValidatedConfig;
  private readonly logger: Logger;
  private readonly transport: Transport;
  private readonly emitter = new TypedEventEmitter();
  private readonly limiter: RateLimiter | undefined;
  private readonly meCache: ResponseCache<User> | undefined;
  private readonly sleep: Sleep | undefined;

  /**
   * @throws ConfigurationError if the config is invalid.
   */
  constructor(config: BotConfig, options: BotOptions = {}) {
    this.config = validateConfig(config);
    this.logger = createLogger(this.config.logLevel);
    this.sleep = options.sleep;
    this.transport =
      options.transport ??
      new HttpTransport({
        token: this.config.token,
        apiUrl: this.config.apiUrl,
        timeoutMs: this.config.timeoutMs,
      });

    if (this.config.throttle) {
      this.limiter = new RateLimiter(this.config.throttle, {
        clock: options.clock,
        sleep: options.sleep,
      });
    }
    if (this.config.cacheMe) {
      this.meCache = new ResponseCache<User>();
    }
  }

  /** Bind any payload to this bot's transport and adaptor stack. */
  request<D extends PayloadDefinition>(payload: Payload<D>): Request<D> {
    let request: Request<D> = new JsonRequest(this.transport, payload);
    if (this.limiter) {
      request = new Throttle(request, this.limiter);
    }
    if (this.config.retry) {
      request = new Retry(request, this.config.retry, {
        events: this.emitter,
        logger: this.logger,
        sleep: this.sleep,
      });
    }
    return new Trace(request, this.logger, this.emitter);
  }

  /** The bot's own user. Answered from cache after the first success unless `cacheMe` is off. */
  getMe(): Request<GetMeDefinition> {
    const request = this.request(GetMe.create({}));
    return this.meCache ? new Cache(request, this.meCache) : request;
  }

  getChat(chatId: ChatIdLike): Request<GetChatDefinition> {
    return this.request(GetChat.create({ chat_id: chatId }));
  }

  sendMessage(chatId: ChatIdLike, text: string): Request<SendMessageDefinition> {
    return this.request(SendMessage.create({ chat_id: chatId, text }));
  }

  deleteMessage(
    chatId: ChatIdLike,
    messageId: number,
  ): Request<DeleteMessageDefinition> {
    return this.request(
      DeleteMessage.create({ chat_id: chatId, message_id: messageId }),
    );
  }

  createChatInviteLink(
    chatId: ChatIdLike,
  ): Request<CreateChatInviteLinkDefinition> {
    return this.request(CreateChatInviteLink.create({ chat_id: chatId }));
  }

  editChatInviteLink(
    chatId: ChatIdLike,
    inviteLink: string,
  ): Request<EditChatInviteLinkDefinition> {
    return this.request(
      EditChatInviteLink.create({ chat_id: chatId, invite_link: inviteLink }),
    );
  }

  revokeChatInviteLink(
    chatId: ChatIdLike,
    inviteLink: string,
  ): Request<RevokeChatInviteLinkDefinition> {
    return this.request(
      RevokeChatInviteLink.create({ chat_id: chatId, invite_link: inviteLink }),
    );
  }

  exportChatInviteLink(
    chatId: ChatIdLike,
  ): Request<ExportChatInviteLinkDefinition> {
    return this.request(ExportChatInviteLink.create({ chat_id: chatId }));
  }

  /** Forget the cached `getMe` result. */
  clearCache(): void {
    this.meCache?.clear();
  }

  /** Drop all listeners and cached results. */
  close(): void {
    this.emitter.removeAllListeners();
    this.clearCache();
  }

  /** Subscribe to request events: `"request:start"`, `"request:success"`, `"request:failure"`, `"request:retry"`. */
  on<E extends EventName>(event: E, listener: EventListener<E>): this {
    this.emitter.on(event, listener);
    return this;
  }

  /** Unsubscribe from request events. */
  off<E extends EventName>(event: E, listener: EventListener<E>): this {
    this.emitter.off(event, listener);
    return this;
  }
}
