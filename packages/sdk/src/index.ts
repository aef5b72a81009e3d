export {
  ApiError,
  ChatId,
  type ChatIdLike,
  DecodeError,
  InvalidChatIdError,
  InvalidPayloadError,
  NetworkError,
  type Output,
  Payload,
  PendingCall,
  type Request,
  RequestCancelledError,
  RequestConsumedError,
  RequestError,
  SerializationError,
  type Transport,
  type TransportCall,
  type TransportResponse,
} from "@botwire/core";
export {
  Cache,
  type Clock,
  RateLimiter,
  type RateLimiterOptions,
  ResponseCache,
  type ResponseCacheOptions,
  Retry,
  type RetryOptions,
  retryDelay,
  type Sleep,
  Throttle,
  Trace,
} from "./adaptors/index";
export { Bot, type BotOptions } from "./bot";
export { validateConfig } from "./config/schema";
export type {
  BotConfig,
  RetryConfig,
  ThrottleConfig,
  ValidatedConfig,
} from "./config/types";
export { BotwireError, ConfigurationError } from "./errors/index";
export { TypedEventEmitter } from "./events/event-emitter";
export type {
  BotEvents,
  EventListener,
  EventName,
  RequestFailureEvent,
  RequestRetryEvent,
  RequestStartEvent,
  RequestSuccessEvent,
} from "./events/types";
export { createLogger, type Logger, type LogLevelConfig } from "./logger/logger";
export * from "./payloads/index";
export * from "./types/index";
