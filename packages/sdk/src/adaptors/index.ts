export { Cache } from "./cache";
export { RateLimiter, type RateLimiterOptions } from "./rate-limiter";
export { ResponseCache, type ResponseCacheOptions } from "./response-cache";
export { Retry, type RetryOptions, retryDelay } from "./retry";
export { type Clock, type Sleep, sleep } from "./sleep";
export { Throttle } from "./throttle";
export { Trace } from "./trace";
