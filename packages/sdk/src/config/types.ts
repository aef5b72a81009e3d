import type { z } from "zod";
import type { BotConfigSchema, RetrySchema, ThrottleSchema } from "./schema";

/** Configuration object passed to `new Bot()`. Validated at construction time. */
export type BotConfig = z.input<typeof BotConfigSchema>;

/** Validated and normalized configuration after Zod parsing. */
export type ValidatedConfig = z.output<typeof BotConfigSchema>;

/** Rate limits applied by the throttle adaptor. */
export type ThrottleConfig = z.output<typeof ThrottleSchema>;

/** Retry policy applied by the retry adaptor. */
export type RetryConfig = z.output<typeof RetrySchema>;
