import { InvalidChatIdError } from "./domain-error";

/** Anything `ChatId.from()` accepts. */
export type ChatIdLike = ChatId | number | string;

const USERNAME_PATTERN = /^@[A-Za-z][A-Za-z0-9_]{4,31}$/;
const NUMERIC_PATTERN = /^-?\d+$/;

/**
 * Immutable Value Object identifying the target chat of an operation:
 * either a numeric chat id or a public `@channelusername`.
 *
 * @example
 * ```ts
 * ChatId.from(42).toJSON(); // 42
 * ChatId.from("-1001234567890").toJSON(); // -1001234567890
 * ChatId.from("@botwire_news").toJSON(); // "@botwire_news"
 * ```
 */
export class ChatId {
  private readonly value: number | string;

  private constructor(value: number | string) {
    this.value = value;
  }

  /**
   * Convert a number, a numeric string or an `@username` into a ChatId.
   * @throws InvalidChatIdError if the input is not a usable identifier.
   */
  static from(input: ChatIdLike): ChatId {
    if (input instanceof ChatId) {
      return input;
    }
    const problem = ChatId.problem(input);
    if (problem) {
      throw new InvalidChatIdError(String(input), problem);
    }
    if (typeof input === "string" && NUMERIC_PATTERN.test(input.trim())) {
      return new ChatId(Number(input.trim()));
    }
    // The Bot API resolves usernames case-insensitively; one stored case keeps wire keys in step with equals().
    return new ChatId(typeof input === "string" ? input.trim().toLowerCase() : input);
  }

  /** Describe why `input` is not a valid chat id, or `undefined` when it is. */
  static problem(input: ChatIdLike): string | undefined {
    if (input instanceof ChatId) return undefined;
    if (typeof input === "number") {
      return ChatId.numericProblem(input);
    }
    const trimmed = input.trim();
    if (trimmed === "") return "must not be empty";
    if (NUMERIC_PATTERN.test(trimmed)) {
      return ChatId.numericProblem(Number(trimmed));
    }
    if (!USERNAME_PATTERN.test(trimmed)) {
      return "expected a numeric id or an @username of 5-32 letters, digits or underscores";
    }
    return undefined;
  }

  private static numericProblem(id: number): string | undefined {
    if (!Number.isSafeInteger(id)) return "must be a safe integer";
    if (id === 0) return "must not be zero";
    return undefined;
  }

  /** Numeric id, or undefined for a username. */
  get id(): number | undefined {
    return typeof this.value === "number" ? this.value : undefined;
  }

  /** Lower-cased `@username`, or undefined for a numeric id. */
  get username(): string | undefined {
    return typeof this.value === "string" ? this.value : undefined;
  }

  /** Value equality. Usernames are stored lower-cased, so `@Foo_Bar` equals `@foo_bar`. */
  equals(other: ChatId): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return String(this.value);
  }

  /** Wire form: the number itself or the `@username` string. */
  toJSON(): number | string {
    return this.value;
  }
}
