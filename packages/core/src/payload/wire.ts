import { SerializationError } from "../request/request-error";
import { ChatId } from "../shared/chat-id.vo";

/** A JSON value as it goes on the wire. */
export type WireValue =
  | null
  | boolean
  | number
  | string
  | readonly WireValue[]
  | { readonly [key: string]: WireValue };

export type WireRecord = { readonly [key: string]: WireValue };

export function isPlainRecord(
  value: unknown,
): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Convert a converted field value into its JSON wire form.
 * Dates become Unix seconds. Keys holding `undefined` are dropped.
 *
 * @throws SerializationError for values JSON cannot represent.
 */
export function toWire(value: unknown, method: string, path: string): WireValue {
  if (value === null) return null;
  if (value instanceof ChatId) return value.toJSON();
  if (value instanceof Date) {
    const ms = value.getTime();
    if (Number.isNaN(ms)) {
      throw new SerializationError(method, `invalid date at ${path}`);
    }
    return Math.floor(ms / 1000);
  }
  switch (typeof value) {
    case "string":
    case "boolean":
      return value;
    case "number":
      if (!Number.isFinite(value)) {
        throw new SerializationError(method, `non-finite number at ${path}`);
      }
      return value;
    case "object":
      break;
    default:
      throw new SerializationError(
        method,
        `${typeof value} is not JSON-encodable at ${path}`,
      );
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => toWire(item, method, `${path}[${index}]`));
  }
  if (isPlainRecord(value)) {
    return toWireRecord(value, method, path);
  }
  throw new SerializationError(
    method,
    `${value.constructor.name} instance is not JSON-encodable at ${path}`,
  );
}

export function toWireRecord(
  record: Readonly<Record<string, unknown>>,
  method: string,
  path = "",
): Record<string, WireValue> {
  const out: Record<string, WireValue> = {};
  for (const [key, entry] of Object.entries(record)) {
    if (entry === undefined) continue;
    out[key] = toWire(entry, method, path ? `${path}.${key}` : key);
  }
  return out;
}

/** JSON text with object keys sorted at every level. Equal values give equal strings. */
export function canonicalJson(value: WireValue): string {
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map((item: WireValue) => canonicalJson(item)).join(",")}]`;
  }
  const entries = Object.entries(value).sort(([a], [b]) =>
    a < b ? -1 : a > b ? 1 : 0,
  );
  const body = entries
    .map(([key, item]) => `${JSON.stringify(key)}:${canonicalJson(item)}`)
    .join(",");
  return `{${body}}`;
}
