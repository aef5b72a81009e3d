import type { z } from "zod";
import { InvalidPayloadError, type PayloadFieldIssue } from "../shared/domain-error";
import { absent, type Field, isPresent, present } from "../shared/field";
import {
  canonicalJson,
  isPlainRecord,
  toWire,
  toWireRecord,
  type WireValue,
} from "./wire";

/** Per-field schemas of a payload's optional fields. */
export type FieldSchemas = Readonly<Record<string, z.ZodType>>;

/**
 * Static description of one remote operation.
 *
 * `required` is an object schema parsed at construction; each entry of
 * `optional` validates and converts one optional field; `output` decodes the
 * operation's successful result and fixes its type.
 */
export interface PayloadDefinition<
  TRequired extends z.ZodType = z.ZodType,
  TOptional extends FieldSchemas = FieldSchemas,
  TOutput extends z.ZodType = z.ZodType,
> {
  readonly method: string;
  readonly required: TRequired;
  readonly optional: TOptional;
  readonly output: TOutput;
}

export type RequiredInput<D extends PayloadDefinition> = z.input<D["required"]>;
export type RequiredValues<D extends PayloadDefinition> = z.output<
  D["required"]
>;
export type OptionalName<D extends PayloadDefinition> = keyof D["optional"] &
  string;
export type OptionalInput<
  D extends PayloadDefinition,
  K extends OptionalName<D>,
> = z.input<D["optional"][K]>;
export type OptionalValue<
  D extends PayloadDefinition,
  K extends OptionalName<D>,
> = z.output<D["optional"][K]>;

/** Decoded result type of a definition's operation. */
export type OutputOf<D extends PayloadDefinition> = z.output<D["output"]>;

/** Decoded result type of a payload, e.g. `Output<typeof payload>`. */
export type Output<P> =
  P extends Payload<infer D extends PayloadDefinition> ? OutputOf<D> : never;

type OptionalState<D extends PayloadDefinition> = {
  [K in OptionalName<D>]?: Field<OptionalValue<D, K>>;
};

/** Minimal view used to compare payloads of any operation. */
export interface PayloadKey {
  readonly method: string;
  key(): string;
}

function toFieldIssues(
  issues: readonly z.core.$ZodIssue[],
  prefix?: string,
): PayloadFieldIssue[] {
  return issues.map((issue) => {
    const segments = issue.path.map(String);
    if (prefix) segments.unshift(prefix);
    return {
      path: segments.length > 0 ? segments.join(".") : "(root)",
      message: issue.message,
    };
  });
}

/**
 * A typed description of one remote operation's parameters.
 *
 * Required fields are fixed at construction; optional fields start absent and
 * are configured with chainable setters. A field that was never set is left out
 * of the wire record, which is not the same as sending a default value.
 *
 * @example
 * ```ts
 * const link = CreateChatInviteLink.create({ chat_id: 42 })
 *   .set("member_limit", 10)
 *   .set("expire_date", new Date("2030-01-01T00:00:00Z"));
 * link.serialize(); // {"chat_id":42,"expire_date":1893456000,"member_limit":10}
 * ```
 */
export class Payload<D extends PayloadDefinition> implements PayloadKey {
  readonly definition: D;
  private requiredInput: RequiredInput<D>;
  private requiredValues: RequiredValues<D>;
  private optional: OptionalState<D>;

  private constructor(
    definition: D,
    requiredInput: RequiredInput<D>,
    requiredValues: RequiredValues<D>,
    optional: OptionalState<D>,
  ) {
    this.definition = definition;
    this.requiredInput = requiredInput;
    this.requiredValues = requiredValues;
    this.optional = optional;
  }

  /**
   * Build a payload from its required fields. All optional fields are absent.
   * @throws InvalidPayloadError if a required value violates its field rules.
   */
  static create<D extends PayloadDefinition>(
    definition: D,
    required: RequiredInput<D>,
  ): Payload<D> {
    const values = Payload.parseRequired(definition, required);
    return new Payload(definition, required, values, {});
  }

  private static parseRequired<D extends PayloadDefinition>(
    definition: D,
    input: unknown,
  ): RequiredValues<D> {
    const schema: D["required"] = definition.required;
    const result = schema.safeParse(input);
    if (!result.success) {
      throw new InvalidPayloadError(
        definition.method,
        toFieldIssues(result.error.issues),
      );
    }
    return result.data;
  }

  get method(): string {
    return this.definition.method;
  }

  /** Required field values after conversion. */
  get required(): RequiredValues<D> {
    return this.requiredValues;
  }

  /**
   * Replace some required fields, e.g. to retarget a reusable request.
   * @throws InvalidPayloadError if the merged values violate the field rules.
   */
  assign(patch: Partial<RequiredInput<D>>): this {
    const merged = Object.assign({}, this.requiredInput, patch);
    this.requiredValues = Payload.parseRequired(this.definition, merged);
    this.requiredInput = merged;
    return this;
  }

  /**
   * Set an optional field. The value may be anything the field converts from.
   * @throws InvalidPayloadError if the value violates the field rules.
   */
  set<K extends OptionalName<D>>(name: K, value: OptionalInput<D, K>): this {
    const optional: D["optional"] = this.definition.optional;
    const schema = optional[name];
    const result = schema.safeParse(value);
    if (!result.success) {
      throw new InvalidPayloadError(
        this.method,
        toFieldIssues(result.error.issues, name),
      );
    }
    // A value that converts to nothing has no wire form, so it counts as unset.
    this.optional[name] =
      result.data === undefined ? absent() : present(result.data);
    return this;
  }

  unset<K extends OptionalName<D>>(name: K): this {
    this.optional[name] = absent();
    return this;
  }

  field<K extends OptionalName<D>>(name: K): Field<OptionalValue<D, K>> {
    return this.optional[name] ?? absent();
  }

  isSet(name: OptionalName<D>): boolean {
    return this.field(name).kind === "present";
  }

  /** Independent copy; mutating one never affects the other. */
  clone(): Payload<D> {
    return new Payload(
      this.definition,
      this.requiredInput,
      this.requiredValues,
      { ...this.optional },
    );
  }

  /**
   * Wire record: every required field, then each set optional field in
   * definition order.
   * @throws SerializationError if a value has no JSON form.
   */
  encode(): Record<string, WireValue> {
    const method = this.method;
    const record: Record<string, WireValue> = isPlainRecord(this.requiredValues)
      ? toWireRecord(this.requiredValues, method)
      : {};
    const states: ReadonlyArray<[string, Field<unknown> | undefined]> =
      Object.entries(this.optional);
    const byName = new Map(states);
    for (const name of Object.keys(this.definition.optional)) {
      const state = byName.get(name);
      if (state && isPresent(state)) {
        record[name] = toWire(state.value, method, name);
      }
    }
    return record;
  }

  /** JSON text sent to the remote service. */
  serialize(): string {
    return JSON.stringify(this.encode());
  }

  toJSON(): Record<string, WireValue> {
    return this.encode();
  }

  /** Stable identity of this call: method plus the key-sorted wire record. */
  key(): string {
    return `${this.method}:${canonicalJson(this.encode())}`;
  }

  /** True iff both describe the same method with equal required and optional fields. */
  equals(other: PayloadKey): boolean {
    return this.method === other.method && this.key() === other.key();
  }
}

/** A payload type created by {@link definePayload}. */
export interface PayloadType<D extends PayloadDefinition> {
  readonly method: string;
  readonly definition: D;
  /** @throws InvalidPayloadError if a required value violates its field rules. */
  create(required: RequiredInput<D>): Payload<D>;
}

export type DefinitionOf<T> =
  T extends PayloadType<infer D extends PayloadDefinition> ? D : never;

export function definePayload<D extends PayloadDefinition>(
  definition: D,
): PayloadType<D> {
  return {
    method: definition.method,
    definition,
    create: (required) => Payload.create(definition, required),
  };
}
