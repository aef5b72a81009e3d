import { z } from "zod";
import type { TransportResponse } from "../shared/transport";
import { ApiError, DecodeError } from "./request-error";

const ResponseParametersSchema = z.object({
  retry_after: z.number().int().nonnegative().optional(),
  migrate_to_chat_id: z.number().int().optional(),
});

/** `{ ok: true, result }` or `{ ok: false, description, error_code, parameters? }`. */
export const ResponseEnvelopeSchema = z.discriminatedUnion("ok", [
  z.object({
    ok: z.literal(true),
    result: z.unknown(),
  }),
  z.object({
    ok: z.literal(false),
    description: z.string(),
    error_code: z.number().int(),
    parameters: ResponseParametersSchema.optional(),
  }),
]);

export type ResponseEnvelope = z.output<typeof ResponseEnvelopeSchema>;

function parseJson(method: string, body: string): unknown {
  try {
    return JSON.parse(body);
  } catch (err) {
    const preview = body.length > 80 ? `${body.slice(0, 80)}…` : body;
    throw new DecodeError(method, `body is not JSON: ${preview}`, {
      cause: err,
    });
  }
}

/**
 * Decode a raw transport response: unwrap the envelope, turn `ok: false`
 * into an {@link ApiError}, and check the result against the output schema.
 */
export function decodeResponse<S extends z.ZodType>(
  method: string,
  response: TransportResponse,
  output: S,
): z.output<S> {
  const json = parseJson(method, response.body);
  const envelope = ResponseEnvelopeSchema.safeParse(json);
  if (!envelope.success) {
    throw new DecodeError(
      method,
      `unexpected envelope (HTTP ${response.status})`,
      { cause: envelope.error },
    );
  }

  if (!envelope.data.ok) {
    const failure = envelope.data;
    throw new ApiError({
      method,
      description: failure.description,
      errorCode: failure.error_code,
      retryAfter: failure.parameters?.retry_after,
      migrateToChatId: failure.parameters?.migrate_to_chat_id,
    });
  }

  const result = output.safeParse(envelope.data.result);
  if (!result.success) {
    const fields = result.error.issues
      .map((issue) => issue.path.map(String).join(".") || "(root)")
      .join(", ");
    throw new DecodeError(method, `result does not match (${fields})`, {
      cause: result.error,
    });
  }
  return result.data;
}
