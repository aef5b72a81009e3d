import type { OutputOf, Payload, PayloadDefinition } from "../payload/payload";
import { RequestConsumedError } from "../shared/domain-error";
import type { Transport, TransportResponse } from "../shared/transport";
import { PendingCall } from "./pending-call";
import type { Request, SendCall, SendRefCall } from "./request";
import { NetworkError, RequestError } from "./request-error";
import { decodeResponse } from "./response";

async function execute<D extends PayloadDefinition>(
  transport: Transport,
  payload: Payload<D>,
  signal: AbortSignal,
): Promise<OutputOf<D>> {
  const method = payload.method;
  const body = payload.serialize();

  let response: TransportResponse;
  try {
    response = await transport.call({ method, body, signal });
  } catch (err) {
    if (err instanceof RequestError) throw err;
    const msg = err instanceof Error ? err.message : "Unknown transport error";
    throw new NetworkError("endpoint_unreachable", `${method}: ${msg}`, {
      cause: err,
    });
  }

  return decodeResponse<D["output"]>(method, response, payload.definition.output);
}

/**
 * The base request: serializes the payload as a JSON body, hands it to the
 * transport, and decodes the response envelope into the payload's output type.
 *
 * @example
 * ```ts
 * const request = new JsonRequest(transport, SendMessage.create({ chat_id: 0, text: "Hi" }));
 * for (const chatId of [1, 2, 3]) {
 *   request.payload.assign({ chat_id: chatId });
 *   await request.sendRef();
 * }
 * ```
 */
export class JsonRequest<D extends PayloadDefinition> implements Request<D> {
  private readonly transport: Transport;
  private owned: Payload<D> | undefined;
  private readonly method: string;

  constructor(transport: Transport, payload: Payload<D>) {
    this.transport = transport;
    this.owned = payload;
    this.method = payload.method;
  }

  get payload(): Payload<D> {
    if (!this.owned) {
      throw new RequestConsumedError(this.method);
    }
    return this.owned;
  }

  send(): SendCall<OutputOf<D>> {
    const payload = this.payload.clone();
    this.owned = undefined;
    const transport = this.transport;
    return new PendingCall("send", (signal) =>
      execute(transport, payload, signal),
    );
  }

  sendRef(): SendRefCall<OutputOf<D>> {
    const snapshot = this.payload.clone();
    const transport = this.transport;
    return new PendingCall("sendRef", (signal) =>
      execute(transport, snapshot, signal),
    );
  }
}
