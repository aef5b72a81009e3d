import {
  NetworkError,
  type Transport,
  type TransportCall,
  type TransportResponse,
} from "@botwire/core";
import { buildEndpoint, DEFAULT_API_URL, redactToken } from "./endpoint";

export const DEFAULT_TIMEOUT_MS = 17_000;

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface HttpTransportOptions {
  readonly token: string;
  readonly apiUrl?: string;
  readonly timeoutMs?: number;
  /** Defaults to the global `fetch`. */
  readonly fetch?: FetchLike;
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && err.name === "TimeoutError";
}

/**
 * Posts each call as a JSON body to `{apiUrl}/bot{token}/{method}` and hands
 * back the raw status and body. Any HTTP status is a response; only failing to
 * get one is an error.
 */
export class HttpTransport implements Transport {
  private readonly token: string;
  private readonly apiUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchLike;

  constructor(options: HttpTransportOptions) {
    this.token = options.token;
    this.apiUrl = options.apiUrl ?? DEFAULT_API_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
  }

  /** Endpoint of a method with the token masked, for logs. */
  describe(method: string): string {
    return redactToken(buildEndpoint(this.apiUrl, this.token, method), this.token);
  }

  async call(call: TransportCall): Promise<TransportResponse> {
    const url = buildEndpoint(this.apiUrl, this.token, call.method);
    const signal = AbortSignal.any([
      call.signal,
      AbortSignal.timeout(this.timeoutMs),
    ]);

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: call.body,
        signal,
      });
    } catch (err) {
      throw this.toNetworkError(call.method, err);
    }

    try {
      return { status: response.status, body: await response.text() };
    } catch (err) {
      throw this.toNetworkError(call.method, err);
    }
  }

  private toNetworkError(method: string, err: unknown): NetworkError {
    if (isTimeout(err)) {
      return new NetworkError(
        "network_timeout",
        `${method} timed out after ${this.timeoutMs}ms`,
        { cause: err },
      );
    }
    const msg = err instanceof Error ? err.message : "Network error";
    return new NetworkError(
      "endpoint_unreachable",
      `Cannot reach ${this.describe(method)}: ${redactToken(msg, this.token)}`,
      { cause: err },
    );
  }
}
