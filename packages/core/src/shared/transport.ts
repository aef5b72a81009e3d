/** One encoded call handed to a transport. */
export interface TransportCall {
  /** Remote method name, e.g. "sendMessage". */
  readonly method: string;
  /** Serialized JSON payload. */
  readonly body: string;
  /** Aborted when the pending call is cancelled. */
  readonly signal: AbortSignal;
}

/** Raw outcome of a transport call. The body is decoded by the request layer. */
export interface TransportResponse {
  readonly status: number;
  readonly body: string;
}

/**
 * Contract every transport binding must implement: perform one encoded call
 * and return the raw result, or throw when the call could not be completed.
 *
 * A transport is shared by many requests and must tolerate concurrent calls.
 */
export interface Transport {
  call(call: TransportCall): Promise<TransportResponse>;
}
