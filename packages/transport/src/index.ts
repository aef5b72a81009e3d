export { buildEndpoint, DEFAULT_API_URL, redactToken } from "./endpoint";
export {
  DEFAULT_TIMEOUT_MS,
  type FetchLike,
  HttpTransport,
  type HttpTransportOptions,
} from "./http-transport";
