export {
  definePayload,
  type DefinitionOf,
  type FieldSchemas,
  type OptionalInput,
  type OptionalName,
  type OptionalValue,
  type Output,
  type OutputOf,
  Payload,
  type PayloadDefinition,
  type PayloadKey,
  type PayloadType,
  type RequiredInput,
  type RequiredValues,
} from "./payload/payload";
export {
  canonicalJson,
  isPlainRecord,
  type WireRecord,
  type WireValue,
} from "./payload/wire";
export { JsonRequest } from "./request/json-request";
export {
  type CallExecutor,
  type CallMode,
  type CallResult,
  PendingCall,
} from "./request/pending-call";
export type { Request, SendCall, SendRefCall } from "./request/request";
export {
  type Interception,
  RequestAdaptor,
} from "./request/request-adaptor";
export {
  ApiError,
  type ApiErrorDetails,
  DecodeError,
  NetworkError,
  RequestCancelledError,
  RequestError,
  SerializationError,
} from "./request/request-error";
export {
  decodeResponse,
  type ResponseEnvelope,
  ResponseEnvelopeSchema,
} from "./request/response";
export { ChatId, type ChatIdLike } from "./shared/chat-id.vo";
export {
  DomainError,
  InvalidChatIdError,
  InvalidPayloadError,
  type PayloadFieldIssue,
  RequestConsumedError,
} from "./shared/domain-error";
export {
  type Absent,
  absent,
  type Field,
  isPresent,
  type Present,
  present,
} from "./shared/field";
export type {
  Transport,
  TransportCall,
  TransportResponse,
} from "./shared/transport";
