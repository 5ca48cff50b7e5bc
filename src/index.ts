/**
 * Root entrypoint for treefetch: re-exports the request, parameter factories, triggers, transport and errors.
 * Use this import if you want everything from a single module surface.
 * @module
 */

export {
  AnyRequest,
  type AnyRequestProps,
  bytesDecoder,
  type Callbacks,
  documentDecoder,
  type Request,
  type RequestConfig,
  type ResponseDecoder,
  schemaDecoder,
} from './core/index.js';

export * from './error/index.js';

/**
 * Default transport on top of `fetch`.
 */
export { FetchTransport, type FetchTransportOptions } from './fetch/index.js';

export * from './params/index.js';

export type { DocumentParser, JsonValue } from './types/document.js';
export { type Logger, type LogMeta, noopLogger } from './types/logger.js';
export type {
  HeaderEntry,
  HttpMethod,
  RequestDescriptor,
  SessionConfiguration,
  SessionOptionKey,
  Transport,
  TransportResponse,
} from './types/request.js';

/**
 * Update sources for re-running a request.
 */
export {
  eventTrigger,
  intervalTrigger,
  iterableTrigger,
  mergeTriggers,
  type TriggerSource,
  type Unsubscribe,
  type UpdateInput,
} from './update/triggers.js';

export { parseDocument } from './utils/decode.js';
