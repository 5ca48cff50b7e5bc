import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { DocumentParser, JsonValue } from '../types/document.js';
import type { Logger } from '../types/logger.js';
import type { Transport } from '../types/request.js';
import type { SafeWrap, SafeWrapAsync } from '../utils/wrap.js';

/** Schema for unknown input, any output, used to infer decoded response types. */
export type SchemaType = StandardSchemaV1;

/**
 * Per-kind consumers registered on a request. At most one per kind; registering again replaces it.
 */
export interface Callbacks<ResponseType> {
  /** Raw response bytes. */
  data?: (body: Uint8Array) => void;
  /** Response decoded as UTF-8, `''` for invalid sequences. */
  string?: (text: string) => void;
  /** Response parsed as a generic structured document. */
  json?: (document: JsonValue) => void;
  /** Response decoded into the request's declared type. */
  object?: (value: ResponseType) => void;
  /** Numeric HTTP status, delivered whatever the body holds. */
  statusCode?: (status: number) => void;
  /** Build, transport, decode and consumer errors. */
  error?: (error: Error) => void;
}

/**
 * Typed decoding of a response body. Receives the configured document parser so schema-based decoders
 * share the request's parsing.
 */
export type ResponseDecoder<ResponseType> = (
  body: Uint8Array,
  parseDocument: DocumentParser,
) => SafeWrap<Error, ResponseType> | SafeWrapAsync<Error, ResponseType>;

/**
 * Runtime configuration of a request, changed through `AnyRequest.config`.
 */
export interface RequestConfig {
  /** Transport performing the network call. Defaults to {@link FetchTransport}. */
  transport?: Transport;
  /** Logger for pipeline events. Defaults to a no-op logger. */
  logger?: Logger;
  /** Generic document parser. Defaults to UTF-8 JSON. */
  parseDocument?: DocumentParser;
}
