/**
 * Core entrypoint: the request entity, its pipeline stages and decoders.
 * Import from here if you only need the request without the parameter factories.
 * @module
 */

/**
 * Declarative request with typed consumers and update sources.
 */
export { AnyRequest, type AnyRequestProps, type Request } from './request.js';

/** Decoders for the `object` consumer. */
export { bytesDecoder, documentDecoder, schemaDecoder } from './decoders.js';

/** Response fan-out to the registered consumers. */
export { type DispatchContext, dispatch, reportError } from './dispatch.js';

/** Single transport call for a folded request. */
export { execute } from './execute.js';

export type { Callbacks, RequestConfig, ResponseDecoder, SchemaType } from './types.js';
