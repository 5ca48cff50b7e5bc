import { type ConsumerKind, ConsumerError } from '../error/consumerError.js';
import { DecodeError } from '../error/decodeError.js';
import type { DocumentParser } from '../types/document.js';
import type { Logger } from '../types/logger.js';
import type { TransportResponse } from '../types/request.js';
import { decodeText } from '../utils/decode.js';
import { type SafeWrap, safeWrap, safeWrapAsync } from '../utils/wrap.js';
import type { Callbacks, ResponseDecoder } from './types.js';

/** Everything dispatch needs besides the outcome itself. */
export interface DispatchContext<ResponseType> {
  callbacks: Readonly<Callbacks<ResponseType>>;
  parseDocument: DocumentParser;
  decode: ResponseDecoder<ResponseType>;
  logger: Logger;
}

/**
 * Hands an error to the error consumer, or drops it when none is registered.
 * An error consumer that throws is logged, never rethrown.
 */
export function reportError<ResponseType>(error: Error, { callbacks, logger }: DispatchContext<ResponseType>): void {
  const onError = callbacks.error;
  if (!onError) {
    logger.debug('request.error.dropped', { error: error.message });
    return;
  }

  const [errConsumer] = safeWrap(() => onError(error));
  if (errConsumer) {
    logger.error('request.consumer.failed', { consumer: 'error', error: errConsumer });
  }
}

/**
 * Runs one consumer; a throw becomes a {@link ConsumerError} for the error consumer.
 */
function invoke<Value, ResponseType>(
  kind: ConsumerKind,
  consumer: ((value: Value) => void) | undefined,
  value: Value,
  context: DispatchContext<ResponseType>,
): void {
  if (!consumer) {
    return;
  }

  const [err] = safeWrap(() => consumer(value));
  if (err) {
    context.logger.warn('request.consumer.failed', { consumer: kind, error: err });
    reportError(new ConsumerError(kind, { cause: err }), context);
  }
}

/**
 * Fans one outcome out to the registered consumers.
 *
 * On success, in order, each step independent of the others:
 * 1. `data` gets the raw bytes.
 * 2. `string` gets the UTF-8 text.
 * 3. `json` gets the parsed document; a parse failure goes to `error` as a `json` {@link DecodeError}.
 * 4. `object` gets the decoded value; a decode failure goes to `error` as an `object` {@link DecodeError}.
 * 5. `statusCode` gets the status.
 *
 * On failure only `error` is called, and the failure is dropped when it is not registered.
 */
export async function dispatch<ResponseType>(
  outcome: SafeWrap<Error, TransportResponse>,
  context: DispatchContext<ResponseType>,
): Promise<void> {
  const [err, response] = outcome;
  if (err) {
    reportError(err, context);
    return;
  }

  const { callbacks, parseDocument, decode } = context;
  const { body, status } = response;

  invoke('data', callbacks.data, body, context);

  if (callbacks.string) {
    invoke('string', callbacks.string, decodeText(body), context);
  }

  if (callbacks.json) {
    const [errParse, document] = parseDocument(body);
    if (errParse) {
      reportError(new DecodeError('json', 'error decoding response as json document', { cause: errParse }), context);
    } else {
      invoke('json', callbacks.json, document, context);
    }
  }

  if (callbacks.object) {
    const [errThrown, decoded] = await safeWrapAsync(async () => decode(body, parseDocument));
    if (errThrown) {
      reportError(new DecodeError('object', 'error thrown while decoding response', { cause: errThrown }), context);
    } else {
      const [errDecode, value] = decoded;
      if (errDecode) {
        reportError(new DecodeError('object', 'error decoding response as object', { cause: errDecode }), context);
      } else {
        invoke('object', callbacks.object, value, context);
      }
    }
  }

  invoke('statusCode', callbacks.statusCode, status, context);
}
