import type { JsonValue } from '../types/document.js';
import { type SafeWrap, safeWrap } from './wrap.js';

const encoder = new TextEncoder();
const strictDecoder = new TextDecoder('utf-8', { fatal: true });

/** UTF-8 encodes a string. */
export function encodeText(text: string): Uint8Array {
  return encoder.encode(text);
}

/**
 * Decodes bytes as UTF-8. Invalid sequences yield an empty string rather than an error.
 */
export function decodeText(body: Uint8Array): string {
  const [err, text] = safeWrap(() => strictDecoder.decode(body));
  if (err) {
    return '';
  }

  return text;
}

/**
 * Default document parser: strict UTF-8 followed by `JSON.parse`.
 */
export function parseDocument(body: Uint8Array): SafeWrap<Error, JsonValue> {
  const [errText, text] = safeWrap(() => strictDecoder.decode(body));
  if (errText) {
    return [new Error('error decoding body as utf-8 in parseDocument', { cause: errText }), null];
  }

  const [errJson, document] = safeWrap((): JsonValue => JSON.parse(text));
  if (errJson) {
    return [new Error('error parsing json body in parseDocument', { cause: errJson }), null];
  }

  return [null, document];
}

/**
 * Re-indents a JSON body for display; empty string when the body is not JSON.
 */
export function prettyJson(body: Uint8Array): string {
  const [err, document] = parseDocument(body);
  if (err) {
    return '';
  }

  return JSON.stringify(document, null, 2);
}
