import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { JsonValue } from '../types/document.js';
import { validator } from '../utils/validator.js';
import type { ResponseDecoder, SchemaType } from './types.js';

/** Hands the raw body back unchanged. */
export const bytesDecoder: ResponseDecoder<Uint8Array> = (body) => [null, body];

/** Decodes into the generic document produced by the configured parser. */
export const documentDecoder: ResponseDecoder<JsonValue> = (body, parseDocument) => parseDocument(body);

/**
 * Parses the body as a document and validates it against a Standard Schema (zod, valibot, arktype, ...).
 * @example
 * schemaDecoder(z.array(z.object({ id: z.number() })))
 */
export function schemaDecoder<Schema extends SchemaType>(
  schema: Schema,
): ResponseDecoder<StandardSchemaV1.InferOutput<Schema>> {
  return async (body, parseDocument) => {
    const [errParse, document] = parseDocument(body);
    if (errParse) {
      return [errParse, null];
    }

    return validator(document, schema);
  };
}
