import type { SafeWrap } from '../utils/wrap.js';

/** Generic structured document: a tree of scalars, sequences and maps. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** Parses raw bytes into a generic structured document. */
export type DocumentParser = (body: Uint8Array) => SafeWrap<Error, JsonValue>;
