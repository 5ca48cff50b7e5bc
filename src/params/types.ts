import type { HttpMethod, SessionConfiguration } from '../types/request.js';

/** A value fixed at construction, or a thunk evaluated each time the tree is folded. */
export type Lazy<T> = T | (() => T);

/** Body content: raw bytes (any buffer or view), text, or anything `JSON.stringify` can encode. */
export type BodyContent = ArrayBuffer | ArrayBufferView | string | number | boolean | null | object;

/** Pure transformation applied to the session configuration while folding. */
export type SessionEffect = (session: SessionConfiguration) => SessionConfiguration;

/**
 * Capability a node opts into to take part in the session fold.
 * Nodes without `configure` never touch the session configuration.
 */
export interface SessionCapable {
  readonly configure?: SessionEffect;
}

/** Sets the absolute request target. Must appear exactly once per tree. */
export interface TargetParam extends SessionCapable {
  readonly kind: 'target';
  readonly address: Lazy<string>;
}

/** Sets the HTTP verb; the last one visited wins. */
export interface MethodParam extends SessionCapable {
  readonly kind: 'method';
  readonly verb: HttpMethod;
}

/** Appends a request header entry. */
export interface HeaderParam extends SessionCapable {
  readonly kind: 'header';
  readonly name: string;
  readonly value: Lazy<string>;
}

/** Appends a query item to the target. */
export interface QueryParam extends SessionCapable {
  readonly kind: 'query';
  readonly name: string;
  readonly value: Lazy<string>;
}

/** Sets the request body; the last one visited wins. */
export interface BodyParam extends SessionCapable {
  readonly kind: 'body';
  readonly content: Lazy<BodyContent>;
}

/** Session-only node, identified by the option it sets. */
export interface SessionParam extends SessionCapable {
  readonly kind: 'session';
  readonly key: keyof SessionConfiguration;
  readonly configure: SessionEffect;
}

/** Ordered composite of other nodes. */
export interface GroupParam extends SessionCapable {
  readonly kind: 'group';
  readonly children: readonly RequestParam[];
}

/** One request-building instruction. */
export type RequestParam = TargetParam | MethodParam | HeaderParam | QueryParam | BodyParam | SessionParam | GroupParam;

/** Authorization schemes accepted by `withAuthorization` and the `authorization` header. */
export type Auth =
  | { type: 'bearer'; token: string }
  | { type: 'basic'; username: string; password: string }
  | { type: 'custom'; scheme: string; value: string };
