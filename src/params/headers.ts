import { encodeText } from '../utils/decode.js';
import { header } from './params.js';
import type { Auth, HeaderParam, Lazy } from './types.js';

/** `Accept` header. */
export function accept(mediaType: Lazy<string>): HeaderParam {
  return header('Accept', mediaType);
}

/** `Content-Type` header. */
export function contentType(mediaType: Lazy<string>): HeaderParam {
  return header('Content-Type', mediaType);
}

/** `User-Agent` header. */
export function userAgent(value: Lazy<string>): HeaderParam {
  return header('User-Agent', value);
}

/** `Accept-Language` header. */
export function acceptLanguage(value: Lazy<string>): HeaderParam {
  return header('Accept-Language', value);
}

/** `Cache-Control` header. */
export function cacheControl(value: Lazy<string>): HeaderParam {
  return header('Cache-Control', value);
}

/** `Authorization` header for the given scheme. */
export function authorization(auth: Auth): HeaderParam {
  return header('Authorization', authorizationValue(auth));
}

/** Bearer token credentials. */
export function bearer(token: string): Auth {
  return { type: 'bearer', token };
}

/** Basic credentials, encoded as base64 of `username:password`. */
export function basic(username: string, password: string): Auth {
  return { type: 'basic', username, password };
}

/** Any other scheme, sent as `<scheme> <value>`. */
export function custom(scheme: string, value: string): Auth {
  return { type: 'custom', scheme, value };
}

/**
 * Renders the `Authorization` header value.
 * @example
 * authorizationValue(basic('user', 'pass')) // 'Basic dXNlcjpwYXNz'
 */
export function authorizationValue(auth: Auth): string {
  switch (auth.type) {
    case 'bearer':
      return `Bearer ${auth.token}`;
    case 'basic':
      return `Basic ${toBase64(`${auth.username}:${auth.password}`)}`;
    case 'custom':
      return `${auth.scheme} ${auth.value}`;
  }
}

/** Base64 of the UTF-8 bytes, so non-latin credentials survive `btoa`. */
function toBase64(text: string): string {
  let binary = '';
  for (const byte of encodeText(text)) {
    binary += String.fromCharCode(byte);
  }

  return btoa(binary);
}
