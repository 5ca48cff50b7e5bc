/**
 * Parameter entrypoint: node factories and the tree fold.
 * @module
 */
export { DEFAULT_TIMEOUT, defaultSession, type FoldedRequest, foldParams } from './fold.js';
export {
  accept,
  acceptLanguage,
  authorization,
  authorizationValue,
  basic,
  bearer,
  cacheControl,
  contentType,
  custom,
  userAgent,
} from './headers.js';
export {
  body,
  cachePolicy,
  credentials,
  group,
  header,
  method,
  queries,
  query,
  sessionHeader,
  sessionOption,
  timeout,
  url,
} from './params.js';
export type {
  Auth,
  BodyContent,
  BodyParam,
  GroupParam,
  HeaderParam,
  Lazy,
  MethodParam,
  QueryParam,
  RequestParam,
  SessionCapable,
  SessionEffect,
  SessionParam,
  TargetParam,
} from './types.js';
