import { BuildError } from '../error/buildError.js';
import type { HeaderEntry, HttpMethod, RequestDescriptor, SessionConfiguration } from '../types/request.js';
import { encodeText } from '../utils/decode.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';
import type { BodyContent, Lazy, RequestParam } from './types.js';

/** Default request timeout in milliseconds. */
export const DEFAULT_TIMEOUT = 60_000;

/** Result of folding a parameter tree. */
export interface FoldedRequest {
  request: RequestDescriptor;
  session: SessionConfiguration;
}

/** Mutable accumulator threaded through a single traversal. */
interface FoldState {
  targets: string[];
  method: HttpMethod;
  headers: HeaderEntry[];
  query: HeaderEntry[];
  body: Uint8Array;
  jsonBody: boolean;
  session: SessionConfiguration;
}

/** Fresh session defaults; never shared between folds. */
export function defaultSession(): SessionConfiguration {
  return { headers: [], timeout: DEFAULT_TIMEOUT, cache: 'default' };
}

function isThunk<T>(value: Lazy<T>): value is () => T {
  return typeof value === 'function';
}

/**
 * Evaluates a lazy parameter value, turning a throwing thunk into an `InvalidParam` build error.
 */
function resolve<T>(value: Lazy<T>, what: string): SafeWrap<BuildError, T> {
  if (!isThunk(value)) {
    return [null, value];
  }

  const [err, resolved] = safeWrap(value);
  if (err) {
    return [new BuildError('InvalidParam', `error evaluating ${what}`, { cause: err }), null];
  }

  return [null, resolved];
}

/** Views any byte container as a `Uint8Array` without copying. */
function toBytes(content: BodyContent): Uint8Array | null {
  if (content instanceof Uint8Array) {
    return content;
  }

  if (content instanceof ArrayBuffer) {
    return new Uint8Array(content);
  }

  if (ArrayBuffer.isView(content)) {
    return new Uint8Array(content.buffer, content.byteOffset, content.byteLength);
  }

  return null;
}

function encodeBody(content: BodyContent): SafeWrap<BuildError, { bytes: Uint8Array; json: boolean }> {
  const bytes = toBytes(content);
  if (bytes) {
    return [null, { bytes, json: false }];
  }

  if (typeof content === 'string') {
    return [null, { bytes: encodeText(content), json: false }];
  }

  const [err, json] = safeWrap((): string | undefined => JSON.stringify(content));
  if (err) {
    return [new BuildError('InvalidParam', 'error encoding body as json', { cause: err }), null];
  }

  if (json === undefined) {
    return [new BuildError('InvalidParam', `error body of type ${typeof content} is not json-encodable`), null];
  }

  return [null, { bytes: encodeText(json), json: true }];
}

/**
 * Visits a node and its children depth-first, in declaration order.
 * Returns the first build error hit, or `null`.
 */
function visit(param: RequestParam, state: FoldState): BuildError | null {
  if (param.configure) {
    state.session = param.configure(state.session);
  }

  switch (param.kind) {
    case 'target': {
      const [err, address] = resolve(param.address, 'target');
      if (err) {
        return err;
      }
      state.targets.push(address);
      return null;
    }
    case 'method':
      state.method = param.verb;
      return null;
    case 'header': {
      const [err, value] = resolve(param.value, `header ${param.name}`);
      if (err) {
        return err;
      }
      state.headers.push([param.name, value]);
      return null;
    }
    case 'query': {
      const [err, value] = resolve(param.value, `query item ${param.name}`);
      if (err) {
        return err;
      }
      state.query.push([param.name, value]);
      return null;
    }
    case 'body': {
      const [errResolve, content] = resolve(param.content, 'body');
      if (errResolve) {
        return errResolve;
      }
      const [errEncode, encoded] = encodeBody(content);
      if (errEncode) {
        return errEncode;
      }
      state.body = encoded.bytes;
      state.jsonBody = encoded.json;
      return null;
    }
    case 'session':
      return null;
    case 'group':
      for (const child of param.children) {
        const err = visit(child, state);
        if (err) {
          return err;
        }
      }
      return null;
  }
}

/**
 * Resolves the single collected target into an absolute URL with the query items appended.
 */
function resolveTarget(targets: string[], query: HeaderEntry[]): SafeWrap<BuildError, string> {
  if (targets.length === 0) {
    return [new BuildError('MissingTarget', 'error request has no target'), null];
  }

  if (targets.length > 1) {
    return [new BuildError('MultipleTargets', `error request has ${targets.length} targets`), null];
  }

  const [address] = targets;
  const [err, target] = safeWrap(() => new URL(address));
  if (err) {
    return [new BuildError('InvalidTarget', `error target ${address} is not an absolute url`, { cause: err }), null];
  }

  for (const [name, value] of query) {
    target.searchParams.append(name, value);
  }

  return [null, target.toString()];
}

/**
 * Folds a parameter tree into a request descriptor and a session configuration in one traversal.
 *
 * - Headers keep declaration order; a JSON body adds `Content-Type: application/json` only when the tree
 *   declares no `Content-Type` of its own.
 * - Only nodes carrying `configure` touch the session configuration.
 * - Fails with a {@link BuildError} when the tree has no target, several targets, an invalid target, or a
 *   lazy value that throws.
 */
export function foldParams(root: RequestParam): SafeWrap<BuildError, FoldedRequest> {
  const state: FoldState = {
    targets: [],
    method: 'GET',
    headers: [],
    query: [],
    body: new Uint8Array(),
    jsonBody: false,
    session: defaultSession(),
  };

  const errVisit = visit(root, state);
  if (errVisit) {
    return [errVisit, null];
  }

  const [errTarget, target] = resolveTarget(state.targets, state.query);
  if (errTarget) {
    return [errTarget, null];
  }

  if (state.jsonBody && !state.headers.some(([name]) => name.toLowerCase() === 'content-type')) {
    state.headers.push(['Content-Type', 'application/json']);
  }

  const request: RequestDescriptor = Object.freeze({
    method: state.method,
    target,
    headers: Object.freeze(state.headers),
    body: state.body,
  });

  return [null, { request, session: state.session }];
}
