import type { HttpMethod, SessionConfiguration, SessionOptionKey } from '../types/request.js';
import type {
  BodyContent,
  BodyParam,
  GroupParam,
  HeaderParam,
  Lazy,
  MethodParam,
  QueryParam,
  RequestParam,
  SessionParam,
  TargetParam,
} from './types.js';

/**
 * Sets the absolute URL of the request.
 * @example
 * url('https://api.example.com/todos')
 */
export function url(address: Lazy<string>): TargetParam {
  return Object.freeze({ kind: 'target', address });
}

/** Sets the HTTP verb, `GET` when omitted. */
export function method(verb: HttpMethod): MethodParam {
  return Object.freeze({ kind: 'method', verb });
}

/**
 * Appends a header. Pass a function to compute the value on every fold.
 * @example
 * header('X-Request-Id', () => nextId())
 */
export function header(name: string, value: Lazy<string>): HeaderParam {
  return Object.freeze({ kind: 'header', name, value });
}

/** Appends a single query item to the target. */
export function query(name: string, value: Lazy<string>): QueryParam {
  return Object.freeze({ kind: 'query', name, value });
}

/**
 * Appends one query item per defined entry, in key order. `null` and `undefined` values are skipped.
 */
export function queries(items: Record<string, string | number | boolean | null | undefined>): GroupParam {
  const children: QueryParam[] = [];
  for (const [name, value] of Object.entries(items)) {
    if (value === null || value === undefined) {
      continue;
    }
    children.push(query(name, String(value)));
  }

  return group(...children);
}

/**
 * Sets the body. Buffers and views are sent as raw bytes, strings as UTF-8, anything else as JSON.
 */
export function body(content: Lazy<BodyContent>): BodyParam {
  return Object.freeze({ kind: 'body', content });
}

/** Nests nodes; children fold in order. */
export function group(...children: RequestParam[]): GroupParam {
  return Object.freeze({ kind: 'group', children: Object.freeze([...children]) });
}

/** Sets a single session option. */
export function sessionOption<K extends SessionOptionKey>(key: K, value: SessionConfiguration[K]): SessionParam {
  return Object.freeze({
    kind: 'session',
    key,
    configure: (session: SessionConfiguration) => {
      const next: SessionConfiguration = { ...session };
      next[key] = value;
      return next;
    },
  });
}

/** Adds a default header to the session; request headers are sent after it. */
export function sessionHeader(name: string, value: string): SessionParam {
  return Object.freeze({
    kind: 'session',
    key: 'headers',
    configure: (session: SessionConfiguration) => ({
      ...session,
      headers: [...session.headers, [name, value] as const],
    }),
  });
}

/** Transport timeout in milliseconds, `false` to disable. */
export function timeout(ms: number | false): SessionParam {
  return sessionOption('timeout', ms);
}

/** Fetch cache mode for the session. */
export function cachePolicy(mode: RequestCache): SessionParam {
  return sessionOption('cache', mode);
}

/** Fetch credentials mode for the session. */
export function credentials(mode: RequestCredentials): SessionParam {
  return sessionOption('credentials', mode);
}
