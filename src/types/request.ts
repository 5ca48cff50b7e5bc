import type { SafeWrapAsync } from '../utils/wrap.js';

/** HTTP verbs accepted by the `method` parameter. */
export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS' | 'TRACE' | 'CONNECT';

/**
 * A single `[name, value]` header entry.
 * Lists of entries keep declaration order; the last entry for a name is the authoritative one.
 */
export type HeaderEntry = readonly [name: string, value: string];

/**
 * Canonical result of folding a parameter tree.
 * Two descriptors built from the same tree are structurally equal.
 */
export interface RequestDescriptor {
  /** Upper-cased HTTP verb, `GET` when no method node was declared. */
  readonly method: HttpMethod;
  /** Absolute target URL, including any folded query items. */
  readonly target: string;
  /** Header entries in the order they were visited. */
  readonly headers: readonly HeaderEntry[];
  /** Encoded body, empty when none was set. */
  readonly body: Uint8Array;
}

/**
 * Transport-level options folded from session-capable nodes.
 * Independent of {@link RequestDescriptor}, built in the same traversal.
 */
export interface SessionConfiguration {
  /** Default headers sent before the request headers. */
  headers: HeaderEntry[];
  /**
   * Request timeout in milliseconds, `false` disables it.
   * @default 60000
   */
  timeout: number | false;
  /**
   * Fetch cache mode.
   * @default 'default'
   */
  cache: RequestCache;
  /** Fetch credentials mode. */
  credentials?: RequestCredentials;
  /** Fetch mode. */
  mode?: RequestMode;
  /** Fetch redirect policy. */
  redirect?: RequestRedirect;
  /** Keep the connection alive past page unload where supported. */
  keepalive?: boolean;
  /** Caller-owned abort signal merged with the timeout signal. */
  signal?: AbortSignal;
}

/** Keys a session option node may set. */
export type SessionOptionKey = Exclude<keyof SessionConfiguration, 'headers'>;

/** Successful transport outcome, delivered once per call. */
export interface TransportResponse {
  /** Raw response body. */
  body: Uint8Array;
  /** Numeric HTTP status, including non-2xx statuses. */
  status: number;
  /** Response headers as returned by the transport. */
  headers: Headers;
}

/**
 * Contract for transports performing the network call.
 * Implementations perform exactly one request per `send` and never throw, returning error-first tuples instead.
 */
export interface Transport {
  send: (request: RequestDescriptor, session: SessionConfiguration) => SafeWrapAsync<Error, TransportResponse>;
}
