import type { HeaderEntry, RequestDescriptor, SessionConfiguration, Transport, TransportResponse } from '../types/request.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { allowsBody, mergeHeaders } from './utils.js';

/** Options to configure the {@link FetchTransport}. */
export interface FetchTransportOptions {
  /** Headers sent with every request, before session and request headers. */
  headers?: readonly HeaderEntry[];
}

/**
 * Default {@link Transport} on top of the native `fetch` API that:
 * - merges transport, session and request headers (last value per name wins),
 * - applies the session timeout and the caller's session signal,
 * - resolves every HTTP status as a response, including non-2xx,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 */
export class FetchTransport implements Transport {
  /** Headers applied before everything else. */
  #headers: readonly HeaderEntry[];

  /** Creates a new fetch transport */
  constructor(opts?: FetchTransportOptions) {
    this.#headers = opts?.headers ?? [];
  }

  /**
   * Performs exactly one request for the descriptor.
   *
   * Errors:
   * - Network failures, aborts and timeouts are wrapped in `Error` with the original as `cause`.
   * - Failing to read the body is wrapped the same way.
   */
  send = async (request: RequestDescriptor, session: SessionConfiguration): SafeWrapAsync<Error, TransportResponse> => {
    const timeout = createTimeoutSignal(session.timeout);
    const merged = mergeSignals([session.signal, timeout.signal]);

    try {
      return await this.#perform(request, session, merged.signal);
    } finally {
      merged.dispose();
      timeout.dispose();
    }
  };

  /** Sends the request and reads the whole body under the given signal. */
  async #perform(
    request: RequestDescriptor,
    session: SessionConfiguration,
    signal: AbortSignal | null,
  ): SafeWrapAsync<Error, TransportResponse> {
    const hasBody = allowsBody(request.method) && request.body.byteLength > 0;

    const [err, res] = await safeWrapAsync(() =>
      fetch(request.target, {
        method: request.method,
        headers: mergeHeaders(this.#headers, session.headers, request.headers),
        body: hasBody ? request.body.slice() : undefined,
        cache: session.cache,
        credentials: session.credentials,
        mode: session.mode,
        redirect: session.redirect,
        keepalive: session.keepalive,
        ...(signal && { signal }),
      }),
    );
    if (err) {
      return [new Error(`error sending ${request.method} request in fetchTransport`, { cause: err }), null];
    }

    const [errBody, buffer] = await safeWrapAsync(() => res.arrayBuffer());
    if (errBody) {
      return [new Error(`error reading ${request.method} response body in fetchTransport`, { cause: errBody }), null];
    }

    return [null, { body: new Uint8Array(buffer), status: res.status, headers: res.headers }];
  }
}
