import { TransportError } from '../error/transportError.js';
import type { RequestDescriptor, SessionConfiguration, Transport, TransportResponse } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';

/**
 * Performs exactly one transport call for a folded request. No retries; timeouts come from the session.
 *
 * A transport that throws, or returns an error tuple, yields a {@link TransportError} carrying the original
 * error as `cause`.
 */
export async function execute(
  request: RequestDescriptor,
  session: SessionConfiguration,
  transport: Transport,
): SafeWrapAsync<TransportError, TransportResponse> {
  const [errThrown, wrapped] = await safeWrapAsync(() => transport.send(request, session));
  if (errThrown) {
    return [
      new TransportError(`error calling transport for ${request.method} ${request.target}`, request.target, {
        cause: errThrown,
      }),
      null,
    ];
  }

  const [err, response] = wrapped;
  if (err) {
    return [
      new TransportError(`error in ${request.method} request to ${request.target}`, request.target, { cause: err }),
      null,
    ];
  }

  return [null, response];
}
