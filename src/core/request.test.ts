import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { BuildError } from '../error/buildError.js';
import { TransportError } from '../error/transportError.js';
import { bearer } from '../params/headers.js';
import { body, group, header, method, timeout, url } from '../params/params.js';
import type { DocumentParser } from '../types/document.js';
import type { Logger } from '../types/logger.js';
import type { Transport } from '../types/request.js';
import { eventTrigger } from '../update/triggers.js';
import { encodeText } from '../utils/decode.js';
import { AnyRequest } from './request.js';

const TODOS = 'https://api.example.com/todos';

function fakeTransport() {
  const send = vi.fn<Transport['send']>(async () => [
    null,
    { body: encodeText('[{"id":1,"title":"write tests"}]'), status: 200, headers: new Headers() },
  ]);
  return { send };
}

function mockLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** Lets pending transport calls and dispatches settle. */
function settle(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe('AnyRequest', () => {
  let transport: ReturnType<typeof fakeTransport>;

  beforeEach(() => {
    transport = fakeTransport();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('folds the tree, calls the transport once and dispatches the outcome', async () => {
    const data = vi.fn();
    const statusCode = vi.fn();

    AnyRequest.create(url(TODOS), method('GET'))
      .config({ transport })
      .onData(data)
      .onStatusCode(statusCode)
      .call();
    await settle();

    expect(transport.send).toHaveBeenCalledTimes(1);
    expect(transport.send).toHaveBeenCalledWith(
      { method: 'GET', target: TODOS, headers: [], body: new Uint8Array() },
      { headers: [], timeout: 60_000, cache: 'default' },
    );
    expect(data).toHaveBeenCalledWith(encodeText('[{"id":1,"title":"write tests"}]'));
    expect(statusCode).toHaveBeenCalledWith(200);
  });

  it('decodes typed responses through the schema', async () => {
    const object = vi.fn();
    const todos = z.array(z.object({ id: z.number(), title: z.string() }));

    AnyRequest.typed(todos, url(TODOS)).config({ transport }).onObject(object).call();
    await settle();

    expect(object).toHaveBeenCalledWith([{ id: 1, title: 'write tests' }]);
  });

  it('passes session options to the transport', async () => {
    AnyRequest.create(url(TODOS), timeout(1_000)).config({ transport }).call();
    await settle();

    expect(transport.send.mock.calls[0][1].timeout).toBe(1_000);
  });

  it('delivers a build error asynchronously without calling the transport', async () => {
    const error = vi.fn();

    AnyRequest.create(method('GET')).config({ transport }).onError(error).call();

    expect(error).not.toHaveBeenCalled();
    await settle();

    expect(transport.send).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0][0]).toBeInstanceOf(BuildError);
    expect(error.mock.calls[0][0].code).toBe('MissingTarget');
  });

  it('does not subscribe update sources when the tree fails to fold', async () => {
    vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval'] });

    AnyRequest.create(method('GET')).config({ transport }).updateEvery(1_000).call();
    vi.advanceTimersByTime(5_000);
    await settle();

    expect(vi.getTimerCount()).toBe(0);
  });

  it('sends transport failures to the error consumer and logs them', async () => {
    const cause = new Error('connection refused');
    const logger = mockLogger();
    const error = vi.fn();
    const statusCode = vi.fn();
    const failing = { send: vi.fn<Transport['send']>(async () => [cause, null]) };

    AnyRequest.create(url(TODOS))
      .config({ transport: failing, logger })
      .onError(error)
      .onStatusCode(statusCode)
      .call();
    await settle();

    expect(statusCode).not.toHaveBeenCalled();
    expect(error.mock.calls[0][0]).toBeInstanceOf(TransportError);
    expect(error.mock.calls[0][0].cause).toBe(cause);
    expect(logger.warn).toHaveBeenCalledWith('request.transport.failed', {
      target: TODOS,
      error: `error in GET request to ${TODOS}`,
    });
  });

  it('logs the call through the configured logger', async () => {
    const logger = mockLogger();

    AnyRequest.create(url(TODOS), method('DELETE')).config({ transport, logger }).call();
    await settle();

    expect(logger.debug).toHaveBeenCalledWith('request.call', { method: 'DELETE', target: TODOS });
  });

  it('uses the configured document parser for json consumers', async () => {
    const json = vi.fn();
    const parseDocument = vi.fn<DocumentParser>(() => [null, { parsed: true }]);

    AnyRequest.create(url(TODOS)).config({ transport, parseDocument }).onJson(json).call();
    await settle();

    expect(parseDocument).toHaveBeenCalledTimes(1);
    expect(json).toHaveBeenCalledWith({ parsed: true });
  });

  it('leaves the receiver untouched when modified', async () => {
    const statusCode = vi.fn();
    const base = AnyRequest.create(url(TODOS)).config({ transport });
    const withConsumer = base.onStatusCode(statusCode);

    base.call();
    await settle();

    expect(statusCode).not.toHaveBeenCalled();

    withConsumer.call();
    await settle();

    expect(statusCode).toHaveBeenCalledTimes(1);
  });

  it('replaces an earlier consumer of the same kind', async () => {
    const first = vi.fn();
    const second = vi.fn();

    AnyRequest.create(url(TODOS)).config({ transport }).onStatusCode(first).onStatusCode(second).call();
    await settle();

    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledWith(200);
  });

  describe('withAuthorization', () => {
    it('adds an Authorization header', () => {
      const [, folded] = AnyRequest.create(url(TODOS)).withAuthorization(bearer('test-token')).build();

      expect(folded?.request.headers).toEqual([['Authorization', 'Bearer test-token']]);
    });

    it('lets an Authorization header inside the tree take precedence', () => {
      const [, folded] = AnyRequest.create(url(TODOS), header('Authorization', 'Bearer inner'))
        .withAuthorization(bearer('outer'))
        .build();

      expect(folded?.request.headers).toEqual([
        ['Authorization', 'Bearer outer'],
        ['Authorization', 'Bearer inner'],
      ]);
    });
  });

  describe('identity', () => {
    it('uses the target for GET and method plus target otherwise', () => {
      expect(AnyRequest.create(url(TODOS)).id).toBe(TODOS);
      expect(AnyRequest.create(url(TODOS), method('POST')).id).toBe(`POST ${TODOS}`);
    });

    it('ignores headers and body', () => {
      const a = AnyRequest.create(url(TODOS), method('POST'), body({ title: 'a' }));
      const b = AnyRequest.create(group(url(TODOS), method('POST')), header('X-Trace', '1'), body('other'));

      expect(a.equals(b)).toBe(true);
    });

    it('distinguishes methods and targets', () => {
      const get = AnyRequest.create(url(TODOS));

      expect(get.equals(AnyRequest.create(url(TODOS), method('PUT')))).toBe(false);
      expect(get.equals(AnyRequest.create(url(`${TODOS}/1`)))).toBe(false);
    });

    it('has no identity when the tree does not fold', () => {
      const invalid = AnyRequest.create(url('not a url'));

      expect(invalid.id).toBeNull();
      expect(invalid.equals(invalid)).toBe(false);
    });
  });

  describe('updates', () => {
    it('re-folds the tree on every tick and stops after dispose', async () => {
      vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval'] });
      let token = 'token-0';
      const request = AnyRequest.create(
        url(TODOS),
        header('X-Token', () => token),
      )
        .config({ transport })
        .updateEvery(1_000);

      request.call();
      await settle();
      expect(transport.send).toHaveBeenCalledTimes(1);

      for (let tick = 1; tick <= 4; tick++) {
        token = `token-${tick}`;
        vi.advanceTimersByTime(1_000);
        await settle();
      }

      expect(transport.send).toHaveBeenCalledTimes(5);
      expect(transport.send.mock.calls.map(([sent]) => sent.headers)).toEqual([
        [['X-Token', 'token-0']],
        [['X-Token', 'token-1']],
        [['X-Token', 'token-2']],
        [['X-Token', 'token-3']],
        [['X-Token', 'token-4']],
      ]);

      request.dispose();
      vi.advanceTimersByTime(5_000);
      await settle();

      expect(transport.send).toHaveBeenCalledTimes(5);
    });

    it('merges interval and event sources', async () => {
      vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval'] });
      const refresh = new EventTarget();
      const request = AnyRequest.create(url(TODOS))
        .config({ transport })
        .update(eventTrigger(refresh, 'refresh'))
        .updateEvery(1_000);

      request.call();
      refresh.dispatchEvent(new Event('refresh'));
      vi.advanceTimersByTime(1_000);
      await settle();

      expect(transport.send).toHaveBeenCalledTimes(3);

      request.dispose();
      refresh.dispatchEvent(new Event('refresh'));
      await settle();

      expect(transport.send).toHaveBeenCalledTimes(3);
    });

    it('runs once per item of an iterable source', async () => {
      AnyRequest.create(url(TODOS)).config({ transport }).update(['a', 'b']).call();
      await settle();

      expect(transport.send).toHaveBeenCalledTimes(3);
    });
  });

  describe('prettyPrint', () => {
    it('renders the folded request', () => {
      const [err, printed] = AnyRequest.create(
        url(TODOS),
        method('POST'),
        header('Accept', 'application/json'),
        body({ title: 'x' }),
      ).prettyPrint();

      expect(err).toBeNull();
      expect(printed).toBe(
        [
          'Beginning of Request.',
          '----------------------------------',
          `Endpoint: POST ${TODOS}`,
          '__________________________________',
          'Headers: {"Accept":"application/json","Content-Type":"application/json"}',
          '__________________________________',
          'Body: {\n  "title": "x"\n}',
          '___________________________________',
          'End Of Request.',
        ].join('\n'),
      );
    });

    it('prints plain text bodies as text', () => {
      const [, printed] = AnyRequest.create(url(TODOS), method('POST'), body('hello')).prettyPrint();

      expect(printed?.split('\n')[6]).toBe('Body: hello');
    });

    it('returns the build error for trees that do not fold', () => {
      const [err, printed] = AnyRequest.create(url(TODOS), url(TODOS)).prettyPrint();

      expect(printed).toBeNull();
      expect(err?.code).toBe('MultipleTargets');
    });
  });
});
