import { describe, expect, it, vi } from 'vitest';
import { TransportError } from '../error/transportError.js';
import type { RequestDescriptor, SessionConfiguration, Transport } from '../types/request.js';
import { encodeText } from '../utils/decode.js';
import { execute } from './execute.js';

const REQUEST: RequestDescriptor = {
  method: 'GET',
  target: 'https://api.example.com/todos',
  headers: [],
  body: new Uint8Array(),
};

const SESSION: SessionConfiguration = { headers: [], timeout: 60_000, cache: 'default' };

describe('execute', () => {
  it('performs exactly one transport call and resolves its response', async () => {
    const body = encodeText('[]');
    const send = vi.fn<Transport['send']>(async () => [null, { body, status: 404, headers: new Headers() }]);

    const [err, response] = await execute(REQUEST, SESSION, { send });

    expect(err).toBeNull();
    expect(response?.status).toBe(404);
    expect(response?.body).toBe(body);
    expect(send).toHaveBeenCalledTimes(1);
    expect(send).toHaveBeenCalledWith(REQUEST, SESSION);
  });

  it('wraps an error tuple in a TransportError', async () => {
    const cause = new Error('connection refused');
    const send = vi.fn<Transport['send']>(async () => [cause, null]);

    const [err, response] = await execute(REQUEST, SESSION, { send });

    expect(response).toBeNull();
    expect(err).toBeInstanceOf(TransportError);
    expect(err?.message).toBe('error in GET request to https://api.example.com/todos');
    expect(err?.target).toBe('https://api.example.com/todos');
    expect(err?.cause).toBe(cause);
  });

  it('wraps a throwing transport in a TransportError', async () => {
    const cause = new Error('transport exploded');
    const send = vi.fn<Transport['send']>(() => {
      throw cause;
    });

    const [err] = await execute({ ...REQUEST, method: 'DELETE' }, SESSION, { send });

    expect(err?.message).toBe('error calling transport for DELETE https://api.example.com/todos');
    expect(err?.cause).toBe(cause);
  });
});
