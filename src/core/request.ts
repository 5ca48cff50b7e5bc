import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { BuildError } from '../error/buildError.js';
import { FetchTransport } from '../fetch/client.js';
import { type FoldedRequest, foldParams } from '../params/fold.js';
import { authorization } from '../params/headers.js';
import { group } from '../params/params.js';
import type { Auth, RequestParam } from '../params/types.js';
import type { DocumentParser, JsonValue } from '../types/document.js';
import { type Logger, noopLogger } from '../types/logger.js';
import type { Transport } from '../types/request.js';
import {
  intervalTrigger,
  mergeTriggers,
  type TriggerSource,
  toTrigger,
  type Unsubscribe,
  type UpdateInput,
} from '../update/triggers.js';
import { decodeText, parseDocument, prettyJson } from '../utils/decode.js';
import type { SafeWrap } from '../utils/wrap.js';
import { bytesDecoder, schemaDecoder } from './decoders.js';
import { type DispatchContext, dispatch, reportError } from './dispatch.js';
import { execute } from './execute.js';
import type { Callbacks, RequestConfig, ResponseDecoder, SchemaType } from './types.js';

/** Constructor props for {@link AnyRequest}, extends {@link RequestConfig}. */
export interface AnyRequestProps<ResponseType> extends RequestConfig {
  /** Root of the parameter tree. */
  params: RequestParam;
  /** Decoder feeding the `object` consumer. */
  decoder: ResponseDecoder<ResponseType>;
}

/** Everything a request value carries; replaced wholesale on every builder call. */
interface RequestState<ResponseType> {
  root: RequestParam;
  decoder: ResponseDecoder<ResponseType>;
  callbacks: Readonly<Callbacks<ResponseType>>;
  updates: TriggerSource | null;
  transport: Transport;
  logger: Logger;
  parseDocument: DocumentParser;
}

/**
 * A declarative HTTP request: a parameter tree, the consumers of its outcome, and optional update sources.
 *
 * Every builder method returns a new request and leaves the receiver untouched. Nothing happens until
 * {@link AnyRequest.call}, and every outcome, errors included, reaches the caller only through the
 * registered consumers.
 *
 * @example
 * AnyRequest.typed(z.array(todoSchema), url('https://api.example.com/todos'))
 *   .onObject((todos) => render(todos))
 *   .onError((error) => report(error))
 *   .updateEvery(30_000)
 *   .call();
 *
 * @typeParam ResponseType - Type handed to the `object` consumer.
 */
export class AnyRequest<ResponseType> {
  #state: RequestState<ResponseType>;
  /** Update subscriptions opened by `call` on this instance. */
  #subscriptions = new Set<Unsubscribe>();

  /**
   * Creates a request from a parameter tree and a decoder.
   * Prefer {@link AnyRequest.create} and {@link AnyRequest.typed}.
   */
  constructor({ params, decoder, transport, logger, parseDocument: parser }: AnyRequestProps<ResponseType>) {
    this.#state = {
      root: params,
      decoder,
      callbacks: {},
      updates: null,
      transport: transport ?? new FetchTransport(),
      logger: logger ?? noopLogger,
      parseDocument: parser ?? parseDocument,
    };
  }

  /**
   * Request whose `object` consumer receives the raw body bytes.
   * @example
   * AnyRequest.create(url('https://api.example.com/todos'), method('GET'))
   */
  static create(...params: RequestParam[]): AnyRequest<Uint8Array> {
    return new AnyRequest({ params: group(...params), decoder: bytesDecoder });
  }

  /**
   * Request whose `object` consumer receives the body validated against a Standard Schema.
   */
  static typed<Schema extends SchemaType>(
    schema: Schema,
    ...params: RequestParam[]
  ): AnyRequest<StandardSchemaV1.InferOutput<Schema>> {
    return new AnyRequest({ params: group(...params), decoder: schemaDecoder(schema) });
  }

  #modify(patch: Partial<RequestState<ResponseType>>): AnyRequest<ResponseType> {
    const { root, decoder, transport } = this.#state;
    const next = new AnyRequest<ResponseType>({ params: root, decoder, transport });
    next.#state = { ...this.#state, ...patch };
    return next;
  }

  #on<K extends keyof Callbacks<ResponseType>>(kind: K, callback: Callbacks<ResponseType>[K]): AnyRequest<ResponseType> {
    const callbacks: Callbacks<ResponseType> = { ...this.#state.callbacks };
    callbacks[kind] = callback;
    return this.#modify({ callbacks });
  }

  /** Sets the consumer of the raw response bytes. */
  onData(callback: (body: Uint8Array) => void): AnyRequest<ResponseType> {
    return this.#on('data', callback);
  }

  /** Sets the consumer of the UTF-8 response text (`''` when the body is not valid UTF-8). */
  onString(callback: (text: string) => void): AnyRequest<ResponseType> {
    return this.#on('string', callback);
  }

  /** Sets the consumer of the response parsed as a generic document. */
  onJson(callback: (document: JsonValue) => void): AnyRequest<ResponseType> {
    return this.#on('json', callback);
  }

  /** Sets the consumer of the decoded response. */
  onObject(callback: (value: ResponseType) => void): AnyRequest<ResponseType> {
    return this.#on('object', callback);
  }

  /** Sets the consumer of the HTTP status code. */
  onStatusCode(callback: (status: number) => void): AnyRequest<ResponseType> {
    return this.#on('statusCode', callback);
  }

  /** Sets the consumer of every build, transport, decode and consumer error. Without one, errors are dropped. */
  onError(callback: (error: Error) => void): AnyRequest<ResponseType> {
    return this.#on('error', callback);
  }

  /**
   * Prepends an `Authorization` header to the tree. An `Authorization` header declared in the tree itself
   * is visited later and therefore wins.
   */
  withAuthorization(auth: Auth): AnyRequest<ResponseType> {
    return this.#modify({ root: group(authorization(auth), this.#state.root) });
  }

  /**
   * Re-runs the request on every event from `source`, after the initial call. Merged with any source
   * attached before.
   */
  update(source: UpdateInput): AnyRequest<ResponseType> {
    const trigger = toTrigger(source);
    const { updates } = this.#state;

    return this.#modify({ updates: updates ? mergeTriggers(updates, trigger) : trigger });
  }

  /** Re-runs the request every `ms` milliseconds after the initial call. */
  updateEvery(ms: number): AnyRequest<ResponseType> {
    return this.update(intervalTrigger(ms));
  }

  /**
   * Returns a copy with the given runtime configuration merged in.
   */
  config({ transport, logger, parseDocument: parser }: RequestConfig): AnyRequest<ResponseType> {
    return this.#modify({
      ...(transport && { transport }),
      ...(logger && { logger }),
      ...(parser && { parseDocument: parser }),
    });
  }

  /**
   * Folds the parameter tree into a request descriptor and session configuration.
   */
  build(): SafeWrap<BuildError, FoldedRequest> {
    return foldParams(this.#state.root);
  }

  /**
   * Performs the request and dispatches the outcome to the registered consumers, then starts the update
   * sources, if any. A tree that fails to fold makes no network call; its {@link BuildError} reaches the
   * error consumer on a microtask.
   *
   * Runs are independent: overlapping update runs are neither deduplicated nor cancelled.
   */
  call(): void {
    const { logger, updates } = this.#state;
    const [errBuild, folded] = this.build();
    if (errBuild) {
      this.#fail(errBuild);
      return;
    }

    this.#start(folded);

    if (updates) {
      this.#subscriptions.add(updates(() => this.#tick(), logger));
    }
  }

  /**
   * Stops the update sources started by `call` on this instance. In-flight requests still complete and
   * dispatch.
   */
  dispose(): void {
    for (const unsubscribe of this.#subscriptions) {
      unsubscribe();
    }
    this.#subscriptions.clear();
  }

  /**
   * Identity of the request: the folded target for `GET`, `<METHOD> <target>` otherwise, `null` when the tree
   * does not fold. Headers and body are ignored.
   */
  get id(): string | null {
    const [err, folded] = this.build();
    if (err) {
      return null;
    }

    const { method, target } = folded.request;
    return method === 'GET' ? target : `${method} ${target}`;
  }

  /**
   * Whether both requests fold to the same method and target. Headers and body are ignored.
   */
  equals(other: AnyRequest<ResponseType>): boolean {
    const id = this.id;
    return id !== null && id === other.id;
  }

  /**
   * Human-readable dump of the folded request.
   */
  prettyPrint(): SafeWrap<BuildError, string> {
    const [err, folded] = this.build();
    if (err) {
      return [err, null];
    }

    const { method, target, headers, body } = folded.request;
    const json = prettyJson(body);

    return [
      null,
      [
        'Beginning of Request.',
        '----------------------------------',
        `Endpoint: ${method} ${target}`,
        '__________________________________',
        `Headers: ${JSON.stringify(Object.fromEntries(headers))}`,
        '__________________________________',
        `Body: ${json || decodeText(body)}`,
        '___________________________________',
        'End Of Request.',
      ].join('\n'),
    ];
  }

  #context(): DispatchContext<ResponseType> {
    const { callbacks, parseDocument: parser, decoder, logger } = this.#state;
    return { callbacks, parseDocument: parser, decode: decoder, logger };
  }

  #fail(error: BuildError): void {
    const context = this.#context();
    context.logger.warn('request.build.failed', { code: error.code, error: error.message });
    queueMicrotask(() => reportError(error, context));
  }

  #start(folded: FoldedRequest): void {
    const { logger } = this.#state;
    this.#run(folded).catch((error: unknown) => logger.error('request.run.failed', { error }));
  }

  async #run({ request, session }: FoldedRequest): Promise<void> {
    const { transport, logger } = this.#state;
    logger.debug('request.call', { method: request.method, target: request.target });

    const outcome = await execute(request, session, transport);
    const [err] = outcome;
    if (err) {
      logger.warn('request.transport.failed', { target: request.target, error: err.message });
    }

    await dispatch(outcome, this.#context());
  }

  #tick(): void {
    this.#state.logger.debug('request.update.tick');
    const [errBuild, folded] = this.build();
    if (errBuild) {
      this.#fail(errBuild);
      return;
    }

    this.#start(folded);
  }
}

/** Request whose decoded object is the raw body. */
export type Request = AnyRequest<Uint8Array>;
