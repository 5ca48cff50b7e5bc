import type { Logger } from '../types/logger.js';
import type { Interval } from '../types/timeout.js';

/** Detaches a subscriber from a trigger source. */
export type Unsubscribe = () => void;

/**
 * A source of update events. Subscribing starts it; the returned function stops it.
 * Sources deliver events as they occur and never buffer missed ones.
 */
export type TriggerSource = (emit: () => void, logger: Logger) => Unsubscribe;

/** Anything that can drive re-execution: a trigger source or a (possibly async) iterable of signals. */
export type UpdateInput = TriggerSource | AsyncIterable<unknown> | Iterable<unknown>;

/**
 * Ticks every `ms` milliseconds until unsubscribed.
 */
export function intervalTrigger(ms: number): TriggerSource {
  return (emit) => {
    let intervalId: Interval = setInterval(emit, ms);

    return () => {
      clearInterval(intervalId);
      intervalId = undefined;
    };
  };
}

/**
 * Emits once per item pulled from the iterable. A failing iterator is logged and ends the source.
 */
export function iterableTrigger(source: AsyncIterable<unknown> | Iterable<unknown>): TriggerSource {
  return (emit, logger) => {
    let active = true;
    const drain = async () => {
      for await (const _signal of source) {
        if (!active) {
          return;
        }
        emit();
      }
    };

    drain().catch((error: unknown) => logger.error('trigger.iterable.failed', { error }));

    return () => {
      active = false;
    };
  };
}

/**
 * Emits whenever `type` is dispatched on the target.
 */
export function eventTrigger(target: EventTarget, type: string): TriggerSource {
  return (emit) => {
    const listener = () => emit();
    target.addEventListener(type, listener);

    return () => target.removeEventListener(type, listener);
  };
}

/**
 * Fans several sources into one. Events from any source are forwarded as they occur, with no ordering
 * across sources; after unsubscribing, late events from any source are ignored.
 */
export function mergeTriggers(...sources: TriggerSource[]): TriggerSource {
  return (emit, logger) => {
    let active = true;
    const forward = () => {
      if (active) {
        emit();
      }
    };
    const subscriptions = sources.map((source) => source(forward, logger));

    return () => {
      active = false;
      for (const unsubscribe of subscriptions) {
        unsubscribe();
      }
    };
  };
}

/**
 * Normalizes update inputs into a trigger source.
 */
export function toTrigger(input: UpdateInput): TriggerSource {
  if (typeof input === 'function') {
    return input;
  }

  return iterableTrigger(input);
}
