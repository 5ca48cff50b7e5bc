import { afterEach, describe, expect, it, vi } from 'vitest';
import type { Logger } from '../types/logger.js';
import { eventTrigger, intervalTrigger, iterableTrigger, mergeTriggers, toTrigger } from './triggers.js';

function mockLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function settle(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe('intervalTrigger', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('ticks every interval until unsubscribed', () => {
    vi.useFakeTimers();
    const emit = vi.fn();

    const unsubscribe = intervalTrigger(500)(emit, mockLogger());
    vi.advanceTimersByTime(1_500);
    expect(emit).toHaveBeenCalledTimes(3);

    unsubscribe();
    vi.advanceTimersByTime(1_500);
    expect(emit).toHaveBeenCalledTimes(3);
    expect(vi.getTimerCount()).toBe(0);
  });
});

describe('iterableTrigger', () => {
  it('emits once per item', async () => {
    const emit = vi.fn();

    iterableTrigger([1, 2, 3])(emit, mockLogger());
    await settle();

    expect(emit).toHaveBeenCalledTimes(3);
  });

  it('emits for async iterables', async () => {
    const emit = vi.fn();
    async function* signals() {
      yield 'a';
      yield 'b';
    }

    iterableTrigger(signals())(emit, mockLogger());
    await settle();

    expect(emit).toHaveBeenCalledTimes(2);
  });

  it('stops emitting once unsubscribed', async () => {
    const emit = vi.fn();

    const unsubscribe = iterableTrigger([1, 2, 3])(emit, mockLogger());
    unsubscribe();
    await settle();

    expect(emit).not.toHaveBeenCalled();
  });

  it('logs a failing iterator and ends the source', async () => {
    const emit = vi.fn();
    const logger = mockLogger();
    const failure = new Error('stream closed');
    async function* signals() {
      yield 'a';
      throw failure;
    }

    iterableTrigger(signals())(emit, logger);
    await settle();

    expect(emit).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith('trigger.iterable.failed', { error: failure });
  });
});

describe('eventTrigger', () => {
  it('emits on dispatched events until unsubscribed', () => {
    const target = new EventTarget();
    const emit = vi.fn();

    const unsubscribe = eventTrigger(target, 'refresh')(emit, mockLogger());
    target.dispatchEvent(new Event('refresh'));
    target.dispatchEvent(new Event('other'));
    unsubscribe();
    target.dispatchEvent(new Event('refresh'));

    expect(emit).toHaveBeenCalledTimes(1);
  });
});

describe('mergeTriggers', () => {
  it('forwards events from every source and detaches them all', () => {
    const first = new EventTarget();
    const second = new EventTarget();
    const emit = vi.fn();

    const unsubscribe = mergeTriggers(eventTrigger(first, 'tick'), eventTrigger(second, 'tick'))(emit, mockLogger());
    first.dispatchEvent(new Event('tick'));
    second.dispatchEvent(new Event('tick'));
    first.dispatchEvent(new Event('tick'));
    expect(emit).toHaveBeenCalledTimes(3);

    unsubscribe();
    first.dispatchEvent(new Event('tick'));
    second.dispatchEvent(new Event('tick'));
    expect(emit).toHaveBeenCalledTimes(3);
  });

  it('ignores late events from sources that do not detach', () => {
    let late: (() => void) | undefined;
    const sticky = (emit: () => void) => {
      late = emit;
      return () => {};
    };
    const emit = vi.fn();

    const unsubscribe = mergeTriggers(sticky)(emit, mockLogger());
    unsubscribe();
    late?.();

    expect(emit).not.toHaveBeenCalled();
  });
});

describe('toTrigger', () => {
  it('keeps trigger sources as they are', () => {
    const source = intervalTrigger(100);

    expect(toTrigger(source)).toBe(source);
  });
});
