import type { HeaderEntry } from '../types/request.js';

/**
 * Flattens ordered header lists into a single `Headers` instance.
 * Lists are applied in order and the last value per (case-insensitive) name wins.
 */
export function mergeHeaders(...lists: Array<readonly HeaderEntry[] | undefined>): Headers {
  const merged = new Headers();
  for (const list of lists) {
    for (const [name, value] of list ?? []) {
      merged.set(name, value);
    }
  }

  return merged;
}

/** Verbs that never carry a request body. */
export function allowsBody(method: string): boolean {
  return method !== 'GET' && method !== 'HEAD';
}
