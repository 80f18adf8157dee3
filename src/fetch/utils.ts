import type { HeaderOptions } from '../types/request.js';

function headerEntries(source?: HeaderOptions): Iterable<[string, string | null | undefined]> {
  if (!source) {
    return [];
  }

  if (source instanceof Headers) {
    return source.entries();
  }

  if (Array.isArray(source)) {
    return source;
  }

  return Object.entries(source);
}

/**
 * Merges header sources left to right into one `Headers` instance.
 * Later sources win; a `null` or `undefined` value removes a header set by an earlier source.
 * @example
 * mergeHeaderOptions({ Authorization: 'Basic …' }, clientHeaders, { 'X-Trace': null })
 */
export function mergeHeaderOptions(...sources: Array<HeaderOptions | undefined>): Headers {
  const merged = new Headers();

  for (const source of sources) {
    for (const [name, value] of headerEntries(source)) {
      if (value === null || value === undefined) {
        merged.delete(name);
        continue;
      }

      merged.set(name, value);
    }
  }

  return merged;
}
