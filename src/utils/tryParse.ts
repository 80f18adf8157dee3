import { safeWrap } from './wrap.js';

/**
 * Attempts to parse a string holding a JSON object or array.
 *
 * Scalars (`"404"`, `"true"`) are deliberately left alone, so a plain-text body is never
 * mistaken for JSON. Returns the parsed value, or `input` unchanged. Never throws.
 */
export function tryParse(input: string): unknown {
  const trimmed = input.trimStart();
  if (!trimmed.startsWith('{') && !trimmed.startsWith('[')) {
    return input;
  }

  const [errParsed, parsed] = safeWrap((): unknown => JSON.parse(input));
  if (errParsed) {
    return input;
  }

  return parsed;
}
