/**
 * Parse-or-default helpers. Malformed porcelain values never fail a parse;
 * they fall back to a default instead.
 */

export function parseOrDefault<T>(
  value: string | undefined,
  parse: (text: string) => T | undefined,
  fallback: T
): T {
  if (value === undefined) {
    return fallback;
  }
  const parsed = parse(value);
  return parsed === undefined ? fallback : parsed;
}

const UNSIGNED = /^\+?[0-9]+$/;

export function parseUnsigned(text: string): number | undefined {
  if (!UNSIGNED.test(text)) {
    return undefined;
  }
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : undefined;
}

export function unsignedOrZero(text: string | undefined): number {
  return parseOrDefault(text, parseUnsigned, 0);
}

// Returns undefined when the separator does not occur at all.
export function splitOnce(text: string, separator: string): [string, string] | undefined {
  const at = text.indexOf(separator);
  if (at < 0) {
    return undefined;
  }
  return [text.substring(0, at), text.substring(at + separator.length)];
}
