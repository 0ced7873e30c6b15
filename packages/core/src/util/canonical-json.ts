import { jsonSafeReplacer } from './json-safe.js';

type CanonicalValue =
  | null
  | boolean
  | number
  | string
  | CanonicalValue[]
  | { [key: string]: CanonicalValue };

function render(value: CanonicalValue): string {
  if (value === null) return 'null';
  if (typeof value === 'number') {
    return JSON.stringify(Object.is(value, -0) ? 0 : value);
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map(render).join(',')}]`;
  }
  const entries = Object.keys(value)
    .sort()
    .map((key) => `${JSON.stringify(key)}:${render(value[key] ?? null)}`);
  return `{${entries.join(',')}}`;
}

/**
 * Key-sorted JSON text; bigint values are rendered as decimal strings and
 * `undefined` members are dropped, so equal structures yield equal text.
 */
export function canonicalJson(value: unknown): string {
  if (value === undefined) return 'null';
  const serialized = JSON.stringify(value, jsonSafeReplacer);
  if (serialized === undefined) return 'null';
  const parsed: CanonicalValue = JSON.parse(serialized);
  return render(parsed);
}
