export function jsonSafeReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/** JSON.stringify that renders bigint values as decimal strings */
export function stringifyJsonSafe(value: unknown, space?: number): string {
  return JSON.stringify(value, jsonSafeReplacer, space) ?? 'null';
}
