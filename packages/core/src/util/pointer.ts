export function escapePointerToken(token: string): string {
  return token.replace(/~/g, '~0').replace(/\//g, '~1');
}

/** Append one reference token to a JSON Pointer ('' is the document root) */
export function appendPointer(base: string, segment: string | number): string {
  return `${base}/${escapePointerToken(String(segment))}`;
}
