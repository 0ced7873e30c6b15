/**
 * Unsigned integer parsing shared by catalog loading and document validation.
 *
 * Accepted inputs:
 * - native non-negative safe integers and bigints
 * - strings in decimal, hex (0x), octal (0o) or binary (0b) notation,
 *   case-insensitive, with `_` digit separators and optional C-style
 *   `u`/`l` suffixes (e.g. "0x3000_0000", "4096UL")
 */

const NUMBER_LITERAL = /^(0[box])?([0-9a-f_]+)([ul]{0,3})$/;

const DIGITS_BY_BASE: Record<string, RegExp> = {
  '0b': /^[01](?:_?[01])*$/,
  '0o': /^[0-7](?:_?[0-7])*$/,
  '0x': /^[0-9a-f](?:_?[0-9a-f])*$/,
  '': /^[0-9](?:_?[0-9])*$/,
};

export function parseUnsigned(value: unknown): bigint | undefined {
  if (typeof value === 'bigint') {
    return value >= 0n ? value : undefined;
  }
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) && value >= 0 ? BigInt(value) : undefined;
  }
  if (typeof value !== 'string') {
    return undefined;
  }
  const match = NUMBER_LITERAL.exec(value.trim().toLowerCase());
  if (!match) {
    return undefined;
  }
  const prefix = match[1] ?? '';
  const digits = match[2] ?? '';
  const pattern = DIGITS_BY_BASE[prefix];
  if (!pattern || !pattern.test(digits)) {
    return undefined;
  }
  return BigInt(`${prefix}${digits.replace(/_/g, '')}`);
}

export function formatHex(value: bigint): string {
  return `0x${value.toString(16).toUpperCase()}`;
}
