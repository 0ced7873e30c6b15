import { createHash } from 'node:crypto';

import { canonicalJson } from './canonical-json.js';

/** sha256 over the canonical JSON text of `value` */
export function stableHash(value: unknown): string {
  return createHash('sha256').update(canonicalJson(value), 'utf8').digest('hex');
}
