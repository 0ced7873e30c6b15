/**
 * Per-value checks: semantic type, nested shape, enum/const and item
 * variants. Numbers are normalized here and nowhere else.
 */

import type { JsonPrimitive } from '../types/device.js';
import type { PropertySpec, SemanticType } from '../types/schema.js';
import type {
  NormalizedDocument,
  NormalizedValue,
  Violation,
  ViolationKind,
} from '../types/validation.js';
import { isJsonPrimitive, isPlainObject } from '../util/guards.js';
import { parseUnsigned } from '../util/number.js';
import { appendPointer } from '../util/pointer.js';

export interface CheckContext {
  readonly numericStrings: boolean;
  readonly maxDepth: number;
  readonly violations: Violation[];
}

export function report(
  ctx: CheckContext,
  kind: ViolationKind,
  path: string,
  message: string,
  rule?: string
): void {
  ctx.violations.push(rule === undefined ? { kind, path, message } : { kind, path, message, rule });
}

export function isPresent(document: Readonly<Record<string, unknown>>, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(document, name) && document[name] !== undefined;
}

export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'string') return `string ${JSON.stringify(value)}`;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return `${typeof value} ${String(value)}`;
  }
  return typeof value;
}

function isNumeric(spec: PropertySpec | undefined): boolean {
  return spec !== undefined && spec.types.some((type) => type === 'number' || type === 'integer');
}

/** Unsigned value of a number-typed input; strings only when allowed */
export function numberValue(value: unknown, numericStrings: boolean): bigint | undefined {
  if (typeof value === 'string' && !numericStrings) return undefined;
  if (typeof value === 'boolean') return undefined;
  return parseUnsigned(value);
}

/**
 * Literal equality as used by enums and rule conditions. Number-typed
 * properties compare by numeric value, so `"0x10"` equals `16`.
 */
export function valueEquals(
  spec: PropertySpec | undefined,
  value: unknown,
  literal: JsonPrimitive,
  numericStrings: boolean
): boolean {
  if (value === literal) return true;
  if (!isNumeric(spec)) return false;
  const left = numberValue(value, numericStrings);
  const right = parseUnsigned(literal);
  return left !== undefined && right !== undefined && left === right;
}

function matchType(
  types: readonly SemanticType[],
  value: unknown,
  numericStrings: boolean
): SemanticType | 'any' | undefined {
  if (types.length === 0) return 'any';
  return types.find((type) => {
    switch (type) {
      case 'number':
      case 'integer':
        return numberValue(value, numericStrings) !== undefined;
      case 'string':
        return typeof value === 'string';
      case 'boolean':
        return typeof value === 'boolean';
      case 'null':
        return value === null;
      case 'object':
        return isPlainObject(value);
      case 'array':
        return Array.isArray(value);
    }
  });
}

/** Objects on the path from the document root to the current value */
export type Ancestors = ReadonlySet<object>;

const NO_ANCESTORS: Ancestors = new Set<object>();

function withAncestor(ancestors: Ancestors, value: object): Ancestors {
  return new Set([...ancestors, value]);
}

/**
 * Reports values that cannot be descended into: a reference back to an
 * enclosing object or array, or nesting past `maxDepth`.
 */
function blocksDescent(
  value: unknown,
  path: string,
  ctx: CheckContext,
  depth: number,
  ancestors: Ancestors
): boolean {
  if (typeof value !== 'object' || value === null) return false;
  if (ancestors.has(value)) {
    report(ctx, 'TypeMismatch', path, 'value refers back to an enclosing value');
    return true;
  }
  if (depth > ctx.maxDepth) {
    report(ctx, 'TypeMismatch', path, `nesting exceeds the maximum depth of ${ctx.maxDepth}`);
    return true;
  }
  return false;
}

/** Copy of a value with no checks applied; undefined for non-JSON input */
export function copyValue(
  value: unknown,
  path: string,
  ctx: CheckContext,
  depth: number,
  ancestors: Ancestors = NO_ANCESTORS
): NormalizedValue | undefined {
  if (isJsonPrimitive(value) || typeof value === 'bigint') return value;
  if (!Array.isArray(value) && !isPlainObject(value)) return undefined;
  if (blocksDescent(value, path, ctx, depth, ancestors)) return undefined;
  const inner = withAncestor(ancestors, value);
  if (Array.isArray(value)) {
    const items: NormalizedValue[] = [];
    value.forEach((item, index) => {
      const copy = copyValue(item, appendPointer(path, index), ctx, depth + 1, inner);
      if (copy !== undefined) items.push(copy);
    });
    return items;
  }
  const result: NormalizedDocument = {};
  for (const [key, member] of Object.entries(value)) {
    const copy = copyValue(member, appendPointer(path, key), ctx, depth + 1, inner);
    if (copy !== undefined) result[key] = copy;
  }
  return result;
}

function checkLiterals(
  spec: PropertySpec,
  value: unknown,
  path: string,
  ctx: CheckContext
): void {
  if (spec.enum !== undefined && spec.enum.length > 0) {
    const allowed = spec.enum;
    if (!allowed.some((literal) => valueEquals(spec, value, literal, ctx.numericStrings))) {
      report(
        ctx,
        'EnumViolation',
        path,
        `${describeValue(value)} is not one of ${allowed.map((item) => JSON.stringify(item)).join(', ')}`
      );
    }
  }
  if (spec.const !== undefined && !valueEquals(spec, value, spec.const, ctx.numericStrings)) {
    report(ctx, 'EnumViolation', path, `must be ${JSON.stringify(spec.const)}, got ${describeValue(value)}`);
  }
}

export function checkObject(
  properties: Readonly<Record<string, PropertySpec>>,
  required: readonly string[],
  value: Readonly<Record<string, unknown>>,
  path: string,
  ctx: CheckContext,
  depth: number,
  ancestors: Ancestors = NO_ANCESTORS
): NormalizedDocument {
  const inner = withAncestor(ancestors, value);
  for (const name of required) {
    if (!isPresent(value, name)) {
      report(ctx, 'MissingRequiredProperty', appendPointer(path, name), `'${name}' is required`);
    }
  }
  const normalized: NormalizedDocument = {};
  for (const [name, member] of Object.entries(value)) {
    if (member === undefined) continue;
    const spec = properties[name];
    const memberPath = appendPointer(path, name);
    const checked =
      spec === undefined
        ? copyValue(member, memberPath, ctx, depth + 1, inner)
        : checkValue(spec, member, memberPath, ctx, depth + 1, inner);
    if (checked !== undefined) normalized[name] = checked;
  }
  return normalized;
}

function checkArray(
  spec: PropertySpec,
  value: readonly unknown[],
  path: string,
  ctx: CheckContext,
  depth: number,
  ancestors: Ancestors
): NormalizedValue[] {
  if (spec.minItems !== undefined && value.length < spec.minItems) {
    report(ctx, 'CardinalityViolation', path, `needs at least ${spec.minItems} item(s), got ${value.length}`);
  }
  if (spec.maxItems !== undefined && value.length > spec.maxItems) {
    report(ctx, 'CardinalityViolation', path, `allows at most ${spec.maxItems} item(s), got ${value.length}`);
  }
  const inner = withAncestor(ancestors, value);
  const items: NormalizedValue[] = [];
  value.forEach((item, index) => {
    const itemPath = appendPointer(path, index);
    const checked =
      spec.items === undefined
        ? copyValue(item, itemPath, ctx, depth + 1, inner)
        : checkValue(spec.items, item, itemPath, ctx, depth + 1, inner);
    if (checked !== undefined) items.push(checked);
  });
  return items;
}

function checkVariants(
  variants: readonly PropertySpec[],
  value: unknown,
  path: string,
  ctx: CheckContext,
  depth: number,
  ancestors: Ancestors
): NormalizedValue | undefined {
  const matches: Array<NormalizedValue | undefined> = [];
  for (const variant of variants) {
    const scratch: CheckContext = { ...ctx, violations: [] };
    const checked = checkValue(variant, value, path, scratch, depth, ancestors);
    if (scratch.violations.length === 0) matches.push(checked);
  }
  if (matches.length === 1) return matches[0];
  if (matches.length === 0) {
    report(ctx, 'UnsatisfiedAlternative', path, `matches none of the ${variants.length} allowed shapes`);
  } else {
    report(
      ctx,
      'AmbiguousAlternative',
      path,
      `matches ${matches.length} of the allowed shapes; exactly one is expected`
    );
  }
  return copyValue(value, path, ctx, depth, ancestors);
}

/**
 * Check one value against its property spec, appending violations to
 * `ctx`, and return its normalized copy.
 */
export function checkValue(
  spec: PropertySpec,
  value: unknown,
  path: string,
  ctx: CheckContext,
  depth: number,
  ancestors: Ancestors = NO_ANCESTORS
): NormalizedValue | undefined {
  if (blocksDescent(value, path, ctx, depth, ancestors)) return undefined;

  const type = matchType(spec.types, value, ctx.numericStrings);
  if (type === undefined) {
    report(ctx, 'TypeMismatch', path, `expected ${spec.types.join(' or ')}, got ${describeValue(value)}`);
    return copyValue(value, path, ctx, depth, ancestors);
  }

  let normalized: NormalizedValue | undefined;
  if (type === 'number' || type === 'integer') {
    normalized = numberValue(value, ctx.numericStrings);
  } else if (type === 'object' && isPlainObject(value)) {
    normalized = checkObject(
      spec.properties ?? {},
      spec.required ?? [],
      value,
      path,
      ctx,
      depth,
      ancestors
    );
  } else if (type === 'array' && Array.isArray(value)) {
    normalized = checkArray(spec, value, path, ctx, depth, ancestors);
  } else {
    normalized = copyValue(value, path, ctx, depth, ancestors);
  }

  if (spec.format === 'number' && type === 'string') {
    const parsed = parseUnsigned(value);
    if (parsed === undefined) {
      report(ctx, 'TypeMismatch', path, `expected a number literal, got ${describeValue(value)}`);
    } else {
      normalized = parsed;
    }
  }

  checkLiterals(spec, value, path, ctx);

  if (spec.variants !== undefined && spec.variants.length > 0) {
    return checkVariants(spec.variants, value, path, ctx, depth, ancestors);
  }
  return normalized;
}
