/**
 * Raw schema group document -> SchemaFragment[].
 *
 * Conditional keywords are translated into tagged ConditionalRules. Branch
 * conditions are limited to literal equality on top-level properties
 * (`properties: { p: { const } | { enum } }` plus an optional `required`
 * naming the same properties); anything else is rejected here so the
 * validator never meets a condition it cannot evaluate.
 */

import type { JsonPrimitive } from '../types/device.js';
import { CatalogError, SchemaError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import {
  SEMANTIC_TYPES,
  type ConditionalRule,
  type Condition,
  type Constraint,
  type EqualityClause,
  type PropertySpec,
  type SchemaFragment,
  type SemanticType,
} from '../types/schema.js';
import {
  isJsonPrimitive,
  isJsonValue,
  isPlainObject,
  isStringArray,
  optionalString,
} from '../util/guards.js';
import { appendPointer } from '../util/pointer.js';
import { checkCatalogShape } from './shape-check.js';

export interface ParsedFragment {
  readonly name: string;
  readonly result: Result<SchemaFragment, CatalogError | SchemaError>;
}

const ANNOTATION_KEYS = new Set(['$comment', 'title', 'description']);

function isSemanticType(value: unknown): value is SemanticType {
  return SEMANTIC_TYPES.some((type) => type === value);
}

function parseTypes(raw: Record<string, unknown>): SemanticType[] {
  const declared = raw.type;
  if (isSemanticType(declared)) return [declared];
  if (Array.isArray(declared)) return declared.filter(isSemanticType);
  if (isPlainObject(raw.properties)) return ['object'];
  if (isPlainObject(raw.items)) return ['array'];
  return [];
}

function parsePropertyMap(
  raw: unknown
): Record<string, PropertySpec> | undefined {
  if (!isPlainObject(raw)) return undefined;
  const properties: Record<string, PropertySpec> = {};
  for (const [name, definition] of Object.entries(raw)) {
    if (isPlainObject(definition)) {
      properties[name] = parseProperty(name, definition);
    }
  }
  return properties;
}

export function parseProperty(
  name: string,
  raw: Record<string, unknown>
): PropertySpec {
  const spec: {
    -readonly [K in keyof PropertySpec]: PropertySpec[K];
  } = {
    name,
    types: parseTypes(raw),
    skipInTemplate: raw.skip_in_template === true,
  };
  const title = optionalString(raw.title);
  if (title !== undefined) spec.title = title;
  const description = optionalString(raw.description);
  if (description !== undefined) spec.description = description;
  if (Array.isArray(raw.enum)) spec.enum = raw.enum.filter(isJsonPrimitive);
  if (isJsonPrimitive(raw.const)) spec.const = raw.const;
  const format = optionalString(raw.format);
  if (format !== undefined) spec.format = format;
  if (isJsonValue(raw.default)) spec.default = raw.default;
  if (isJsonValue(raw.template_value)) spec.templateValue = raw.template_value;

  const properties = parsePropertyMap(raw.properties);
  if (properties) spec.properties = properties;
  if (isStringArray(raw.required)) spec.required = [...new Set(raw.required)];
  if (isPlainObject(raw.items)) spec.items = parseProperty('items', raw.items);
  if (Array.isArray(raw.oneOf)) {
    spec.variants = raw.oneOf
      .filter(isPlainObject)
      .map((variant, index) => parseProperty(`${name}[${index}]`, variant));
  }
  if (typeof raw.minItems === 'number') spec.minItems = raw.minItems;
  if (typeof raw.maxItems === 'number') spec.maxItems = raw.maxItems;
  return spec;
}

function unsupported(fragment: string, path: string, reason: string): SchemaError {
  return new SchemaError({
    kind: 'UnsupportedCondition',
    message: `Fragment '${fragment}' ${reason} at '${path}'`,
    context: { fragment, path },
  });
}

function parseEqualityClauses(
  fragment: string,
  raw: unknown,
  path: string
): EqualityClause[] {
  if (!isPlainObject(raw) || Object.keys(raw).length === 0) {
    throw unsupported(fragment, path, 'needs a non-empty properties block');
  }
  const clauses: EqualityClause[] = [];
  for (const [property, test] of Object.entries(raw)) {
    const testPath = appendPointer(path, property);
    if (!isPlainObject(test)) {
      throw unsupported(fragment, testPath, 'uses a non-object property test');
    }
    const keys = Object.keys(test).filter((key) => !ANNOTATION_KEYS.has(key));
    if (keys.length === 1 && keys[0] === 'const' && isJsonPrimitive(test.const)) {
      clauses.push({ property, values: [test.const] });
      continue;
    }
    if (
      keys.length === 1 &&
      keys[0] === 'enum' &&
      Array.isArray(test.enum) &&
      test.enum.length > 0 &&
      test.enum.every(isJsonPrimitive)
    ) {
      const values: JsonPrimitive[] = test.enum.filter(isJsonPrimitive);
      clauses.push({ property, values });
      continue;
    }
    throw unsupported(
      fragment,
      testPath,
      'uses a property test other than a literal const/enum'
    );
  }
  return clauses;
}

export function parseCondition(
  fragment: string,
  raw: unknown,
  path: string
): Condition {
  if (!isPlainObject(raw)) {
    throw unsupported(fragment, path, 'has a non-object condition');
  }
  for (const key of Object.keys(raw)) {
    if (key !== 'properties' && key !== 'required' && !ANNOTATION_KEYS.has(key)) {
      throw unsupported(fragment, appendPointer(path, key), `uses '${key}' in a condition`);
    }
  }
  const clauses = parseEqualityClauses(
    fragment,
    raw.properties,
    appendPointer(path, 'properties')
  );
  if (raw.required !== undefined) {
    const tested = new Set(clauses.map((clause) => clause.property));
    if (!isStringArray(raw.required) || !raw.required.every((name) => tested.has(name))) {
      throw unsupported(
        fragment,
        appendPointer(path, 'required'),
        'requires properties the condition does not test'
      );
    }
  }
  return { kind: 'equals', clauses };
}

function parseAlternatives(
  fragment: string,
  raw: unknown,
  path: string
): Constraint[] {
  if (!Array.isArray(raw) || raw.length === 0) {
    throw unsupported(fragment, path, 'needs a non-empty list of alternatives');
  }
  return raw.map((item: unknown, index) =>
    parseConstraint(fragment, item, appendPointer(path, index))
  );
}

/**
 * Translate a consequence block (`then`, `else`, an `allOf` item, a
 * `oneOf`/`anyOf` alternative) into a Constraint.
 */
export function parseConstraint(
  fragment: string,
  raw: unknown,
  path: string
): Constraint {
  if (!isPlainObject(raw)) {
    throw unsupported(fragment, path, 'has a non-object constraint');
  }
  const parts: Constraint[] = [];
  for (const [key, value] of Object.entries(raw)) {
    const keyPath = appendPointer(path, key);
    switch (key) {
      case 'required':
        if (!isStringArray(value)) {
          throw unsupported(fragment, keyPath, 'has a malformed required list');
        }
        parts.push({ kind: 'required', properties: [...new Set(value)] });
        break;
      case 'not':
        if (
          !isPlainObject(value) ||
          Object.keys(value).length !== 1 ||
          !isStringArray(value.required)
        ) {
          throw unsupported(fragment, keyPath, "supports only 'not: { required }'");
        }
        parts.push({ kind: 'forbidden', properties: [...new Set(value.required)] });
        break;
      case 'properties':
        parts.push({
          kind: 'restrict',
          clauses: parseEqualityClauses(fragment, value, keyPath),
        });
        break;
      case 'allOf':
        if (!Array.isArray(value)) {
          throw unsupported(fragment, keyPath, 'has a malformed allOf list');
        }
        parts.push({
          kind: 'allOf',
          constraints: value.map((item: unknown, index) =>
            parseConstraint(fragment, item, appendPointer(keyPath, index))
          ),
        });
        break;
      case 'oneOf':
        parts.push({ kind: 'oneOf', alternatives: parseAlternatives(fragment, value, keyPath) });
        break;
      case 'anyOf':
        parts.push({ kind: 'anyOf', alternatives: parseAlternatives(fragment, value, keyPath) });
        break;
      default:
        if (!ANNOTATION_KEYS.has(key)) {
          throw unsupported(fragment, keyPath, `uses '${key}' inside a rule consequence`);
        }
    }
  }
  const [single] = parts;
  if (parts.length === 1 && single) return single;
  return { kind: 'allOf', constraints: parts };
}

function parseConditionalBlock(
  fragment: string,
  raw: Record<string, unknown>,
  path: string
): ConditionalRule {
  const rule: {
    -readonly [K in keyof ConditionalRule]: ConditionalRule[K];
  } = {
    id: `${fragment}#${path}`,
    fragment,
    condition: parseCondition(fragment, raw.if, appendPointer(path, 'if')),
    consequence: parseConstraint(fragment, raw.then ?? {}, appendPointer(path, 'then')),
  };
  if (raw.else !== undefined) {
    rule.otherwise = parseConstraint(fragment, raw.else, appendPointer(path, 'else'));
  }
  return rule;
}

export function parseRules(
  fragment: string,
  raw: Record<string, unknown>
): ConditionalRule[] {
  const rules: ConditionalRule[] = [];
  if (raw.if !== undefined) {
    rules.push(parseConditionalBlock(fragment, raw, ''));
  } else if (raw.then !== undefined || raw.else !== undefined) {
    throw unsupported(fragment, '', "declares 'then'/'else' without 'if'");
  }

  if (Array.isArray(raw.allOf)) {
    raw.allOf.forEach((item: unknown, index) => {
      const path = appendPointer('/allOf', index);
      if (isPlainObject(item) && item.if !== undefined) {
        rules.push(parseConditionalBlock(fragment, item, path));
        return;
      }
      rules.push({
        id: `${fragment}#${path}`,
        fragment,
        condition: { kind: 'always' },
        consequence: parseConstraint(fragment, item, path),
      });
    });
  }

  for (const keyword of ['oneOf', 'anyOf'] as const) {
    if (raw[keyword] === undefined) continue;
    const path = `/${keyword}`;
    rules.push({
      id: `${fragment}#${path}`,
      fragment,
      condition: { kind: 'always' },
      consequence: {
        kind: keyword,
        alternatives: parseAlternatives(fragment, raw[keyword], path),
      },
    });
  }
  return rules;
}

function parseFragment(
  name: string,
  group: string,
  raw: Record<string, unknown>
): Result<SchemaFragment, CatalogError | SchemaError> {
  try {
    const fragment: SchemaFragment = {
      name,
      group,
      title: optionalString(raw.title) ?? name,
      properties: parsePropertyMap(raw.properties) ?? {},
      required: isStringArray(raw.required) ? [...new Set(raw.required)] : [],
      rules: parseRules(name, raw),
    };
    return ok(fragment);
  } catch (error) {
    if (error instanceof SchemaError) {
      return err(error);
    }
    throw error;
  }
}

/**
 * Parse every fragment of a group. A fragment that fails is reported on its
 * own; the rest of the group still loads.
 */
export function parseSchemaGroup(
  group: string,
  document: unknown
): ParsedFragment[] | CatalogError {
  const shapeIssues = checkCatalogShape('schemaGroup', document);
  if (shapeIssues.length > 0 || !isPlainObject(document)) {
    return new CatalogError({
      message: `Schema group '${group}' does not match the fragment document shape`,
      issues: shapeIssues,
      context: { fragment: group },
    });
  }
  const parsed: ParsedFragment[] = [];
  for (const [name, raw] of Object.entries(document)) {
    if (!isPlainObject(raw)) continue;
    parsed.push({ name, result: parseFragment(name, group, raw) });
  }
  return parsed;
}
