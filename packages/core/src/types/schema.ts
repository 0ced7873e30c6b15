/**
 * Schema fragment, conditional rule and composite schema model
 */

import type { JsonObject, JsonPrimitive, JsonValue } from './device.js';

export type SemanticType =
  | 'string'
  | 'number'
  | 'integer'
  | 'boolean'
  | 'object'
  | 'array'
  | 'null';

export const SEMANTIC_TYPES: readonly SemanticType[] = [
  'string',
  'number',
  'integer',
  'boolean',
  'object',
  'array',
  'null',
];

export interface PropertySpec {
  readonly name: string;
  /** Empty when the definition declares no type (any value accepted) */
  readonly types: readonly SemanticType[];
  readonly title?: string;
  readonly description?: string;
  readonly enum?: readonly JsonPrimitive[];
  readonly const?: JsonPrimitive;
  /** Format hint, e.g. `number`, `file`, `optional_file` */
  readonly format?: string;
  readonly default?: JsonValue;
  /** Example value used only when generating templates */
  readonly templateValue?: JsonValue;
  readonly skipInTemplate: boolean;
  /** Nested object shape */
  readonly properties?: Readonly<Record<string, PropertySpec>>;
  readonly required?: readonly string[];
  /** Array element shape */
  readonly items?: PropertySpec;
  /** Mutually exclusive shapes (`oneOf` at property level) */
  readonly variants?: readonly PropertySpec[];
  readonly minItems?: number;
  readonly maxItems?: number;
}

export interface EqualityClause {
  readonly property: string;
  readonly values: readonly JsonPrimitive[];
}

export type Condition =
  | { readonly kind: 'always' }
  | { readonly kind: 'equals'; readonly clauses: readonly EqualityClause[] };

export type Constraint =
  | { readonly kind: 'required'; readonly properties: readonly string[] }
  | { readonly kind: 'forbidden'; readonly properties: readonly string[] }
  | { readonly kind: 'restrict'; readonly clauses: readonly EqualityClause[] }
  | { readonly kind: 'allOf'; readonly constraints: readonly Constraint[] }
  | { readonly kind: 'oneOf'; readonly alternatives: readonly Constraint[] }
  | { readonly kind: 'anyOf'; readonly alternatives: readonly Constraint[] };

export interface ConditionalRule {
  /** Fragment name plus the JSON Pointer of the rule inside it */
  readonly id: string;
  readonly fragment: string;
  readonly condition: Condition;
  readonly consequence: Constraint;
  /** `else` branch, applied when the condition does not hold */
  readonly otherwise?: Constraint;
}

export interface SchemaFragment {
  readonly name: string;
  readonly title: string;
  /** Catalog group (file) the fragment was declared in */
  readonly group: string;
  readonly properties: Readonly<Record<string, PropertySpec>>;
  readonly required: readonly string[];
  readonly rules: readonly ConditionalRule[];
}

export interface CompositionNote {
  readonly code: 'PROPERTY_OVERRIDDEN' | 'PROPERTY_TYPE_CONFLICT';
  readonly severity: 'info' | 'warn' | 'error';
  readonly property: string;
  readonly fragment: string;
  readonly previousFragment: string;
  readonly message: string;
}

export interface CompositeSchema {
  /** Cache key: catalog fingerprint plus the ordered fragment names */
  readonly key: string;
  readonly fragments: readonly string[];
  readonly title: string;
  readonly properties: Readonly<Record<string, PropertySpec>>;
  /** Property name to the fragment whose definition won */
  readonly origins: Readonly<Record<string, string>>;
  readonly required: readonly string[];
  readonly rules: readonly ConditionalRule[];
  readonly notes: readonly CompositionNote[];
}

export type ConfigDocument = JsonObject;
