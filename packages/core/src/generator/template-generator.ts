/**
 * Template document generation.
 *
 * Values come from `template_value`, then `default`; required properties
 * without either get a synthesized value (first enum member or the type's
 * zero value). Active rules are then satisfied pass by pass until the
 * document is stable, so the result validates against the same schema.
 */

import { DIAGNOSTIC_CODES } from '../diag/codes.js';
import { createDiagnostic, type DiagnosticSink } from '../diag/envelope.js';
import type { JsonObject, JsonValue } from '../types/device.js';
import {
  resolveOptions,
  type CoreOptions,
  type ResolvedOptions,
} from '../types/options.js';
import type {
  CompositeSchema,
  ConfigDocument,
  Constraint,
  PropertySpec,
  SemanticType,
} from '../types/schema.js';
import {
  activeConstraints,
  collectActiveSet,
  describeConstraint,
  evaluateConstraint,
} from '../validator/rule-interpreter.js';
import { isPresent } from '../validator/value-checks.js';

export interface TemplateOptions {
  options?: CoreOptions | ResolvedOptions;
  /** Receives TEMPLATE_RULE_UNSATISFIED when rules cannot all be met */
  sink?: DiagnosticSink;
}

interface BuildContext {
  readonly includeOptional: boolean;
  readonly synthesize: boolean;
  readonly maxDepth: number;
}

function cloneJson(value: JsonValue): JsonValue {
  if (Array.isArray(value)) return value.map(cloneJson);
  if (value !== null && typeof value === 'object') {
    const copy: JsonObject = {};
    for (const [key, member] of Object.entries(value)) copy[key] = cloneJson(member);
    return copy;
  }
  return value;
}

function zeroValue(type: SemanticType | undefined, spec: PropertySpec): JsonValue {
  switch (type) {
    case 'string':
      return spec.format === 'number' ? '0' : '';
    case 'number':
    case 'integer':
      return 0;
    case 'boolean':
      return false;
    case 'object':
      return {};
    case 'array':
      return [];
    default:
      return null;
  }
}

function buildObject(
  properties: Readonly<Record<string, PropertySpec>>,
  required: readonly string[],
  ctx: BuildContext,
  depth: number
): JsonObject {
  const document: JsonObject = {};
  const requiredSet = new Set(required);
  for (const [name, spec] of Object.entries(properties)) {
    const isRequired = requiredSet.has(name);
    if (!isRequired && (!ctx.includeOptional || spec.skipInTemplate)) continue;
    const value = buildValue(spec, isRequired, ctx, depth + 1);
    if (value !== undefined) document[name] = value;
  }
  for (const name of required) {
    if (!Object.prototype.hasOwnProperty.call(properties, name)) document[name] = null;
  }
  return document;
}

function buildArray(spec: PropertySpec, ctx: BuildContext, depth: number): JsonValue[] {
  const items: JsonValue[] = [];
  const itemSpec = spec.items;
  if (itemSpec !== undefined && ctx.includeOptional) {
    const shapes = itemSpec.variants !== undefined && itemSpec.variants.length > 0
      ? itemSpec.variants
      : [itemSpec];
    for (const shape of shapes) {
      const item = buildValue(shape, true, ctx, depth + 1);
      if (item !== undefined) items.push(item);
    }
  }
  const minItems = spec.minItems ?? 0;
  while (items.length < minItems) {
    const filler = itemSpec === undefined ? null : buildValue(itemSpec, true, ctx, depth + 1);
    items.push(filler ?? null);
  }
  return spec.maxItems === undefined ? items : items.slice(0, Math.max(spec.maxItems, minItems));
}

/**
 * Template value for one property. Undefined means the property is left out.
 */
function buildValue(
  spec: PropertySpec,
  required: boolean,
  ctx: BuildContext,
  depth: number
): JsonValue | undefined {
  if (spec.templateValue !== undefined) return cloneJson(spec.templateValue);
  if (spec.default !== undefined) return cloneJson(spec.default);
  if (spec.const !== undefined) return spec.const;
  if (depth > ctx.maxDepth) return undefined;

  const type = spec.types[0];
  if (spec.variants !== undefined && spec.variants.length > 0 && type !== 'array') {
    const [first] = spec.variants;
    return first === undefined || !(required || ctx.includeOptional)
      ? undefined
      : buildValue(first, true, ctx, depth + 1);
  }
  if (type === 'object' && spec.properties !== undefined) {
    return buildObject(spec.properties, spec.required ?? [], ctx, depth);
  }
  if (type === 'array' && (required || ctx.includeOptional)) {
    return buildArray(spec, ctx, depth);
  }
  if (!required || !ctx.synthesize) return undefined;
  const [firstAllowed] = spec.enum ?? [];
  if (firstAllowed !== undefined) return firstAllowed;
  return zeroValue(type, spec);
}

function requiredNames(constraint: Constraint): string[] {
  switch (constraint.kind) {
    case 'required':
      return [...constraint.properties];
    case 'allOf':
      return constraint.constraints.flatMap(requiredNames);
    default:
      return [];
  }
}

class RuleSatisfier {
  constructor(
    private readonly schema: CompositeSchema,
    private readonly document: JsonObject,
    private readonly ctx: BuildContext,
    private readonly numericStrings: boolean
  ) {}

  private addProperty(name: string): boolean {
    if (isPresent(this.document, name)) return false;
    const spec = this.schema.properties[name];
    const value = spec === undefined ? null : buildValue(spec, true, this.ctx, 1);
    if (value === undefined) return false;
    this.document[name] = value;
    return true;
  }

  private removeProperty(name: string, keep: ReadonlySet<string>): boolean {
    if (keep.has(name) || !isPresent(this.document, name)) return false;
    delete this.document[name];
    return true;
  }

  /** Usable alternatives only ask for declared properties shown in templates */
  private isUsable(constraint: Constraint): boolean {
    return requiredNames(constraint).every((name) => {
      const spec = this.schema.properties[name];
      return spec !== undefined && !spec.skipInTemplate;
    });
  }

  apply(constraint: Constraint, keep: ReadonlySet<string>): boolean {
    let changed = false;
    switch (constraint.kind) {
      case 'required':
        for (const name of constraint.properties) changed = this.addProperty(name) || changed;
        break;
      case 'forbidden':
        for (const name of constraint.properties) changed = this.removeProperty(name, keep) || changed;
        break;
      case 'restrict':
        for (const clause of constraint.clauses) {
          const outcome = evaluateConstraint(
            { kind: 'restrict', clauses: [clause] },
            this.document,
            this.schema.properties,
            this.numericStrings
          );
          const [first] = clause.values;
          if (!outcome.satisfied && first !== undefined) {
            this.document[clause.property] = first;
            changed = true;
          }
        }
        break;
      case 'allOf':
        for (const inner of constraint.constraints) changed = this.apply(inner, keep) || changed;
        break;
      case 'oneOf':
      case 'anyOf':
        changed = this.applyGroup(constraint.kind, constraint.alternatives, keep);
        break;
    }
    return changed;
  }

  applyGroup(
    kind: 'oneOf' | 'anyOf',
    alternatives: readonly Constraint[],
    keep: ReadonlySet<string>
  ): boolean {
    const passing = alternatives.filter(
      (alternative) =>
        evaluateConstraint(alternative, this.document, this.schema.properties, this.numericStrings)
          .satisfied
    );
    if (passing.length === 0) {
      const chosen = alternatives.find((alternative) => this.isUsable(alternative)) ?? alternatives[0];
      return chosen === undefined ? false : this.apply(chosen, keep);
    }
    if (kind === 'anyOf' || passing.length === 1) return false;

    const [winner, ...others] = passing;
    const protect = new Set([...keep, ...(winner === undefined ? [] : requiredNames(winner))]);
    let changed = false;
    for (const other of others) {
      for (const name of requiredNames(other)) {
        changed = this.removeProperty(name, protect) || changed;
      }
    }
    return changed;
  }
}

/**
 * Generate a template document for a composite schema.
 *
 * Required properties are always present; other properties only with
 * `includeOptional`. `skip_in_template` properties appear only when required.
 */
export function generateTemplate(
  schema: CompositeSchema,
  includeOptional: boolean,
  templateOptions: TemplateOptions = {}
): ConfigDocument {
  const options = resolveOptions(templateOptions.options);
  const ctx: BuildContext = {
    includeOptional,
    synthesize: options.template.synthesizeRequired,
    maxDepth: options.validation.maxDepth,
  };
  const numericStrings = options.validation.numericStrings;
  const document = buildObject(schema.properties, schema.required, ctx, 0);
  const satisfier = new RuleSatisfier(schema, document, ctx, numericStrings);

  for (let pass = 0; pass < options.template.maxRulePasses; pass += 1) {
    const active = activeConstraints(schema, document, numericStrings);
    const set = collectActiveSet(active);
    const keep = new Set([...schema.required, ...set.required.keys()]);
    let changed = false;
    for (const { constraint } of active) {
      changed = satisfier.apply(constraint, keep) || changed;
    }
    if (!changed) break;
  }

  if (templateOptions.sink) {
    for (const { rule, constraint } of activeConstraints(schema, document, numericStrings)) {
      const outcome = evaluateConstraint(constraint, document, schema.properties, numericStrings);
      if (outcome.satisfied) continue;
      templateOptions.sink(
        createDiagnostic(
          DIAGNOSTIC_CODES.TEMPLATE_RULE_UNSATISFIED,
          'warn',
          '',
          `Template could not satisfy rule ${rule.id}: ${describeConstraint(constraint)}`,
          { rule: rule.id }
        )
      );
    }
  }
  return document;
}
