/**
 * Configuration document validation against a CompositeSchema.
 *
 * Checks run in a fixed order (required presence, types and nested shapes,
 * enumerations, then active rules) and every violation is collected.
 * Nothing here throws for a malformed document or mutates it.
 */

import {
  resolveOptions,
  type CoreOptions,
  type ResolvedOptions,
} from '../types/options.js';
import type { CompositeSchema } from '../types/schema.js';
import type { ValidationResult } from '../types/validation.js';
import { isPlainObject } from '../util/guards.js';
import { appendPointer } from '../util/pointer.js';
import {
  activeConstraints,
  clauseHolds,
  collectActiveSet,
  describeConstraint,
  evaluateConstraint,
} from './rule-interpreter.js';
import {
  checkObject,
  describeValue,
  isPresent,
  report,
  type CheckContext,
} from './value-checks.js';

export function validate(
  document: unknown,
  schema: CompositeSchema,
  options: CoreOptions | ResolvedOptions = {}
): ValidationResult {
  const { validation } = resolveOptions(options);
  const ctx: CheckContext = {
    numericStrings: validation.numericStrings,
    maxDepth: validation.maxDepth,
    violations: [],
  };

  if (!isPlainObject(document)) {
    report(ctx, 'TypeMismatch', '', `expected an object document, got ${describeValue(document)}`);
    return { valid: false, violations: ctx.violations, normalized: {} };
  }

  const active = collectActiveSet(
    activeConstraints(schema, document, validation.numericStrings)
  );

  // Required and forbidden at once: report the contradiction, not both halves
  const conflicts = new Set<string>();
  const requiredBy = new Map<string, string | undefined>();
  for (const name of schema.required) requiredBy.set(name, undefined);
  for (const [name, rule] of active.required) {
    if (!requiredBy.has(name)) requiredBy.set(name, rule);
  }
  for (const [name, forbiddingRule] of active.forbidden) {
    if (!requiredBy.has(name)) continue;
    conflicts.add(name);
    const requiringRule = active.required.get(name);
    report(
      ctx,
      'ConflictingRule',
      appendPointer('', name),
      `'${name}' is required${requiringRule ? ` by ${requiringRule}` : ''} and forbidden by ${forbiddingRule}`,
      forbiddingRule
    );
  }

  // (1) required presence
  for (const [name, rule] of requiredBy) {
    if (conflicts.has(name) || isPresent(document, name)) continue;
    report(ctx, 'MissingRequiredProperty', appendPointer('', name), `'${name}' is required`, rule);
  }

  // (2)-(3) types, nested shapes and enumerations
  const normalized = checkObject(schema.properties, [], document, '', ctx, 0);

  // (4) remaining rule consequences
  for (const [name, rule] of active.forbidden) {
    if (conflicts.has(name) || !isPresent(document, name)) continue;
    report(ctx, 'ForbiddenProperty', appendPointer('', name), `'${name}' is not allowed here`, rule);
  }
  for (const { clause, rule } of active.restrictions) {
    if (!isPresent(document, clause.property)) continue;
    if (clauseHolds(clause, document, schema.properties, validation.numericStrings)) continue;
    report(
      ctx,
      'EnumViolation',
      appendPointer('', clause.property),
      `${describeValue(document[clause.property])} is not one of ` +
        clause.values.map((value) => JSON.stringify(value)).join(', '),
      rule
    );
  }
  for (const group of active.groups) {
    const outcomes = group.alternatives.map((alternative) =>
      evaluateConstraint(alternative, document, schema.properties, validation.numericStrings)
    );
    const passing = outcomes.filter((outcome) => outcome.satisfied).length;
    const expected = group.alternatives.map(describeConstraint).join(' | ');
    if (passing === 0) {
      const onlyMissing = outcomes.every((outcome) => outcome.onlyMissing);
      report(
        ctx,
        onlyMissing ? 'MissingRequiredProperty' : 'UnsatisfiedAlternative',
        '',
        `${group.kind === 'oneOf' ? 'exactly one' : 'at least one'} of ${expected} is required`,
        group.rule
      );
    } else if (group.kind === 'oneOf' && passing > 1) {
      report(
        ctx,
        'AmbiguousAlternative',
        '',
        `${passing} alternatives of ${expected} apply; exactly one is allowed`,
        group.rule
      );
    }
  }

  return { valid: ctx.violations.length === 0, violations: ctx.violations, normalized };
}

