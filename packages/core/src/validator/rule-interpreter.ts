/**
 * Interpreter for ConditionalRules.
 *
 * Conditions only test literal equality of top-level properties that are
 * already in the document, so one evaluation per rule is enough: activating
 * a consequence can never change whether another condition holds.
 */

import type {
  CompositeSchema,
  Condition,
  ConditionalRule,
  Constraint,
  EqualityClause,
  PropertySpec,
} from '../types/schema.js';
import { isPresent, valueEquals } from './value-checks.js';

type Document = Readonly<Record<string, unknown>>;
type Properties = Readonly<Record<string, PropertySpec>>;

export interface ActiveConstraint {
  readonly rule: ConditionalRule;
  readonly constraint: Constraint;
}

export interface AlternativeGroup {
  readonly kind: 'oneOf' | 'anyOf';
  readonly alternatives: readonly Constraint[];
  readonly rule: string;
}

export interface RestrictionEntry {
  readonly clause: EqualityClause;
  readonly rule: string;
}

/** Active constraints flattened by kind; maps record the first rule seen */
export interface ActiveSet {
  readonly required: Map<string, string>;
  readonly forbidden: Map<string, string>;
  readonly restrictions: RestrictionEntry[];
  readonly groups: AlternativeGroup[];
}

export interface ConstraintOutcome {
  readonly satisfied: boolean;
  /** True when every failing part is a missing required property */
  readonly onlyMissing: boolean;
}

export function clauseHolds(
  clause: EqualityClause,
  document: Document,
  properties: Properties,
  numericStrings: boolean
): boolean {
  if (!isPresent(document, clause.property)) return false;
  const value = document[clause.property];
  const spec = properties[clause.property];
  return clause.values.some((literal) => valueEquals(spec, value, literal, numericStrings));
}

export function conditionHolds(
  condition: Condition,
  document: Document,
  properties: Properties,
  numericStrings: boolean
): boolean {
  if (condition.kind === 'always') return true;
  return condition.clauses.every((clause) =>
    clauseHolds(clause, document, properties, numericStrings)
  );
}

/** `then` of every rule whose condition holds, `else` of the others */
export function activeConstraints(
  schema: CompositeSchema,
  document: Document,
  numericStrings: boolean
): ActiveConstraint[] {
  const active: ActiveConstraint[] = [];
  for (const rule of schema.rules) {
    if (conditionHolds(rule.condition, document, schema.properties, numericStrings)) {
      active.push({ rule, constraint: rule.consequence });
    } else if (rule.otherwise !== undefined) {
      active.push({ rule, constraint: rule.otherwise });
    }
  }
  return active;
}

export function collectActiveSet(active: readonly ActiveConstraint[]): ActiveSet {
  const set: ActiveSet = {
    required: new Map(),
    forbidden: new Map(),
    restrictions: [],
    groups: [],
  };
  const visit = (constraint: Constraint, rule: string): void => {
    switch (constraint.kind) {
      case 'required':
        for (const name of constraint.properties) {
          if (!set.required.has(name)) set.required.set(name, rule);
        }
        break;
      case 'forbidden':
        for (const name of constraint.properties) {
          if (!set.forbidden.has(name)) set.forbidden.set(name, rule);
        }
        break;
      case 'restrict':
        for (const clause of constraint.clauses) set.restrictions.push({ clause, rule });
        break;
      case 'allOf':
        for (const inner of constraint.constraints) visit(inner, rule);
        break;
      case 'oneOf':
      case 'anyOf':
        set.groups.push({ kind: constraint.kind, alternatives: constraint.alternatives, rule });
        break;
    }
  };
  for (const { rule, constraint } of active) visit(constraint, rule.id);
  return set;
}

/**
 * Whether `document` satisfies a constraint, without reporting anything.
 * Used for alternatives, where only the overall outcome matters.
 */
export function evaluateConstraint(
  constraint: Constraint,
  document: Document,
  properties: Properties,
  numericStrings: boolean
): ConstraintOutcome {
  switch (constraint.kind) {
    case 'required': {
      const satisfied = constraint.properties.every((name) => isPresent(document, name));
      return { satisfied, onlyMissing: !satisfied };
    }
    case 'forbidden':
      return {
        satisfied: !constraint.properties.some((name) => isPresent(document, name)),
        onlyMissing: false,
      };
    case 'restrict':
      return {
        satisfied: constraint.clauses.every(
          (clause) =>
            !isPresent(document, clause.property) ||
            clauseHolds(clause, document, properties, numericStrings)
        ),
        onlyMissing: false,
      };
    case 'allOf': {
      const failed = constraint.constraints
        .map((inner) => evaluateConstraint(inner, document, properties, numericStrings))
        .filter((outcome) => !outcome.satisfied);
      return {
        satisfied: failed.length === 0,
        onlyMissing: failed.length > 0 && failed.every((outcome) => outcome.onlyMissing),
      };
    }
    case 'oneOf':
    case 'anyOf': {
      const outcomes = constraint.alternatives.map((inner) =>
        evaluateConstraint(inner, document, properties, numericStrings)
      );
      const passing = outcomes.filter((outcome) => outcome.satisfied).length;
      const satisfied = constraint.kind === 'oneOf' ? passing === 1 : passing >= 1;
      return {
        satisfied,
        onlyMissing: passing === 0 && outcomes.every((outcome) => outcome.onlyMissing),
      };
    }
  }
}

/** Short human description of a constraint, used in violation messages */
export function describeConstraint(constraint: Constraint): string {
  switch (constraint.kind) {
    case 'required':
      return constraint.properties.map((name) => `'${name}'`).join(' and ');
    case 'forbidden':
      return `no ${constraint.properties.map((name) => `'${name}'`).join(' or ')}`;
    case 'restrict':
      return constraint.clauses
        .map((clause) => `${clause.property} in [${clause.values.map((v) => JSON.stringify(v)).join(', ')}]`)
        .join(' and ');
    case 'allOf':
      return `(${constraint.constraints.map(describeConstraint).join(' and ')})`;
    case 'oneOf':
      return `exactly one of (${constraint.alternatives.map(describeConstraint).join(' | ')})`;
    case 'anyOf':
      return `any of (${constraint.alternatives.map(describeConstraint).join(' | ')})`;
  }
}
