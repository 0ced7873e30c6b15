/**
 * Diagnostic codes emitted as structured notes (never thrown).
 * Each code belongs to exactly one phase.
 */

export const DIAGNOSTIC_PHASES = {
  LOAD: 'load',
  RESOLVE: 'resolve',
  COMPOSE: 'compose',
  VALIDATE: 'validate',
  TEMPLATE: 'template',
} as const;

export type DiagnosticPhase =
  (typeof DIAGNOSTIC_PHASES)[keyof typeof DIAGNOSTIC_PHASES];

export const DIAGNOSTIC_CODES = {
  // load
  DEVICE_LOAD_FAILED: 'DEVICE_LOAD_FAILED',
  SCHEMA_GROUP_LOAD_FAILED: 'SCHEMA_GROUP_LOAD_FAILED',
  FEATURE_BINDINGS_LOAD_FAILED: 'FEATURE_BINDINGS_LOAD_FAILED',
  ALIAS_SHADOWS_DEFINITION: 'ALIAS_SHADOWS_DEFINITION',
  ALIAS_CYCLE: 'ALIAS_CYCLE',
  DUPLICATE_FRAGMENT: 'DUPLICATE_FRAGMENT',
  FEATURE_FRAGMENT_MISSING: 'FEATURE_FRAGMENT_MISSING',
  // compose
  PROPERTY_OVERRIDDEN: 'PROPERTY_OVERRIDDEN',
  PROPERTY_TYPE_CONFLICT: 'PROPERTY_TYPE_CONFLICT',
  // template
  TEMPLATE_RULE_UNSATISFIED: 'TEMPLATE_RULE_UNSATISFIED',
} as const;

export type DiagnosticCode =
  (typeof DIAGNOSTIC_CODES)[keyof typeof DIAGNOSTIC_CODES];

const PHASE_BY_CODE: Record<DiagnosticCode, DiagnosticPhase> = {
  DEVICE_LOAD_FAILED: DIAGNOSTIC_PHASES.LOAD,
  SCHEMA_GROUP_LOAD_FAILED: DIAGNOSTIC_PHASES.LOAD,
  FEATURE_BINDINGS_LOAD_FAILED: DIAGNOSTIC_PHASES.LOAD,
  ALIAS_SHADOWS_DEFINITION: DIAGNOSTIC_PHASES.LOAD,
  ALIAS_CYCLE: DIAGNOSTIC_PHASES.LOAD,
  DUPLICATE_FRAGMENT: DIAGNOSTIC_PHASES.LOAD,
  FEATURE_FRAGMENT_MISSING: DIAGNOSTIC_PHASES.LOAD,
  PROPERTY_OVERRIDDEN: DIAGNOSTIC_PHASES.COMPOSE,
  PROPERTY_TYPE_CONFLICT: DIAGNOSTIC_PHASES.COMPOSE,
  TEMPLATE_RULE_UNSATISFIED: DIAGNOSTIC_PHASES.TEMPLATE,
};

export function getDiagnosticPhase(code: DiagnosticCode): DiagnosticPhase {
  return PHASE_BY_CODE[code];
}

export function isKnownDiagnosticCode(code: string): code is DiagnosticCode {
  return Object.prototype.hasOwnProperty.call(PHASE_BY_CODE, code);
}
