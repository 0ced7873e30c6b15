/**
 * Validation report model. Violations are data: the validator collects them
 * and never throws for a malformed document.
 */

import type { JsonPrimitive } from './device.js';

export type ViolationKind =
  | 'MissingRequiredProperty'
  | 'TypeMismatch'
  | 'EnumViolation'
  | 'ConflictingRule'
  | 'ForbiddenProperty'
  | 'UnsatisfiedAlternative'
  | 'AmbiguousAlternative'
  | 'CardinalityViolation';

export interface Violation {
  readonly kind: ViolationKind;
  /** JSON Pointer of the offending value ('' for the document root) */
  readonly path: string;
  readonly message: string;
  /** Id of the conditional rule that produced the violation */
  readonly rule?: string;
}

/** Document value after number normalization */
export type NormalizedValue =
  | JsonPrimitive
  | bigint
  | NormalizedValue[]
  | NormalizedDocument;

export interface NormalizedDocument {
  [key: string]: NormalizedValue;
}

export interface ValidationResult {
  readonly valid: boolean;
  readonly violations: readonly Violation[];
  /**
   * Copy of the document with number-typed values as unsigned bigint.
   * Values that failed their type check are kept as supplied.
   */
  readonly normalized: NormalizedDocument;
}
