/**
 * Error Code Infrastructure
 * Stable error codes and severity/category mappings.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Device Profile Errors (E001–E099)
  UNKNOWN_DEVICE = 'E001',
  UNKNOWN_REVISION = 'E002',
  ALIAS_CYCLE = 'E003',
  MIRROR_SIZE_MISMATCH = 'E010',
  REGION_OVERLAP = 'E011',
  DANGLING_MIRROR = 'E012',
  MIRROR_CYCLE = 'E013',

  // Schema Composition Errors (E100–E199)
  UNKNOWN_SCHEMA_FRAGMENT = 'E100',
  INCOMPATIBLE_REDEFINITION = 'E101',
  UNKNOWN_ARTIFACT = 'E102',
  UNSUPPORTED_CONDITION = 'E110',

  // Validation Errors (E200–E299)
  CONFIG_VALIDATION_FAILED = 'E200',

  // Configuration & Catalog Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',
  CATALOG_SHAPE_INVALID = 'E310',
  CATALOG_READ_FAILED = 'E311',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

export type ErrorCategory =
  | 'device'
  | 'schema'
  | 'validation'
  | 'catalog'
  | 'internal';

export const CATEGORY_BY_CODE = {
  [ErrorCode.UNKNOWN_DEVICE]: 'device',
  [ErrorCode.UNKNOWN_REVISION]: 'device',
  [ErrorCode.ALIAS_CYCLE]: 'device',
  [ErrorCode.MIRROR_SIZE_MISMATCH]: 'device',
  [ErrorCode.REGION_OVERLAP]: 'device',
  [ErrorCode.DANGLING_MIRROR]: 'device',
  [ErrorCode.MIRROR_CYCLE]: 'device',
  [ErrorCode.UNKNOWN_SCHEMA_FRAGMENT]: 'schema',
  [ErrorCode.INCOMPATIBLE_REDEFINITION]: 'schema',
  [ErrorCode.UNKNOWN_ARTIFACT]: 'schema',
  [ErrorCode.UNSUPPORTED_CONDITION]: 'schema',
  [ErrorCode.CONFIG_VALIDATION_FAILED]: 'validation',
  [ErrorCode.CONFIGURATION_ERROR]: 'catalog',
  [ErrorCode.CATALOG_SHAPE_INVALID]: 'catalog',
  [ErrorCode.CATALOG_READ_FAILED]: 'catalog',
  [ErrorCode.INTERNAL_ERROR]: 'internal',
} satisfies Record<ErrorCode, ErrorCategory>;

// HTTP status mapping for consumers exposing the core behind an API
export const HTTP_STATUS_BY_CODE = {
  [ErrorCode.UNKNOWN_DEVICE]: 404,
  [ErrorCode.UNKNOWN_REVISION]: 404,
  [ErrorCode.ALIAS_CYCLE]: 500,
  [ErrorCode.MIRROR_SIZE_MISMATCH]: 500,
  [ErrorCode.REGION_OVERLAP]: 500,
  [ErrorCode.DANGLING_MIRROR]: 500,
  [ErrorCode.MIRROR_CYCLE]: 500,
  [ErrorCode.UNKNOWN_SCHEMA_FRAGMENT]: 404,
  [ErrorCode.INCOMPATIBLE_REDEFINITION]: 500,
  [ErrorCode.UNKNOWN_ARTIFACT]: 404,
  [ErrorCode.UNSUPPORTED_CONDITION]: 500,
  [ErrorCode.CONFIG_VALIDATION_FAILED]: 422,
  [ErrorCode.CONFIGURATION_ERROR]: 500,
  [ErrorCode.CATALOG_SHAPE_INVALID]: 500,
  [ErrorCode.CATALOG_READ_FAILED]: 500,
  [ErrorCode.INTERNAL_ERROR]: 500,
} satisfies Record<ErrorCode, number>;

export function getErrorCategory(code: ErrorCode): ErrorCategory {
  return CATEGORY_BY_CODE[code];
}

export function getHttpStatus(code: ErrorCode): number {
  return HTTP_STATUS_BY_CODE[code];
}
