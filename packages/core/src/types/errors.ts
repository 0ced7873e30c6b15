/**
 * Error hierarchy for provcat
 * Provides structured error handling with stable codes and context
 */

import {
  ErrorCode,
  type Severity,
  getErrorCategory,
  type ErrorCategory,
} from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  deviceId?: string;
  revision?: string;
  region?: string;
  fragment?: string;
  artifact?: string;
  path?: string; // JSON Pointer inside a document or catalog entry
  value?: unknown; // Problematic value
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  kind: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface UserError {
  message: string;
  code: ErrorCode;
  severity: Severity;
  path?: string;
}

interface ErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all provcat errors
 */
export abstract class ProvcatError extends Error {
  /** Name of the failure as used in diagnostics, e.g. `UnknownDevice` */
  public abstract readonly kind: string;
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  constructor(params: ErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  get category(): ErrorCategory {
    return getErrorCategory(this.errorCode);
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack and raw values
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      kind: this.kind,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: env === 'prod' ? this.#redactContext(this.context) : this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Return a minimal, safe structure for external exposure */
  toUserError(): UserError {
    return {
      message: this.message,
      code: this.errorCode,
      severity: this.severity,
      path: this.context?.path,
    };
  }

  // Key material may travel in `value`; never ship it in production payloads
  #redactContext(context?: ErrorContext): ErrorContext | undefined {
    if (!context) return context;
    if (!('value' in context)) return context;
    return { ...context, value: '[REDACTED]' };
  }
}

/**
 * Device profile resolution errors
 */
export type DeviceErrorKind =
  | 'UnknownDevice'
  | 'UnknownRevision'
  | 'AliasCycle'
  | 'MirrorSizeMismatch'
  | 'RegionOverlap'
  | 'DanglingMirror'
  | 'MirrorCycle';

const DEVICE_ERROR_CODES: Record<DeviceErrorKind, ErrorCode> = {
  UnknownDevice: ErrorCode.UNKNOWN_DEVICE,
  UnknownRevision: ErrorCode.UNKNOWN_REVISION,
  AliasCycle: ErrorCode.ALIAS_CYCLE,
  MirrorSizeMismatch: ErrorCode.MIRROR_SIZE_MISMATCH,
  RegionOverlap: ErrorCode.REGION_OVERLAP,
  DanglingMirror: ErrorCode.DANGLING_MIRROR,
  MirrorCycle: ErrorCode.MIRROR_CYCLE,
};

export class DeviceProfileError extends ProvcatError {
  public readonly kind: DeviceErrorKind;

  constructor(params: {
    kind: DeviceErrorKind;
    message: string;
    context: ErrorContext & { deviceId: string };
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: DEVICE_ERROR_CODES[params.kind],
      context: params.context,
      cause: params.cause,
    });
    this.kind = params.kind;
  }
}

/**
 * Schema catalog and composition errors
 */
export type SchemaErrorKind =
  | 'UnknownSchemaFragment'
  | 'IncompatibleRedefinition'
  | 'UnknownArtifact'
  | 'UnsupportedCondition';

const SCHEMA_ERROR_CODES: Record<SchemaErrorKind, ErrorCode> = {
  UnknownSchemaFragment: ErrorCode.UNKNOWN_SCHEMA_FRAGMENT,
  IncompatibleRedefinition: ErrorCode.INCOMPATIBLE_REDEFINITION,
  UnknownArtifact: ErrorCode.UNKNOWN_ARTIFACT,
  UnsupportedCondition: ErrorCode.UNSUPPORTED_CONDITION,
};

export class SchemaError extends ProvcatError {
  public readonly kind: SchemaErrorKind;

  constructor(params: {
    kind: SchemaErrorKind;
    message: string;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: SCHEMA_ERROR_CODES[params.kind],
      context: params.context,
      cause: params.cause,
    });
    this.kind = params.kind;
  }
}

/**
 * Raw catalog input that does not match the expected document shape
 */
export class CatalogError extends ProvcatError {
  public readonly kind = 'CatalogShapeInvalid';
  public readonly issues: readonly CatalogIssue[];

  constructor(params: {
    message: string;
    issues: readonly CatalogIssue[];
    context?: ErrorContext;
    errorCode?: ErrorCode;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.CATALOG_SHAPE_INVALID,
      context: params.context,
      cause: params.cause,
    });
    this.issues = params.issues;
  }
}

export interface CatalogIssue {
  path: string;
  message: string;
}

/**
 * Invalid option combinations passed to resolveOptions()
 */
export class ConfigurationError extends ProvcatError {
  public readonly kind = 'ConfigurationError';

  constructor(message: string, context?: ErrorContext) {
    super({ message, errorCode: ErrorCode.CONFIGURATION_ERROR, context });
  }
}

/**
 * Type guards
 */
export function isProvcatError(error: unknown): error is ProvcatError {
  return error instanceof ProvcatError;
}

export function isDeviceProfileError(
  error: unknown
): error is DeviceProfileError {
  return error instanceof DeviceProfileError;
}

export function isSchemaError(error: unknown): error is SchemaError {
  return error instanceof SchemaError;
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
