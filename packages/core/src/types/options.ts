/**
 * Configuration options for provcat
 *
 * All options are optional with conservative defaults. Catalog loading,
 * composition, validation and template generation read the same resolved
 * object, so one `resolveOptions()` call configures a whole session.
 */

import type { DiagnosticEnvelope } from '../diag/envelope.js';
import { ConfigurationError } from './errors.js';

/**
 * Composition cache configuration
 */
export interface CacheOptions {
  /** LRU capacity for composite schemas; 0 disables caching (default: 64) */
  compositionSize?: number;
}

/**
 * Schema composition configuration
 */
export interface CompositionOptions {
  /**
   * Throw IncompatibleRedefinition when a later fragment redefines a
   * property with a disjoint type set, instead of recording a note
   * (default: false)
   */
  strictTypes?: boolean;
}

/**
 * Document validation configuration
 */
export interface ValidationOptions {
  /** Accept decimal/hex strings for number-typed properties (default: true) */
  numericStrings?: boolean;
  /** Maximum nesting depth inspected inside a document (default: 32) */
  maxDepth?: number;
}

/**
 * Template generation configuration
 */
export interface TemplateOptions {
  /**
   * Derive a value from enum/type for required properties that declare
   * neither a template value nor a default (default: true)
   */
  synthesizeRequired?: boolean;
  /** Upper bound on rule-satisfaction passes (default: 8) */
  maxRulePasses?: number;
}

export type LogLevel = 'silent' | 'warn' | 'info';

/**
 * Logging configuration
 */
export interface LoggingOptions {
  /** Minimum severity forwarded to the sink (default: 'warn') */
  level?: LogLevel;
  /**
   * Sink for warnings; when omitted, each diagnostic code is printed once
   * per process with console.warn
   */
  onWarning?: (diagnostic: DiagnosticEnvelope) => void;
}

export interface CoreOptions {
  cache?: CacheOptions;
  composition?: CompositionOptions;
  validation?: ValidationOptions;
  template?: TemplateOptions;
  logging?: LoggingOptions;
  /** Enable metrics collection (default: true) */
  metrics?: boolean;
}

/**
 * Resolved configuration with all defaults applied
 */
export interface ResolvedOptions {
  cache: Required<CacheOptions>;
  composition: Required<CompositionOptions>;
  validation: Required<ValidationOptions>;
  template: Required<TemplateOptions>;
  logging: Required<Omit<LoggingOptions, 'onWarning'>> &
    Pick<LoggingOptions, 'onWarning'>;
  metrics: boolean;
}

export const DEFAULT_OPTIONS: ResolvedOptions = {
  cache: {
    compositionSize: 64,
  },
  composition: {
    strictTypes: false,
  },
  validation: {
    numericStrings: true,
    maxDepth: 32,
  },
  template: {
    synthesizeRequired: true,
    maxRulePasses: 8,
  },
  logging: {
    level: 'warn',
  },
  metrics: true,
};

const LOG_LEVELS: readonly LogLevel[] = ['silent', 'warn', 'info'];

/**
 * Resolves partial user options into complete configuration
 *
 * @throws {ConfigurationError} When invalid option combinations are detected
 */
export function resolveOptions(
  userOptions: CoreOptions | ResolvedOptions = {}
): ResolvedOptions {
  const resolved: ResolvedOptions = {
    ...DEFAULT_OPTIONS,
    ...userOptions,

    // Deep merge nested objects
    cache: { ...DEFAULT_OPTIONS.cache, ...userOptions.cache },
    composition: {
      ...DEFAULT_OPTIONS.composition,
      ...userOptions.composition,
    },
    validation: { ...DEFAULT_OPTIONS.validation, ...userOptions.validation },
    template: { ...DEFAULT_OPTIONS.template, ...userOptions.template },
    logging: { ...DEFAULT_OPTIONS.logging, ...userOptions.logging },
    metrics: userOptions.metrics ?? DEFAULT_OPTIONS.metrics,
  };

  validateOptions(resolved);
  return resolved;
}

function validateOptions(options: ResolvedOptions): void {
  const { compositionSize } = options.cache;
  if (!Number.isInteger(compositionSize) || compositionSize < 0) {
    throw new ConfigurationError(
      'cache.compositionSize must be a non-negative integer',
      { value: compositionSize }
    );
  }
  if (!Number.isInteger(options.validation.maxDepth)) {
    throw new ConfigurationError('validation.maxDepth must be an integer', {
      value: options.validation.maxDepth,
    });
  }
  if (options.validation.maxDepth < 1) {
    throw new ConfigurationError('validation.maxDepth must be positive', {
      value: options.validation.maxDepth,
    });
  }
  if (
    !Number.isInteger(options.template.maxRulePasses) ||
    options.template.maxRulePasses < 1
  ) {
    throw new ConfigurationError(
      'template.maxRulePasses must be a positive integer',
      { value: options.template.maxRulePasses }
    );
  }
  if (!LOG_LEVELS.includes(options.logging.level)) {
    throw new ConfigurationError(
      `logging.level must be one of ${LOG_LEVELS.join(', ')}`,
      { value: options.logging.level }
    );
  }
}
