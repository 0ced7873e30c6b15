// @provcat/core entry point
//
// Public API:
// - ProvisioningCore / createProvisioningCore bind a catalog snapshot and one
//   option set, exposing resolve, compose, composeForDevice, validate and
//   generateTemplate.
// - Catalog loading (in-memory, directory, bundled data) and the building
//   blocks behind the facade for callers that wire their own pipeline.

export * from './api.js';

// Catalog
export {
  Catalog,
  loadCatalog,
  type CatalogSource,
  type LoadCatalogOptions,
  type LoadFailure,
  type LoadFailureKind,
} from './catalog/catalog.js';
export {
  bundledCatalogDir,
  loadBundledCatalog,
  loadCatalogFromDirectory,
  readCatalogSource,
} from './catalog/loader.js';

// Device Profile Registry
export { DeviceRegistry, type DeviceLoadFailure } from './registry/device-registry.js';
export {
  effectiveRange,
  getFeatureValue,
  hasFeature,
  regionAt,
  warningRanges,
  type EffectiveRange,
  type RegionWarning,
} from './registry/profile-queries.js';

// Lookup
export { AliasIndex, foldName, type AliasResolution } from './lookup/alias-index.js';
export { FeatureIndex, familyFragmentName, type FeatureBindings } from './lookup/feature-index.js';

// Composition, validation, templates
export {
  SchemaComposer,
  composeFragments,
  compositionKey,
  typesCompatible,
  type ComposeOptions,
} from './transform/composition-engine.js';
export { validate } from './validator/config-validator.js';
export { generateTemplate, type TemplateOptions } from './generator/template-generator.js';

// Types
export * from './types/device.js';
export * from './types/schema.js';
export * from './types/validation.js';
export {
  ProvcatError,
  DeviceProfileError,
  SchemaError,
  CatalogError,
  ConfigurationError,
  isProvcatError,
  isDeviceProfileError,
  isSchemaError,
  type CatalogIssue,
  type DeviceErrorKind,
  type ErrorContext,
  type SchemaErrorKind,
  type SerializedError,
  type UserError,
} from './types/errors.js';
export {
  DEFAULT_OPTIONS,
  resolveOptions,
  type CoreOptions,
  type ResolvedOptions,
  type LogLevel,
} from './types/options.js';
export { ok, err, isOk, isErr, type Result } from './types/result.js';

// Errors and diagnostics
export {
  ErrorCode,
  getErrorCategory,
  getHttpStatus,
  type ErrorCategory,
  type Severity,
} from './errors/codes.js';
export { ErrorPresenter, type PresenterOptions } from './errors/presenter.js';
export {
  DIAGNOSTIC_CODES,
  DIAGNOSTIC_PHASES,
  type DiagnosticCode,
  type DiagnosticPhase,
} from './diag/codes.js';
export {
  createDiagnostic,
  createDiagnosticSink,
  type DiagnosticEnvelope,
  type DiagnosticSink,
} from './diag/envelope.js';
export { MetricsCollector, type MetricsSnapshot } from './util/metrics.js';
export { parseUnsigned, formatHex } from './util/number.js';
