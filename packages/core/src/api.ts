/**
 * Public facade: one object bound to a catalog snapshot and one resolved
 * option set, exposing the four operations external collaborators call.
 */

import type { Catalog } from './catalog/catalog.js';
import {
  createDiagnosticSink,
  type DiagnosticSink,
} from './diag/envelope.js';
import { generateTemplate } from './generator/template-generator.js';
import { SchemaComposer } from './transform/composition-engine.js';
import type { DeviceProfile } from './types/device.js';
import {
  resolveOptions,
  type CoreOptions,
  type ResolvedOptions,
} from './types/options.js';
import type { CompositeSchema, ConfigDocument } from './types/schema.js';
import type { ValidationResult } from './types/validation.js';
import { MetricsCollector, type MetricsSnapshot } from './util/metrics.js';
import { validate } from './validator/config-validator.js';

export interface ProvisioningCoreOptions extends CoreOptions {
  /** Shared collector; a private one is created when omitted */
  metricsCollector?: MetricsCollector;
}

export class ProvisioningCore {
  readonly options: ResolvedOptions;
  private readonly metrics: MetricsCollector;
  private readonly sink: DiagnosticSink;
  private readonly composer: SchemaComposer;

  constructor(
    readonly catalog: Catalog,
    options: ProvisioningCoreOptions = {}
  ) {
    const { metricsCollector, ...coreOptions } = options;
    this.options = resolveOptions(coreOptions);
    this.metrics =
      metricsCollector ?? new MetricsCollector({ enabled: this.options.metrics });
    this.sink = createDiagnosticSink(this.options.logging);
    this.composer = new SchemaComposer(catalog, {
      options: this.options,
      metrics: this.metrics,
      sink: this.sink,
    });
  }

  /**
   * @throws DeviceProfileError UnknownDevice, AliasCycle or UnknownRevision
   */
  resolve(deviceId: string, revision?: string): DeviceProfile {
    return this.metrics.time('RESOLVE', () => this.catalog.devices.resolve(deviceId, revision));
  }

  /**
   * @throws SchemaError UnknownSchemaFragment or IncompatibleRedefinition
   */
  compose(fragmentNames: readonly string[]): CompositeSchema {
    return this.composer.compose(fragmentNames);
  }

  /**
   * Composite schema for one artifact of a device, e.g. `iee` or `sb31`.
   *
   * @throws DeviceProfileError when the device cannot be resolved
   * @throws SchemaError UnknownArtifact when no enabled feature produces it
   */
  composeForDevice(deviceId: string, artifact: string, revision?: string): CompositeSchema {
    return this.composer.composeForDevice(this.resolve(deviceId, revision), artifact);
  }

  validate(document: unknown, schema: CompositeSchema): ValidationResult {
    const result = this.metrics.time('VALIDATE', () => validate(document, schema, this.options));
    this.metrics.recordValidation(result.violations.length);
    return result;
  }

  generateTemplate(schema: CompositeSchema, includeOptional = false): ConfigDocument {
    const document = this.metrics.time('TEMPLATE', () =>
      generateTemplate(schema, includeOptional, { options: this.options, sink: this.sink })
    );
    this.metrics.recordTemplate();
    return document;
  }

  metricsSnapshot(): MetricsSnapshot {
    return this.metrics.snapshotMetrics();
  }
}

export function createProvisioningCore(
  catalog: Catalog,
  options: ProvisioningCoreOptions = {}
): ProvisioningCore {
  return new ProvisioningCore(catalog, options);
}
