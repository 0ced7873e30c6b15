/**
 * Schema Composition Engine.
 *
 * Folds an ordered list of fragments into one CompositeSchema:
 * - properties: union, a later definition replaces an earlier one as a unit
 *   and leaves a composition note;
 * - required: union in first-seen order;
 * - rules: concatenated in fragment order, never evaluated here.
 *
 * Results depend only on the catalog snapshot and the name tuple, so they are
 * cached by catalog fingerprint plus names.
 */

import type { Catalog } from '../catalog/catalog.js';
import { DIAGNOSTIC_CODES } from '../diag/codes.js';
import {
  createDiagnostic,
  createDiagnosticSink,
  type DiagnosticSink,
} from '../diag/envelope.js';
import { familyFragmentName } from '../lookup/feature-index.js';
import type { DeviceProfile } from '../types/device.js';
import { SchemaError } from '../types/errors.js';
import {
  resolveOptions,
  type CoreOptions,
  type ResolvedOptions,
} from '../types/options.js';
import type {
  CompositeSchema,
  CompositionNote,
  ConditionalRule,
  PropertySpec,
  SchemaFragment,
  SemanticType,
} from '../types/schema.js';
import { deepFreeze } from '../util/deep-freeze.js';
import { LRUCache } from '../util/lru-cache.js';
import { MetricsCollector } from '../util/metrics.js';

export interface ComposeOptions {
  options?: CoreOptions | ResolvedOptions;
  metrics?: MetricsCollector;
  /** Receives composition notes as diagnostics; defaults to the logging sink */
  sink?: DiagnosticSink;
}

function typesOverlap(a: SemanticType, b: SemanticType): boolean {
  if (a === b) return true;
  const numeric = new Set<SemanticType>(['number', 'integer']);
  return numeric.has(a) && numeric.has(b);
}

/** Two declarations are compatible unless both declare types and none overlap */
export function typesCompatible(
  previous: readonly SemanticType[],
  next: readonly SemanticType[]
): boolean {
  if (previous.length === 0 || next.length === 0) return true;
  return previous.some((a) => next.some((b) => typesOverlap(a, b)));
}

export function compositionKey(fingerprint: string, names: readonly string[]): string {
  return `${fingerprint}:${JSON.stringify(names)}`;
}

function lookupFragments(catalog: Catalog, names: readonly string[]): SchemaFragment[] {
  const found: SchemaFragment[] = [];
  const missing: string[] = [];
  for (const name of names) {
    const fragment = catalog.getFragment(name);
    if (fragment) found.push(fragment);
    else missing.push(name);
  }
  if (missing.length > 0) {
    throw new SchemaError({
      kind: 'UnknownSchemaFragment',
      message: `Unknown schema fragment${missing.length > 1 ? 's' : ''}: ${missing
        .map((name) => `'${name}'`)
        .join(', ')}`,
      context: { fragment: missing[0], missing },
    });
  }
  return found;
}

/**
 * Merge fragments left to right. Uncached; prefer SchemaComposer.compose.
 *
 * @throws SchemaError UnknownSchemaFragment, or IncompatibleRedefinition
 *   when `composition.strictTypes` is set
 */
export function composeFragments(
  catalog: Catalog,
  names: readonly string[],
  options: ResolvedOptions
): CompositeSchema {
  const fragments = lookupFragments(catalog, names);

  const properties: Record<string, PropertySpec> = {};
  const origins: Record<string, string> = {};
  const required = new Set<string>();
  const rules: ConditionalRule[] = [];
  const notes: CompositionNote[] = [];

  for (const fragment of fragments) {
    for (const [name, spec] of Object.entries(fragment.properties)) {
      const previous = properties[name];
      const previousFragment = origins[name];
      if (previous !== undefined && previousFragment !== undefined) {
        if (typesCompatible(previous.types, spec.types)) {
          notes.push({
            code: DIAGNOSTIC_CODES.PROPERTY_OVERRIDDEN,
            severity: 'info',
            property: name,
            fragment: fragment.name,
            previousFragment,
            message: `Property '${name}' from '${previousFragment}' replaced by '${fragment.name}'`,
          });
        } else {
          const message =
            `Property '${name}' redefined by '${fragment.name}' as ` +
            `${spec.types.join('|')}, incompatible with ${previous.types.join('|')} ` +
            `from '${previousFragment}'`;
          if (options.composition.strictTypes) {
            throw new SchemaError({
              kind: 'IncompatibleRedefinition',
              message,
              context: { fragment: fragment.name, path: `/${name}`, previousFragment },
            });
          }
          notes.push({
            code: DIAGNOSTIC_CODES.PROPERTY_TYPE_CONFLICT,
            severity: 'error',
            property: name,
            fragment: fragment.name,
            previousFragment,
            message,
          });
        }
      }
      properties[name] = spec;
      origins[name] = fragment.name;
    }
    for (const name of fragment.required) required.add(name);
    rules.push(...fragment.rules);
  }

  const last = fragments[fragments.length - 1];
  return deepFreeze({
    key: compositionKey(catalog.fingerprint, names),
    fragments: [...names],
    title: last?.title ?? '',
    properties,
    origins,
    required: [...required],
    rules,
    notes,
  });
}

/**
 * Stateful front of the engine: owns the composition cache and routes notes
 * to diagnostics. One instance per catalog.
 */
export class SchemaComposer {
  private readonly options: ResolvedOptions;
  private readonly metrics: MetricsCollector;
  private readonly sink: DiagnosticSink;
  private readonly cache: LRUCache<string, CompositeSchema>;

  constructor(
    private readonly catalog: Catalog,
    composeOptions: ComposeOptions = {}
  ) {
    this.options = resolveOptions(composeOptions.options);
    this.metrics =
      composeOptions.metrics ?? new MetricsCollector({ enabled: this.options.metrics });
    this.sink = composeOptions.sink ?? createDiagnosticSink(this.options.logging);
    this.cache = new LRUCache(this.options.cache.compositionSize);
  }

  compose(names: readonly string[]): CompositeSchema {
    return this.metrics.time('COMPOSE', () => {
      const key = compositionKey(this.catalog.fingerprint, names);
      const cached = this.cache.get(key);
      this.metrics.recordCacheLookup(cached !== undefined);
      if (cached) return cached;

      const schema = composeFragments(this.catalog, names, this.options);
      for (const note of schema.notes) {
        this.sink(
          createDiagnostic(
            note.code,
            note.severity,
            `/${note.property}`,
            note.message,
            { fragment: note.fragment, previousFragment: note.previousFragment }
          )
        );
      }
      return this.cache.setIfAbsent(key, schema);
    });
  }

  /** Fragment names for an artifact of a resolved profile, the device's family fragment first */
  fragmentsForDevice(profile: DeviceProfile, artifact: string): string[] {
    const { features } = this.catalog;
    for (const [feature, params] of Object.entries(profile.features)) {
      const names = features.fragmentsFor(feature, artifact, params);
      if (names !== undefined) {
        return [familyFragmentName(feature, profile.requestedId), ...names];
      }
    }
    const available = Object.keys(profile.features).flatMap((feature) =>
      features.artifactsOf(feature)
    );
    throw new SchemaError({
      kind: 'UnknownArtifact',
      message:
        `Device '${profile.requestedId}' has no feature producing artifact '${artifact}'` +
        (available.length > 0 ? `; available: ${available.join(', ')}` : ''),
      context: { deviceId: profile.requestedId, artifact, available },
    });
  }

  /**
   * @throws SchemaError UnknownArtifact when no enabled feature binds it
   */
  composeForDevice(profile: DeviceProfile, artifact: string): CompositeSchema {
    return this.compose(this.fragmentsForDevice(profile, artifact));
  }

  clearCache(): void {
    this.cache.clear();
  }

  get cacheSize(): number {
    return this.cache.size;
  }
}
