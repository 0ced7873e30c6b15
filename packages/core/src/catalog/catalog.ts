/**
 * Immutable catalog of device profiles, schema fragments and feature
 * bindings, built once from raw documents.
 *
 * Loading never aborts on a single bad entry: a device, schema group or
 * fragment that fails is listed in `loadFailures` and the rest loads.
 */

import { DIAGNOSTIC_CODES } from '../diag/codes.js';
import {
  createDiagnostic,
  createDiagnosticSink,
  type DiagnosticEnvelope,
} from '../diag/envelope.js';
import {
  familyFragmentName,
  FeatureIndex,
  parseFeatureBindings,
  type FeatureBindings,
} from '../lookup/feature-index.js';
import { DeviceRegistry } from '../registry/device-registry.js';
import { LATEST_REVISION } from '../types/device.js';
import { ProvcatError } from '../types/errors.js';
import {
  resolveOptions,
  type CoreOptions,
  type ResolvedOptions,
} from '../types/options.js';
import { isErr } from '../types/result.js';
import type { PropertySpec, SchemaFragment } from '../types/schema.js';
import { deepFreeze } from '../util/deep-freeze.js';
import { MetricsCollector } from '../util/metrics.js';
import { stableHash } from '../util/stable-hash.js';
import type { DeviceDefinition } from './device-parser.js';
import { parseDeviceDocument } from './device-parser.js';
import { parseSchemaGroup } from './fragment-parser.js';

/** Raw catalog documents, keyed by device id and schema group name */
export interface CatalogSource {
  readonly devices: Readonly<Record<string, unknown>>;
  readonly schemas: Readonly<Record<string, unknown>>;
  readonly features?: unknown;
  /** Files that could not be read, reported as load failures */
  readonly readFailures?: readonly LoadFailure[];
}

export type LoadFailureKind = 'device' | 'schema' | 'features';

export interface LoadFailure {
  readonly kind: LoadFailureKind;
  /** Device id, `group` or `group#fragment`, or `features` */
  readonly id: string;
  readonly error: ProvcatError;
}

export interface LoadCatalogOptions {
  options?: CoreOptions | ResolvedOptions;
  metrics?: MetricsCollector;
}

export class Catalog {
  constructor(
    readonly fingerprint: string,
    readonly devices: DeviceRegistry,
    readonly features: FeatureIndex,
    private readonly fragments: ReadonlyMap<string, SchemaFragment>,
    readonly loadFailures: readonly LoadFailure[],
    readonly diagnostics: readonly DiagnosticEnvelope[],
    private readonly deviceFamilies: ReadonlyMap<string, SchemaFragment> = new Map()
  ) {}

  /** Declared fragment, feature family fragment or `family:<feature>:<device>` */
  getFragment(name: string): SchemaFragment | undefined {
    return this.fragments.get(name) ?? this.deviceFamilies.get(name);
  }

  hasFragment(name: string): boolean {
    return this.fragments.has(name) || this.deviceFamilies.has(name);
  }

  /** Declared and feature family fragments; per-device family fragments are left out */
  fragmentNames(): string[] {
    return [...this.fragments.keys()].sort();
  }
}

function sortedEntries(record: Readonly<Record<string, unknown>>): Array<[string, unknown]> {
  return Object.entries(record).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

interface FamilySelection {
  readonly name: string;
  readonly feature: string;
  readonly devices: readonly string[];
  readonly revisions: readonly string[];
  readonly requestedId?: string;
}

function familyFragment(selection: FamilySelection): SchemaFragment {
  const { feature, devices, requestedId } = selection;
  const family: PropertySpec = {
    name: 'family',
    types: ['string'],
    title: 'MCU family',
    description: `Device the ${feature} configuration targets`,
    skipInTemplate: false,
    ...(devices.length > 0 ? { enum: [...devices] } : {}),
    ...(requestedId !== undefined ? { templateValue: requestedId } : {}),
  };
  const revision: PropertySpec = {
    name: 'revision',
    types: ['string'],
    title: 'MCU revision',
    description: 'Chip revision; `latest` selects the newest one',
    enum: [...selection.revisions, LATEST_REVISION],
    templateValue: LATEST_REVISION,
    skipInTemplate: false,
  };
  return {
    name: selection.name,
    title: `${feature} family selection`,
    group: 'family',
    properties: { family, revision },
    required: ['family'],
    rules: [],
  };
}

/**
 * One family fragment per loadable device name and bound feature. `family`
 * accepts the names that resolve to the same profile and defaults to the
 * requested one; `revision` lists only that profile's revisions.
 */
function deviceFamilyFragments(
  registry: DeviceRegistry,
  features: FeatureIndex
): Map<string, SchemaFragment> {
  const bound = new Set(features.features());
  const result = new Map<string, SchemaFragment>();
  for (const deviceId of registry.listDevices()) {
    const profile = registry.resolve(deviceId);
    const enabled = new Set<string>();
    for (const revision of profile.revisions) {
      for (const feature of Object.keys(registry.resolve(deviceId, revision).features)) {
        if (bound.has(feature)) enabled.add(feature);
      }
    }
    const names = [
      profile.id,
      ...registry.aliasIndex.aliasesOf(profile.id).filter((alias) => registry.isLoadable(alias)),
    ].sort();
    for (const feature of enabled) {
      const name = familyFragmentName(feature, profile.requestedId);
      result.set(
        name,
        deepFreeze(
          familyFragment({
            name,
            feature,
            devices: names,
            revisions: profile.revisions,
            requestedId: profile.requestedId,
          })
        )
      );
    }
  }
  return result;
}

/**
 * Build a catalog from raw documents.
 *
 * Devices and groups are processed in name order so the result does not
 * depend on how the caller enumerated its input.
 */
export function loadCatalog(
  source: CatalogSource,
  loadOptions: LoadCatalogOptions = {}
): Catalog {
  const options = resolveOptions(loadOptions.options);
  const metrics = loadOptions.metrics ?? new MetricsCollector({ enabled: options.metrics });
  return metrics.time('LOAD', () => buildCatalog(source, options));
}

function buildCatalog(source: CatalogSource, options: ResolvedOptions): Catalog {
  const sink = createDiagnosticSink(options.logging);
  const diagnostics: DiagnosticEnvelope[] = [];
  const failures: LoadFailure[] = [];
  const note = (envelope: DiagnosticEnvelope): void => {
    diagnostics.push(envelope);
    sink(envelope);
  };
  const fail = (kind: LoadFailureKind, id: string, error: ProvcatError): void => {
    failures.push({ kind, id, error });
    const code =
      kind === 'device'
        ? DIAGNOSTIC_CODES.DEVICE_LOAD_FAILED
        : kind === 'schema'
          ? DIAGNOSTIC_CODES.SCHEMA_GROUP_LOAD_FAILED
          : DIAGNOSTIC_CODES.FEATURE_BINDINGS_LOAD_FAILED;
    note(
      createDiagnostic(code, 'warn', id, error.message, {
        errorCode: error.errorCode,
        kind: error.kind,
      })
    );
  };

  for (const failure of source.readFailures ?? []) {
    fail(failure.kind, failure.id, failure.error);
  }

  // Devices
  const definitions: DeviceDefinition[] = [];
  const parseFailures: Array<{ id: string; error: ProvcatError }> = [];
  for (const [id, document] of sortedEntries(source.devices)) {
    const parsed = parseDeviceDocument(id, document);
    if (isErr(parsed)) {
      parseFailures.push({ id, error: parsed.error });
      continue;
    }
    const definition = parsed.value;
    if (definition.kind === 'alias' && definition.shadowsDefinition) {
      note(
        createDiagnostic(
          DIAGNOSTIC_CODES.ALIAS_SHADOWS_DEFINITION,
          'info',
          id,
          `Device '${id}' is an alias of '${definition.target}'; its other keys are ignored`,
          { target: definition.target }
        )
      );
    }
    definitions.push(definition);
  }
  const registry = new DeviceRegistry(definitions, parseFailures);
  for (const failure of registry.loadFailures) {
    if (failure.error.kind === 'AliasCycle') {
      note(
        createDiagnostic(DIAGNOSTIC_CODES.ALIAS_CYCLE, 'warn', failure.id, failure.error.message)
      );
    }
    fail('device', failure.id, failure.error);
  }

  // Schema fragments
  const fragments = new Map<string, SchemaFragment>();
  for (const [group, document] of sortedEntries(source.schemas)) {
    const parsed = parseSchemaGroup(group, document);
    if (parsed instanceof ProvcatError) {
      fail('schema', group, parsed);
      continue;
    }
    for (const { name, result } of parsed) {
      if (isErr(result)) {
        fail('schema', `${group}#${name}`, result.error);
        continue;
      }
      const existing = fragments.get(name);
      if (existing) {
        note(
          createDiagnostic(
            DIAGNOSTIC_CODES.DUPLICATE_FRAGMENT,
            'warn',
            `${group}#${name}`,
            `Fragment '${name}' from '${group}' ignored; already declared in '${existing.group}'`,
            { keptGroup: existing.group }
          )
        );
        continue;
      }
      fragments.set(name, result.value);
    }
  }

  // Feature bindings
  let bindings: FeatureBindings = new Map();
  if (source.features !== undefined) {
    const parsed = parseFeatureBindings(source.features);
    if (isErr(parsed)) {
      fail('features', 'features', parsed.error);
    } else {
      bindings = parsed.value;
    }
  }
  const features = new FeatureIndex(bindings);
  for (const feature of features.features()) {
    const family = familyFragment({
      name: familyFragmentName(feature),
      feature,
      devices: registry.devicesWithFeature(feature),
      revisions: registry.revisionNames(),
    });
    fragments.set(family.name, family);
  }

  const referenced = new Set(features.referencedFragments());
  for (const deviceId of registry.listDevices({ includeAliases: false })) {
    const profile = registry.resolve(deviceId);
    for (const [feature, params] of Object.entries(profile.features)) {
      for (const artifact of features.artifactsOf(feature)) {
        for (const name of features.fragmentsFor(feature, artifact, params) ?? []) {
          referenced.add(name);
        }
      }
    }
  }
  for (const name of referenced) {
    if (!fragments.has(name)) {
      note(
        createDiagnostic(
          DIAGNOSTIC_CODES.FEATURE_FRAGMENT_MISSING,
          'warn',
          name,
          `Feature bindings reference unknown schema fragment '${name}'`
        )
      );
    }
  }

  for (const fragment of fragments.values()) deepFreeze(fragment);

  return new Catalog(
    stableHash({
      devices: source.devices,
      schemas: source.schemas,
      features: source.features ?? null,
    }),
    registry,
    features,
    fragments,
    Object.freeze([...failures]),
    deepFreeze(diagnostics),
    deviceFamilyFragments(registry, features)
  );
}
