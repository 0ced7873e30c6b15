/**
 * Device Profile Registry.
 *
 * Every revision of every profile is resolved when the registry is built, so
 * structural problems surface at load time as per-profile failures instead of
 * aborting the catalog. `resolve()` afterwards only looks up frozen results.
 */

import {
  LATEST_REVISION,
  type DeviceInfo,
  type DeviceProfile,
  type JsonObject,
} from '../types/device.js';
import {
  DeviceProfileError,
  ProvcatError,
} from '../types/errors.js';
import type {
  DeviceDefinition,
  DevicePatch,
  ProfileDefinition,
} from '../catalog/device-parser.js';
import { AliasIndex, foldName } from '../lookup/alias-index.js';
import { deepFreeze } from '../util/deep-freeze.js';
import { resolveMemoryMap } from './memory-map.js';
import { applyRevision } from './revision-overlay.js';

export interface DeviceLoadFailure {
  readonly id: string;
  readonly error: ProvcatError;
}

type RevisionView = Omit<DeviceProfile, 'requestedId' | 'aliasChain'>;

interface ResolvedDevice {
  readonly id: string;
  readonly latest: string;
  readonly revisions: ReadonlyMap<string, RevisionView>;
}

function buildInfo(info: Readonly<JsonObject>): DeviceInfo {
  const { purpose, web, use_in_doc: useInDoc, ...extra } = info;
  const result: { -readonly [K in keyof DeviceInfo]: DeviceInfo[K] } = {
    useInDoc: useInDoc === true,
    extra,
  };
  if (typeof purpose === 'string') result.purpose = purpose;
  if (typeof web === 'string') result.web = web;
  return result;
}

function resolveRevision(
  definition: ProfileDefinition,
  revision: string,
  overlay: DevicePatch
): RevisionView {
  const body = applyRevision(definition.base, overlay);
  return {
    id: definition.id,
    revision,
    revisions: Object.keys(definition.revisions),
    latest: definition.latest,
    info: buildInfo(body.info),
    memoryMap: resolveMemoryMap({ deviceId: definition.id, revision }, body.memoryMap),
    features: body.features,
  };
}

function resolveDefinition(definition: ProfileDefinition): ResolvedDevice {
  const revisions = new Map<string, RevisionView>();
  for (const [name, overlay] of Object.entries(definition.revisions)) {
    revisions.set(name, resolveRevision(definition, name, overlay));
  }
  return { id: definition.id, latest: definition.latest, revisions };
}

export class DeviceRegistry {
  private readonly aliases: AliasIndex;
  private readonly devices = new Map<string, ResolvedDevice>();
  private readonly failed = new Map<string, DeviceLoadFailure>();
  private readonly profiles = new Map<string, DeviceProfile>();

  /**
   * @param definitions parsed device documents
   * @param earlierFailures devices that already failed to parse; they stay
   *   resolvable by name so callers get the load error as `cause`
   */
  constructor(
    definitions: readonly DeviceDefinition[],
    earlierFailures: readonly DeviceLoadFailure[] = []
  ) {
    this.aliases = new AliasIndex([
      ...definitions.map((definition) =>
        definition.kind === 'alias'
          ? { id: definition.id, target: definition.target }
          : { id: definition.id }
      ),
      ...earlierFailures.map((failure) => ({ id: failure.id })),
    ]);
    for (const failure of earlierFailures) {
      this.failed.set(foldName(failure.id), failure);
    }

    for (const definition of definitions) {
      if (definition.kind !== 'profile') continue;
      try {
        this.devices.set(foldName(definition.id), resolveDefinition(definition));
      } catch (error) {
        if (!(error instanceof ProvcatError)) throw error;
        this.failed.set(foldName(definition.id), { id: definition.id, error });
      }
    }
    for (const broken of this.aliases.brokenAliases()) {
      this.failed.set(foldName(broken.id), broken);
    }
  }

  /** Profiles and aliases that could not be loaded, in name order */
  get loadFailures(): DeviceLoadFailure[] {
    return [...this.failed.values()].sort((a, b) => a.id.localeCompare(b.id));
  }

  get aliasIndex(): AliasIndex {
    return this.aliases;
  }

  /**
   * Resolve a device (following aliases) and revision into a frozen profile.
   *
   * @throws DeviceProfileError UnknownDevice, AliasCycle or UnknownRevision
   */
  resolve(deviceId: string, revision?: string): DeviceProfile {
    const { id, chain } = this.aliases.follow(deviceId);
    const requestedId = chain[0] ?? id;

    const failure = this.failed.get(foldName(requestedId)) ?? this.failed.get(foldName(id));
    if (failure) {
      if (failure.error instanceof DeviceProfileError && failure.error.kind === 'AliasCycle') {
        throw failure.error;
      }
      throw new DeviceProfileError({
        kind: 'UnknownDevice',
        message: `Device '${deviceId}' failed to load: ${failure.error.message}`,
        context: { deviceId, aliasChain: [...chain] },
        cause: failure.error,
      });
    }

    const device = this.devices.get(foldName(id));
    if (!device) {
      throw new DeviceProfileError({
        kind: 'UnknownDevice',
        message: `Unknown device '${deviceId}'`,
        context: { deviceId },
      });
    }

    const revisionName =
      revision === undefined || revision === LATEST_REVISION ? device.latest : revision;
    const view = device.revisions.get(revisionName);
    if (!view) {
      throw new DeviceProfileError({
        kind: 'UnknownRevision',
        message:
          `Unknown revision '${revisionName}' for device '${device.id}'; ` +
          `available: ${[...device.revisions.keys()].join(', ')}`,
        context: { deviceId: device.id, revision: revisionName },
      });
    }

    const key = `${foldName(requestedId)}\u0000${revisionName}`;
    const cached = this.profiles.get(key);
    if (cached) return cached;
    const profile: DeviceProfile = deepFreeze({
      ...view,
      requestedId,
      aliasChain: chain,
    });
    this.profiles.set(key, profile);
    return profile;
  }

  /** True when the name resolves to a loaded profile */
  isLoadable(deviceId: string): boolean {
    const resolution = this.aliases.tryFollow(deviceId);
    return (
      resolution !== undefined &&
      !this.failed.has(foldName(deviceId)) &&
      this.devices.has(foldName(resolution.id))
    );
  }

  /**
   * Loadable device names, sorted. Aliases are included unless
   * `includeAliases` is false.
   */
  listDevices(options: { includeAliases?: boolean } = {}): string[] {
    const includeAliases = options.includeAliases ?? true;
    const names: string[] = [];
    for (const device of this.devices.values()) {
      names.push(device.id);
      if (includeAliases) {
        names.push(
          ...this.aliases.aliasesOf(device.id).filter((alias) => this.isLoadable(alias))
        );
      }
    }
    return names.sort();
  }

  /**
   * Devices whose latest revision enables `feature`, aliases included.
   */
  devicesWithFeature(feature: string): string[] {
    const names: string[] = [];
    for (const device of this.devices.values()) {
      const latest = device.revisions.get(device.latest);
      if (!latest || !Object.prototype.hasOwnProperty.call(latest.features, feature)) {
        continue;
      }
      names.push(device.id);
      names.push(
        ...this.aliases.aliasesOf(device.id).filter((alias) => this.isLoadable(alias))
      );
    }
    return names.sort();
  }

  /** Union of revision names across loadable profiles, sorted */
  revisionNames(): string[] {
    const names = new Set<string>();
    for (const device of this.devices.values()) {
      for (const name of device.revisions.keys()) names.add(name);
    }
    return [...names].sort();
  }
}
