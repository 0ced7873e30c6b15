/**
 * Read-only queries over a resolved profile, used by image builders to look
 * up effective address ranges and advisory warning ranges. Nothing here
 * checks runtime addresses against warning ranges.
 */

import type {
  DeviceProfile,
  JsonValue,
  MemoryRegion,
  WarningRange,
} from '../types/device.js';
import { parseUnsigned } from '../util/number.js';

export interface EffectiveRange {
  readonly region: string;
  readonly start: bigint;
  readonly size: bigint;
  readonly end: bigint;
  readonly external: boolean;
}

export function effectiveRange(
  profile: DeviceProfile,
  regionName: string
): EffectiveRange | undefined {
  if (!Object.prototype.hasOwnProperty.call(profile.memoryMap, regionName)) return undefined;
  const region = profile.memoryMap[regionName];
  if (region === undefined) return undefined;
  return {
    region: region.name,
    start: region.start,
    size: region.size,
    end: region.end,
    external: region.external,
  };
}

/**
 * Regions containing `address`, in declaration order. Mirrors are listed
 * alongside the region they alias.
 */
export function regionAt(
  profile: DeviceProfile,
  address: bigint | number | string
): MemoryRegion[] {
  const value = parseUnsigned(address);
  if (value === undefined) return [];
  return Object.values(profile.memoryMap).filter(
    (region) => value >= region.start && value < region.end
  );
}

export interface RegionWarning {
  readonly region: string;
  readonly range: WarningRange;
}

export function warningRanges(profile: DeviceProfile): RegionWarning[] {
  const result: RegionWarning[] = [];
  for (const region of Object.values(profile.memoryMap)) {
    for (const range of region.warningRanges) {
      result.push({ region: region.name, range });
    }
  }
  return result;
}

/**
 * Parameter `key` of an enabled feature; `fallback` when the feature is
 * disabled or does not declare the key.
 */
export function getFeatureValue(
  profile: DeviceProfile,
  feature: string,
  key: string,
  fallback?: JsonValue
): JsonValue | undefined {
  if (!hasFeature(profile, feature)) return fallback;
  const params = profile.features[feature];
  if (params === undefined || !Object.prototype.hasOwnProperty.call(params, key)) {
    return fallback;
  }
  return params[key];
}

export function hasFeature(profile: DeviceProfile, feature: string): boolean {
  return Object.prototype.hasOwnProperty.call(profile.features, feature);
}
