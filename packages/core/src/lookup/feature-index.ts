/**
 * Feature name -> artifact -> ordered schema fragment names.
 *
 * Bindings come from the catalog's `features.json`; a device may replace an
 * artifact's list through its feature parameters:
 *   "features": { "iee": { "schemas": { "iee": ["iee_output", ...] } } }
 */

import type { FeatureParams } from '../types/device.js';
import { CatalogError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import { isPlainObject, isStringArray } from '../util/guards.js';
import { checkCatalogShape } from '../catalog/shape-check.js';

export type FeatureBindings = ReadonlyMap<
  string,
  ReadonlyMap<string, readonly string[]>
>;

/**
 * Name of the synthesized family/revision fragment for a feature, or for one
 * device when `deviceId` is given.
 */
export function familyFragmentName(feature: string, deviceId?: string): string {
  return deviceId === undefined ? `family:${feature}` : `family:${feature}:${deviceId}`;
}

export function parseFeatureBindings(
  document: unknown
): Result<FeatureBindings, CatalogError> {
  const issues = checkCatalogShape('features', document);
  if (issues.length > 0 || !isPlainObject(document)) {
    return err(
      new CatalogError({
        message: 'Feature bindings do not match the expected document shape',
        issues,
      })
    );
  }
  const bindings = new Map<string, Map<string, readonly string[]>>();
  for (const [feature, entry] of Object.entries(document)) {
    if (!isPlainObject(entry) || !isPlainObject(entry.artifacts)) continue;
    const artifacts = new Map<string, readonly string[]>();
    for (const [artifact, names] of Object.entries(entry.artifacts)) {
      if (isStringArray(names)) artifacts.set(artifact, [...names]);
    }
    bindings.set(feature, artifacts);
  }
  return ok(bindings);
}

export class FeatureIndex {
  constructor(private readonly bindings: FeatureBindings) {}

  features(): string[] {
    return [...this.bindings.keys()];
  }

  artifactsOf(feature: string): string[] {
    return [...(this.bindings.get(feature)?.keys() ?? [])];
  }

  /**
   * Fragment names for one artifact of a feature, honouring a device's
   * `schemas` override. Undefined when the feature does not bind the artifact.
   */
  fragmentsFor(
    feature: string,
    artifact: string,
    params: FeatureParams = {}
  ): readonly string[] | undefined {
    const bound = this.bindings.get(feature)?.get(artifact);
    if (bound === undefined) return undefined;
    const overrides = params.schemas;
    if (isPlainObject(overrides)) {
      const override = overrides[artifact];
      if (isStringArray(override)) return override;
    }
    return bound;
  }

  /** Every fragment name referenced by the bindings, in first-seen order */
  referencedFragments(): string[] {
    const names = new Set<string>();
    for (const artifacts of this.bindings.values()) {
      for (const list of artifacts.values()) {
        for (const name of list) names.add(name);
      }
    }
    return [...names];
  }
}
