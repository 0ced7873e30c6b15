/**
 * Revision overlay: one named diff applied on top of a profile's base body.
 *
 * Keys present in the revision win; nothing below the first level is merged,
 * except memory-map entries, which are merged field by field so a revision
 * can move or resize a region without restating it.
 */

import type { JsonObject } from '../types/device.js';
import type { DevicePatch, RegionPatch } from '../catalog/device-parser.js';

function overlayRegion(base: RegionPatch | undefined, overlay: RegionPatch): RegionPatch {
  return base === undefined ? overlay : { ...base, ...overlay };
}

export function applyRevision(base: DevicePatch, revision: DevicePatch): DevicePatch {
  const info: JsonObject = { ...base.info, ...revision.info };

  const memoryMap: Record<string, RegionPatch> = { ...base.memoryMap };
  for (const [name, region] of Object.entries(revision.memoryMap)) {
    memoryMap[name] = overlayRegion(base.memoryMap[name], region);
  }

  const features: Record<string, JsonObject> = { ...base.features };
  for (const [name, params] of Object.entries(revision.features)) {
    features[name] = params;
  }

  return { info, memoryMap, features };
}
