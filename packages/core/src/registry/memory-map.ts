/**
 * Memory-map resolution: mirror expansion and overlap validation.
 */

import type { MemoryMap, MemoryRegion } from '../types/device.js';
import { CatalogError, DeviceProfileError } from '../types/errors.js';
import type { RegionPatch } from '../catalog/device-parser.js';
import { formatHex } from '../util/number.js';

interface MemoryMapContext {
  readonly deviceId: string;
  readonly revision: string;
}

function regionError(
  ctx: MemoryMapContext,
  kind: 'MirrorSizeMismatch' | 'RegionOverlap' | 'DanglingMirror' | 'MirrorCycle',
  region: string,
  message: string,
  extra: Record<string, unknown> = {}
): DeviceProfileError {
  return new DeviceProfileError({
    kind,
    message,
    context: { deviceId: ctx.deviceId, revision: ctx.revision, region, ...extra },
  });
}

/**
 * Resolve region patches (already overlaid) into concrete regions.
 *
 * - `mirror_of` copies the source's size, and its start and external flag
 *   when the mirror does not declare them; a declared size may not exceed
 *   the source's.
 * - Non-mirror regions must not overlap.
 *
 * @throws DeviceProfileError for mirror and overlap violations
 * @throws CatalogError when a non-mirror region lacks start or size
 */
export function resolveMemoryMap(
  ctx: MemoryMapContext,
  patches: Readonly<Record<string, RegionPatch>>
): MemoryMap {
  const resolved = new Map<string, MemoryRegion>();
  const resolving = new Set<string>();

  const resolveRegion = (name: string): MemoryRegion => {
    const done = resolved.get(name);
    if (done) return done;
    const patch = patches[name];
    if (patch === undefined) {
      throw new Error(`Region '${name}' missing from patch set`);
    }
    if (resolving.has(name)) {
      throw regionError(
        ctx,
        'MirrorCycle',
        name,
        `Mirror cycle through region '${name}' in '${ctx.deviceId}' (${ctx.revision})`,
        { cycle: [...resolving, name] }
      );
    }
    resolving.add(name);
    const region =
      patch.mirrorOf === undefined
        ? concreteRegion(ctx, name, patch)
        : mirrorRegion(ctx, name, patch, patch.mirrorOf);
    resolving.delete(name);
    resolved.set(name, region);
    return region;
  };

  const mirrorRegion = (
    context: MemoryMapContext,
    name: string,
    patch: RegionPatch,
    sourceName: string
  ): MemoryRegion => {
    if (!Object.prototype.hasOwnProperty.call(patches, sourceName)) {
      throw regionError(
        context,
        'DanglingMirror',
        name,
        `Region '${name}' mirrors unknown region '${sourceName}' in '${context.deviceId}'`,
        { mirrorOf: sourceName }
      );
    }
    const source = resolveRegion(sourceName);
    if (patch.size !== undefined && patch.size > source.size) {
      throw regionError(
        context,
        'MirrorSizeMismatch',
        name,
        `Region '${name}' declares size ${formatHex(patch.size)} larger than ` +
          `its source '${sourceName}' (${formatHex(source.size)})`,
        { mirrorOf: sourceName }
      );
    }
    const start = patch.start ?? source.start;
    const size = patch.size ?? source.size;
    return {
      name,
      start,
      size,
      end: start + size,
      external: patch.external ?? source.external,
      mirrorOf: sourceName,
      warningRanges: patch.warningRanges ?? [],
    };
  };

  for (const name of Object.keys(patches)) {
    resolveRegion(name);
  }

  assertNoOverlap(ctx, [...resolved.values()]);

  // Keep declaration order
  const map: Record<string, MemoryRegion> = {};
  for (const name of Object.keys(patches)) {
    const region = resolved.get(name);
    if (region) map[name] = region;
  }
  return map;
}

function concreteRegion(
  ctx: MemoryMapContext,
  name: string,
  patch: RegionPatch
): MemoryRegion {
  if (patch.start === undefined || patch.size === undefined) {
    throw new CatalogError({
      message: `Region '${name}' of '${ctx.deviceId}' (${ctx.revision}) must declare start and size`,
      issues: [
        {
          path: `/info/memory_map/${name}`,
          message: 'start and size are required unless mirror_of is set',
        },
      ],
      context: { deviceId: ctx.deviceId, revision: ctx.revision, region: name },
    });
  }
  return {
    name,
    start: patch.start,
    size: patch.size,
    end: patch.start + patch.size,
    external: patch.external ?? false,
    warningRanges: patch.warningRanges ?? [],
  };
}

function assertNoOverlap(ctx: MemoryMapContext, regions: MemoryRegion[]): void {
  const concrete = regions
    .filter((region) => region.mirrorOf === undefined && region.size > 0n)
    .sort((a, b) => (a.start < b.start ? -1 : a.start > b.start ? 1 : 0));

  let widest: MemoryRegion | undefined;
  for (const region of concrete) {
    if (widest && region.start < widest.end) {
      throw regionError(
        ctx,
        'RegionOverlap',
        region.name,
        `Region '${region.name}' [${formatHex(region.start)}, ${formatHex(region.end)}) ` +
          `overlaps '${widest.name}' [${formatHex(widest.start)}, ${formatHex(widest.end)})`,
        { overlaps: widest.name }
      );
    }
    if (!widest || region.end > widest.end) widest = region;
  }
}
