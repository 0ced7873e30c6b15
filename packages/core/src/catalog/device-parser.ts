/**
 * Raw device document -> DeviceDefinition.
 *
 * The definition keeps the base body and every revision as partial patches;
 * overlay and memory-map resolution happen in the registry.
 */

import type {
  JsonObject,
  WarningRange,
} from '../types/device.js';
import { CatalogError, type CatalogIssue } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import { isJsonObject, isJsonValue, isPlainObject } from '../util/guards.js';
import { parseUnsigned } from '../util/number.js';
import { appendPointer } from '../util/pointer.js';
import { checkCatalogShape } from './shape-check.js';

/** Region fields as declared; absent fields are inherited or derived */
export interface RegionPatch {
  readonly start?: bigint;
  readonly size?: bigint;
  readonly external?: boolean;
  readonly mirrorOf?: string;
  readonly warningRanges?: readonly WarningRange[];
}

export interface DevicePatch {
  /** `info` without `memory_map` */
  readonly info: Readonly<JsonObject>;
  readonly memoryMap: Readonly<Record<string, RegionPatch>>;
  readonly features: Readonly<Record<string, JsonObject>>;
}

export interface AliasDefinition {
  readonly kind: 'alias';
  readonly id: string;
  readonly target: string;
  /** True when the document declares data besides the alias */
  readonly shadowsDefinition: boolean;
}

export interface ProfileDefinition {
  readonly kind: 'profile';
  readonly id: string;
  readonly latest: string;
  readonly base: DevicePatch;
  /** Revision name -> overlay, in declaration order */
  readonly revisions: Readonly<Record<string, DevicePatch>>;
}

export type DeviceDefinition = AliasDefinition | ProfileDefinition;

class IssueCollector {
  readonly issues: CatalogIssue[] = [];

  add(path: string, message: string): void {
    this.issues.push({ path, message });
  }

  unsigned(value: unknown, path: string): bigint | undefined {
    if (value === undefined) return undefined;
    const parsed = parseUnsigned(value);
    if (parsed === undefined) {
      this.add(path, `not an unsigned integer literal: ${JSON.stringify(value)}`);
    }
    return parsed;
  }
}

function parseWarningRanges(
  raw: unknown,
  path: string,
  issues: IssueCollector
): WarningRange[] | undefined {
  if (!Array.isArray(raw)) return undefined;
  const ranges: WarningRange[] = [];
  raw.forEach((entry: unknown, index) => {
    const entryPath = appendPointer(path, index);
    if (!isPlainObject(entry)) return;
    const start = issues.unsigned(entry.start, appendPointer(entryPath, 'start'));
    const size = issues.unsigned(entry.size, appendPointer(entryPath, 'size'));
    const message = entry.warning_msg;
    if (start === undefined || size === undefined || typeof message !== 'string') {
      return;
    }
    ranges.push({ start, size, end: start + size, message });
  });
  return ranges;
}

function parseRegion(
  raw: Record<string, unknown>,
  path: string,
  issues: IssueCollector
): RegionPatch {
  const patch: {
    start?: bigint;
    size?: bigint;
    external?: boolean;
    mirrorOf?: string;
    warningRanges?: WarningRange[];
  } = {};
  const start = issues.unsigned(raw.start, appendPointer(path, 'start'));
  if (start !== undefined) patch.start = start;
  const size = issues.unsigned(raw.size, appendPointer(path, 'size'));
  if (size !== undefined) patch.size = size;
  if (typeof raw.external === 'boolean') patch.external = raw.external;
  if (typeof raw.mirror_of === 'string') patch.mirrorOf = raw.mirror_of;
  const ranges = parseWarningRanges(
    raw.warning_ranges,
    appendPointer(path, 'warning_ranges'),
    issues
  );
  if (ranges) patch.warningRanges = ranges;
  return patch;
}

function parseBody(
  raw: Record<string, unknown>,
  path: string,
  issues: IssueCollector
): DevicePatch {
  const info: JsonObject = {};
  const memoryMap: Record<string, RegionPatch> = {};
  const features: Record<string, JsonObject> = {};

  if (isPlainObject(raw.info)) {
    for (const [key, value] of Object.entries(raw.info)) {
      if (key === 'memory_map') continue;
      if (isJsonValue(value)) {
        info[key] = value;
      }
    }
    const rawMap = raw.info.memory_map;
    if (isPlainObject(rawMap)) {
      const mapPath = appendPointer(appendPointer(path, 'info'), 'memory_map');
      for (const [name, region] of Object.entries(rawMap)) {
        if (!isPlainObject(region)) continue;
        memoryMap[name] = parseRegion(region, appendPointer(mapPath, name), issues);
      }
    }
  }

  if (isPlainObject(raw.features)) {
    for (const [name, params] of Object.entries(raw.features)) {
      if (isJsonObject(params)) {
        features[name] = params;
      } else {
        issues.add(
          appendPointer(appendPointer(path, 'features'), name),
          'feature parameters must be a JSON object'
        );
      }
    }
  }

  return { info, memoryMap, features };
}

export function parseDeviceDocument(
  id: string,
  document: unknown
): Result<DeviceDefinition, CatalogError> {
  const shapeIssues = checkCatalogShape('device', document);
  if (shapeIssues.length > 0 || !isPlainObject(document)) {
    return err(
      new CatalogError({
        message: `Device '${id}' does not match the device document shape`,
        issues: shapeIssues,
        context: { deviceId: id },
      })
    );
  }

  if (typeof document.alias === 'string') {
    const shadowsDefinition = Object.keys(document).some((key) => key !== 'alias');
    const alias: AliasDefinition = {
      kind: 'alias',
      id,
      target: document.alias,
      shadowsDefinition,
    };
    return ok(alias);
  }

  const issues = new IssueCollector();
  const base = parseBody(document, '', issues);
  const revisions: Record<string, DevicePatch> = {};
  if (isPlainObject(document.revisions)) {
    for (const [name, overlay] of Object.entries(document.revisions)) {
      if (!isPlainObject(overlay)) continue;
      revisions[name] = parseBody(
        overlay,
        appendPointer('/revisions', name),
        issues
      );
    }
  }
  const latest = typeof document.latest === 'string' ? document.latest : '';
  if (!Object.prototype.hasOwnProperty.call(revisions, latest)) {
    issues.add('/latest', `latest revision '${latest}' is not declared in revisions`);
  }

  if (issues.issues.length > 0) {
    return err(
      new CatalogError({
        message: `Device '${id}' contains invalid entries`,
        issues: issues.issues,
        context: { deviceId: id },
      })
    );
  }
  const profile: ProfileDefinition = {
    kind: 'profile',
    id,
    latest,
    base,
    revisions,
  };
  return ok(profile);
}
