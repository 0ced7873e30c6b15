/**
 * Device profile model (resolved view handed to callers)
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

/** Advisory address range attached to a region, evaluated by image builders */
export interface WarningRange {
  readonly start: bigint;
  readonly size: bigint;
  /** Exclusive end address (start + size) */
  readonly end: bigint;
  readonly message: string;
}

export interface MemoryRegion {
  readonly name: string;
  readonly start: bigint;
  readonly size: bigint;
  /** Exclusive end address (start + size) */
  readonly end: bigint;
  readonly external: boolean;
  /** Region whose backing storage this region aliases */
  readonly mirrorOf?: string;
  readonly warningRanges: readonly WarningRange[];
}

export type MemoryMap = Readonly<Record<string, MemoryRegion>>;

export type FeatureParams = Readonly<JsonObject>;
export type FeatureSet = Readonly<Record<string, FeatureParams>>;

export interface DeviceInfo {
  readonly purpose?: string;
  readonly web?: string;
  readonly useInDoc: boolean;
  /** Info keys without a dedicated field, passed through unchanged */
  readonly extra: Readonly<JsonObject>;
}

export interface DeviceProfile {
  /** Profile that supplied the data (alias target when aliased) */
  readonly id: string;
  /** Identifier the caller asked for, as stored in the catalog */
  readonly requestedId: string;
  /** Identifiers visited while following aliases, requested id first */
  readonly aliasChain: readonly string[];
  /** Concrete revision name, never `latest` */
  readonly revision: string;
  readonly revisions: readonly string[];
  readonly latest: string;
  readonly info: DeviceInfo;
  readonly memoryMap: MemoryMap;
  readonly features: FeatureSet;
}

/** Keyword accepted in place of a concrete revision name */
export const LATEST_REVISION = 'latest';
