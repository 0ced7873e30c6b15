/**
 * Case-insensitive device name index with alias redirection.
 *
 * An alias substitutes its target completely: nothing declared beside the
 * alias is merged in.
 */

import { DeviceProfileError } from '../types/errors.js';

interface IndexEntry {
  readonly id: string;
  readonly target?: string;
}

export interface AliasResolution {
  /** Identifier of the concrete profile */
  readonly id: string;
  /** Identifiers visited, requested one first */
  readonly chain: readonly string[];
}

export function foldName(name: string): string {
  return name.trim().toLowerCase();
}

export class AliasIndex {
  private readonly entries = new Map<string, IndexEntry>();

  constructor(
    devices: Iterable<{ readonly id: string; readonly target?: string }>
  ) {
    for (const device of devices) {
      this.entries.set(foldName(device.id), {
        id: device.id,
        target: device.target,
      });
    }
  }

  has(name: string): boolean {
    return this.entries.has(foldName(name));
  }

  /** Stored spelling of a device name, undefined when unknown */
  canonicalName(name: string): string | undefined {
    return this.entries.get(foldName(name))?.id;
  }

  isAlias(name: string): boolean {
    return this.entries.get(foldName(name))?.target !== undefined;
  }

  /** Aliases pointing (directly or transitively) at `target` */
  aliasesOf(target: string): string[] {
    const wanted = foldName(target);
    const result: string[] = [];
    for (const entry of this.entries.values()) {
      if (entry.target === undefined) continue;
      const resolution = this.tryFollow(entry.id);
      if (resolution && foldName(resolution.id) === wanted) {
        result.push(entry.id);
      }
    }
    return result.sort();
  }

  /**
   * Follow aliases until a concrete profile is reached.
   * @throws DeviceProfileError UnknownDevice or AliasCycle
   */
  follow(name: string): AliasResolution {
    const chain: string[] = [];
    const seen = new Set<string>();
    let current = name;
    for (;;) {
      const key = foldName(current);
      const entry = this.entries.get(key);
      if (!entry) {
        throw new DeviceProfileError({
          kind: 'UnknownDevice',
          message:
            chain.length === 0
              ? `Unknown device '${name}'`
              : `Device '${name}' is an alias of unknown device '${current}'`,
          context: { deviceId: name, aliasChain: [...chain] },
        });
      }
      if (seen.has(key)) {
        throw new DeviceProfileError({
          kind: 'AliasCycle',
          message: `Alias cycle while resolving '${name}': ${[...chain, entry.id].join(' -> ')}`,
          context: { deviceId: name, aliasChain: [...chain, entry.id] },
        });
      }
      seen.add(key);
      chain.push(entry.id);
      if (entry.target === undefined) {
        return { id: entry.id, chain };
      }
      current = entry.target;
    }
  }

  tryFollow(name: string): AliasResolution | undefined {
    try {
      return this.follow(name);
    } catch (error) {
      if (error instanceof DeviceProfileError) return undefined;
      throw error;
    }
  }

  /** Alias names whose redirection never reaches a concrete profile */
  brokenAliases(): Array<{ id: string; error: DeviceProfileError }> {
    const broken: Array<{ id: string; error: DeviceProfileError }> = [];
    for (const entry of this.entries.values()) {
      if (entry.target === undefined) continue;
      try {
        this.follow(entry.id);
      } catch (error) {
        if (!(error instanceof DeviceProfileError)) throw error;
        broken.push({ id: entry.id, error });
      }
    }
    return broken;
  }
}
