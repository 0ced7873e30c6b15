import { describe, expect, it } from 'vitest';

import { chipA, chipC } from '../../../test/fixtures/catalog';
import { parseDeviceDocument, type DeviceDefinition } from '../../catalog/device-parser';
import { DeviceProfileError } from '../../types/errors';
import { isOk } from '../../types/result';
import { DeviceRegistry } from '../device-registry';

function definitions(documents: Record<string, unknown>): DeviceDefinition[] {
  return Object.entries(documents).map(([id, document]) => {
    const parsed = parseDeviceDocument(id, document);
    if (!isOk(parsed)) throw parsed.error;
    return parsed.value;
  });
}

function registry(extra: Record<string, unknown> = {}): DeviceRegistry {
  return new DeviceRegistry(
    definitions({ chip_a: chipA(), chip_b: { alias: 'chip_a' }, chip_c: chipC(), ...extra })
  );
}

function resolveError(reg: DeviceRegistry, id: string, revision?: string): DeviceProfileError {
  try {
    reg.resolve(id, revision);
  } catch (error) {
    if (error instanceof DeviceProfileError) return error;
    throw error;
  }
  throw new Error(`expected ${id} to fail`);
}

describe('DeviceRegistry', () => {
  it('resolves the latest revision when none or `latest` is given', () => {
    const reg = registry();
    const implicit = reg.resolve('chip_a');
    expect(implicit.revision).toBe('b0');
    expect(reg.resolve('chip_a', 'latest')).toBe(implicit);
    expect(implicit.revisions).toEqual(['a0', 'b0']);
    expect(implicit.latest).toBe('b0');
  });

  it('applies the revision overlay on top of the base body', () => {
    const reg = registry();
    const a0 = reg.resolve('chip_a', 'a0');
    const b0 = reg.resolve('chip_a', 'b0');

    expect(a0.memoryMap.sram?.size).toBe(0x1_0000n);
    expect(b0.memoryMap.sram?.size).toBe(0x2_0000n);
    expect(b0.memoryMap.sram?.start).toBe(0x2000_0000n);
    expect(b0.memoryMap.sram?.warningRanges).toHaveLength(1);
    expect(a0.features.secure_boot).toEqual({ max_keys: 2 });
    expect(b0.features.secure_boot).toEqual({ max_keys: 4, rotk_slots: 2 });
    expect(b0.features.debug).toEqual({ swd: true });
  });

  it('exposes info fields and keeps the rest in extra', () => {
    const profile = registry().resolve('chip_a');
    expect(profile.info).toEqual({
      purpose: 'Test MCU',
      web: 'https://example.com/chip_a',
      useInDoc: true,
      extra: { package: 'QFN48' },
    });
    expect(registry().resolve('chip_c').info).toEqual({ useInDoc: false, extra: {} });
  });

  it('resolves mirrors with the source size', () => {
    const mirror = registry().resolve('chip_a').memoryMap.flash_mirror;
    expect(mirror?.start).toBe(0x1000_0000n);
    expect(mirror?.size).toBe(0x8_0000n);
    expect(mirror?.end).toBe(0x1008_0000n);
    expect(mirror?.mirrorOf).toBe('flash');
  });

  it('matches device ids case-insensitively but revisions exactly', () => {
    const reg = registry();
    expect(reg.resolve('CHIP_A', 'a0').id).toBe('chip_a');
    const error = resolveError(reg, 'chip_a', 'A0');
    expect(error.kind).toBe('UnknownRevision');
    expect(error.message).toBe("Unknown revision 'A0' for device 'chip_a'; available: a0, b0");
  });

  it('substitutes aliases completely and records the chain', () => {
    const reg = registry();
    const viaAlias = reg.resolve('Chip_B', 'a0');
    expect(viaAlias.id).toBe('chip_a');
    expect(viaAlias.requestedId).toBe('chip_b');
    expect(viaAlias.aliasChain).toEqual(['chip_b', 'chip_a']);
    expect(viaAlias.memoryMap).toEqual(reg.resolve('chip_a', 'a0').memoryMap);
  });

  it('returns the same frozen object for repeated requests', () => {
    const reg = registry();
    const first = reg.resolve('chip_a', 'a0');
    expect(reg.resolve('chip_a', 'a0')).toBe(first);
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first.memoryMap.flash)).toBe(true);
  });

  it('raises UnknownDevice for unknown ids', () => {
    expect(resolveError(registry(), 'chip_z').kind).toBe('UnknownDevice');
  });

  it('keeps failed profiles out of the listings and chains the load error', () => {
    const reg = registry({
      chip_bad: {
        revisions: { a0: {} },
        latest: 'a0',
        info: {
          memory_map: {
            flash: { start: 0, size: 0x1000 },
            ram: { start: 0x800, size: 0x1000 },
          },
        },
      },
      chip_bad_alias: { alias: 'chip_bad' },
    });

    expect(reg.loadFailures.map((failure) => failure.id)).toEqual(['chip_bad']);
    expect(reg.listDevices()).toEqual(['chip_a', 'chip_b', 'chip_c']);
    expect(reg.isLoadable('chip_bad_alias')).toBe(false);

    const error = resolveError(reg, 'chip_bad_alias');
    expect(error.kind).toBe('UnknownDevice');
    expect(error.cause).toBeInstanceOf(DeviceProfileError);
    if (error.cause instanceof DeviceProfileError) {
      expect(error.cause.kind).toBe('RegionOverlap');
    }
  });

  it('treats earlier parse failures as resolvable failures', () => {
    const parsed = parseDeviceDocument('chip_p', { latest: 'a0' });
    if (isOk(parsed)) throw new Error('expected a parse failure');
    const reg = new DeviceRegistry(definitions({ chip_a: chipA() }), [
      { id: 'chip_p', error: parsed.error },
    ]);
    const error = resolveError(reg, 'chip_p');
    expect(error.cause).toBe(parsed.error);
  });

  it('lists devices, features and revision names', () => {
    const reg = registry();
    expect(reg.listDevices({ includeAliases: false })).toEqual(['chip_a', 'chip_c']);
    expect(reg.devicesWithFeature('secure_boot')).toEqual(['chip_a', 'chip_b']);
    expect(reg.devicesWithFeature('debug')).toEqual(['chip_a', 'chip_b', 'chip_c']);
    expect(reg.devicesWithFeature('none')).toEqual([]);
    expect(reg.revisionNames()).toEqual(['a0', 'b0']);
    expect(reg.aliasIndex.isAlias('chip_b')).toBe(true);
  });
});
