import { describe, expect, it } from 'vitest';

import { bootSchemas, chipA, sampleSource } from '../../../test/fixtures/catalog';
import type { DiagnosticEnvelope } from '../../diag/envelope';
import { DeviceProfileError } from '../../types/errors';
import { MetricsCollector } from '../../util/metrics';
import { loadCatalog, type CatalogSource } from '../catalog';

const quiet = { options: { logging: { level: 'silent' as const } } };

describe('loadCatalog', () => {
  it('loads a clean catalog without failures or warnings', () => {
    const catalog = loadCatalog(sampleSource(), quiet);
    expect(catalog.loadFailures).toEqual([]);
    expect(catalog.diagnostics).toEqual([]);
    expect(catalog.devices.listDevices()).toEqual(['chip_a', 'chip_b', 'chip_c']);
    expect(catalog.fragmentNames()).toEqual([
      'boot_address',
      'boot_keys',
      'boot_output',
      'family:secure_boot',
    ]);
    expect(Object.isFrozen(catalog.getFragment('boot_keys'))).toBe(true);
  });

  it('fingerprints content, not enumeration order', () => {
    const source = sampleSource();
    const reordered: CatalogSource = {
      devices: {
        chip_c: source.devices.chip_c,
        chip_b: source.devices.chip_b,
        chip_a: source.devices.chip_a,
      },
      schemas: source.schemas,
      features: source.features,
    };
    const a = loadCatalog(source, quiet);
    const b = loadCatalog(reordered, quiet);
    const c = loadCatalog({ ...source, devices: { chip_a: chipA() } }, quiet);
    expect(a.fingerprint).toBe(b.fingerprint);
    expect(a.fingerprint).not.toBe(c.fingerprint);
  });

  it('builds a family fragment from the devices enabling each feature', () => {
    const catalog = loadCatalog(sampleSource(), quiet);
    const family = catalog.getFragment('family:secure_boot');
    expect(family?.required).toEqual(['family']);
    expect(family?.properties.family?.enum).toEqual(['chip_a', 'chip_b']);
    expect(family?.properties.revision?.enum).toEqual(['a0', 'b0', 'latest']);
    expect(family?.properties.revision?.templateValue).toBe('latest');
  });

  it('builds a family fragment per device that defaults to the requested name', () => {
    const catalog = loadCatalog(sampleSource(), quiet);
    const aliased = catalog.getFragment('family:secure_boot:chip_b');
    expect(aliased?.properties.family?.enum).toEqual(['chip_a', 'chip_b']);
    expect(aliased?.properties.family?.templateValue).toBe('chip_b');
    expect(aliased?.properties.revision?.enum).toEqual(['a0', 'b0', 'latest']);
    expect(catalog.getFragment('family:secure_boot:chip_a')?.properties.family?.templateValue).toBe(
      'chip_a'
    );
    expect(catalog.hasFragment('family:secure_boot:chip_c')).toBe(false);
    expect(catalog.fragmentNames()).not.toContain('family:secure_boot:chip_a');
  });

  it('isolates a broken device and keeps it resolvable by name', () => {
    const source = sampleSource();
    const catalog = loadCatalog(
      {
        ...source,
        devices: {
          ...source.devices,
          chip_x: {
            revisions: { a0: {} },
            latest: 'a0',
            info: {
              memory_map: {
                flash: { start: '0x0', size: '0x1000' },
                flash_s: { mirror_of: 'rom' },
              },
            },
          },
        },
      },
      quiet
    );

    expect(catalog.loadFailures.map((failure) => [failure.kind, failure.id])).toEqual([
      ['device', 'chip_x'],
    ]);
    expect(catalog.diagnostics.map((d) => [d.code, d.canonPath])).toEqual([
      ['DEVICE_LOAD_FAILED', 'chip_x'],
    ]);
    expect(catalog.devices.resolve('chip_a').id).toBe('chip_a');

    try {
      catalog.devices.resolve('chip_x');
      expect.unreachable('chip_x should not resolve');
    } catch (error) {
      expect(error).toBeInstanceOf(DeviceProfileError);
      if (error instanceof DeviceProfileError) {
        expect(error.kind).toBe('UnknownDevice');
        expect(error.cause).toBeInstanceOf(DeviceProfileError);
        expect(error.cause?.message).toBe(
          "Region 'flash_s' mirrors unknown region 'rom' in 'chip_x'"
        );
      }
    }
  });

  it('reports alias cycles and alias shadowing', () => {
    const source = sampleSource();
    const catalog = loadCatalog(
      {
        ...source,
        devices: {
          ...source.devices,
          loop_a: { alias: 'loop_b' },
          loop_b: { alias: 'loop_a', info: { purpose: 'ignored' } },
        },
      },
      quiet
    );
    const codes = catalog.diagnostics.map((d) => `${d.code}@${d.canonPath}`);
    expect(codes).toEqual([
      'ALIAS_SHADOWS_DEFINITION@loop_b',
      'ALIAS_CYCLE@loop_a',
      'DEVICE_LOAD_FAILED@loop_a',
      'ALIAS_CYCLE@loop_b',
      'DEVICE_LOAD_FAILED@loop_b',
    ]);
    expect(() => catalog.devices.resolve('loop_a')).toThrow(/Alias cycle/);
  });

  it('keeps the first declaration of a duplicated fragment', () => {
    const catalog = loadCatalog(
      {
        devices: {},
        schemas: {
          alpha: { shared: { type: 'object', title: 'from alpha' } },
          beta: { shared: { type: 'object', title: 'from beta' } },
        },
      },
      quiet
    );
    expect(catalog.getFragment('shared')?.title).toBe('from alpha');
    expect(catalog.diagnostics.map((d) => [d.code, d.canonPath])).toEqual([
      ['DUPLICATE_FRAGMENT', 'beta#shared'],
    ]);
  });

  it('records schema, fragment and binding failures separately', () => {
    const catalog = loadCatalog(
      {
        devices: { chip_a: chipA() },
        schemas: {
          boot: bootSchemas(),
          broken: { f: { type: 'string' } },
          partial: { odd: { type: 'object', then: {} } },
        },
        features: { secure_boot: { artifacts: { boot: ['boot_output', 'boot_missing'] } } },
      },
      quiet
    );
    expect(catalog.loadFailures.map((failure) => [failure.kind, failure.id])).toEqual([
      ['schema', 'broken'],
      ['schema', 'partial#odd'],
    ]);
    expect(catalog.diagnostics.map((d) => d.code)).toEqual([
      'SCHEMA_GROUP_LOAD_FAILED',
      'SCHEMA_GROUP_LOAD_FAILED',
      'FEATURE_FRAGMENT_MISSING',
    ]);
    expect(catalog.diagnostics[2]?.canonPath).toBe('boot_missing');
  });

  it('checks device schema overrides for missing fragments', () => {
    const device = chipA();
    const catalog = loadCatalog(
      {
        devices: {
          chip_a: {
            ...device,
            revisions: { a0: {} },
            latest: 'a0',
            features: { secure_boot: { schemas: { boot: ['boot_output', 'custom_boot'] } } },
          },
        },
        schemas: { boot: bootSchemas() },
        features: sampleSource().features,
      },
      quiet
    );
    expect(catalog.diagnostics.map((d) => `${d.code}@${d.canonPath}`)).toEqual([
      'FEATURE_FRAGMENT_MISSING@custom_boot',
    ]);
  });

  it('rejects malformed feature bindings', () => {
    const catalog = loadCatalog(
      { devices: {}, schemas: {}, features: { secure_boot: { artifacts: { boot: [] } } } },
      quiet
    );
    expect(catalog.loadFailures.map((failure) => failure.kind)).toEqual(['features']);
    expect(catalog.features.features()).toEqual([]);
  });

  it('routes diagnostics to onWarning and times the load', () => {
    const seen: DiagnosticEnvelope[] = [];
    let now = 0;
    const metrics = new MetricsCollector({ now: () => (now += 4) });
    loadCatalog(
      {
        devices: {},
        schemas: {
          alpha: { shared: { type: 'object' } },
          beta: { shared: { type: 'object' } },
        },
      },
      { options: { logging: { onWarning: (d) => seen.push(d) } }, metrics }
    );
    expect(seen.map((d) => d.code)).toEqual(['DUPLICATE_FRAGMENT']);
    expect(metrics.snapshotMetrics().loadMs).toBe(4);
  });
});
