import { describe, expect, it } from 'vitest';

import {
  createProvisioningCore,
  effectiveRange,
  getFeatureValue,
  loadBundledCatalog,
  regionAt,
  warningRanges,
} from '../../src/index.js';

const catalog = loadBundledCatalog({ options: { logging: { level: 'silent' } } });
const core = createProvisioningCore(catalog, { logging: { level: 'silent' } });

describe('bundled catalog', () => {
  it('loads without failures', () => {
    expect(catalog.loadFailures).toEqual([]);
    expect(catalog.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.canonPath])).toEqual([
      ['ALIAS_SHADOWS_DEFINITION', 'mcxn235'],
    ]);
    expect(catalog.devices.listDevices()).toEqual([
      'lpc804',
      'mcxc041',
      'mcxn235',
      'mcxn236',
      'rt1050',
    ]);
  });

  it('produces templates that validate for every device artifact', () => {
    let checked = 0;
    for (const deviceId of catalog.devices.listDevices()) {
      const profile = core.resolve(deviceId);
      for (const feature of Object.keys(profile.features)) {
        for (const artifact of catalog.features.artifactsOf(feature)) {
          const schema = core.composeForDevice(deviceId, artifact);
          for (const includeOptional of [false, true]) {
            const template = core.generateTemplate(schema, includeOptional);
            const result = core.validate(template, schema);
            expect({ deviceId, artifact, includeOptional, violations: result.violations }).toEqual({
              deviceId,
              artifact,
              includeOptional,
              violations: [],
            });
            checked += 1;
          }
        }
      }
    }
    // mcxc041 cert_block, mcxn235/mcxn236 iee + cert_block + sbx, rt1050 bee
    expect(checked).toBe(16);
  });

  it('resolves the alias to the latest revision of its target', () => {
    const profile = core.resolve('MCXN235');
    expect(profile.id).toBe('mcxn236');
    expect(profile.requestedId).toBe('mcxn235');
    expect(profile.revision).toBe('a1');
    expect(profile.memoryMap.sram?.size).toBe(0x5_0000n);
    expect(profile.info.purpose).toBe('MCX Series');
  });

  it('applies revision overlays', () => {
    const a0 = core.resolve('mcxn236', 'a0');
    expect(a0.memoryMap.sram?.size).toBe(0x4_0000n);
    expect(getFeatureValue(a0, 'iee', 'key_blob_count')).toBe(2);
    expect(getFeatureValue(a0, 'iee', 'keyblob_address', null)).toBe(null);
    expect(getFeatureValue(core.resolve('mcxn236'), 'iee', 'key_blob_count')).toBe(4);
  });

  it('resolves mirrors and warning ranges', () => {
    const mcxn = core.resolve('mcxn236');
    expect(effectiveRange(mcxn, 'internal-flash_s')).toEqual({
      region: 'internal-flash_s',
      start: 0x1000_0000n,
      size: 0x10_0000n,
      end: 0x1010_0000n,
      external: false,
    });
    expect(warningRanges(mcxn).map(({ region, range }) => [region, range.start])).toEqual([
      ['sram', 0x2002_0000n],
    ]);

    const rt = core.resolve('rt1050');
    expect(regionAt(rt, '0x8000_0100').map((region) => region.name)).toEqual(['flexspi-alias']);
    expect(effectiveRange(rt, 'flexspi-alias')?.external).toBe(true);
  });

  it('uses a device override of the bound fragments', () => {
    expect(core.composeForDevice('mcxc041', 'cert_block').fragments).toEqual([
      'family:cert_block:mcxc041',
      'cert_block_output',
      'certificate_v1',
      'certificate_root_keys',
    ]);
    expect(core.composeForDevice('mcxn236', 'cert_block').fragments).toContain('certificate_v21');
  });

  it('fills in and pins the requested family', () => {
    const schema = core.composeForDevice('mcxn236', 'cert_block');
    expect(schema.properties.family?.enum).toEqual(['mcxn235', 'mcxn236']);
    expect(schema.properties.revision?.enum).toEqual(['a0', 'a1', 'latest']);

    const template = core.generateTemplate(schema);
    expect(template.family).toBe('mcxn236');
    expect(template.revision).toBe('latest');
    expect(core.validate({ ...template, family: 'mcxc041' }, schema).violations).toEqual([
      {
        kind: 'EnumViolation',
        path: '/family',
        message: 'string "mcxc041" is not one of "mcxn235", "mcxn236"',
      },
    ]);

    const aliased = core.composeForDevice('mcxn235', 'cert_block');
    expect(aliased.fragments[0]).toBe('family:cert_block:mcxn235');
    expect(core.generateTemplate(aliased).family).toBe('mcxn235');
  });

  it('reports the ISK rule of a certificate block', () => {
    const schema = core.compose(['certificate_v21']);
    expect(core.validate({ useIsk: true }, schema).violations).toEqual([
      {
        kind: 'MissingRequiredProperty',
        path: '/signer',
        message: "'signer' is required",
        rule: 'certificate_v21#/allOf/0',
      },
      {
        kind: 'MissingRequiredProperty',
        path: '',
        message: "exactly one of 'signingCertificateFile' | 'iskPublicKey' is required",
        rule: 'certificate_v21#/allOf/0',
      },
    ]);
    expect(
      core.validate({ useIsk: true, iskPublicKey: 'isk.pub', signer: 'type=file;file_path=k.pem' }, schema)
        .valid
    ).toBe(true);
  });

  it('restricts the BEE engine choice for a zero key', () => {
    const schema = core.composeForDevice('rt1050', 'bee');
    const template = core.generateTemplate(schema);
    const result = core.validate(
      { ...template, engine_key_selection: 'zero', engine_selection: 'both' },
      schema
    );
    expect(result.violations).toEqual([
      {
        kind: 'EnumViolation',
        path: '/engine_selection',
        message: 'string "both" is not one of "engine0", "engine1"',
        rule: 'bee#',
      },
    ]);
  });

  it('normalizes hex and decimal addresses alike', () => {
    const schema = core.composeForDevice('mcxn236', 'iee');
    const template = core.generateTemplate(schema);
    const hex = core.validate({ ...template, keyblob_address: '0x30000000' }, schema);
    const decimal = core.validate({ ...template, keyblob_address: 805306368 }, schema);
    expect(hex.normalized.keyblob_address).toBe(805306368n);
    expect(decimal.normalized.keyblob_address).toBe(805306368n);
  });
});
