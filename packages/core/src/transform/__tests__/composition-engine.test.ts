import { describe, expect, it } from 'vitest';

import { sampleSource } from '../../../test/fixtures/catalog';
import { loadCatalog, type Catalog } from '../../catalog/catalog';
import { DIAGNOSTIC_CODES } from '../../diag/codes';
import type { DiagnosticEnvelope } from '../../diag/envelope';
import { SchemaError } from '../../types/errors';
import { resolveOptions } from '../../types/options';
import { MetricsCollector } from '../../util/metrics';
import { validate } from '../../validator/config-validator';
import {
  SchemaComposer,
  composeFragments,
  compositionKey,
  typesCompatible,
} from '../composition-engine';

function catalogWithOverrides(): Catalog {
  const source = sampleSource();
  return loadCatalog(
    {
      ...source,
      schemas: {
        ...source.schemas,
        extra: {
          base_a: {
            type: 'object',
            properties: {
              name: { type: 'string' },
              size: { type: 'number' },
            },
            required: ['name'],
          },
          base_b: {
            type: 'object',
            properties: {
              name: { type: 'string', template_value: 'b' },
              size: { type: 'string' },
              flag: { type: 'boolean' },
            },
            required: ['flag', 'name'],
            allOf: [{ required: ['flag'] }],
          },
        },
      },
    },
    { options: { logging: { level: 'silent' } } }
  );
}

function composeError(run: () => unknown): SchemaError {
  try {
    run();
  } catch (error) {
    if (error instanceof SchemaError) return error;
    throw error;
  }
  throw new Error('expected a SchemaError');
}

describe('typesCompatible', () => {
  it('treats undeclared types as compatible with anything', () => {
    expect(typesCompatible([], ['string'])).toBe(true);
    expect(typesCompatible(['boolean'], [])).toBe(true);
  });

  it('needs one overlapping type, with number and integer overlapping', () => {
    expect(typesCompatible(['string', 'number'], ['number'])).toBe(true);
    expect(typesCompatible(['integer'], ['number'])).toBe(true);
    expect(typesCompatible(['string'], ['number'])).toBe(false);
  });
});

describe('composeFragments', () => {
  const catalog = catalogWithOverrides();
  const options = resolveOptions({ logging: { level: 'silent' } });

  it('unions properties and required names in fragment order', () => {
    const schema = composeFragments(catalog, ['base_a', 'base_b'], options);

    expect(Object.keys(schema.properties)).toEqual(['name', 'size', 'flag']);
    expect(schema.required).toEqual(['name', 'flag']);
    expect(schema.origins).toEqual({ name: 'base_b', size: 'base_b', flag: 'base_b' });
    expect(schema.properties.name?.templateValue).toBe('b');
    expect(schema.title).toBe('base_b');
    expect(schema.rules.map((rule) => rule.id)).toEqual(['base_b#/allOf/0']);
    expect(schema.key).toBe(compositionKey(catalog.fingerprint, ['base_a', 'base_b']));
  });

  it('records an override note and a type conflict note', () => {
    const schema = composeFragments(catalog, ['base_a', 'base_b'], options);
    expect(schema.notes).toEqual([
      {
        code: 'PROPERTY_OVERRIDDEN',
        severity: 'info',
        property: 'name',
        fragment: 'base_b',
        previousFragment: 'base_a',
        message: "Property 'name' from 'base_a' replaced by 'base_b'",
      },
      {
        code: 'PROPERTY_TYPE_CONFLICT',
        severity: 'error',
        property: 'size',
        fragment: 'base_b',
        previousFragment: 'base_a',
        message:
          "Property 'size' redefined by 'base_b' as string, incompatible with number from 'base_a'",
      },
    ]);
  });

  it('lets the last fragment win when the order is reversed', () => {
    const forward = composeFragments(catalog, ['base_a', 'base_b'], options);
    const reversed = composeFragments(catalog, ['base_b', 'base_a'], options);
    expect(forward.properties.size?.types).toEqual(['string']);
    expect(reversed.properties.size?.types).toEqual(['number']);
    expect(reversed.required).toEqual(['flag', 'name']);
    expect(reversed.notes.map((note) => note.fragment)).toEqual(['base_a', 'base_a']);
  });

  it('validates a document against the order-dependent winner', () => {
    const document = { name: 'n', flag: true, size: 'large' };
    expect(validate(document, composeFragments(catalog, ['base_a', 'base_b'], options), options).valid).toBe(true);
    expect(
      validate(document, composeFragments(catalog, ['base_b', 'base_a'], options), options).violations
    ).toEqual([{ kind: 'TypeMismatch', path: '/size', message: 'expected number, got string "large"' }]);
  });

  it('throws on disjoint types under strictTypes', () => {
    const strict = resolveOptions({ composition: { strictTypes: true } });
    const error = composeError(() => composeFragments(catalog, ['base_a', 'base_b'], strict));
    expect(error.kind).toBe('IncompatibleRedefinition');
    expect(error.context?.path).toBe('/size');
    expect(error.context?.fragment).toBe('base_b');
  });

  it('lists every missing fragment', () => {
    const error = composeError(() =>
      composeFragments(catalog, ['base_a', 'nope', 'also_nope'], options)
    );
    expect(error.kind).toBe('UnknownSchemaFragment');
    expect(error.message).toBe("Unknown schema fragments: 'nope', 'also_nope'");
    expect(error.context?.missing).toEqual(['nope', 'also_nope']);
  });

  it('returns a frozen composite', () => {
    const schema = composeFragments(catalog, ['boot_output'], options);
    expect(Object.isFrozen(schema)).toBe(true);
    expect(Object.isFrozen(schema.properties.output)).toBe(true);
  });
});

describe('SchemaComposer', () => {
  const catalog = catalogWithOverrides();

  it('caches by fingerprint and names', () => {
    const metrics = new MetricsCollector();
    const composer = new SchemaComposer(catalog, {
      options: { logging: { level: 'silent' } },
      metrics,
    });

    const first = composer.compose(['boot_output', 'boot_keys']);
    expect(composer.compose(['boot_output', 'boot_keys'])).toBe(first);
    expect(composer.compose(['boot_keys', 'boot_output'])).not.toBe(first);
    expect(composer.cacheSize).toBe(2);

    const snapshot = metrics.snapshotMetrics();
    expect(snapshot.compositionCacheHits).toBe(1);
    expect(snapshot.compositionCacheMisses).toBe(2);

    composer.clearCache();
    expect(composer.cacheSize).toBe(0);
    expect(composer.compose(['boot_output', 'boot_keys'])).not.toBe(first);
  });

  it('recomposes every time when the cache is disabled', () => {
    const composer = new SchemaComposer(catalog, {
      options: { cache: { compositionSize: 0 }, logging: { level: 'silent' } },
    });
    const first = composer.compose(['boot_output']);
    const second = composer.compose(['boot_output']);
    expect(second).not.toBe(first);
    expect(second).toEqual(first);
  });

  it('routes composition notes to the sink once per composition', () => {
    const seen: DiagnosticEnvelope[] = [];
    const composer = new SchemaComposer(catalog, {
      options: { logging: { level: 'info', onWarning: (diagnostic) => seen.push(diagnostic) } },
    });
    composer.compose(['base_a', 'base_b']);
    composer.compose(['base_a', 'base_b']);

    expect(seen.map((diagnostic) => [diagnostic.code, diagnostic.canonPath])).toEqual([
      [DIAGNOSTIC_CODES.PROPERTY_OVERRIDDEN, '/name'],
      [DIAGNOSTIC_CODES.PROPERTY_TYPE_CONFLICT, '/size'],
    ]);
    expect(seen[0]?.phase).toBe('compose');
    expect(seen[1]?.details).toEqual({ fragment: 'base_b', previousFragment: 'base_a' });
  });

  it('composes a device artifact with the family fragment first', () => {
    const composer = new SchemaComposer(catalog, { options: { logging: { level: 'silent' } } });
    const profile = catalog.devices.resolve('chip_b');
    const schema = composer.composeForDevice(profile, 'boot');

    expect(schema.fragments).toEqual([
      'family:secure_boot:chip_b',
      'boot_output',
      'boot_keys',
      'boot_address',
    ]);
    expect(schema.required).toEqual(['family', 'output', 'useKey', 'address']);
    expect(schema.properties.family?.enum).toEqual(['chip_a', 'chip_b']);
    expect(schema.properties.family?.templateValue).toBe('chip_b');
    expect(schema.properties.revision?.enum).toEqual(['a0', 'b0', 'latest']);
    expect(schema.title).toBe('Load address');
  });

  it('raises UnknownArtifact with the artifacts the device offers', () => {
    const composer = new SchemaComposer(catalog, { options: { logging: { level: 'silent' } } });

    const missing = composeError(() =>
      composer.composeForDevice(catalog.devices.resolve('chip_a'), 'sb31')
    );
    expect(missing.kind).toBe('UnknownArtifact');
    expect(missing.message).toBe(
      "Device 'chip_a' has no feature producing artifact 'sb31'; available: boot"
    );

    const none = composeError(() =>
      composer.composeForDevice(catalog.devices.resolve('chip_c'), 'boot')
    );
    expect(none.message).toBe("Device 'chip_c' has no feature producing artifact 'boot'");
    expect(none.context?.available).toEqual([]);
  });
});
