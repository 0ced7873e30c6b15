import { describe, expect, it } from 'vitest';

import { isErr, isOk } from '../../types/result';
import { FeatureIndex, familyFragmentName, parseFeatureBindings } from '../feature-index';

function indexOf(document: unknown): FeatureIndex {
  const parsed = parseFeatureBindings(document);
  if (!isOk(parsed)) throw parsed.error;
  return new FeatureIndex(parsed.value);
}

describe('FeatureIndex', () => {
  const features = indexOf({
    iee: { artifacts: { iee: ['iee_output', 'iee', 'ibkek'] } },
    cert_block: {
      artifacts: {
        cert_block: ['cert_block_output', 'certificate_v21'],
        cert_block_root: ['cert_block_output', 'certificate_root_keys'],
      },
    },
  });

  it('lists features and their artifacts', () => {
    expect(features.features()).toEqual(['iee', 'cert_block']);
    expect(features.artifactsOf('cert_block')).toEqual(['cert_block', 'cert_block_root']);
    expect(features.artifactsOf('bee')).toEqual([]);
  });

  it('returns the bound fragment list or a device override', () => {
    expect(features.fragmentsFor('iee', 'iee')).toEqual(['iee_output', 'iee', 'ibkek']);
    expect(
      features.fragmentsFor('cert_block', 'cert_block', {
        schemas: { cert_block: ['cert_block_output', 'certificate_v1'] },
      })
    ).toEqual(['cert_block_output', 'certificate_v1']);
    expect(features.fragmentsFor('iee', 'bee')).toBeUndefined();
  });

  it('collects referenced fragments once, in first-seen order', () => {
    expect(features.referencedFragments()).toEqual([
      'iee_output',
      'iee',
      'ibkek',
      'cert_block_output',
      'certificate_v21',
      'certificate_root_keys',
    ]);
  });

  it('names family fragments after the feature', () => {
    expect(familyFragmentName('sbx')).toBe('family:sbx');
    expect(familyFragmentName('sbx', 'mcxn236')).toBe('family:sbx:mcxn236');
  });

  it('rejects bindings without artifacts', () => {
    expect(isErr(parseFeatureBindings({ iee: {} }))).toBe(true);
    expect(isErr(parseFeatureBindings([]))).toBe(true);
  });
});
