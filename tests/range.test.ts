import { describe, expect, it } from 'vitest';
import { InvalidRangeError } from '../src/pipeline/errors';
import { DEFAULT_PADDING_SEC, policyFromConfig, resolveRange } from '../src/pipeline/range';

describe('resolveRange', () => {
  it('bounds the matched tokens exactly under the exact policy', () => {
    expect(resolveRange({ start: 5.0, end: 6.0 }, { kind: 'exact' })).toEqual({ start: 5.0, end: 6.0 });
  });

  it('adds padding on both sides', () => {
    expect(resolveRange({ start: 5.0, end: 6.0 }, { kind: 'padded', pad: 2.0 })).toEqual({ start: 3.0, end: 8.0 });
  });

  it('clamps a padded start to zero', () => {
    expect(resolveRange({ start: 1.0, end: 1.5 }, { kind: 'padded', pad: 2.0 })).toEqual({ start: 0.0, end: 3.5 });
  });

  it('clamps a padded end to the media duration when known', () => {
    expect(resolveRange({ start: 5.0, end: 6.0 }, { kind: 'padded', pad: 2.0 }, { durationSec: 7 })).toEqual({
      start: 3.0,
      end: 7,
    });
  });

  it('rejects an empty interval instead of returning it', () => {
    expect(() => resolveRange({ start: 2, end: 2 }, { kind: 'exact' })).toThrow(InvalidRangeError);
    expect(() => resolveRange({ start: 3, end: 2 }, { kind: 'exact' })).toThrow(InvalidRangeError);
  });

  it('rejects negative or non-numeric padding', () => {
    expect(() => resolveRange({ start: 5, end: 6 }, { kind: 'padded', pad: -1 })).toThrow(InvalidRangeError);
    expect(() => resolveRange({ start: 5, end: 6 }, { kind: 'padded', pad: NaN })).toThrow(InvalidRangeError);
  });
});

describe('policyFromConfig', () => {
  it('maps configuration to a policy', () => {
    expect(policyFromConfig('exact', 3)).toEqual({ kind: 'exact' });
    expect(policyFromConfig('padded', 3)).toEqual({ kind: 'padded', pad: 3 });
    expect(policyFromConfig('padded')).toEqual({ kind: 'padded', pad: DEFAULT_PADDING_SEC });
  });
});
