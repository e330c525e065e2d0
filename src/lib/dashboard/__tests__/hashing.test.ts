import { describe, it, expect } from 'vitest';
import {
  fingerprintAesthetics,
  fingerprintSelection,
  hashString,
  hashValue,
  stableStringify,
  unitHash,
} from '../hashing';
import { AestheticsManager } from '../aesthetics';
import { samplesTable } from './fixtures';

describe('stableStringify', () => {
  it('should sort object keys recursively', () => {
    expect(stableStringify({ b: 1, a: { d: 2, c: [3, null] } })).toBe('{"a":{"c":[3,null],"d":2},"b":1}');
  });

  it('should skip undefined members', () => {
    expect(stableStringify({ a: undefined, b: 'x' })).toBe('{"b":"x"}');
  });

  it('should serialize sets in sorted order', () => {
    expect(stableStringify(new Set(['b', 'a']))).toBe('["a","b"]');
  });
});

describe('hashString', () => {
  it('should return 16 hex digits', () => {
    expect(hashString('PC1')).toMatch(/^[0-9a-f]{16}$/);
  });

  it('should hash the empty string to its seeds', () => {
    // djb2 seed 5381 = 0x1505, sdbm seed 0
    expect(hashString('')).toBe('0000150500000000');
  });

  it('should be key-order independent through hashValue', () => {
    expect(hashValue({ a: 1, b: 2 })).toBe(hashValue({ b: 2, a: 1 }));
  });
});

describe('unitHash', () => {
  it('should stay within [0, 1)', () => {
    for (const id of ['S1', 'S2', 'a-much-longer-identifier']) {
      const value = unitHash(id);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('should be deterministic', () => {
    expect(unitHash('S1')).toBe(unitHash('S1'));
  });
});

describe('fingerprintSelection', () => {
  it('should use a fixed fingerprint for the empty selection', () => {
    expect(fingerprintSelection(new Set())).toBe('none');
  });

  it('should ignore insertion order', () => {
    expect(fingerprintSelection(new Set(['a', 'b']))).toBe(fingerprintSelection(new Set(['b', 'a'])));
  });

  it('should prefix the size', () => {
    expect(fingerprintSelection(new Set(['a', 'b', 'c']))).toMatch(/^3:/);
  });
});

describe('fingerprintAesthetics', () => {
  it('should change when an override changes the resolved styles', () => {
    const manager = new AestheticsManager(samplesTable(), { grouping: 'region' });
    const before = fingerprintAesthetics(manager.current());
    manager.setEntityOverride('S1', { size: 20 });
    expect(fingerprintAesthetics(manager.current())).not.toBe(before);
  });
});
