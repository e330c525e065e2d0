/**
 * Data-keyed Record Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { keyedRecord, ownEntry, withEntry } from '../records';

describe('ownEntry', () => {
  it('should not see inherited properties', () => {
    const record: Record<string, number> = { a: 1 };
    expect(ownEntry(record, 'a')).toBe(1);
    expect(ownEntry(record, 'toString')).toBeUndefined();
    expect(ownEntry(record, '__proto__')).toBeUndefined();
  });
});

describe('withEntry', () => {
  it('should keep positions and remove on null', () => {
    const record = { a: 1, b: 2 };
    expect(Object.entries(withEntry(record, 'a', 5))).toEqual([['a', 5], ['b', 2]]);
    expect(withEntry(record, 'a', null)).toEqual({ b: 2 });
    expect(record).toEqual({ a: 1, b: 2 });
  });

  it('should store "__proto__" as an own key', () => {
    const record = withEntry<number>({}, '__proto__', 3);
    expect(Object.entries(record)).toEqual([['__proto__', 3]]);
    expect(Object.getPrototypeOf(record)).toBe(Object.prototype);
    expect(ownEntry(record, '__proto__')).toBe(3);
  });
});

describe('keyedRecord', () => {
  const schema = keyedRecord(z.number());

  it('should keep a "__proto__" key', () => {
    const parsed = schema.parse(JSON.parse('{"__proto__": 1, "b": 2}'));
    expect(Object.entries(parsed)).toEqual([['__proto__', 1], ['b', 2]]);
  });

  it('should reject arrays and bad values', () => {
    expect(schema.safeParse([['a', 1]]).success).toBe(false);
    expect(schema.safeParse({ a: 'one' }).success).toBe(false);
    expect(schema.safeParse(null).success).toBe(false);
  });
});
