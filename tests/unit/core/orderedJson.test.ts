import { describe, expect, it } from 'vitest';
import { parseOrderedJson, stringifyOrdered } from '../../../src/core/storage/orderedJson.js';

describe('parseOrderedJson', () => {
  it('reads objects as Maps in file order, integer-like keys included', () => {
    const parsed = parseOrderedJson('{"b": 1, "10": {"x": "y"}, "2": [true, null]}');
    expect(parsed).toEqual(
      new Map<string, unknown>([
        ['b', 1],
        ['10', new Map([['x', 'y']])],
        ['2', [true, null]],
      ]),
    );
    expect(parsed instanceof Map ? Array.from(parsed.keys()) : []).toEqual(['b', '10', '2']);
  });

  it('throws on malformed input', () => {
    expect(() => parseOrderedJson('{"a": ')).toThrow();
  });
});

describe('stringifyOrdered', () => {
  it('matches JSON.stringify with two-space indent for plain data', () => {
    const value = { a: { list: [1, 'two', { deep: false }], empty: {}, none: [] }, b: null };
    expect(stringifyOrdered(value)).toBe(JSON.stringify(value, null, 2));
  });

  it('writes Map entries in insertion order', () => {
    const value = new Map<string, unknown>([
      ['zed', 1],
      ['233', { n: 2 }],
    ]);
    expect(stringifyOrdered(value)).toBe('{\n  "zed": 1,\n  "233": {\n    "n": 2\n  }\n}');
  });
});
