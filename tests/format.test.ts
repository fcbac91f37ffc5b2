import { formatValue } from '../src/format';

describe('formatValue', () => {
  it('formats scalars', () => {
    expect(formatValue(5)).toBe('5');
    expect(formatValue('hi')).toBe('"hi"');
    expect(formatValue(-1n)).toBe('-1n');
    expect(formatValue(undefined)).toBe('(absent)');
    expect(formatValue(null)).toBe('null');
    expect(formatValue(new Uint8Array([1, 2]))).toBe('[2 bytes] 0102');
  });

  it('formats records with nested values', () => {
    const text = formatValue({ a: 1, b: [1n], c: new Uint8Array([0xab]), d: undefined });
    expect(text.split('\n')).toEqual(['a: 1', 'b:', '  [0]: 1n', 'c: [1 bytes] ab', 'd: (absent)']);
  });

  it('formats records inside arrays', () => {
    expect(formatValue([{ x: 1 }, { x: 2 }])).toBe('[0]:\n  x: 1\n[1]:\n  x: 2');
  });

  it('formats maps and sets', () => {
    expect(formatValue(new Map([['k', true]]))).toBe('"k": true');
    expect(formatValue(new Set(['a', 'b']))).toBe('[0]: "a"\n[1]: "b"');
  });

  it('marks empty containers', () => {
    expect(formatValue([])).toBe('(empty)');
    expect(formatValue(new Map())).toBe('(empty map)');
    expect(formatValue({ list: [] }, 1)).toBe('  list:\n    (empty)');
  });
});
