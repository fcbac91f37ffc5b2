import { bytesToHex } from './hex';

/**
 * Pretty-print a decoded value for humans. Byte arrays become hex, bigints
 * carry an `n` suffix, absent optionals print as `(absent)`.
 */
export function formatValue(value: unknown, indent: number = 0): string {
  const pad = '  '.repeat(indent);
  if (value instanceof Uint8Array) {
    return `${pad}${formatScalar(value)}`;
  }
  if (Array.isArray(value) || value instanceof Set) {
    const items: unknown[] = [...value];
    if (items.length === 0) return `${pad}(empty)`;
    return items.map((item, i) => formatEntry(pad, `[${i}]`, item, indent)).join('\n');
  }
  if (value instanceof Map) {
    if (value.size === 0) return `${pad}(empty map)`;
    return [...value]
      .map(([key, item]) => formatEntry(pad, formatValue(key).split('\n').join(', '), item, indent))
      .join('\n');
  }
  if (value !== null && typeof value === 'object') {
    return Object.entries(value)
      .map(([key, item]) => formatEntry(pad, key, item, indent))
      .join('\n');
  }
  return `${pad}${formatScalar(value)}`;
}

function formatEntry(pad: string, label: string, value: unknown, indent: number): string {
  if (value !== null && typeof value === 'object' && !(value instanceof Uint8Array)) {
    return `${pad}${label}:\n${formatValue(value, indent + 1)}`;
  }
  return `${pad}${label}: ${formatScalar(value)}`;
}

function formatScalar(value: unknown): string {
  if (value instanceof Uint8Array) return `[${value.length} bytes] ${bytesToHex(value)}`;
  if (typeof value === 'bigint') return `${value}n`;
  if (value === undefined) return '(absent)';
  return JSON.stringify(value);
}
