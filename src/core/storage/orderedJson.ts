import { parseDocument } from 'yaml';

/**
 * Parse a JSON document with every object read as a Map, so key order
 * (including integer-like keys such as "233") is exactly the file's order.
 * JSON is valid YAML 1.2; throws on syntax errors.
 */
export function parseOrderedJson(raw: string): unknown {
  const doc = parseDocument(raw, { uniqueKeys: true });
  if (doc.errors.length > 0) {
    throw doc.errors[0];
  }
  return doc.toJS({ mapAsMap: true });
}

/**
 * Same output as `JSON.stringify(value, null, 2)`, except that Maps are
 * written as objects in their own entry order.
 */
export function stringifyOrdered(value: unknown, depth = 0): string {
  const pad = '  '.repeat(depth + 1);
  const closePad = '  '.repeat(depth);

  if (value instanceof Map) {
    const entries = Array.from(value.entries()).filter(([, v]) => v !== undefined);
    if (entries.length === 0) return '{}';
    const body = entries
      .map(([k, v]) => `${pad}${JSON.stringify(String(k))}: ${stringifyOrdered(v, depth + 1)}`)
      .join(',\n');
    return `{\n${body}\n${closePad}}`;
  }

  if (Array.isArray(value)) {
    if (value.length === 0) return '[]';
    const body = value.map((v: unknown) => `${pad}${stringifyOrdered(v ?? null, depth + 1)}`).join(',\n');
    return `[\n${body}\n${closePad}]`;
  }

  if (value !== null && typeof value === 'object') {
    return stringifyOrdered(new Map(Object.entries(value)), depth);
  }

  return JSON.stringify(value) ?? 'null';
}
