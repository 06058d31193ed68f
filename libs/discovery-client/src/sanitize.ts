import { isRecord } from '@discovery-engine/http-core';
import type { TypeNode } from './document';

/**
 * Converts call arguments into JSON-safe values, recursively:
 * binary data becomes standard base64 and dates become RFC 3339 strings
 * (`YYYY-MM-DD` when `dateOnly` is set). Returns a copy.
 */
export function sanitizeValue(value: unknown, dateOnly = false): unknown {
  if (value instanceof Uint8Array) {
    return Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString('base64');
  }
  if (value instanceof ArrayBuffer) {
    return Buffer.from(value).toString('base64');
  }
  if (value instanceof Date) {
    const iso = value.toISOString();
    return dateOnly ? iso.slice(0, 10) : iso;
  }
  if (Array.isArray(value)) {
    return value.map((entry) => sanitizeValue(entry, dateOnly));
  }
  if (isRecord(value)) {
    const copy: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      copy[key] = sanitizeValue(entry, dateOnly);
    }
    return copy;
  }
  return value;
}

/**
 * Like {@link sanitizeValue}, but follows the request schema alongside the
 * value so that fields declared with `format: "date"` are sent as
 * `YYYY-MM-DD`. Fields the schema does not describe get the default rules.
 */
export function sanitizeBody(value: unknown, node: TypeNode | undefined, schemas: Record<string, TypeNode>): unknown {
  const shape = resolveShape(node, schemas);

  if (Array.isArray(value)) {
    return value.map((entry) => sanitizeBody(entry, shape?.items, schemas));
  }
  if (isPlainRecord(value)) {
    const copy: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      copy[key] = sanitizeBody(entry, fieldShape(shape, key), schemas);
    }
    return copy;
  }
  return sanitizeValue(value, shape?.format === 'date');
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return isRecord(value) && !(value instanceof Uint8Array) && !(value instanceof ArrayBuffer) && !(value instanceof Date);
}

function fieldShape(shape: TypeNode | undefined, key: string): TypeNode | undefined {
  if (!shape) return undefined;
  if (shape.properties && Object.hasOwn(shape.properties, key)) {
    return shape.properties[key];
  }
  return typeof shape.additionalProperties === 'object' ? shape.additionalProperties : undefined;
}

/** Follows `$ref` aliases; unknown names and alias loops resolve to no shape. */
function resolveShape(node: TypeNode | undefined, schemas: Record<string, TypeNode>): TypeNode | undefined {
  const seen = new Set<string>();
  let current = node;
  while (current?.$ref !== undefined) {
    const ref = current.$ref;
    if (seen.has(ref) || !Object.hasOwn(schemas, ref)) return undefined;
    seen.add(ref);
    current = schemas[ref];
  }
  return current;
}
