export type ScalarType = 'BOOLEAN' | 'INT64' | 'FLOAT64' | 'FLOAT' | 'BYTES' | 'DATE' | 'TIMESTAMP' | 'STRING';

const STRING_FORMATS: Record<string, ScalarType> = {
  byte: 'BYTES',
  date: 'DATE',
  'date-time': 'TIMESTAMP',
  // 64-bit integers are strings on the wire
  int64: 'STRING',
  uint64: 'STRING',
};

/**
 * Column type for a scalar type node.
 */
export function toScalarType(node: { type?: unknown; format?: unknown }): ScalarType {
  const format = typeof node.format === 'string' ? node.format : '';
  switch (node.type) {
    case 'boolean':
      return 'BOOLEAN';
    case 'integer':
      return 'INT64';
    case 'number':
      return format === 'double' ? 'FLOAT64' : 'FLOAT';
    case 'string':
      return Object.hasOwn(STRING_FORMATS, format) ? STRING_FORMATS[format] : 'STRING';
    default:
      return 'STRING';
  }
}
