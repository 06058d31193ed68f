import type { ScalarType } from './scalarTypes';

export type FieldMode = 'NULLABLE' | 'REPEATED';

export type FieldType = ScalarType | 'RECORD';

/** One column of a tabular schema. `fields` is set for RECORD columns. */
export interface SchemaField {
  name: string;
  type: FieldType;
  mode: FieldMode;
  fields?: SchemaField[];
  description?: string;
}

/**
 * A type node with every reference replaced by a copy of its target.
 * Truncated references are `null`.
 */
export interface ObjectTreeNode {
  type?: string;
  format?: string;
  description?: string;
  enum?: string[];
  properties?: ObjectTree;
  items?: ObjectTreeNode | null;
  additionalProperties?: ObjectTreeNode | null | boolean;
  [key: string]: unknown;
}

export type ObjectTree = Record<string, ObjectTreeNode | null>;
