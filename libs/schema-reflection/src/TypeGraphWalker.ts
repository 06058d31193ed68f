import { createConsoleLogger, type Logger } from '@discovery-engine/http-core';
import {
  DEFAULT_RECURSION_DEPTH,
  findMethod,
  type InterfaceDocument,
  type TypeNode,
} from '@discovery-engine/discovery-client';
import { SchemaNotFoundError, UnhandledSchemaError } from './errors';
import { toScalarType } from './scalarTypes';
import type { FieldMode, ObjectTree, ObjectTreeNode, SchemaField } from './types';

export const DESCRIPTION_MAX_LENGTH = 1024;

export interface TypeGraphWalkerOptions {
  /** How many times one reference may be expanded along a single branch. */
  maxDepth?: number;
  logger?: Logger;
}

/** Visit counts of the references currently open on the branch being walked. */
type Visits = Map<string, number>;

interface ShapeNode {
  type?: string;
  properties?: Record<string, unknown>;
  items?: unknown;
  additionalProperties?: unknown;
}

const isRecordShape = (node: ShapeNode): boolean =>
  node.properties !== undefined && Object.keys(node.properties).length > 0;

const isArrayShape = (node: ShapeNode): boolean => node.type === 'array' || node.items !== undefined;

const isMapShape = (node: ShapeNode): boolean =>
  node.additionalProperties !== undefined && node.additionalProperties !== false && !isRecordShape(node);

const sortedKeys = (record: Record<string, unknown>): string[] => Object.keys(record).sort();

const joinPath = (path: string, name: string): string => (path ? `${path}.${name}` : name);

function enumDescription(node: { enum?: string[] }): { description?: string } {
  if (!node.enum || node.enum.length === 0) return {};
  return { description: node.enum.join(', ').slice(0, DESCRIPTION_MAX_LENGTH) };
}

/**
 * Walks the named schemas of an interface document and renders them as
 * column schemas, expanded object trees or SQL struct literals.
 *
 * Self-referencing types are cut off once the same reference has been
 * expanded `maxDepth` times on the current branch; sibling branches keep
 * their own budget.
 */
export class TypeGraphWalker {
  private readonly maxDepth: number;
  private readonly logger: Logger;

  constructor(
    private readonly document: InterfaceDocument,
    options: TypeGraphWalkerOptions = {},
  ) {
    this.maxDepth = options.maxDepth ?? DEFAULT_RECURSION_DEPTH;
    this.logger = options.logger ?? createConsoleLogger('schema-reflection');
  }

  toSchema(node: TypeNode): SchemaField[] {
    const root = this.recordRoot(node);
    return this.schemaFields(root.properties ?? {}, new Map(), '');
  }

  toObjectTree(node: TypeNode): ObjectTree {
    const root = this.recordRoot(node);
    return this.expandProperties(root.properties ?? {}, new Map());
  }

  toStructLiteral(node: TypeNode, indent = 2): string {
    return this.structFields(this.toObjectTree(node), indent, '');
  }

  resourceSchema(name: string): SchemaField[] {
    return this.toSchema(this.lookup(name));
  }

  resourceTree(name: string): ObjectTree {
    return this.toObjectTree(this.lookup(name));
  }

  resourceStruct(name: string, indent = 2): string {
    return this.toStructLiteral(this.lookup(name), indent);
  }

  /**
   * Schema of one row returned by a method. List responses are unwrapped to
   * their element type when `iterate` is set, when the response is named
   * `List...Response`, or when it holds exactly one array field.
   */
  methodSchema(dotPath: string, iterate = false): SchemaField[] {
    const response = this.responseOf(dotPath);
    if (!response) return [];

    const schema = this.toSchema(response.node);
    const listField = this.listField(response.name, response.node, iterate);
    const entry = listField === undefined ? undefined : schema.find((field) => field.name === listField);
    if (!entry) return schema;

    return entry.type === 'RECORD' ? entry.fields ?? [] : [{ ...entry, mode: 'NULLABLE' }];
  }

  methodStruct(dotPath: string, iterate = false, indent = 2): string {
    const response = this.responseOf(dotPath);
    if (!response) return '';

    const tree = this.toObjectTree(response.node);
    const listField = this.listField(response.name, response.node, iterate);
    const wrapper = listField === undefined ? undefined : tree[listField];
    if (listField === undefined || !wrapper) return this.structFields(tree, indent, '');

    const element = wrapper.items === undefined ? {} : wrapper.items;
    if (element !== null && element.properties && isRecordShape(element)) {
      return this.structFields(element.properties, indent, listField);
    }
    return this.structField(listField, element, indent, listField) ?? '';
  }

  private lookup(name: string): TypeNode {
    if (!Object.hasOwn(this.document.schemas, name)) {
      throw new SchemaNotFoundError(name);
    }
    return this.document.schemas[name];
  }

  private recordRoot(node: TypeNode): TypeNode {
    const root = node.$ref === undefined ? node : this.lookup(node.$ref);
    if (!isRecordShape(root)) {
      throw new UnhandledSchemaError(node.$ref ?? root.id ?? '(inline)', 'not an object with properties');
    }
    return root;
  }

  private responseOf(dotPath: string): { name: string; node: TypeNode } | undefined {
    const method = findMethod(this.document, dotPath);
    if (!method.response) return undefined;
    const name = method.response.$ref;
    return { name, node: this.lookup(name) };
  }

  private listField(name: string, node: TypeNode, iterate: boolean): string | undefined {
    const properties = node.properties ?? {};
    const arrays = sortedKeys(properties).filter((key) => isArrayShape(this.dereference(properties[key])));
    if (arrays.length === 0) return undefined;

    const namedAsList = name.includes('List') && name.endsWith('Response');
    return iterate || namedAsList || arrays.length === 1 ? arrays[0] : undefined;
  }

  private dereference(node: TypeNode): TypeNode {
    return node.$ref === undefined ? node : this.lookup(node.$ref);
  }

  private schemaFields(properties: Record<string, TypeNode>, visits: Visits, path: string): SchemaField[] {
    const fields: SchemaField[] = [];
    for (const key of sortedKeys(properties)) {
      const field = this.schemaField(key, properties[key], visits, joinPath(path, key), 'NULLABLE');
      if (field) fields.push(field);
    }
    return fields;
  }

  private schemaField(
    name: string,
    node: TypeNode,
    visits: Visits,
    path: string,
    mode: FieldMode,
  ): SchemaField | undefined {
    if (node.$ref !== undefined) {
      const ref = node.$ref;
      const target = this.lookup(ref);
      const count = visits.get(ref) ?? 0;
      if (count >= this.maxDepth) {
        return { name, type: 'STRING', mode };
      }
      visits.set(ref, count + 1);
      try {
        return this.schemaField(name, target, visits, path, mode);
      } finally {
        visits.set(ref, count);
      }
    }

    if (isRecordShape(node)) {
      return { name, type: 'RECORD', mode, fields: this.schemaFields(node.properties ?? {}, visits, path) };
    }

    if (isArrayShape(node)) {
      // columns cannot repeat twice; nested lists land as strings
      if (mode === 'REPEATED') return { name, type: 'STRING', mode };
      return this.schemaField(name, node.items ?? {}, visits, path, 'REPEATED');
    }

    if (isMapShape(node)) {
      this.logger.warn('schema.skip_map', { field: path });
      return undefined;
    }

    return { name, type: toScalarType(node), mode, ...enumDescription(node) };
  }

  private expandProperties(properties: Record<string, TypeNode>, visits: Visits): ObjectTree {
    const tree: ObjectTree = {};
    for (const key of sortedKeys(properties)) {
      tree[key] = this.expandNode(properties[key], visits);
    }
    return tree;
  }

  private expandNode(node: TypeNode, visits: Visits): ObjectTreeNode | null {
    const { $ref, properties, items, additionalProperties, ...metadata } = node;

    if ($ref !== undefined) {
      const target = this.lookup($ref);
      const count = visits.get($ref) ?? 0;
      if (count >= this.maxDepth) return null;
      visits.set($ref, count + 1);
      try {
        const expanded = this.expandNode(target, visits);
        return expanded === null ? null : { ...expanded, ...cloneMetadata(metadata) };
      } finally {
        visits.set($ref, count);
      }
    }

    const copy = cloneMetadata(metadata);
    if (properties !== undefined) copy.properties = this.expandProperties(properties, visits);
    if (items !== undefined) copy.items = this.expandNode(items, visits);
    if (additionalProperties !== undefined) {
      copy.additionalProperties =
        typeof additionalProperties === 'boolean' ? additionalProperties : this.expandNode(additionalProperties, visits);
    }
    return copy;
  }

  private structFields(tree: ObjectTree, indent: number, path: string): string {
    const lines: string[] = [];
    for (const key of sortedKeys(tree)) {
      const line = this.structField(key, tree[key], indent, joinPath(path, key));
      if (line !== undefined) lines.push(line);
    }
    return lines.join(',\n');
  }

  private structField(
    name: string,
    node: ObjectTreeNode | null,
    indent: number,
    path: string,
    repeated = false,
  ): string | undefined {
    const spaces = ' '.repeat(indent);
    // arrays may not hold NULL elements, so scalar lists render as empty typed arrays
    const leaf = (type: string): string =>
      repeated ? `${spaces}CAST([] AS ARRAY<${type}>) AS ${name}` : `${spaces}CAST(NULL AS ${type}) AS ${name}`;

    if (node === null) {
      return leaf('STRING');
    }

    if (node.properties && isRecordShape(node)) {
      const inner = this.structFields(node.properties, indent + 2, path);
      const struct = `STRUCT(\n${inner}\n${spaces})`;
      return `${spaces}${repeated ? `[${struct}]` : struct} AS ${name}`;
    }

    if (isArrayShape(node)) {
      if (repeated) return leaf('STRING');
      return this.structField(name, node.items === undefined ? {} : node.items, indent, path, true);
    }

    if (isMapShape(node)) {
      this.logger.warn('schema.skip_map', { field: path });
      return undefined;
    }

    return leaf(toScalarType(node));
  }
}

function cloneMetadata(metadata: Record<string, unknown>): ObjectTreeNode {
  const copy: ObjectTreeNode = {};
  for (const [key, value] of Object.entries(metadata)) {
    copy[key] = structuredClone(value);
  }
  return copy;
}
