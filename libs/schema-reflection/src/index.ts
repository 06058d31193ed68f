export { DESCRIPTION_MAX_LENGTH, TypeGraphWalker, type TypeGraphWalkerOptions } from './TypeGraphWalker';
export { createTypeGraphWalkerFromEnv, loadTypeGraphWalker } from './config';
export { SchemaNotFoundError, UnhandledSchemaError } from './errors';
export { toScalarType, type ScalarType } from './scalarTypes';
export type { FieldMode, FieldType, ObjectTree, ObjectTreeNode, SchemaField } from './types';
