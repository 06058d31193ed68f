export class SchemaNotFoundError extends Error {
  readonly schemaName: string;

  constructor(schemaName: string) {
    super(`Schema "${schemaName}" is not defined in the interface document`);
    this.name = 'SchemaNotFoundError';
    this.schemaName = schemaName;
  }
}

/**
 * The walker was asked for a tabular shape of something that is not a record.
 */
export class UnhandledSchemaError extends Error {
  readonly schemaName: string;

  constructor(schemaName: string, reason: string) {
    super(`Cannot reflect "${schemaName}": ${reason}`);
    this.name = 'UnhandledSchemaError';
    this.schemaName = schemaName;
  }
}
