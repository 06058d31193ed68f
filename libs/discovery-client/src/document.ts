import { z } from 'zod';

/**
 * A node of the document's type graph: a scalar, an object with properties,
 * an open map, an array, or a `$ref` to a named schema. Unknown keys
 * (`pattern`, `readOnly`, `annotations`, ...) are kept.
 */
export interface TypeNode {
  id?: string;
  type?: string;
  format?: string;
  description?: string;
  $ref?: string;
  enum?: string[];
  enumDescriptions?: string[];
  properties?: Record<string, TypeNode>;
  additionalProperties?: TypeNode | boolean;
  items?: TypeNode;
  repeated?: boolean;
  required?: boolean;
  [key: string]: unknown;
}

export const TypeNodeSchema: z.ZodType<TypeNode, z.ZodTypeDef, unknown> = z.lazy(() =>
  z
    .object({
      id: z.string().optional(),
      type: z.string().optional(),
      format: z.string().optional(),
      description: z.string().optional(),
      $ref: z.string().optional(),
      enum: z.array(z.string()).optional(),
      enumDescriptions: z.array(z.string()).optional(),
      properties: z.record(TypeNodeSchema).optional(),
      additionalProperties: z.union([TypeNodeSchema, z.boolean()]).optional(),
      items: TypeNodeSchema.optional(),
      repeated: z.boolean().optional(),
      required: z.boolean().optional(),
    })
    .passthrough(),
);

export const ParameterSchema = z
  .object({
    type: z.string().default('string'),
    format: z.string().optional(),
    location: z.enum(['path', 'query']).default('query'),
    required: z.boolean().optional(),
    repeated: z.boolean().optional(),
    enum: z.array(z.string()).optional(),
    description: z.string().optional(),
    pattern: z.string().optional(),
  })
  .passthrough();

export type ParameterNode = z.infer<typeof ParameterSchema>;

const SchemaRefSchema = z
  .object({
    $ref: z.string(),
    parameterName: z.string().optional(),
  })
  .passthrough();

const UploadProtocolSchema = z
  .object({
    multipart: z.boolean().optional(),
    path: z.string(),
  })
  .passthrough();

const MediaUploadSchema = z
  .object({
    accept: z.array(z.string()).optional(),
    maxSize: z.string().optional(),
    protocols: z
      .object({
        simple: UploadProtocolSchema.optional(),
        resumable: UploadProtocolSchema.optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type MediaUploadNode = z.infer<typeof MediaUploadSchema>;

export const MethodNodeSchema = z
  .object({
    id: z.string().optional(),
    path: z.string(),
    flatPath: z.string().optional(),
    httpMethod: z.enum(['GET', 'HEAD', 'OPTIONS', 'POST', 'PUT', 'PATCH', 'DELETE']),
    description: z.string().optional(),
    parameters: z.record(ParameterSchema).default({}),
    parameterOrder: z.array(z.string()).default([]),
    request: SchemaRefSchema.optional(),
    response: SchemaRefSchema.optional(),
    scopes: z.array(z.string()).optional(),
    supportsMediaUpload: z.boolean().optional(),
    mediaUpload: MediaUploadSchema.optional(),
  })
  .passthrough();

export type MethodNode = z.infer<typeof MethodNodeSchema>;

export interface ResourceNode {
  methods?: Record<string, MethodNode>;
  resources?: Record<string, ResourceNode>;
  [key: string]: unknown;
}

export const ResourceNodeSchema: z.ZodType<ResourceNode, z.ZodTypeDef, unknown> = z.lazy(() =>
  z
    .object({
      methods: z.record(MethodNodeSchema).optional(),
      resources: z.record(ResourceNodeSchema).optional(),
    })
    .passthrough(),
);

export const InterfaceDocumentSchema = z
  .object({
    kind: z.string().optional(),
    id: z.string().optional(),
    name: z.string(),
    version: z.string(),
    title: z.string().optional(),
    rootUrl: z.string(),
    servicePath: z.string().default(''),
    baseUrl: z.string().optional(),
    batchPath: z.string().optional(),
    parameters: z.record(ParameterSchema).default({}),
    schemas: z.record(TypeNodeSchema).default({}),
    resources: z.record(ResourceNodeSchema).default({}),
    methods: z.record(MethodNodeSchema).default({}),
  })
  .passthrough();

export type InterfaceDocument = z.infer<typeof InterfaceDocumentSchema>;

export function parseInterfaceDocument(value: unknown): InterfaceDocument {
  return InterfaceDocumentSchema.parse(value);
}

/** Root URL every method path is resolved against. */
export function serviceBaseUrl(document: InterfaceDocument): string {
  return document.baseUrl ?? `${document.rootUrl}${document.servicePath}`;
}

export const DirectoryListSchema = z.object({
  items: z
    .array(
      z
        .object({
          name: z.string(),
          version: z.string(),
          preferred: z.boolean().optional(),
        })
        .passthrough(),
    )
    .default([]),
});
