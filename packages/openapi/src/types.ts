import { z } from 'zod';

/**
 * OpenAPI 3.x / Swagger 2.0 shapes, parsed only as far as the index needs.
 * Everything else passes through untouched.
 */

const SchemaObject = z.record(z.unknown());

export const ParameterObjectSchema = z
  .object({
    name: z.string().min(1),
    in: z.enum(['query', 'path', 'header', 'cookie', 'body', 'formData']),
    description: z.string().optional(),
    required: z.boolean().optional(),
    schema: SchemaObject.optional(),
    // Swagger 2.0 carries the type on the parameter itself
    type: z.string().optional(),
    enum: z.array(z.unknown()).optional(),
    items: SchemaObject.optional(),
  })
  .passthrough();

export type ParameterObject = z.infer<typeof ParameterObjectSchema>;

export const MediaTypeObjectSchema = z.object({ schema: z.unknown().optional() }).passthrough();

export const RequestBodyObjectSchema = z
  .object({
    description: z.string().optional(),
    required: z.boolean().optional(),
    content: z.record(MediaTypeObjectSchema).optional(),
  })
  .passthrough();

export type RequestBodyObject = z.infer<typeof RequestBodyObjectSchema>;

export const ResponseObjectSchema = z
  .object({
    description: z.string().optional(),
    content: z.record(MediaTypeObjectSchema).optional(),
    // Swagger 2.0
    schema: z.unknown().optional(),
  })
  .passthrough();

export const OperationObjectSchema = z
  .object({
    operationId: z.string().optional(),
    summary: z.string().optional(),
    description: z.string().optional(),
    tags: z.array(z.string()).optional(),
    parameters: z.array(z.unknown()).optional(),
    requestBody: z.unknown().optional(),
    responses: z.record(z.unknown()).optional(),
  })
  .passthrough();

export type OperationObject = z.infer<typeof OperationObjectSchema>;

export const OpenAPIDocumentSchema = z
  .object({
    openapi: z.string().optional(),
    swagger: z.string().optional(),
    info: z
      .object({
        title: z.string().optional(),
        version: z.union([z.string(), z.number()]).optional(),
        description: z.string().optional(),
      })
      .passthrough()
      .optional(),
    servers: z.array(z.object({ url: z.string() }).passthrough()).optional(),
    paths: z.record(z.record(z.unknown())),
    components: z.record(z.unknown()).optional(),
    definitions: z.record(z.unknown()).optional(),
  })
  .passthrough();

export type OpenAPIDocument = z.infer<typeof OpenAPIDocumentSchema>;

export interface CatalogIndexOptions {
  /** How many nested $ref hops are inlined before the truncation marker */
  maxRefDepth?: number;
  /** Leading path segments skipped for naming and tagging, besides vN */
  ignoredPrefixes?: readonly string[];
}

export const DEFAULT_MAX_REF_DEPTH = 4;
export const DEFAULT_IGNORED_PREFIXES: readonly string[] = ['api'];
