/**
 * @fileoverview Zod schemas for descriptor files
 *
 * Descriptor files let any external scanner feed the analyzer. The schema
 * mirrors `TypeDescriptor` and fills in defaults for optional flags.
 */

import { z } from 'zod';
import { TYPE_CATEGORIES } from './types.js';

export const DESCRIPTOR_SCHEMA_VERSION = 1;

export const TypeCategorySchema = z.enum(TYPE_CATEGORIES);

export const FieldDescriptorSchema = z.object({
  name: z.string().min(1),
  typeName: z.string().optional(),
  writable: z.boolean(),
  visibility: z.enum(['public', 'protected', 'private']).default('public'),
  identity: z.boolean().optional(),
});

export const MethodDescriptorSchema = z.object({
  name: z.string().min(1),
  kind: z.enum(['constructor', 'factory', 'instance', 'static', 'getter', 'setter']).default('instance'),
  pureAccessor: z.boolean(),
  validates: z.boolean().default(false),
  mutatesState: z.boolean().default(false),
  parameterTypes: z.array(z.string()).optional(),
  returnType: z.string().optional(),
});

export const EqualityDescriptorSchema = z.object({
  kind: z.enum(['identity', 'attributes', 'none']),
  fields: z.array(z.string()).default([]),
});

export const TypeDescriptorSchema = z.object({
  name: z.string().min(1),
  declarationKind: z.enum(['class', 'abstract-class', 'interface']).default('class'),
  categoryHint: TypeCategorySchema.optional(),
  fields: z.array(FieldDescriptorSchema).default([]),
  methods: z.array(MethodDescriptorSchema).default([]),
  equality: EqualityDescriptorSchema.default({ kind: 'none', fields: [] }),
  capabilities: z.array(z.string()).default([]),
  cluster: z.string().optional(),
  externallyReferenced: z.boolean().optional(),
  repositoryTarget: z.string().optional(),
  location: z.object({
    file: z.string(),
    line: z.number().int().nonnegative(),
  }).optional(),
});

export const DescriptorListSchema = z.array(TypeDescriptorSchema);

export const DescriptorEnvelopeSchema = z.object({
  version: z.literal(DESCRIPTOR_SCHEMA_VERSION),
  types: DescriptorListSchema,
});

/** Either a bare array of descriptors or a versioned envelope. */
export const DescriptorFileSchema = z.union([DescriptorListSchema, DescriptorEnvelopeSchema]);

export type DescriptorFileInput = z.input<typeof DescriptorFileSchema>;
