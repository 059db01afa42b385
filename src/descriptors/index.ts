/**
 * @fileoverview Type descriptors: shape, schema and file I/O
 */

export {
  TYPE_CATEGORIES,
  isTypeCategory,
  discover,
  compareDeclarationOrder,
  type TypeCategory,
  type Classification,
  type DeclarationKind,
  type Visibility,
  type FieldDescriptor,
  type MethodKind,
  type MethodDescriptor,
  type EqualityKind,
  type EqualityDescriptor,
  type SourceLocation,
  type TypeDescriptor,
  type DiscoveredType,
} from './types.js';

export {
  DESCRIPTOR_SCHEMA_VERSION,
  TypeCategorySchema,
  FieldDescriptorSchema,
  MethodDescriptorSchema,
  EqualityDescriptorSchema,
  TypeDescriptorSchema,
  DescriptorListSchema,
  DescriptorEnvelopeSchema,
  DescriptorFileSchema,
  type DescriptorFileInput,
} from './schema.js';

export { parseDescriptors, loadDescriptorFile, serializeDescriptors } from './loader.js';
