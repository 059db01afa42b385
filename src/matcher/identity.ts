import type { FieldDescriptor, TypeDescriptor } from '../descriptors/types.js';

export const DEFAULT_IDENTITY_FIELD_NAMES: readonly string[] = ['id'];

function lowerFirst(value: string): string {
  return value.length === 0 ? value : value[0].toLowerCase() + value.slice(1);
}

/**
 * Builds the identity-field lookup used by classification and by the
 * identity rules. A field explicitly marked `identity: false` is never an
 * identity field, whatever its name.
 */
export function createIdentityResolver(
  identityFieldNames: readonly string[] = DEFAULT_IDENTITY_FIELD_NAMES,
): (descriptor: TypeDescriptor) => string[] {
  const configured = new Set(identityFieldNames);

  const isIdentity = (descriptor: TypeDescriptor, field: FieldDescriptor): boolean => {
    if (field.identity !== undefined) return field.identity;
    if (configured.has(field.name)) return true;
    if (field.name === `${lowerFirst(descriptor.name)}Id`) return true;
    return field.typeName === `${descriptor.name}Id`;
  };

  return (descriptor) =>
    descriptor.fields.filter((field) => isIdentity(descriptor, field)).map((field) => field.name);
}
