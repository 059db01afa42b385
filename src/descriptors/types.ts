/**
 * @fileoverview Structural descriptors of discovered domain types
 *
 * A TypeDescriptor is a read-only snapshot of one class or interface, built by
 * the source scanner or loaded from a descriptor file. Rules only ever look at
 * these snapshots, never at source text.
 */

// ============================================================================
// CATEGORIES
// ============================================================================

export const TYPE_CATEGORIES = [
  'entity',
  'value-object',
  'aggregate',
  'repository',
  'domain-service',
  'domain-event',
] as const;

export type TypeCategory = (typeof TYPE_CATEGORIES)[number];

/** Result of classification; `unknown` types are reported as coverage gaps. */
export type Classification = TypeCategory | 'unknown';

export function isTypeCategory(value: string): value is TypeCategory {
  return (TYPE_CATEGORIES as readonly string[]).includes(value);
}

// ============================================================================
// DESCRIPTOR SHAPE
// ============================================================================

export type DeclarationKind = 'class' | 'abstract-class' | 'interface';

export type Visibility = 'public' | 'protected' | 'private';

export interface FieldDescriptor {
  name: string;
  /** Declared type as written, e.g. `UserId` or `Promise<Order | null>` */
  typeName?: string;
  /** Assignable after construction */
  writable: boolean;
  visibility: Visibility;
  /** Explicitly marked as the persistent identity */
  identity?: boolean;
}

export type MethodKind = 'constructor' | 'factory' | 'instance' | 'static' | 'getter' | 'setter';

export interface MethodDescriptor {
  name: string;
  kind: MethodKind;
  /** Body only assigns a parameter to a field or returns a field */
  pureAccessor: boolean;
  /** Body rejects invalid input (throws or calls a guard) */
  validates: boolean;
  /** Body assigns to instance state */
  mutatesState: boolean;
  parameterTypes?: string[];
  returnType?: string;
}

export type EqualityKind = 'identity' | 'attributes' | 'none';

export interface EqualityDescriptor {
  kind: EqualityKind;
  /** Fields the equality implementation compares */
  fields: string[];
}

export interface SourceLocation {
  file: string;
  line: number;
}

export interface TypeDescriptor {
  name: string;
  declarationKind: DeclarationKind;
  categoryHint?: TypeCategory;
  fields: FieldDescriptor[];
  methods: MethodDescriptor[];
  equality: EqualityDescriptor;
  /** Base classes, implemented interfaces and decorators */
  capabilities: string[];
  cluster?: string;
  externallyReferenced?: boolean;
  repositoryTarget?: string;
  location?: SourceLocation;
}

/** A descriptor paired with its position in the discovered sequence. */
export interface DiscoveredType {
  readonly index: number;
  readonly descriptor: TypeDescriptor;
}

export function discover(descriptors: readonly TypeDescriptor[]): DiscoveredType[] {
  return descriptors.map((descriptor, index) => ({ index, descriptor }));
}

// ============================================================================
// DECLARATION ORDER
// ============================================================================

/**
 * Total order over types that does not depend on discovery order:
 * file, then line, then name, then cluster. Discovery index only breaks
 * exact ties.
 */
export function compareDeclarationOrder(a: DiscoveredType, b: DiscoveredType): number {
  const fileA = a.descriptor.location?.file ?? '';
  const fileB = b.descriptor.location?.file ?? '';
  if (fileA !== fileB) return fileA < fileB ? -1 : 1;

  const lineA = a.descriptor.location?.line ?? 0;
  const lineB = b.descriptor.location?.line ?? 0;
  if (lineA !== lineB) return lineA - lineB;

  if (a.descriptor.name !== b.descriptor.name) {
    return a.descriptor.name < b.descriptor.name ? -1 : 1;
  }

  const clusterA = a.descriptor.cluster ?? '';
  const clusterB = b.descriptor.cluster ?? '';
  if (clusterA !== clusterB) return clusterA < clusterB ? -1 : 1;
  return a.index - b.index;
}
