/**
 * @fileoverview Type classification
 *
 * Assigns each descriptor exactly one category, or `unknown`. Checks run in a
 * fixed order, so the first match wins:
 *
 *   1. repository      - `Repository` suffix or capability, or a declared target
 *   2. domain-event    - hint, `DomainEvent` capability, or `Event` suffix
 *   3. domain-service  - hint, `DomainService` capability, or `Service` suffix
 *   4. identity field  - aggregate when hinted, marked `AggregateRoot` or named
 *                        after its cluster; entity otherwise
 *      (an explicit aggregate or entity marker without an identity field
 *      still classifies, and the identity rules report the gap)
 *   5. value-object    - hint or `ValueObject` capability, or all fields immutable
 *
 * An identity field outranks immutability and a value-object hint: a type
 * with an identity is an entity, never a value object.
 */

import type { Classification, TypeCategory, TypeDescriptor } from '../descriptors/types.js';

export type IdentityResolver = (descriptor: TypeDescriptor) => string[];

function normalize(value: string): string {
  return value.replace(/[^A-Za-z0-9]/g, '').toLowerCase();
}

function hasCapability(descriptor: TypeDescriptor, ...names: string[]): boolean {
  const wanted = new Set(names.map(normalize));
  return descriptor.capabilities.some((capability) => wanted.has(normalize(capability)));
}

function hinted(descriptor: TypeDescriptor, category: TypeCategory): boolean {
  return descriptor.categoryHint === category;
}

/** Clusters may be paths (`ordering/domain`); only the last segment names the cluster. */
function namedAfterCluster(descriptor: TypeDescriptor): boolean {
  if (descriptor.cluster === undefined) return false;
  const segments = descriptor.cluster.split('/');
  return normalize(segments[segments.length - 1]) === normalize(descriptor.name);
}

/**
 * Classify one descriptor. Pure: the result depends only on the descriptor and
 * the identity resolver.
 */
export function classify(descriptor: TypeDescriptor, identityFieldsOf: IdentityResolver): Classification {
  const { name } = descriptor;

  if (
    hinted(descriptor, 'repository') ||
    name.endsWith('Repository') ||
    hasCapability(descriptor, 'Repository') ||
    descriptor.repositoryTarget !== undefined
  ) {
    return 'repository';
  }

  if (hinted(descriptor, 'domain-event') || hasCapability(descriptor, 'DomainEvent') || name.endsWith('Event')) {
    return 'domain-event';
  }

  if (hinted(descriptor, 'domain-service') || hasCapability(descriptor, 'DomainService') || name.endsWith('Service')) {
    return 'domain-service';
  }

  if (identityFieldsOf(descriptor).length > 0) {
    if (hinted(descriptor, 'aggregate') || hasCapability(descriptor, 'AggregateRoot') || namedAfterCluster(descriptor)) {
      return 'aggregate';
    }
    return 'entity';
  }
  if (hinted(descriptor, 'aggregate') || hasCapability(descriptor, 'AggregateRoot')) {
    return 'aggregate';
  }
  if (hinted(descriptor, 'entity') || hasCapability(descriptor, 'Entity')) {
    return 'entity';
  }

  if (hinted(descriptor, 'value-object') || hasCapability(descriptor, 'ValueObject')) {
    return 'value-object';
  }
  if (descriptor.fields.length > 0 && descriptor.fields.every((field) => !field.writable)) {
    return 'value-object';
  }

  return 'unknown';
}
