/**
 * @fileoverview Built-in tactical-pattern rules
 *
 * Declaration order here is the catalog order: it breaks severity ties in the
 * action list, so new rules go at the end of their category block.
 *
 * References:
 * - Evans, "Domain-Driven Design" (2003), part II
 * - Vernon, "Implementing Domain-Driven Design" (2013)
 */

import { Errors } from '../core/errors.js';
import {
  compareDeclarationOrder,
  type DiscoveredType,
  type FieldDescriptor,
  type TypeDescriptor,
} from '../descriptors/types.js';
import { eventBaseName, splitIdentifier } from './past_tense.js';
import {
  fail,
  notApplicable,
  pass,
  type Rule,
  type RuleContext,
  type RulePredicate,
} from './types.js';

// ============================================================================
// SHARED PREDICATE HELPERS
// ============================================================================

function writableFields(descriptor: TypeDescriptor): FieldDescriptor[] {
  return descriptor.fields.filter((field) => field.writable);
}

/** Writable fields first, then methods other than the constructor that assign to instance state. */
function mutationEvidence(descriptor: TypeDescriptor): string[] {
  return [
    ...writableFields(descriptor).map((field) => `field "${field.name}" is writable after construction`),
    ...descriptor.methods
      .filter((method) => method.kind !== 'constructor' && method.mutatesState)
      .map((method) => `method "${method.name}" modifies state after construction`),
  ];
}

function requireIdentity(descriptor: TypeDescriptor, context: RuleContext): string[] {
  const identity = context.identityFieldsOf(descriptor);
  if (identity.length === 0) {
    throw Errors.malformed(descriptor.name, 'an identity field');
  }
  return identity;
}

function namesInDeclarationOrder(types: DiscoveredType[]): string[] {
  return [...types].sort(compareDeclarationOrder).map((type) => type.descriptor.name);
}

/** Identifiers mentioned in a declared type, e.g. `Array<Order | null>` -> Array, Order */
function referencedTypeNames(typeName: string | undefined): string[] {
  return typeName?.match(/[A-Za-z_$][A-Za-z0-9_$]*/g) ?? [];
}

const identityEquality: RulePredicate = ({ descriptor }, context) => {
  const { equality } = descriptor;
  if (equality.kind === 'none') {
    return notApplicable('No equality implementation; instances compare by reference');
  }
  const identity = requireIdentity(descriptor, context);
  if (equality.fields.length === 0) {
    if (equality.kind === 'identity') return pass();
    throw Errors.malformed(descriptor.name, 'equality.fields', `Type ${descriptor.name} declares attribute equality without listing the compared fields`);
  }
  const extra = equality.fields.filter((field) => !identity.includes(field));
  if (extra.length === 0) return pass();
  return fail(extra.map((field) => `equality compares non-identity field "${field}"`));
};

const aggregateMember = (type: DiscoveredType, context: RuleContext): boolean => {
  const category = context.classificationOf(type);
  return category === 'entity' || category === 'aggregate';
};

// ============================================================================
// VOCABULARIES
// ============================================================================

const COLLECTION_VERBS = new Set([
  'add', 'all', 'by', 'contains', 'count', 'delete', 'exists', 'find', 'get', 'has',
  'list', 'load', 'next', 'of', 'put', 'remove', 'save', 'size', 'store', 'update',
]);

const TIMESTAMP_FIELDS = ['occurredAt', 'occurredOn', 'timestamp'];

const TECHNICAL_SUFFIXES = ['Dto', 'DTO', 'Impl', 'Data', 'Info', 'Manager', 'Helper', 'Utils', 'Util'];

// ============================================================================
// RULES
// ============================================================================

export const BUILTIN_RULES: readonly Rule[] = [
  // =========================================================================
  // ENTITIES
  // =========================================================================
  {
    id: 'ENT-001',
    category: 'entity',
    title: 'Identity-based equality',
    severity: 'high',
    message: 'Entity {type} compares attributes other than its identity',
    fixSuggestion: 'Make {type}.equals compare only the identity field',
    reference: 'Evans 2003, ch. 5 "Entities"',
    heuristic: false,
    check: identityEquality,
  },
  {
    id: 'ENT-002',
    category: 'entity',
    title: 'Entity carries behavior',
    severity: 'medium',
    message: 'Entity {type} is anemic: it only exposes getters and setters',
    fixSuggestion: 'Move the business operations that change {type} onto {type} itself',
    reference: 'Vernon 2013, ch. 5 "Entities"',
    heuristic: false,
    check: ({ descriptor }) => {
      const behaviour = descriptor.methods.filter((method) => method.kind !== 'constructor');
      if (behaviour.some((method) => !method.pureAccessor)) return pass();
      if (behaviour.length === 0) return fail(['declares no methods']);
      return fail(behaviour.map((method) => `${method.name} only reads or assigns a field`));
    },
  },
  {
    id: 'ENT-003',
    category: 'entity',
    title: 'Immutable identity',
    severity: 'high',
    message: 'Entity {type} lets its identity change after construction',
    fixSuggestion: 'Declare the identity of {type} readonly and set it once in the constructor',
    reference: 'Evans 2003, ch. 5 "Entities"',
    heuristic: false,
    check: ({ descriptor }, context) => {
      const identity = requireIdentity(descriptor, context);
      const writable = descriptor.fields.filter((field) => identity.includes(field.name) && field.writable);
      if (writable.length === 0) return pass();
      return fail(writable.map((field) => `identity field "${field.name}" is writable`));
    },
  },

  // =========================================================================
  // VALUE OBJECTS
  // =========================================================================
  {
    id: 'VO-001',
    category: 'value-object',
    title: 'Value object immutability',
    severity: 'critical',
    message: 'Value object {type} can be modified after construction',
    fixSuggestion: 'Make every field of {type} readonly and return new instances instead of mutating',
    reference: 'Evans 2003, ch. 5 "Value Objects"',
    heuristic: false,
    check: ({ descriptor }) => {
      const evidence = mutationEvidence(descriptor);
      return evidence.length === 0 ? pass() : fail(evidence);
    },
  },
  {
    id: 'VO-002',
    category: 'value-object',
    title: 'Self-validating value object',
    severity: 'medium',
    message: 'Value object {type} accepts any input without validating it',
    fixSuggestion: 'Validate the domain constraints of {type} in its constructor or factory and reject invalid values',
    reference: 'Vernon 2013, ch. 6 "Value Objects"',
    heuristic: false,
    check: ({ descriptor }) => {
      if (descriptor.declarationKind === 'interface') {
        return notApplicable('Interfaces declare no construction logic');
      }
      const creators = descriptor.methods.filter(
        (method) => method.kind === 'constructor' || method.kind === 'factory',
      );
      if (creators.some((method) => method.validates)) return pass();
      if (creators.length === 0) return fail(['no constructor or factory method']);
      return fail(creators.map((method) => `${method.name} does not validate its input`));
    },
  },
  {
    id: 'VO-003',
    category: 'value-object',
    title: 'Attribute-based equality',
    severity: 'medium',
    message: 'Value object {type} does not compare all of its attributes',
    fixSuggestion: 'Make {type}.equals compare every attribute',
    reference: 'Evans 2003, ch. 5 "Value Objects"',
    heuristic: false,
    check: ({ descriptor }) => {
      const { equality } = descriptor;
      if (equality.kind === 'none') {
        return notApplicable('No equality implementation; instances compare by reference');
      }
      if (equality.kind === 'identity') return fail(['equality compares identity instead of attributes']);
      const missing = descriptor.fields.filter((field) => !equality.fields.includes(field.name));
      if (missing.length === 0) return pass();
      return fail(missing.map((field) => `equality ignores field "${field.name}"`));
    },
  },

  // =========================================================================
  // AGGREGATES
  // =========================================================================
  {
    id: 'AGG-001',
    category: 'aggregate',
    title: 'Single aggregate root',
    severity: 'critical',
    message: 'Aggregate {type} shares its cluster with other externally referenced entities',
    fixSuggestion: 'Route outside access to the cluster of {type} through {type} only',
    reference: 'Evans 2003, ch. 6 "Aggregates"',
    heuristic: false,
    check: ({ descriptor }, context) => {
      const { cluster } = descriptor;
      if (cluster === undefined) {
        throw Errors.malformed(descriptor.name, 'cluster');
      }
      const referenced = context.types.filter(
        (type) =>
          type.descriptor.cluster === cluster &&
          type.descriptor.externallyReferenced === true &&
          aggregateMember(type, context),
      );
      if (referenced.length <= 1) return pass();
      return fail(
        namesInDeclarationOrder(referenced).map((name) => `"${name}" is referenced from outside cluster "${cluster}"`),
      );
    },
  },
  {
    id: 'AGG-002',
    category: 'aggregate',
    title: 'Root equality by identity',
    severity: 'high',
    message: 'Aggregate root {type} compares attributes other than its identity',
    fixSuggestion: 'Make {type}.equals compare only the identity field',
    reference: 'Evans 2003, ch. 5 "Entities"',
    heuristic: false,
    check: identityEquality,
  },
  {
    id: 'AGG-003',
    category: 'aggregate',
    title: 'Encapsulated root state',
    severity: 'high',
    message: 'Aggregate root {type} exposes writable state',
    fixSuggestion: 'Make the fields of {type} private or readonly and change them through intention-revealing methods',
    reference: 'Vernon 2013, ch. 10 "Aggregates"',
    heuristic: false,
    check: ({ descriptor }) => {
      const exposed = descriptor.fields.filter((field) => field.visibility === 'public' && field.writable);
      if (exposed.length === 0) return pass();
      return fail(exposed.map((field) => `public field "${field.name}" is writable from outside`));
    },
  },
  {
    id: 'AGG-004',
    category: 'aggregate',
    title: 'Reference other aggregates by identity',
    severity: 'medium',
    message: 'Aggregate root {type} holds other aggregate roots directly',
    fixSuggestion: 'Store the identity of the other aggregate in {type} instead of the aggregate itself',
    reference: 'Vernon 2013, ch. 10 "Reference Other Aggregates by Identity"',
    heuristic: false,
    check: ({ descriptor }, context) => {
      const otherRoots = new Set(
        context.types
          .filter((type) => type.descriptor.name !== descriptor.name && context.classificationOf(type) === 'aggregate')
          .map((type) => type.descriptor.name),
      );
      const evidence: string[] = [];
      for (const field of descriptor.fields) {
        const held = referencedTypeNames(field.typeName).find((name) => otherRoots.has(name));
        if (held !== undefined) {
          evidence.push(`field "${field.name}" holds aggregate "${held}"`);
        }
      }
      return evidence.length === 0 ? pass() : fail(evidence);
    },
  },

  // =========================================================================
  // REPOSITORIES
  // =========================================================================
  {
    id: 'REP-001',
    category: 'repository',
    title: 'One repository per aggregate root',
    severity: 'high',
    message: 'Repository {type} does not map one-to-one onto an aggregate root',
    fixSuggestion: 'Keep exactly one repository interface per aggregate root and point {type} at a root',
    reference: 'Evans 2003, ch. 6 "Repositories"',
    heuristic: false,
    check: ({ descriptor }, context) => {
      if (descriptor.declarationKind === 'class') {
        return notApplicable('Concrete repository adapter; the one-to-one rule checks repository interfaces');
      }
      const target = descriptor.repositoryTarget;
      if (target === undefined) {
        throw Errors.malformed(descriptor.name, 'repositoryTarget');
      }

      const interfaces = context.types.filter(
        (type) => type.descriptor.declarationKind !== 'class' && context.classificationOf(type) === 'repository',
      );
      const roots = new Set(
        context.types
          .filter((type) => context.classificationOf(type) === 'aggregate')
          .map((type) => type.descriptor.name),
      );
      const evidence: string[] = [];

      if (!roots.has(target)) {
        evidence.push(`targets "${target}", which is not an aggregate root`);
      }
      const sameTarget = interfaces.filter((type) => type.descriptor.repositoryTarget === target);
      if (sameTarget.length > 1) {
        evidence.push(`repositories targeting "${target}": ${namesInDeclarationOrder(sameTarget).join(', ')}`);
      }
      const repositoryNames = new Set(interfaces.map((type) => type.descriptor.name));
      if (repositoryNames.size > roots.size) {
        evidence.push(`${repositoryNames.size} repository interfaces for ${roots.size} aggregate roots`);
      }
      return evidence.length === 0 ? pass() : fail(evidence);
    },
  },
  {
    id: 'REP-002',
    category: 'repository',
    title: 'Collection-style repository',
    severity: 'low',
    message: 'Repository {type} exposes operations beyond storing and retrieving aggregates',
    fixSuggestion: 'Move query or business logic out of {type} into a query service or the aggregate',
    reference: 'Evans 2003, ch. 6 "Repositories"',
    heuristic: true,
    check: ({ descriptor }) => {
      const offending = descriptor.methods.filter((method) => {
        if (method.kind === 'constructor' || method.kind === 'getter' || method.kind === 'setter') return false;
        const verb = splitIdentifier(method.name)[0]?.toLowerCase() ?? '';
        return !COLLECTION_VERBS.has(verb);
      });
      if (offending.length === 0) return pass();
      return fail(offending.map((method) => `${method.name} is not a collection-style operation`));
    },
  },

  // =========================================================================
  // DOMAIN SERVICES
  // =========================================================================
  {
    id: 'SVC-001',
    category: 'domain-service',
    title: 'Stateless domain service',
    severity: 'medium',
    message: 'Domain service {type} keeps mutable state',
    fixSuggestion: 'Make the dependencies of {type} readonly and pass per-call data as arguments',
    reference: 'Evans 2003, ch. 5 "Services"',
    heuristic: false,
    check: ({ descriptor }) => {
      const evidence = mutationEvidence(descriptor);
      return evidence.length === 0 ? pass() : fail(evidence);
    },
  },

  // =========================================================================
  // DOMAIN EVENTS
  // =========================================================================
  {
    id: 'EVT-001',
    category: 'domain-event',
    title: 'Past-tense event name',
    severity: 'low',
    message: 'Domain event {type} is not named in the past tense',
    fixSuggestion: 'Rename {type} to describe something that already happened, e.g. OrderPlaced',
    reference: 'Vernon 2013, ch. 8 "Domain Events"',
    heuristic: true,
    check: ({ descriptor }, context) => {
      const words = splitIdentifier(eventBaseName(descriptor.name));
      const last = words[words.length - 1];
      if (last === undefined) {
        throw Errors.malformed(descriptor.name, 'a name made of words');
      }
      return context.isPastTense(last) ? pass() : fail([`"${last}" does not read as past tense`]);
    },
  },
  {
    id: 'EVT-002',
    category: 'domain-event',
    title: 'Immutable domain event',
    severity: 'high',
    message: 'Domain event {type} can be modified after it was raised',
    fixSuggestion: 'Make every field of {type} readonly and drop methods that change it',
    reference: 'Vernon 2013, ch. 8 "Domain Events"',
    heuristic: false,
    check: ({ descriptor }) => {
      const evidence = mutationEvidence(descriptor);
      return evidence.length === 0 ? pass() : fail(evidence);
    },
  },
  {
    id: 'EVT-003',
    category: 'domain-event',
    title: 'Event records when it occurred',
    severity: 'low',
    message: 'Domain event {type} does not record when it occurred',
    fixSuggestion: 'Add a readonly occurredAt field to {type}',
    reference: 'Vernon 2013, ch. 8 "Domain Events"',
    heuristic: false,
    check: ({ descriptor }) => {
      const hasTimestamp = descriptor.fields.some((field) => TIMESTAMP_FIELDS.includes(field.name));
      return hasTimestamp ? pass() : fail([`no ${TIMESTAMP_FIELDS.join(' / ')} field`]);
    },
  },

  // =========================================================================
  // NAMING
  // =========================================================================
  {
    id: 'NAM-001',
    category: 'naming',
    appliesTo: ['entity', 'value-object', 'aggregate', 'domain-service'],
    title: 'Ubiquitous-language type names',
    severity: 'low',
    message: '{type} is named after a technical role rather than a domain concept',
    fixSuggestion: 'Rename {type} using a term from the ubiquitous language',
    reference: 'Evans 2003, ch. 2 "Ubiquitous Language"',
    heuristic: true,
    check: ({ descriptor }) => {
      const suffix = TECHNICAL_SUFFIXES.find(
        (candidate) => descriptor.name.length > candidate.length && descriptor.name.endsWith(candidate),
      );
      return suffix === undefined ? pass() : fail([`name ends with technical suffix "${suffix}"`]);
    },
  },
  {
    id: 'NAM-002',
    category: 'naming',
    appliesTo: ['repository'],
    title: 'Repository named after its aggregate',
    severity: 'low',
    message: 'Repository {type} is not named after the aggregate it stores',
    fixSuggestion: 'Name {type} after its aggregate root, e.g. OrderRepository',
    reference: 'Evans 2003, ch. 6 "Repositories"',
    heuristic: false,
    check: ({ descriptor }) => {
      const target = descriptor.repositoryTarget;
      if (target === undefined) {
        throw Errors.malformed(descriptor.name, 'repositoryTarget');
      }
      const expected = `${target}Repository`;
      return descriptor.name.endsWith(expected) ? pass() : fail([`expected a name ending in "${expected}"`]);
    },
  },
];
