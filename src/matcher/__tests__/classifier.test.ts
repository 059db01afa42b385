import { describe, it, expect } from 'vitest';
import { anemicUser, emailValueObject, field, typeDescriptor } from '../../__tests__/descriptor_fixtures.js';
import { classify } from '../classifier.js';
import { createIdentityResolver } from '../identity.js';

const identityFieldsOf = createIdentityResolver(['id']);

describe('classify', () => {
  it('classifies immutable identity-less types as value objects', () => {
    expect(classify(emailValueObject(), identityFieldsOf)).toBe('value-object');
  });

  it('classifies types with an identity field as entities', () => {
    expect(classify(anemicUser(), identityFieldsOf)).toBe('entity');
  });

  it('prefers entity over value object when a type has identity and immutable fields', () => {
    const customer = typeDescriptor('Customer', {
      categoryHint: 'value-object',
      fields: [field('id'), field('name')],
    });

    expect(classify(customer, identityFieldsOf)).toBe('entity');
  });

  it('classifies an identity type named after its cluster as an aggregate', () => {
    const order = typeDescriptor('Order', { cluster: 'order', fields: [field('id')] });

    expect(classify(order, identityFieldsOf)).toBe('aggregate');
    expect(classify({ ...order, cluster: 'sales' }, identityFieldsOf)).toBe('entity');
  });

  it('matches the last segment of a cluster path against the type name', () => {
    const order = typeDescriptor('Order', { cluster: 'sales/order', fields: [field('id')] });

    expect(classify(order, identityFieldsOf)).toBe('aggregate');
    expect(classify({ ...order, cluster: 'order/domain' }, identityFieldsOf)).toBe('entity');
  });

  it('honors aggregate markers', () => {
    expect(classify(typeDescriptor('Cart', { capabilities: ['AggregateRoot'], fields: [field('id')] }), identityFieldsOf)).toBe('aggregate');
    expect(classify(typeDescriptor('Cart', { categoryHint: 'aggregate' }), identityFieldsOf)).toBe('aggregate');
  });

  it('recognizes repositories, events and services by name', () => {
    expect(classify(typeDescriptor('OrderRepository'), identityFieldsOf)).toBe('repository');
    expect(classify(typeDescriptor('OrderPlacedEvent', { fields: [field('id')] }), identityFieldsOf)).toBe('domain-event');
    expect(classify(typeDescriptor('PricingService'), identityFieldsOf)).toBe('domain-service');
  });

  it('treats a declared repository target as a repository', () => {
    expect(classify(typeDescriptor('Orders', { repositoryTarget: 'Order' }), identityFieldsOf)).toBe('repository');
  });

  it('reads capabilities regardless of case and punctuation', () => {
    expect(classify(typeDescriptor('Placed', { capabilities: ['domain_event'] }), identityFieldsOf)).toBe('domain-event');
  });

  it('finds identity through <type>Id names and <Type>Id types', () => {
    expect(classify(typeDescriptor('Invoice', { fields: [field('invoiceId', { writable: true })] }), identityFieldsOf)).toBe('entity');
    expect(classify(typeDescriptor('Invoice', { fields: [field('key', { typeName: 'InvoiceId', writable: true })] }), identityFieldsOf)).toBe('entity');
  });

  it('lets an explicit identity flag override the field name', () => {
    const snapshot = typeDescriptor('Snapshot', { fields: [field('id', { identity: false })] });

    expect(classify(snapshot, identityFieldsOf)).toBe('value-object');
  });

  it('returns unknown when nothing fits', () => {
    expect(classify(typeDescriptor('Helper'), identityFieldsOf)).toBe('unknown');
    expect(classify(typeDescriptor('Counter', { fields: [field('count', { writable: true })] }), identityFieldsOf)).toBe('unknown');
  });

  it('is pure', () => {
    const user = anemicUser();
    const before = structuredClone(user);

    const first = classify(user, identityFieldsOf);
    const second = classify(user, identityFieldsOf);

    expect(first).toBe(second);
    expect(user).toEqual(before);
  });
});
