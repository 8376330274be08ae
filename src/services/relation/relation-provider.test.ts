/**
 * Tests for link relation providers
 */

import { describe, it, expect, afterEach } from 'vitest';
import * as fc from 'fast-check';
import {
  AnnotationLinkRelationProvider,
  DefaultLinkRelationProvider,
  DelegatingLinkRelationProvider,
  RelationRegistry,
  defaultRelationRegistry,
  registerRelation,
  uncapitalize
} from './relation-provider.js';
import { ValidationError } from '../../core/errors.js';

class OrderItem {}
class Person {}
class Invoice {}

describe('DefaultLinkRelationProvider', () => {
  const provider = new DefaultLinkRelationProvider();

  it('should derive relations from the class name', () => {
    expect(provider.getItemResourceRelFor(OrderItem)).toBe('orderItem');
    expect(provider.getCollectionResourceRelFor(OrderItem)).toBe('orderItemList');
  });

  it('should accept type names', () => {
    expect(provider.getItemResourceRelFor('Customer')).toBe('customer');
    expect(provider.getCollectionResourceRelFor('URL')).toBe('uRLList');
  });

  it('should reject anonymous and blank types', () => {
    const anonymous = (() => class {})();
    expect(() => provider.getItemResourceRelFor(anonymous)).toThrow(ValidationError);
    expect(() => provider.getItemResourceRelFor('  ')).toThrow(ValidationError);
  });

  it('should lowercase only the first character of any name', () => {
    fc.assert(
      fc.property(fc.stringMatching(/^[A-Z][A-Za-z0-9]{0,20}$/), name => {
        const item = provider.getItemResourceRelFor(name);
        expect(item).toBe(uncapitalize(name));
        expect(item.slice(1)).toBe(name.slice(1));
        expect(provider.getCollectionResourceRelFor(name)).toBe(`${item}List`);
      })
    );
  });
});

describe('AnnotationLinkRelationProvider', () => {
  it('should answer only for declared types', () => {
    const registry = new RelationRegistry();
    registry.register(Person, { itemRelation: 'person', collectionRelation: 'people' });
    const provider = new AnnotationLinkRelationProvider(registry);

    expect(provider.getItemResourceRelFor(Person)).toBe('person');
    expect(provider.getCollectionResourceRelFor(Person)).toBe('people');
    expect(provider.getItemResourceRelFor(Invoice)).toBeUndefined();
    expect(provider.getCollectionResourceRelFor(Invoice)).toBeUndefined();
  });

  it('should suffix a declared item relation for collections', () => {
    const registry = new RelationRegistry();
    registry.register(Invoice, { itemRelation: 'bill' });
    expect(new AnnotationLinkRelationProvider(registry).getCollectionResourceRelFor(Invoice)).toBe('billList');
  });

  it('should validate declarations', () => {
    const registry = new RelationRegistry();
    expect(() => registry.register(Invoice, {})).toThrow(ValidationError);
    expect(() => registry.register(Invoice, { itemRelation: 'two words' })).toThrow(ValidationError);
  });

  it('should forget unregistered types', () => {
    const registry = new RelationRegistry();
    registry.register('Invoice', { itemRelation: 'bill' });
    expect(registry.unregister('Invoice')).toBe(true);
    expect(registry.lookup('Invoice')).toBeUndefined();
  });
});

describe('DelegatingLinkRelationProvider', () => {
  afterEach(() => {
    defaultRelationRegistry.clear();
  });

  it('should prefer declared relations over derived ones', () => {
    registerRelation(Person, { collectionRelation: 'people' });
    const provider = new DelegatingLinkRelationProvider();

    expect(provider.getRelationsFor(Person)).toEqual({ itemRelation: 'person', collectionRelation: 'people' });
    expect(provider.getRelationsFor(OrderItem)).toEqual({
      itemRelation: 'orderItem',
      collectionRelation: 'orderItemList'
    });
  });

  it('should throw when no provider answers', () => {
    const provider = new DelegatingLinkRelationProvider(new AnnotationLinkRelationProvider(new RelationRegistry()));
    expect(() => provider.getItemResourceRelFor(Invoice)).toThrow('No item relation available for type Invoice');
    expect(() => provider.getCollectionResourceRelFor(Invoice)).toThrow(ValidationError);
  });
});
