// Tests for curie provider

import { describe, it, expect } from 'vitest';
import { DefaultCurieProvider } from './curie-provider.js';
import { ValidationError } from '../../core/errors.js';

describe('DefaultCurieProvider', () => {
  const provider = new DefaultCurieProvider({ ex: 'https://example.com/rels/{rel}' });

  describe('getNamespacedRelFrom', () => {
    it('should prefix custom relations with the only curie', () => {
      expect(provider.getNamespacedRelFrom('orders')).toBe('ex:orders');
    });

    it('should leave registered, prefixed and URI relations alone', () => {
      expect(provider.getNamespacedRelFrom('self')).toBe('self');
      expect(provider.getNamespacedRelFrom('NEXT')).toBe('NEXT');
      expect(provider.getNamespacedRelFrom('other:orders')).toBe('other:orders');
      expect(provider.getNamespacedRelFrom('https://example.com/rels/orders')).toBe('https://example.com/rels/orders');
    });

    it('should not prefix without a default curie', () => {
      const several = new DefaultCurieProvider({
        ex: 'https://example.com/rels/{rel}',
        acme: 'https://acme.test/docs/{rel}'
      });
      expect(several.getNamespacedRelFrom('orders')).toBe('orders');
    });

    it('should use the named default', () => {
      const several = new DefaultCurieProvider(
        { ex: 'https://example.com/rels/{rel}', acme: 'https://acme.test/docs/{rel}' },
        'acme'
      );
      expect(several.getNamespacedRelFrom('orders')).toBe('acme:orders');
    });
  });

  describe('getCurieInformation', () => {
    it('should describe every curie once a prefix is used', () => {
      const curies = provider.getCurieInformation(['self', 'ex:orders']);
      expect(curies.map(link => link.toJSON())).toEqual([
        { rel: 'curies', href: 'https://example.com/rels/{rel}', name: 'ex', templated: true }
      ]);
    });

    it('should return nothing when no prefix is used', () => {
      expect(provider.getCurieInformation(['self', 'orders', 'https://example.com/x'])).toEqual([]);
      expect(provider.getCurieInformation(['other:orders'])).toEqual([]);
    });
  });

  describe('validation', () => {
    it('should reject templates without {rel}', () => {
      expect(() => new DefaultCurieProvider({ ex: 'https://example.com/rels' })).toThrow(ValidationError);
    });

    it('should reject invalid names and unknown defaults', () => {
      expect(() => new DefaultCurieProvider({ '1ex': 'https://example.com/{rel}' })).toThrow(ValidationError);
      expect(() => new DefaultCurieProvider({ ex: 'https://example.com/{rel}' }, 'acme'))
        .toThrow('Default curie "acme" is not configured');
    });

    it('should list curie names', () => {
      expect(provider.getCurieNames()).toEqual(['ex']);
    });
  });
});
