/**
 * Tests for URI template parsing and expansion
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { UriTemplate } from './uri-template.js';
import { UriTemplateError } from '../../core/errors.js';

const variables = {
  var: 'value',
  hello: 'Hello World!',
  path: '/foo/bar',
  list: ['red', 'green', 'blue'],
  keys: { semi: ';', dot: '.', comma: ',' },
  x: 1024,
  y: 768,
  empty: ''
};

describe('UriTemplate', () => {
  describe('expand', () => {
    it.each([
      ['{var}', 'value'],
      ['{hello}', 'Hello%20World%21'],
      ['{+path}/here', '/foo/bar/here'],
      ['{+hello}', 'Hello%20World!'],
      ['{#hello}', '#Hello%20World!'],
      ['{.list}', '.red,green,blue'],
      ['{/list*}', '/red/green/blue'],
      ['{;x,y}', ';x=1024;y=768'],
      ['{;x,y,empty}', ';x=1024;y=768;empty'],
      ['{?x,y,empty}', '?x=1024&y=768&empty='],
      ['?fixed=yes{&x}', '?fixed=yes&x=1024'],
      ['{var:3}', 'val'],
      ['{+path:6}/here', '/foo/b/here'],
      ['{keys}', 'semi,%3B,dot,.,comma,%2C'],
      ['{keys*}', 'semi=%3B,dot=.,comma=%2C'],
      ['{?list}', '?list=red,green,blue'],
      ['{?list*}', '?list=red&list=green&list=blue'],
      ['{?keys*}', '?semi=%3B&dot=.&comma=%2C']
    ])('should expand %s', (template, expected) => {
      expect(UriTemplate.of(template).expand(variables)).toBe(expected);
    });

    it('should drop undefined variables', () => {
      expect(UriTemplate.of('/orders{?page,size}').expand({ size: 20 })).toBe('/orders?size=20');
      expect(UriTemplate.of('/orders{?page,size}').expand({})).toBe('/orders');
      expect(UriTemplate.of('/orders/{id}').expand()).toBe('/orders/');
    });

    it('should ignore inherited object properties', () => {
      expect(UriTemplate.of('/x{?toString,page}').expand({ page: 1 })).toBe('/x?page=1');
      expect(UriTemplate.of('/x{/constructor}').expand({})).toBe('/x');
    });

    it('should skip empty lists and records', () => {
      expect(UriTemplate.of('/search{?tags}').expand({ tags: [] })).toBe('/search');
      expect(UriTemplate.of('/search{?filter*}').expand({ filter: {} })).toBe('/search');
    });

    it('should bind positional values in order of appearance', () => {
      const template = UriTemplate.of('/orders/{id}/items{?page,size}');
      expect(template.expand(42, 2)).toBe('/orders/42/items?page=2');
      expect(template.expand('a b', null, 10)).toBe('/orders/a%20b/items?size=10');
    });

    it('should count prefix lengths in code points', () => {
      expect(UriTemplate.of('{word:2}').expand({ word: 'ça va' })).toBe('%C3%A7a');
    });

    it('should keep percent-encoded triplets in reserved expansion', () => {
      expect(UriTemplate.of('{+text}').expand({ text: '50%25 off' })).toBe('50%25%20off');
      expect(UriTemplate.of('{text}').expand({ text: '50%25' })).toBe('50%2525');
    });
  });

  describe('variables', () => {
    it('should describe every variable', () => {
      const template = UriTemplate.of('/files{/path*}{?q,limit:3}');
      expect(template.getVariables()).toEqual([
        { name: 'path', kind: 'path-segment', explode: true },
        { name: 'q', kind: 'query', explode: false },
        { name: 'limit', kind: 'query', explode: false, prefixLength: 3 }
      ]);
    });

    it('should list distinct names in order', () => {
      expect(UriTemplate.of('/{a}/{b}{?a,c}').getVariableNames()).toEqual(['a', 'b', 'c']);
    });

    it('should report no variables for plain URIs', () => {
      expect(UriTemplate.of('/orders').getVariableNames()).toEqual([]);
      expect(UriTemplate.isTemplate('/orders')).toBe(false);
      expect(UriTemplate.isTemplate('/orders/{id}')).toBe(true);
    });
  });

  describe('with', () => {
    it('should merge into a trailing query expression', () => {
      expect(UriTemplate.of('/orders{?page}').with('size').toString()).toBe('/orders{?page,size}');
    });

    it('should append a query expression', () => {
      expect(UriTemplate.of('/orders').with('page', 'size').toString()).toBe('/orders{?page,size}');
    });

    it('should continue a literal query string', () => {
      expect(UriTemplate.of('/orders?sort=asc').with('page').toString()).toBe('/orders?sort=asc{&page}');
    });

    it('should ignore variables already present', () => {
      const template = UriTemplate.of('/orders{?page}');
      expect(template.with('page')).toBe(template);
    });

    it('should reject invalid variable names', () => {
      expect(() => UriTemplate.of('/orders').with('not valid')).toThrow(UriTemplateError);
    });
  });

  describe('parse errors', () => {
    it.each([
      ['/orders/{id', 'Unterminated expression'],
      ['/orders/id}', 'Unmatched closing brace'],
      ['/orders/{}', 'Empty expression'],
      ['/{a{b}}', 'Nested expression'],
      ['/{=a}', "Reserved operator '=' is not supported"],
      ['/{a:0}', "Invalid prefix modifier in 'a:0'"],
      ['/{a b}', "Invalid variable name 'a b'"]
    ])('should reject %s', (template, message) => {
      expect(() => UriTemplate.of(template)).toThrow(message);
    });

    it('should report the template and position', () => {
      try {
        UriTemplate.of('/orders/{id');
        expect.fail('expected a parse error');
      } catch (error) {
        expect(error).toBeInstanceOf(UriTemplateError);
        if (error instanceof UriTemplateError) {
          expect(error.template).toBe('/orders/{id');
          expect(error.position).toBe(8);
        }
      }
    });

    it('should return null from tryParse', () => {
      expect(UriTemplate.tryParse('/orders/{id')).toBeNull();
      expect(UriTemplate.tryParse('/orders/{id}')?.toString()).toBe('/orders/{id}');
    });
  });

  describe('properties', () => {
    it('should round-trip simple values through percent decoding', () => {
      fc.assert(
        fc.property(fc.string(), value => {
          const expanded = UriTemplate.of('{v}').expand({ v: value });
          expect(expanded).toMatch(/^(?:[A-Za-z0-9\-._~]|%[0-9A-F]{2})*$/);
          expect(decodeURIComponent(expanded)).toBe(value);
        })
      );
    });

    it('should expand the same way by name and by position', () => {
      const template = UriTemplate.of('/r/{a}{/b}{?c}');
      fc.assert(
        fc.property(fc.string(), fc.string(), fc.integer(), (a, b, c) => {
          expect(template.expand(a, b, c)).toBe(template.expand({ a, b, c }));
        })
      );
    });
  });
});
