/**
 * Tests for Links
 *
 * Includes a property-based check that rendered headers parse back
 * into equal links.
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { Link } from './link.js';
import { Links, MergeMode } from './links.js';
import { LinkNotFoundError, LinkParseError } from '../core/errors.js';

const self = Link.of('/orders/1');
const next = Link.of('/orders/2', 'next');
const prev = Link.of('/orders/0', 'prev');

describe('Links', () => {
  describe('construction', () => {
    it('should flatten links and iterables', () => {
      const links = Links.of(self, [next, prev]);
      expect(links.toArray()).toEqual([self, next, prev]);
      expect(links.size).toBe(3);
    });

    it('should share the empty instance', () => {
      expect(Links.of()).toBe(Links.NONE);
      expect(Links.NONE.isEmpty()).toBe(true);
      expect(Links.of(self).hasSingleLink()).toBe(true);
    });

    it('should leave the original untouched on and/andIf', () => {
      const links = Links.of(self);
      const more = links.and(next);
      expect(links.size).toBe(1);
      expect(more.getRels()).toEqual(['self', 'next']);
      expect(links.andIf(false, next)).toBe(links);
      expect(links.andIf(true, next).size).toBe(2);
    });
  });

  describe('lookups', () => {
    const links = Links.of(self, next, Link.of('/orders/3', 'Next'));

    it('should find links by relation, ignoring case', () => {
      expect(links.hasLink('NEXT')).toBe(true);
      expect(links.getLink('next')).toBe(next);
      expect(links.getLinks('next').map(link => link.href)).toEqual(['/orders/2', '/orders/3']);
      expect(links.getRels()).toEqual(['self', 'next']);
    });

    it('should throw for missing required links', () => {
      expect(() => links.getRequiredLink('last')).toThrow(LinkNotFoundError);
      expect(() => links.getRequiredLink('last')).toThrow("No link with rel 'last' found");
    });

    it('should remove every link of a relation', () => {
      expect(links.without('next').toArray()).toEqual([self]);
      expect(links.without('missing')).toBe(links);
    });
  });

  describe('merge', () => {
    const existing = Links.of(self, next);

    it('should skip equal links by default', () => {
      const merged = existing.merge(Link.of('/orders/2', 'next'), prev);
      expect(merged.toArray().map(link => link.toString())).toEqual([
        '</orders/1>;rel="self"',
        '</orders/2>;rel="next"',
        '</orders/0>;rel="prev"'
      ]);
    });

    it('should skip links whose relation differs only in case', () => {
      const merged = Links.of(Link.of('/a', 'Next')).merge(Link.of('/a', 'next'));
      expect(merged.size).toBe(1);
      expect(merged.getRequiredLink('next').rel).toBe('Next');
    });

    it('should keep links that differ only in attributes', () => {
      const merged = existing.merge(next.withTitle('Next page'));
      expect(merged.size).toBe(3);
    });

    it('should replace links by relation', () => {
      const merged = existing.merge(MergeMode.REPLACE_BY_REL, Link.of('/orders/9', 'next'));
      expect(merged.toArray().map(link => link.href)).toEqual(['/orders/1', '/orders/9']);
    });

    it('should skip links whose relation exists', () => {
      const merged = existing.merge(MergeMode.SKIP_BY_REL, Link.of('/orders/9', 'next'), prev);
      expect(merged.toArray().map(link => link.href)).toEqual(['/orders/1', '/orders/2', '/orders/0']);
    });
  });

  describe('parse', () => {
    it('should parse a header with several values', () => {
      const links = Links.parse('</orders?page=1>; rel="prev", </orders?page=3>; rel="next"; title="Next, please"');
      expect(links.toJSON()).toEqual([
        { rel: 'prev', href: '/orders?page=1' },
        { rel: 'next', href: '/orders?page=3', title: 'Next, please' }
      ]);
    });

    it('should create one link per declared relation', () => {
      const links = Links.parse('</orders?page=9>; rel="next last"');
      expect(links.getRels()).toEqual(['next', 'last']);
      expect(links.getRequiredLink('last').href).toBe('/orders?page=9');
    });

    it('should return no links for blank input', () => {
      expect(Links.parse('')).toBe(Links.NONE);
      expect(Links.parse('   ')).toBe(Links.NONE);
      expect(Links.parse(undefined)).toBe(Links.NONE);
    });

    it('should reject values without a relation', () => {
      expect(() => Links.parse('</a>; rel=next, </b>')).toThrow(LinkParseError);
    });

    it('should render a comma separated header', () => {
      expect(Links.of(self, next).toString()).toBe('</orders/1>;rel="self",</orders/2>;rel="next"');
    });

    it('should parse rendered headers back into equal links', () => {
      const relArb = fc.constantFrom('self', 'next', 'prev', 'item', 'ex:orders');
      const textArb = fc.string({ maxLength: 20 });
      const linkArb = fc
        .tuple(fc.webPath(), relArb, fc.option(textArb, { nil: undefined }))
        .map(([path, rel, title]) => {
          const link = Link.of(path || '/', rel);
          return title === undefined ? link : link.withTitle(title);
        });

      fc.assert(
        fc.property(fc.array(linkArb, { minLength: 1, maxLength: 5 }), items => {
          const links = Links.of(items);
          expect(Links.parse(links.toString()).equals(links)).toBe(true);
        })
      );
    });
  });
});
