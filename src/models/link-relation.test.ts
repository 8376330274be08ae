// Tests for link relation helpers

import { describe, it, expect } from 'vitest';
import { IanaLinkRelations, isIanaRel, isUriRel, relEquals } from './link-relation.js';

describe('isIanaRel', () => {
  it('should know relations from the registry file', () => {
    expect(isIanaRel('api-catalog')).toBe(true);
    expect(isIanaRel('DescribedBy')).toBe(true);
    for (const rel of Object.values(IanaLinkRelations)) {
      expect(isIanaRel(rel)).toBe(true);
    }
  });

  it('should reject custom relations', () => {
    expect(isIanaRel('lines')).toBe(false);
    expect(isIanaRel('ex:lines')).toBe(false);
  });
});

describe('relEquals', () => {
  it('should compare case-insensitively', () => {
    expect(relEquals('Next', 'next')).toBe(true);
    expect(relEquals('next', 'prev')).toBe(false);
  });
});

describe('isUriRel', () => {
  it('should detect absolute URI relations', () => {
    expect(isUriRel('https://example.com/rels/lines')).toBe(true);
    expect(isUriRel('ex:lines')).toBe(false);
  });
});
