// Tests for the links command

import { describe, it, expect } from 'vitest';
import { parseFormat, renderLinkHeader } from './links.js';
import { LinkParseError, ValidationError } from '../../core/errors.js';
import { RenderSingleLinks } from '../../services/serialization/index.js';

const HEADER = '</orders/1>; rel="self", </orders?page=2>; rel="next"; title="Next"';

describe('parseFormat', () => {
  it('should accept known formats', () => {
    expect(parseFormat('hal')).toBe('hal');
    expect(parseFormat('json')).toBe('json');
  });

  it('should reject others', () => {
    expect(() => parseFormat('xml')).toThrow(ValidationError);
  });
});

describe('renderLinkHeader', () => {
  it('should render HAL links', () => {
    expect(JSON.parse(renderLinkHeader(HEADER, 'hal'))).toEqual({
      self: { href: '/orders/1' },
      next: { href: '/orders?page=2', title: 'Next' }
    });
  });

  it('should honor serializer options', () => {
    expect(JSON.parse(renderLinkHeader('</a>; rel="self"', 'hal', { renderSingleLinks: RenderSingleLinks.AS_ARRAY })))
      .toEqual({ self: [{ href: '/a' }] });
  });

  it('should render a JSON array of links', () => {
    expect(JSON.parse(renderLinkHeader(HEADER, 'json'))).toEqual([
      { rel: 'self', href: '/orders/1' },
      { rel: 'next', href: '/orders?page=2', title: 'Next' }
    ]);
  });

  it('should render an empty header as an empty object', () => {
    expect(renderLinkHeader('', 'hal')).toBe('{}');
  });

  it('should reject links without a relation', () => {
    expect(() => renderLinkHeader('</a>', 'hal')).toThrow(LinkParseError);
  });
});
