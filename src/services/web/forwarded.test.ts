// Tests for base URI resolution

import { describe, it, expect } from 'vitest';
import { parseForwarded, resolveBaseUri, type RequestLike } from './forwarded.js';

function request(protocol: string, headers: Record<string, string>): RequestLike {
  const lowered = new Map(Object.entries(headers).map(([name, value]) => [name.toLowerCase(), value]));
  return { protocol, get: name => lowered.get(name.toLowerCase()) };
}

const trusted = { trustForwardedHeaders: true };

describe('resolveBaseUri', () => {
  it('should use the request host', () => {
    expect(resolveBaseUri(request('http', { Host: 'shop.test:8080' }), trusted)).toBe('http://shop.test:8080');
    expect(resolveBaseUri(request('http', { Host: 'shop.test:80' }), trusted)).toBe('http://shop.test');
  });

  it('should apply X-Forwarded headers', () => {
    const req = request('http', {
      Host: 'internal:3000',
      'X-Forwarded-Proto': 'https',
      'X-Forwarded-Host': 'api.example.com, proxy.internal',
      'X-Forwarded-Port': '8443',
      'X-Forwarded-Prefix': '/shop/'
    });
    expect(resolveBaseUri(req, trusted)).toBe('https://api.example.com:8443/shop');
  });

  it('should drop default ports of the forwarded scheme', () => {
    const req = request('http', { Host: 'internal:3000', 'X-Forwarded-Proto': 'https', 'X-Forwarded-Port': '443' });
    expect(resolveBaseUri(req, trusted)).toBe('https://internal');
  });

  it('should prefer the Forwarded header', () => {
    const req = request('http', {
      Host: 'internal:3000',
      Forwarded: 'for=192.0.2.60;proto=https;host="api.example.com", for=198.51.100.17',
      'X-Forwarded-Host': 'ignored.example.com'
    });
    expect(resolveBaseUri(req, trusted)).toBe('https://api.example.com');
  });

  it('should keep IPv6 hosts intact', () => {
    expect(resolveBaseUri(request('http', { Host: '[::1]:3000' }), trusted)).toBe('http://[::1]:3000');
  });

  it('should ignore forwarded headers unless trusted', () => {
    const req = request('http', { Host: 'internal:3000', 'X-Forwarded-Host': 'api.example.com' });
    expect(resolveBaseUri(req, { trustForwardedHeaders: false })).toBe('http://internal:3000');
  });
});

describe('parseForwarded', () => {
  it('should read the first element', () => {
    expect(parseForwarded('Proto=HTTPS;host=a.test, proto=http')).toEqual({ proto: 'HTTPS', host: 'a.test' });
    expect(parseForwarded(undefined)).toEqual({});
  });

  it('should keep the first occurrence of a parameter', () => {
    expect(parseForwarded('proto=https;proto=http;constructor=x')).toEqual({ proto: 'https', constructor: 'x' });
  });
});
