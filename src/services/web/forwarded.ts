// Base URI resolution from the request and its forwarding headers

/**
 * The parts of an Express request the resolver reads
 */
export interface RequestLike {
  protocol: string;
  get(name: string): string | undefined;
}

export interface ForwardedOptions {
  trustForwardedHeaders: boolean;
}

const DEFAULT_PORTS: Record<string, string> = { http: '80', https: '443' };
const HOST_AND_PORT = /^(\[[^\]]+\]|[^:]+)(?::(\d+))?$/;

function firstValue(header: string | undefined): string | undefined {
  const value = header?.split(',')[0]?.trim();
  return value ? value : undefined;
}

function unquote(value: string): string {
  return value.length >= 2 && value.startsWith('"') && value.endsWith('"') ? value.slice(1, -1) : value;
}

/**
 * Parses the first element of an RFC 7239 `Forwarded` header
 */
export function parseForwarded(header: string | undefined): Record<string, string> {
  const element = firstValue(header);
  const params: Record<string, string> = {};
  if (!element) return params;

  for (const pair of element.split(';')) {
    const index = pair.indexOf('=');
    if (index <= 0) continue;
    const name = pair.slice(0, index).trim().toLowerCase();
    if (!Object.hasOwn(params, name)) {
      params[name] = unquote(pair.slice(index + 1).trim());
    }
  }
  return params;
}

function normalizePrefix(prefix: string | undefined): string {
  if (!prefix) return '';
  const trimmed = prefix.replace(/\/+$/, '');
  if (!trimmed) return '';
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

/**
 * Resolves `scheme://host[:port][prefix]` for a request. Default ports
 * are left out.
 */
export function resolveBaseUri(req: RequestLike, options: ForwardedOptions): string {
  let protocol = req.protocol || 'http';
  let host = req.get('host') ?? 'localhost';
  let port: string | undefined;
  let prefix = '';

  if (options.trustForwardedHeaders) {
    const forwarded = parseForwarded(req.get('forwarded'));
    protocol = forwarded.proto ?? firstValue(req.get('x-forwarded-proto')) ?? protocol;
    host = forwarded.host ?? firstValue(req.get('x-forwarded-host')) ?? host;
    port = firstValue(req.get('x-forwarded-port'));
    prefix = normalizePrefix(firstValue(req.get('x-forwarded-prefix')));
  }

  protocol = protocol.toLowerCase();
  const match = HOST_AND_PORT.exec(host);
  const hostname = match?.[1] ?? host;
  const effectivePort = port ?? match?.[2];
  const portSuffix = effectivePort && effectivePort !== DEFAULT_PORTS[protocol] ? `:${effectivePort}` : '';

  return `${protocol}://${hostname}${portSuffix}${prefix}`;
}
