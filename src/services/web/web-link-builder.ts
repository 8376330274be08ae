/**
 * Web Link Builder
 *
 * Builds links to registered controller routes. Path parameters are
 * substituted from the given params, leftover params become the query
 * string and declared query parameters that were not supplied are kept
 * as a `{?...}` template expression.
 */

import { IanaLinkRelations } from '../../models/link-relation.js';
import { Link } from '../../models/link.js';
import { encodeValue, UriTemplate, type TemplateScalar } from '../uri-template/index.js';
import type { ControllerClass, RouteRegistry } from './route-registry.js';

export type LinkParamValue = TemplateScalar | readonly TemplateScalar[] | null | undefined;
export type LinkParams = Readonly<Record<string, LinkParamValue>>;

const PATH_PARAM = /(\/?):([A-Za-z_][A-Za-z0-9_]*)(\?)?/g;

function isPresent(value: LinkParamValue): value is TemplateScalar | readonly TemplateScalar[] {
  return value !== undefined && value !== null;
}

function toList(value: TemplateScalar | readonly TemplateScalar[]): readonly TemplateScalar[] {
  return isList(value) ? value : [value];
}

function isList(value: TemplateScalar | readonly TemplateScalar[]): value is readonly TemplateScalar[] {
  return Array.isArray(value);
}

function encodeParam(value: TemplateScalar | readonly TemplateScalar[]): string {
  return toList(value).map(item => encodeValue(String(item), false)).join(',');
}

function splitQuery(href: string): [string, string] {
  const index = href.search(/\?|\{[?&#]/);
  return index < 0 ? [href, ''] : [href.slice(0, index), href.slice(index)];
}

/**
 * A URI under construction
 */
export class LinkBuilder {
  constructor(private readonly href: string) {}

  /**
   * Appends path segments ahead of any query string
   */
  slash(segment: string | number): LinkBuilder {
    const pieces = String(segment)
      .split('/')
      .filter(piece => piece.length > 0)
      .map(piece => encodeValue(piece, false));

    if (pieces.length === 0) {
      return this;
    }

    const [path, query] = splitQuery(this.href);
    const base = path.endsWith('/') ? path.slice(0, -1) : path;
    return new LinkBuilder(`${base}/${pieces.join('/')}${query}`);
  }

  withRel(rel: string): Link {
    return Link.of(this.href, rel);
  }

  withSelfRel(): Link {
    return this.withRel(IanaLinkRelations.SELF);
  }

  toUri(): string {
    return this.href;
  }

  toString(): string {
    return this.href;
  }
}

/**
 * Web Link Builder Implementation
 */
export class WebLinkBuilder {
  /**
   * @param baseUri - scheme, authority and prefix prepended to route paths
   */
  constructor(
    private readonly registry: RouteRegistry,
    private readonly baseUri: string = ''
  ) {}

  getBaseUri(): string {
    return this.baseUri;
  }

  /**
   * Starts a link to a handler, or to the controller's base path
   *
   * @throws RouteNotFoundError when the controller or handler is not registered
   */
  linkTo(controller: ControllerClass | string, handler?: string, params: LinkParams = {}): LinkBuilder {
    const route = handler === undefined ? undefined : this.registry.getRoute(controller, handler);
    const pattern = route ? route.fullPath : this.registry.getBasePath(controller);
    const used = new Set<string>();

    const path = pattern.replace(PATH_PARAM, (_match, slash: string, name: string, optional: string | undefined) => {
      used.add(name);
      const value = Object.hasOwn(params, name) ? params[name] : undefined;
      if (value !== undefined && isPresent(value)) {
        return `${slash}${encodeParam(value)}`;
      }
      return optional ? '' : `${slash}{${name}}`;
    });

    const pairs: string[] = [];
    for (const [name, value] of Object.entries(params)) {
      if (used.has(name) || value === undefined || !isPresent(value)) continue;
      for (const item of toList(value)) {
        pairs.push(`${encodeValue(name, false)}=${encodeValue(String(item), false)}`);
      }
    }

    let href = `${this.baseUri}${path || '/'}`;
    if (pairs.length > 0) {
      href += `?${pairs.join('&')}`;
    }

    const missing = (route?.query ?? []).filter(name => {
      const value = Object.hasOwn(params, name) ? params[name] : undefined;
      return value === undefined || !isPresent(value);
    });
    if (missing.length > 0) {
      href = UriTemplate.of(href).with(...missing).toString();
    }

    return new LinkBuilder(href);
  }
}
