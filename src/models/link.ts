/**
 * Link
 *
 * Immutable hypermedia link: a target address, a relation and the
 * optional RFC 8288 / HAL attributes. Every modification returns a
 * new instance.
 */

import { LinkParseError } from '../core/errors.js';
import { validateRel } from '../core/validation.js';
import {
  UriTemplate,
  type PositionalValue,
  type TemplateVariable,
  type TemplateVariables
} from '../services/uri-template/uri-template.js';
import type { Affordance } from './affordance.js';
import { IanaLinkRelations, relEquals } from './link-relation.js';

/**
 * Optional link attributes
 */
export interface LinkAttributes {
  hreflang?: string;
  media?: string;
  title?: string;
  type?: string;
  deprecation?: string;
  profile?: string;
  name?: string;
}

/**
 * Attribute names in rendering order
 */
export const LINK_ATTRIBUTES: readonly (keyof LinkAttributes)[] = [
  'hreflang',
  'media',
  'title',
  'type',
  'deprecation',
  'profile',
  'name'
];

/**
 * Plain representation of a link
 */
export interface LinkJson extends LinkAttributes {
  rel: string;
  href: string;
  templated?: true;
}

/**
 * Result of splitting a single RFC 8288 link value
 */
export interface ParsedLinkValue {
  href: string;
  params: Record<string, string>;
}

interface LinkState {
  href: string;
  rel: string;
  attributes: LinkAttributes;
  affordances: readonly Affordance[];
}

function quote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function isLinkAttribute(name: string): name is keyof LinkAttributes {
  return LINK_ATTRIBUTES.some(attribute => attribute === name);
}

/**
 * Splits a string on a separator, ignoring separators inside quotes
 * and angle brackets
 */
export function splitOutsideQuotes(input: string, separator: string): string[] {
  const parts: string[] = [];
  let current = '';
  let inQuotes = false;
  let inBrackets = false;
  let escaped = false;

  for (const ch of input) {
    if (escaped) {
      current += ch;
      escaped = false;
      continue;
    }
    if (inQuotes && ch === '\\') {
      current += ch;
      escaped = true;
      continue;
    }
    if (ch === '"' && !inBrackets) {
      inQuotes = !inQuotes;
    } else if (ch === '<' && !inQuotes) {
      inBrackets = true;
    } else if (ch === '>' && !inQuotes) {
      inBrackets = false;
    } else if (ch === separator && !inQuotes && !inBrackets) {
      parts.push(current);
      current = '';
      continue;
    }
    current += ch;
  }

  if (inQuotes) {
    throw new LinkParseError('Unterminated quoted string', input);
  }

  parts.push(current);
  return parts;
}

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1).replace(/\\(.)/g, '$1');
  }
  return value;
}

/**
 * Parses a single RFC 8288 link value into its target and parameters.
 * Parameter names are lowercased; the first occurrence of a parameter wins.
 */
export function parseLinkValue(value: string): ParsedLinkValue {
  const trimmed = value.trim();
  const match = /^<([^>]*)>(.*)$/s.exec(trimmed);

  if (!match) {
    throw new LinkParseError(`Link value must start with <uri>: ${trimmed}`, value);
  }

  const href = match[1] ?? '';
  const rest = (match[2] ?? '').trim();
  const params: Record<string, string> = {};

  if (rest.length > 0) {
    if (!rest.startsWith(';')) {
      throw new LinkParseError(`Unexpected content after target: ${rest}`, value);
    }

    for (const segment of splitOutsideQuotes(rest.slice(1), ';')) {
      const param = segment.trim();
      if (param.length === 0) continue;

      const eq = param.indexOf('=');
      const name = (eq < 0 ? param : param.slice(0, eq)).trim().toLowerCase();
      const raw = eq < 0 ? '' : param.slice(eq + 1).trim();

      if (!/^[a-z0-9!#$&+\-.^_`|~]+\*?$/.test(name)) {
        throw new LinkParseError(`Invalid link parameter name "${name}"`, value);
      }
      if (!Object.hasOwn(params, name)) {
        params[name] = unquote(raw);
      }
    }
  }

  return { href, params };
}

/**
 * An immutable hypermedia link
 */
export class Link {
  readonly href: string;
  readonly rel: string;
  readonly hreflang?: string;
  readonly media?: string;
  readonly title?: string;
  readonly type?: string;
  readonly deprecation?: string;
  readonly profile?: string;
  readonly name?: string;
  readonly affordances: readonly Affordance[];
  private readonly template: UriTemplate | null;

  private constructor(state: LinkState) {
    this.href = state.href;
    this.rel = validateRel(state.rel);
    this.hreflang = state.attributes.hreflang;
    this.media = state.attributes.media;
    this.title = state.attributes.title;
    this.type = state.attributes.type;
    this.deprecation = state.attributes.deprecation;
    this.profile = state.attributes.profile;
    this.name = state.attributes.name;
    this.affordances = Object.freeze([...state.affordances]);
    this.template = UriTemplate.tryParse(state.href);
    Object.freeze(this);
  }

  /**
   * Creates a link; the relation defaults to "self"
   */
  static of(href: string, rel: string = IanaLinkRelations.SELF): Link {
    return new Link({ href, rel, attributes: {}, affordances: [] });
  }

  /**
   * Parses a single RFC 8288 link value such as `<https://x>;rel="next"`
   *
   * @throws LinkParseError on malformed input or a missing relation
   */
  static valueOf(value: string): Link {
    const parsed = parseLinkValue(value);
    const rel = parsed.params.rel;

    if (rel === undefined || rel.trim().length === 0) {
      throw new LinkParseError('Link does not provide a rel attribute', value);
    }

    const rels = rel.trim().split(/\s+/);
    if (rels.length > 1) {
      throw new LinkParseError(`Link value declares several relations (${rel}); use Links.parse`, value);
    }

    return Link.fromParsed(parsed, rels[0] ?? rel);
  }

  /**
   * Builds a link from a parsed link value and one of its relations
   */
  static fromParsed(parsed: ParsedLinkValue, rel: string): Link {
    const attributes: LinkAttributes = {};
    for (const [name, value] of Object.entries(parsed.params)) {
      if (isLinkAttribute(name)) {
        attributes[name] = value;
      }
    }
    return new Link({ href: parsed.href, rel, attributes, affordances: [] });
  }

  /**
   * Builds a link from its plain representation
   */
  static fromJSON(json: LinkJson): Link {
    const attributes: LinkAttributes = {};
    for (const attribute of LINK_ATTRIBUTES) {
      const value = json[attribute];
      if (value !== undefined) {
        attributes[attribute] = value;
      }
    }
    return new Link({ href: json.href, rel: json.rel, attributes, affordances: [] });
  }

  withRel(rel: string): Link {
    return this.copy({ rel });
  }

  withSelfRel(): Link {
    return this.withRel(IanaLinkRelations.SELF);
  }

  withHref(href: string): Link {
    return this.copy({ href });
  }

  withHreflang(hreflang: string): Link {
    return this.withAttribute('hreflang', hreflang);
  }

  withMedia(media: string): Link {
    return this.withAttribute('media', media);
  }

  withTitle(title: string): Link {
    return this.withAttribute('title', title);
  }

  withType(type: string): Link {
    return this.withAttribute('type', type);
  }

  withDeprecation(deprecation: string): Link {
    return this.withAttribute('deprecation', deprecation);
  }

  withProfile(profile: string): Link {
    return this.withAttribute('profile', profile);
  }

  withName(name: string): Link {
    return this.withAttribute('name', name);
  }

  /**
   * Returns a copy that additionally advertises the given affordance
   */
  andAffordance(affordance: Affordance): Link {
    return this.copy({ affordances: [...this.affordances, affordance] });
  }

  /**
   * Returns a copy with the given affordances replacing the current ones
   */
  withAffordances(affordances: readonly Affordance[]): Link {
    return this.copy({ affordances });
  }

  hasRel(rel: string): boolean {
    return relEquals(this.rel, rel);
  }

  isTemplated(): boolean {
    return this.template !== null && this.template.getVariables().length > 0;
  }

  /**
   * The parsed href; null when the href holds braces that are not a valid template
   */
  getTemplate(): UriTemplate | null {
    return this.template;
  }

  getVariables(): TemplateVariable[] {
    return this.template ? this.template.getVariables() : [];
  }

  getVariableNames(): string[] {
    return this.template ? this.template.getVariableNames() : [];
  }

  /**
   * Expands the href template; the result keeps all other attributes
   */
  expand(variables?: TemplateVariables): Link;
  expand(...positional: PositionalValue[]): Link;
  expand(...args: Array<PositionalValue | TemplateVariables>): Link {
    if (!this.isTemplated() || !this.template) {
      return this;
    }
    return this.copy({ href: this.template.expandWith(args) });
  }

  /**
   * Value equality over href, relation and attributes
   */
  equals(other: unknown): boolean {
    if (!(other instanceof Link)) return false;
    if (this.href !== other.href || !relEquals(this.rel, other.rel)) return false;
    return LINK_ATTRIBUTES.every(attribute => this[attribute] === other[attribute]);
  }

  /**
   * RFC 8288 representation: `<href>;rel="rel";title="..."`
   */
  toString(): string {
    let result = `<${this.href}>;rel=${quote(this.rel)}`;
    for (const attribute of LINK_ATTRIBUTES) {
      const value = this[attribute];
      if (value !== undefined) {
        result += `;${attribute}=${quote(value)}`;
      }
    }
    return result;
  }

  toJSON(): LinkJson {
    const json: LinkJson = { rel: this.rel, href: this.href };
    for (const attribute of LINK_ATTRIBUTES) {
      const value = this[attribute];
      if (value !== undefined) {
        json[attribute] = value;
      }
    }
    if (this.isTemplated()) {
      json.templated = true;
    }
    return json;
  }

  private withAttribute(attribute: keyof LinkAttributes, value: string): Link {
    return this.copy({ attributes: { ...this.attributes(), [attribute]: value } });
  }

  private attributes(): LinkAttributes {
    const attributes: LinkAttributes = {};
    for (const attribute of LINK_ATTRIBUTES) {
      const value = this[attribute];
      if (value !== undefined) {
        attributes[attribute] = value;
      }
    }
    return attributes;
  }

  private copy(changes: Partial<LinkState>): Link {
    return new Link({
      href: changes.href ?? this.href,
      rel: changes.rel ?? this.rel,
      attributes: changes.attributes ?? this.attributes(),
      affordances: changes.affordances ?? this.affordances
    });
  }
}
