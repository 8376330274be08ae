/**
 * Links
 *
 * Immutable, ordered collection of links with relation lookups,
 * merge strategies and RFC 8288 header parsing.
 */

import { LinkNotFoundError, LinkParseError } from '../core/errors.js';
import { Link, parseLinkValue, splitOutsideQuotes } from './link.js';
import { relEquals } from './link-relation.js';

/**
 * How merged links treat links already present
 */
export enum MergeMode {
  /** Drop incoming links equal to an existing one */
  SKIP_BY_EQUALITY = 'SKIP_BY_EQUALITY',
  /** Drop incoming links whose relation is already present */
  SKIP_BY_REL = 'SKIP_BY_REL',
  /** Incoming links replace existing links with the same relation */
  REPLACE_BY_REL = 'REPLACE_BY_REL'
}

export type LinkSource = Link | Iterable<Link>;

function flatten(sources: readonly LinkSource[]): Link[] {
  const result: Link[] = [];
  for (const source of sources) {
    if (source instanceof Link) {
      result.push(source);
    } else {
      result.push(...source);
    }
  }
  return result;
}

/**
 * An immutable collection of links
 */
export class Links implements Iterable<Link> {
  static readonly NONE: Links = new Links([]);

  private readonly links: readonly Link[];

  private constructor(links: readonly Link[]) {
    this.links = Object.freeze([...links]);
  }

  static of(...links: LinkSource[]): Links {
    const flattened = flatten(links);
    return flattened.length === 0 ? Links.NONE : new Links(flattened);
  }

  /**
   * Parses an RFC 8288 `Link` header value. A link value declaring several
   * space separated relations yields one link per relation.
   *
   * @throws LinkParseError on malformed input
   */
  static parse(header: string | undefined | null): Links {
    if (header === undefined || header === null || header.trim().length === 0) {
      return Links.NONE;
    }

    const links: Link[] = [];
    for (const value of splitOutsideQuotes(header, ',')) {
      if (value.trim().length === 0) continue;

      const parsed = parseLinkValue(value);
      const rel = parsed.params.rel;
      if (rel === undefined || rel.trim().length === 0) {
        throw new LinkParseError('Link does not provide a rel attribute', value);
      }

      for (const single of rel.trim().split(/\s+/)) {
        links.push(Link.fromParsed(parsed, single));
      }
    }

    return Links.of(...links);
  }

  get size(): number {
    return this.links.length;
  }

  [Symbol.iterator](): Iterator<Link> {
    return this.links[Symbol.iterator]();
  }

  toArray(): Link[] {
    return [...this.links];
  }

  isEmpty(): boolean {
    return this.links.length === 0;
  }

  hasSingleLink(): boolean {
    return this.links.length === 1;
  }

  /**
   * Returns a new collection with the given links appended
   */
  and(...links: LinkSource[]): Links {
    const added = flatten(links);
    return added.length === 0 ? this : new Links([...this.links, ...added]);
  }

  andIf(condition: boolean, ...links: LinkSource[]): Links {
    return condition ? this.and(...links) : this;
  }

  /**
   * Merges links into a new collection, by default skipping duplicates
   */
  merge(...links: LinkSource[]): Links;
  merge(mode: MergeMode, ...links: LinkSource[]): Links;
  merge(...args: Array<MergeMode | LinkSource>): Links {
    let mode = MergeMode.SKIP_BY_EQUALITY;
    const sources: LinkSource[] = [];

    for (const arg of args) {
      if (typeof arg === 'string') {
        mode = arg;
      } else {
        sources.push(arg);
      }
    }

    const incoming = flatten(sources);

    switch (mode) {
      case MergeMode.REPLACE_BY_REL: {
        const kept = this.links.filter(existing => !incoming.some(link => link.hasRel(existing.rel)));
        return new Links([...kept, ...incoming]);
      }
      case MergeMode.SKIP_BY_REL: {
        const result = [...this.links];
        for (const link of incoming) {
          if (!result.some(existing => existing.hasRel(link.rel))) {
            result.push(link);
          }
        }
        return new Links(result);
      }
      case MergeMode.SKIP_BY_EQUALITY:
      default: {
        const result = [...this.links];
        for (const link of incoming) {
          if (!result.some(existing => existing.equals(link))) {
            result.push(link);
          }
        }
        return new Links(result);
      }
    }
  }

  /**
   * Returns a new collection without any link of the given relation
   */
  without(rel: string): Links {
    const remaining = this.links.filter(link => !link.hasRel(rel));
    return remaining.length === this.links.length ? this : new Links(remaining);
  }

  hasLink(rel: string): boolean {
    return this.links.some(link => link.hasRel(rel));
  }

  /**
   * The first link with the relation
   */
  getLink(rel: string): Link | undefined {
    return this.links.find(link => link.hasRel(rel));
  }

  /**
   * @throws LinkNotFoundError when no link has the relation
   */
  getRequiredLink(rel: string): Link {
    const link = this.getLink(rel);
    if (!link) {
      throw new LinkNotFoundError(rel);
    }
    return link;
  }

  /**
   * All links with the relation, in order
   */
  getLinks(rel: string): Link[] {
    return this.links.filter(link => relEquals(link.rel, rel));
  }

  /**
   * Relations in order of first appearance
   */
  getRels(): string[] {
    const rels: string[] = [];
    for (const link of this.links) {
      if (!rels.some(rel => relEquals(rel, link.rel))) {
        rels.push(link.rel);
      }
    }
    return rels;
  }

  equals(other: unknown): boolean {
    if (!(other instanceof Links) || other.size !== this.size) return false;
    return this.links.every((link, index) => link.equals(other.links[index]));
  }

  /**
   * RFC 8288 header value
   */
  toString(): string {
    return this.links.map(link => link.toString()).join(',');
  }

  toJSON() {
    return this.links.map(link => link.toJSON());
  }
}
