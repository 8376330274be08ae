/**
 * HAL Serializer
 *
 * Renders representation models as `application/hal+json` documents:
 * resource state inline, links under `_links` keyed by relation,
 * collection items under `_embedded`, page metadata under `page`.
 */

import type { HalLinkObject } from '../../core/schemas.js';
import type { Link } from '../../models/link.js';
import type { Links } from '../../models/links.js';
import {
  CollectionModel,
  EntityModel,
  PagedModel,
  RepresentationModel
} from '../../models/representation-model.js';
import type { ResourceClass, TypeReference } from '../../models/types.js';
import { CURIES_REL, type CurieProvider } from '../curie/curie-provider.js';
import { DelegatingLinkRelationProvider } from '../relation/relation-provider.js';

/**
 * Whether relations with a single link render as an object or an array
 */
export enum RenderSingleLinks {
  AS_SINGLE = 'AS_SINGLE',
  AS_ARRAY = 'AS_ARRAY'
}

/**
 * HAL rendering options
 */
export interface HalOptions {
  renderSingleLinks: RenderSingleLinks;
  /** Relation patterns (`*` wildcard) always rendered as arrays */
  arrayRels: readonly string[];
  curieProvider?: CurieProvider;
  relationProvider: DelegatingLinkRelationProvider;
  /** Embedded relation for items without a type */
  fallbackRel: string;
}

export type HalLinks = Record<string, HalLinkObject | HalLinkObject[]>;

/**
 * A rendered HAL resource
 */
export interface HalDocument {
  [property: string]: unknown;
  _links?: HalLinks;
  _embedded?: Record<string, unknown[]>;
}

export const DEFAULT_FALLBACK_REL = 'content';

function patternToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+?^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*');
  return new RegExp(`^${escaped}$`, 'i');
}

function isResourceClass(candidate: unknown): candidate is ResourceClass {
  return typeof candidate === 'function' && candidate !== Object && candidate !== Array;
}

function hasToJSON(value: object): value is { toJSON(): unknown } {
  return 'toJSON' in value && typeof value.toJSON === 'function';
}

/**
 * Renders a single link as a HAL link object; the relation is the key
 * it is rendered under, so it is not repeated
 */
export function toHalLink(link: Link): HalLinkObject {
  const rendered: HalLinkObject = { href: link.href };
  if (link.isTemplated()) rendered.templated = true;
  if (link.type !== undefined) rendered.type = link.type;
  if (link.deprecation !== undefined) rendered.deprecation = link.deprecation;
  if (link.name !== undefined) rendered.name = link.name;
  if (link.profile !== undefined) rendered.profile = link.profile;
  if (link.title !== undefined) rendered.title = link.title;
  if (link.hreflang !== undefined) rendered.hreflang = link.hreflang;
  return rendered;
}

/**
 * HAL Serializer Implementation
 */
export class HalSerializer {
  protected readonly options: HalOptions;
  private readonly arrayPatterns: RegExp[];

  constructor(options: Partial<HalOptions> = {}) {
    this.options = {
      renderSingleLinks: options.renderSingleLinks ?? RenderSingleLinks.AS_SINGLE,
      arrayRels: options.arrayRels ?? [],
      curieProvider: options.curieProvider,
      relationProvider: options.relationProvider ?? new DelegatingLinkRelationProvider(),
      fallbackRel: options.fallbackRel ?? DEFAULT_FALLBACK_REL
    };
    this.arrayPatterns = this.options.arrayRels.map(patternToRegExp);
  }

  /**
   * Renders a model as a HAL document
   */
  serialize(model: RepresentationModel): HalDocument {
    const document: HalDocument = { ...this.renderState(model) };

    let embedded: Record<string, unknown[]> | undefined;
    if (model instanceof CollectionModel) {
      embedded = this.renderEmbedded(model);
      if (embedded) {
        document._embedded = embedded;
      }
    }

    const links = this.renderLinks(model.getLinks(), Object.keys(embedded ?? {}));
    if (links) {
      document._links = links;
    }

    if (model instanceof PagedModel) {
      const metadata = model.getMetadata();
      if (metadata) {
        document.page = metadata.toJSON();
      }
    }

    return document;
  }

  /**
   * Renders `_links`; undefined when there is nothing to render
   *
   * @param embeddedRels - rendered `_embedded` keys, which also call for curies
   */
  renderLinks(links: Links, embeddedRels: readonly string[] = []): HalLinks | undefined {
    const grouped = new Map<string, Link[]>();

    for (const link of links) {
      const key = this.namespaced(link.rel);
      const group = grouped.get(key);
      if (group) {
        group.push(link);
      } else {
        grouped.set(key, [link]);
      }
    }

    const rendered: HalLinks = {};

    const curies = this.options.curieProvider?.getCurieInformation([...grouped.keys(), ...embeddedRels]) ?? [];
    if (curies.length > 0) {
      rendered[CURIES_REL] = curies.map(toHalLink);
    }

    for (const [rel, group] of grouped) {
      const objects = group.map(toHalLink);
      const single = objects[0];
      rendered[rel] = objects.length === 1 && single !== undefined && !this.renderAsArray(rel, group)
        ? single
        : objects;
    }

    return Object.keys(rendered).length > 0 ? rendered : undefined;
  }

  /**
   * Renders an arbitrary value, turning nested models into HAL documents
   */
  renderValue(value: unknown): unknown {
    if (value instanceof RepresentationModel) {
      return this.serialize(value);
    }
    if (Array.isArray(value)) {
      return value.map(item => this.renderValue(item));
    }
    return value;
  }

  /**
   * Resource state rendered inline next to `_links`
   */
  protected renderState(model: RepresentationModel): Record<string, unknown> {
    if (model instanceof CollectionModel) {
      return {};
    }
    const source: object = model instanceof EntityModel ? model.getContent() : model;
    return this.toProperties(source);
  }

  protected renderEmbedded(model: CollectionModel<unknown>): Record<string, unknown[]> | undefined {
    const content = model.getContent();
    const fallbackType = model.getFallbackType();

    if (content.length === 0) {
      return fallbackType === undefined
        ? undefined
        : { [this.namespaced(this.options.relationProvider.getCollectionResourceRelFor(fallbackType))]: [] };
    }

    const embedded: Record<string, unknown[]> = {};
    for (const item of content) {
      const rel = this.namespaced(this.embeddedRelFor(item, fallbackType));
      const rendered = this.renderValue(item);
      const group = Object.hasOwn(embedded, rel) ? embedded[rel] : undefined;
      if (group) {
        group.push(rendered);
      } else {
        embedded[rel] = [rendered];
      }
    }
    return embedded;
  }

  /**
   * Collection relation for an embedded item, from the item's class,
   * the collection's fallback type or the fallback relation
   */
  protected embeddedRelFor(item: unknown, fallbackType: TypeReference | undefined): string {
    const type = this.typeOf(item) ?? fallbackType;
    return type === undefined
      ? this.options.fallbackRel
      : this.options.relationProvider.getCollectionResourceRelFor(type);
  }

  private typeOf(item: unknown): ResourceClass | undefined {
    const subject: unknown = item instanceof EntityModel ? item.getContent() : item;

    if (subject instanceof CollectionModel || typeof subject !== 'object' || subject === null) {
      return undefined;
    }
    if (subject instanceof RepresentationModel && subject.constructor === RepresentationModel) {
      return undefined;
    }

    const constructor: unknown = subject.constructor;
    return isResourceClass(constructor) ? constructor : undefined;
  }

  private toProperties(source: object): Record<string, unknown> {
    const plain: unknown = hasToJSON(source) ? source.toJSON() : source;
    const properties: Record<string, unknown> = {};

    if (typeof plain !== 'object' || plain === null || Array.isArray(plain)) {
      return properties;
    }

    for (const [key, value] of Object.entries(plain)) {
      if (value !== undefined && typeof value !== 'function') {
        properties[key] = this.renderValue(value);
      }
    }
    return properties;
  }

  private namespaced(rel: string): string {
    return this.options.curieProvider ? this.options.curieProvider.getNamespacedRelFrom(rel) : rel;
  }

  private renderAsArray(renderedRel: string, group: readonly Link[]): boolean {
    if (this.options.renderSingleLinks === RenderSingleLinks.AS_ARRAY) {
      return true;
    }
    return this.arrayPatterns.some(pattern =>
      pattern.test(renderedRel) || group.some(link => pattern.test(link.rel))
    );
  }
}
