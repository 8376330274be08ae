/**
 * Representation models
 *
 * Payload wrappers carrying links: a plain base model, a single entity,
 * a collection and a page of a collection.
 */

import { LinkNotFoundError, ValidationError } from '../core/errors.js';
import { validateNonNegativeInteger } from '../core/validation.js';
import type { Link } from './link.js';
import { IanaLinkRelations } from './link-relation.js';
import { Links, type LinkSource } from './links.js';
import type { TypeReference } from './types.js';

/**
 * Base class for anything rendered with links. Subclasses add their own
 * fields, which are rendered next to the links.
 */
export class RepresentationModel {
  #links: Link[] = [];

  constructor(...links: LinkSource[]) {
    this.add(...links);
  }

  /**
   * Appends links; the links themselves are immutable
   */
  add(...links: LinkSource[]): this {
    for (const link of Links.of(...links)) {
      this.#links.push(link);
    }
    return this;
  }

  addIf(condition: boolean, supplier: () => Link): this {
    return condition ? this.add(supplier()) : this;
  }

  addAllIf(condition: boolean, supplier: () => Iterable<Link>): this {
    return condition ? this.add(supplier()) : this;
  }

  hasLinks(): boolean {
    return this.#links.length > 0;
  }

  hasLink(rel: string): boolean {
    return this.#links.some(link => link.hasRel(rel));
  }

  /**
   * All links, or the links of one relation
   */
  getLinks(): Links;
  getLinks(rel: string): Link[];
  getLinks(rel?: string): Links | Link[] {
    const links = Links.of(this.#links);
    return rel === undefined ? links : links.getLinks(rel);
  }

  getLink(rel: string): Link | undefined {
    return this.#links.find(link => link.hasRel(rel));
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

  removeLinks(): this {
    this.#links = [];
    return this;
  }

  /**
   * Replaces every link of the relation with the mapper's result
   */
  mapLink(rel: string, mapper: (link: Link) => Link): this {
    this.#links = this.#links.map(link => (link.hasRel(rel) ? mapper(link) : link));
    return this;
  }
}

function isIterable(value: object): value is Iterable<unknown> {
  return Symbol.iterator in value;
}

/**
 * A single payload object with links
 */
export class EntityModel<T extends object> extends RepresentationModel {
  readonly #content: T;

  private constructor(content: T, links: LinkSource[]) {
    super(...links);
    this.#content = content;
  }

  /**
   * @throws ValidationError for collections; wrap those in a CollectionModel
   */
  static of<T extends object>(content: T, ...links: LinkSource[]): EntityModel<T> {
    if (content === null || content === undefined || typeof content !== 'object') {
      throw new ValidationError('Entity content must be an object', 'content');
    }
    if (isIterable(content)) {
      throw new ValidationError('Entity content must not be a collection, use CollectionModel instead', 'content');
    }
    return new EntityModel(content, links);
  }

  getContent(): T {
    return this.#content;
  }
}

/**
 * A collection of items with links
 */
export class CollectionModel<T> extends RepresentationModel {
  readonly #content: readonly T[];
  #fallbackType: TypeReference | undefined;

  protected constructor(content: Iterable<T>, links: LinkSource[]) {
    super(...links);
    this.#content = Object.freeze([...content]);
  }

  static of<T>(content: Iterable<T>, ...links: LinkSource[]): CollectionModel<T> {
    return new CollectionModel(content, links);
  }

  static empty<T>(...links: LinkSource[]): CollectionModel<T> {
    return new CollectionModel<T>([], links);
  }

  getContent(): readonly T[] {
    return this.#content;
  }

  /**
   * Type used to name the embedded relation when items carry no type
   * of their own, including when the collection is empty
   */
  withFallbackType(type: TypeReference): this {
    this.#fallbackType = type;
    return this;
  }

  getFallbackType(): TypeReference | undefined {
    return this.#fallbackType;
  }
}

/**
 * Paging information of a PagedModel
 */
export class PageMetadata {
  readonly size: number;
  readonly number: number;
  readonly totalElements: number;
  readonly totalPages: number;

  /**
   * @throws ValidationError for negative or fractional values
   */
  constructor(size: number, number: number, totalElements: number, totalPages?: number) {
    this.size = validateNonNegativeInteger(size, 'size');
    this.number = validateNonNegativeInteger(number, 'number');
    this.totalElements = validateNonNegativeInteger(totalElements, 'totalElements');
    this.totalPages = totalPages === undefined
      ? (size > 0 ? Math.ceil(totalElements / size) : 0)
      : validateNonNegativeInteger(totalPages, 'totalPages');
    Object.freeze(this);
  }

  toJSON() {
    return {
      size: this.size,
      totalElements: this.totalElements,
      totalPages: this.totalPages,
      number: this.number
    };
  }
}

/**
 * One page of a collection
 */
export class PagedModel<T> extends CollectionModel<T> {
  readonly #metadata: PageMetadata | undefined;

  private constructor(content: Iterable<T>, metadata: PageMetadata | undefined, links: LinkSource[]) {
    super(content, links);
    this.#metadata = metadata;
  }

  static ofPage<T>(content: Iterable<T>, metadata?: PageMetadata, ...links: LinkSource[]): PagedModel<T> {
    return new PagedModel(content, metadata, links);
  }

  static emptyPage<T>(metadata?: PageMetadata, ...links: LinkSource[]): PagedModel<T> {
    return new PagedModel<T>([], metadata, links);
  }

  getMetadata(): PageMetadata | undefined {
    return this.#metadata;
  }

  getNextLink(): Link | undefined {
    return this.getLink(IanaLinkRelations.NEXT);
  }

  getPreviousLink(): Link | undefined {
    return this.getLink(IanaLinkRelations.PREV);
  }
}
