/**
 * Paged Model Assembler
 *
 * Wraps one page of a result set in a PagedModel with navigation links.
 * The page and size query parameters are rewritten per link; all other
 * query parameters of the base URI are kept.
 */

import { IanaLinkRelations } from '../../models/link-relation.js';
import { Link } from '../../models/link.js';
import { PagedModel, PageMetadata } from '../../models/representation-model.js';
import { encodeValue } from '../uri-template/index.js';

/**
 * One page of a result set; `number` is zero based
 */
export interface Page<T> {
  content: readonly T[];
  number: number;
  size: number;
  totalElements: number;
}

export interface PagingOptions {
  pageParam: string;
  sizeParam: string;
  /** Render page numbers starting at 1 in links */
  oneIndexed: boolean;
}

/**
 * Turns page items into the models that are embedded
 */
export type ModelMapper<T, R> = ((item: T) => R) | { toModel(item: T): R };

const DEFAULT_OPTIONS: PagingOptions = {
  pageParam: 'page',
  sizeParam: 'size',
  oneIndexed: false
};

function decodeName(raw: string): string {
  try {
    return decodeURIComponent(raw.replace(/\+/g, ' '));
  } catch {
    return raw;
  }
}

function mapWith<T, R>(mapper: ModelMapper<T, R>, item: T): R {
  return typeof mapper === 'function' ? mapper(item) : mapper.toModel(item);
}

/**
 * Paged Model Assembler Implementation
 */
export class PagedModelAssembler {
  private readonly options: PagingOptions;

  constructor(options: Partial<PagingOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Builds a PagedModel with `first`, `prev`, `self`, `next` and `last` links.
   * `first` and `last` are only added when there is more than one page.
   *
   * @throws ValidationError for negative or fractional page values
   */
  toPagedModel<T>(page: Page<T>, baseUri: string): PagedModel<T>;
  toPagedModel<T, R>(page: Page<T>, baseUri: string, mapper: ModelMapper<T, R>): PagedModel<R>;
  toPagedModel<T, R>(page: Page<T>, baseUri: string, mapper?: ModelMapper<T, R>): PagedModel<T> | PagedModel<R> {
    const metadata = new PageMetadata(page.size, page.number, page.totalElements);
    const links = this.pageLinks(metadata, baseUri);

    if (mapper === undefined) {
      return PagedModel.ofPage(page.content, metadata, links);
    }
    return PagedModel.ofPage(page.content.map(item => mapWith(mapper, item)), metadata, links);
  }

  private pageLinks(metadata: PageMetadata, baseUri: string): Link[] {
    const hasPrevious = metadata.number > 0;
    const hasNext = metadata.number + 1 < metadata.totalPages;
    const lastIndex = Math.max(0, metadata.totalPages - 1);
    const href = (number: number) => this.pageUri(baseUri, number, metadata.size);
    const links: Link[] = [];

    if (hasPrevious || hasNext) {
      links.push(Link.of(href(0), IanaLinkRelations.FIRST));
    }
    if (hasPrevious) {
      links.push(Link.of(href(Math.min(metadata.number - 1, lastIndex)), IanaLinkRelations.PREV));
    }
    links.push(Link.of(href(metadata.number), IanaLinkRelations.SELF));
    if (hasNext) {
      links.push(Link.of(href(metadata.number + 1), IanaLinkRelations.NEXT));
    }
    if (hasPrevious || hasNext) {
      links.push(Link.of(href(lastIndex), IanaLinkRelations.LAST));
    }

    return links;
  }

  private pageUri(baseUri: string, number: number, size: number): string {
    const withoutFragment = baseUri.split('#')[0] ?? baseUri;
    const index = withoutFragment.indexOf('?');
    const path = index < 0 ? withoutFragment : withoutFragment.slice(0, index);
    const query = index < 0 ? '' : withoutFragment.slice(index + 1);
    const { pageParam, sizeParam, oneIndexed } = this.options;

    const kept = query
      .split('&')
      .filter(pair => pair.length > 0)
      .filter(pair => {
        const name = decodeName(pair.split('=')[0] ?? '');
        return name !== pageParam && name !== sizeParam;
      });

    kept.push(`${encodeValue(pageParam, false)}=${number + (oneIndexed ? 1 : 0)}`);
    kept.push(`${encodeValue(sizeParam, false)}=${size}`);

    return `${path}?${kept.join('&')}`;
  }
}
