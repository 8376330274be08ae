// RFC 8288 Link header rendering and parsing

import { Links } from '../../models/links.js';
import { RepresentationModel } from '../../models/representation-model.js';

/**
 * Renders the links of a model (or a link collection) as a header value
 */
export function toLinkHeader(source: RepresentationModel | Links): string {
  const links = source instanceof RepresentationModel ? source.getLinks() : source;
  return links.toString();
}

/**
 * Parses a header value; absent or blank headers give no links
 */
export function fromLinkHeader(header: string | readonly string[] | undefined): Links {
  if (header === undefined) {
    return Links.NONE;
  }
  const values = typeof header === 'string' ? [header] : header;
  return Links.NONE.and(...values.map(value => Links.parse(value)));
}
