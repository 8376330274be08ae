// HAL document deserializer

import { HalParseError } from '../../core/errors.js';
import { HalResourceSchema, type HalLinkObject, type HalLinksObject } from '../../core/schemas.js';
import { Link } from '../../models/link.js';
import { Links } from '../../models/links.js';
import { EntityModel } from '../../models/representation-model.js';
import { CURIES_REL } from '../curie/curie-provider.js';

/**
 * A parsed HAL resource
 */
export interface ParsedHal {
  /** Resource state with its links */
  model: EntityModel<Record<string, unknown>>;
  /** Embedded resources, keyed by relation as written */
  embedded: Record<string, ParsedHal | ParsedHal[]>;
}

function toLink(rel: string, object: HalLinkObject): Link {
  return Link.fromJSON({
    rel,
    href: object.href,
    type: object.type,
    deprecation: object.deprecation,
    name: object.name,
    profile: object.profile,
    title: object.title,
    hreflang: object.hreflang
  });
}

function toLinks(links: HalLinksObject | undefined): Links {
  if (!links) {
    return Links.NONE;
  }

  const result: Link[] = [];
  for (const [rel, value] of Object.entries(links)) {
    if (rel === CURIES_REL) continue;

    const objects = Array.isArray(value) ? value : [value];
    for (const object of objects) {
      result.push(toLink(rel, object));
    }
  }
  return Links.of(...result);
}

function parseResource(input: unknown, path: string): ParsedHal {
  const result = HalResourceSchema.safeParse(input);

  if (!result.success) {
    throw new HalParseError(`Invalid HAL document at ${path}`, { issues: result.error.issues });
  }

  const { _links, _embedded, ...state } = result.data;
  const embedded: Record<string, ParsedHal | ParsedHal[]> = {};

  for (const [rel, value] of Object.entries(_embedded ?? {})) {
    embedded[rel] = Array.isArray(value)
      ? value.map((item, index) => parseResource(item, `${path}._embedded.${rel}[${index}]`))
      : parseResource(value, `${path}._embedded.${rel}`);
  }

  return {
    model: EntityModel.of(state, toLinks(_links)),
    embedded
  };
}

/**
 * Parses a HAL document from JSON text or an already decoded value
 *
 * @throws HalParseError if the input is not JSON or not a HAL resource
 */
export function parseHal(input: unknown): ParsedHal {
  let decoded: unknown = input;

  if (typeof input === 'string') {
    try {
      decoded = JSON.parse(input);
    } catch (error) {
      throw new HalParseError(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  return parseResource(decoded, '$');
}
