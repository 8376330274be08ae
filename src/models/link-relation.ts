// Link relations and the IANA registry

import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const RegistryFileSchema = z.object({
  relations: z.array(z.string().min(1))
});

/**
 * Reads the IANA registry from `data/` at the package root
 */
function loadRegistry(): ReadonlySet<string> {
  const file = fileURLToPath(new URL('../../data/iana-link-relations.json', import.meta.url));
  const { relations } = RegistryFileSchema.parse(JSON.parse(fs.readFileSync(file, 'utf-8')));
  return new Set(relations.map(rel => rel.toLowerCase()));
}

const IANA_RELATIONS = loadRegistry();

/**
 * Frequently used IANA relations
 */
export const IanaLinkRelations = {
  SELF: 'self',
  NEXT: 'next',
  PREV: 'prev',
  FIRST: 'first',
  LAST: 'last',
  ITEM: 'item',
  COLLECTION: 'collection',
  EDIT: 'edit',
  PROFILE: 'profile',
  DESCRIBEDBY: 'describedby',
  SEARCH: 'search',
  UP: 'up'
} as const;

/**
 * True when the relation is registered with IANA
 */
export function isIanaRel(rel: string): boolean {
  return IANA_RELATIONS.has(rel.toLowerCase());
}

/**
 * Relations compare case-insensitively
 */
export function relEquals(left: string, right: string): boolean {
  return left.toLowerCase() === right.toLowerCase();
}

/**
 * True for relations given as absolute URIs (extension relation types)
 */
export function isUriRel(rel: string): boolean {
  return /^[A-Za-z][A-Za-z0-9+.-]*:\/\//.test(rel);
}
