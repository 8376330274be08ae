/**
 * Curie Provider
 *
 * Shortens custom relations to `prefix:rel` and produces the `curies`
 * links that tell clients how to expand them.
 */

import { ValidationError } from '../../core/errors.js';
import { validateCurie } from '../../core/validation.js';
import { Link } from '../../models/link.js';
import { isIanaRel, isUriRel } from '../../models/link-relation.js';

export const CURIES_REL = 'curies';

/**
 * Curie Provider Interface
 */
export interface CurieProvider {
  /** The relation as rendered, prefixed with the default curie when it is custom */
  getNamespacedRelFrom(rel: string): string;
  /** The `curies` links to render next to the given relations */
  getCurieInformation(renderedRels: Iterable<string>): Link[];
}

/**
 * Curie provider backed by a fixed map of names to URI templates
 */
export class DefaultCurieProvider implements CurieProvider {
  private readonly curies: ReadonlyMap<string, string>;
  private readonly defaultName: string | undefined;

  /**
   * @param curies - curie names mapped to templates containing `{rel}`
   * @param defaultName - curie applied to unprefixed custom relations;
   *   defaults to the only entry when there is exactly one
   * @throws ValidationError for templates without `{rel}` or an unknown default
   */
  constructor(curies: Readonly<Record<string, string>>, defaultName?: string) {
    const entries = Object.entries(curies);
    for (const [name, template] of entries) {
      validateCurie(name, template);
    }
    this.curies = new Map(entries);

    if (defaultName !== undefined && !this.curies.has(defaultName)) {
      throw new ValidationError(`Default curie "${defaultName}" is not configured`, 'curie');
    }

    const only = entries.length === 1 ? entries[0] : undefined;
    this.defaultName = defaultName ?? only?.[0];
  }

  getNamespacedRelFrom(rel: string): string {
    if (!this.defaultName || isIanaRel(rel) || rel.includes(':') || isUriRel(rel)) {
      return rel;
    }
    return `${this.defaultName}:${rel}`;
  }

  getCurieInformation(renderedRels: Iterable<string>): Link[] {
    const used = new Set<string>();
    for (const rel of renderedRels) {
      const colon = rel.indexOf(':');
      if (colon > 0 && !isUriRel(rel)) {
        used.add(rel.slice(0, colon));
      }
    }

    if (![...used].some(prefix => this.curies.has(prefix))) {
      return [];
    }

    return [...this.curies].map(([name, template]) => Link.of(template, CURIES_REL).withName(name));
  }

  getCurieNames(): string[] {
    return [...this.curies.keys()];
  }
}
