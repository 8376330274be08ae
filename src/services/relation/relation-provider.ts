/**
 * Link Relation Provider
 *
 * Derives the relation names under which resources of a type are
 * embedded: explicitly registered relations first, then relations
 * derived from the type name.
 */

import { ValidationError } from '../../core/errors.js';
import { validateRel, validateTypeName } from '../../core/validation.js';
import { logger } from '../../core/logger.js';
import { typeNameOf, type TypeReference } from '../../models/types.js';

const log = logger.child('relations');

/**
 * Relation names for one type
 */
export interface RelationNames {
  itemRelation: string;
  collectionRelation: string;
}

/**
 * Explicit relations declared for a type
 */
export interface RelationDeclaration {
  itemRelation?: string;
  collectionRelation?: string;
}

/**
 * Link Relation Provider Interface
 */
export interface LinkRelationProvider {
  /** Returns undefined when the provider has no answer for the type */
  getItemResourceRelFor(type: TypeReference): string | undefined;
  getCollectionResourceRelFor(type: TypeReference): string | undefined;
}

const COLLECTION_SUFFIX = 'List';

/**
 * Lowercases the first character: `OrderItem` becomes `orderItem`
 */
export function uncapitalize(name: string): string {
  return name.charAt(0).toLowerCase() + name.slice(1);
}

/**
 * Derives relations from the type name
 */
export class DefaultLinkRelationProvider implements LinkRelationProvider {
  getItemResourceRelFor(type: TypeReference): string {
    return uncapitalize(validateTypeName(typeNameOf(type)));
  }

  getCollectionResourceRelFor(type: TypeReference): string {
    return `${this.getItemResourceRelFor(type)}${COLLECTION_SUFFIX}`;
  }
}

/**
 * Registry of explicitly declared relations, keyed by class or type name
 */
export class RelationRegistry {
  private readonly declarations = new Map<TypeReference, RelationDeclaration>();

  /**
   * Declares the relations of a type
   *
   * @throws ValidationError when neither relation is given or one is invalid
   */
  register(type: TypeReference, declaration: RelationDeclaration): void {
    const { itemRelation, collectionRelation } = declaration;

    if (itemRelation === undefined && collectionRelation === undefined) {
      throw new ValidationError('A relation declaration needs an item or collection relation', 'relation');
    }

    const validated: RelationDeclaration = {};
    if (itemRelation !== undefined) {
      validated.itemRelation = validateRel(itemRelation);
    }
    if (collectionRelation !== undefined) {
      validated.collectionRelation = validateRel(collectionRelation);
    }

    this.declarations.set(type, validated);
    log.debug('Registered relations', { type: typeNameOf(type), ...validated });
  }

  lookup(type: TypeReference): RelationDeclaration | undefined {
    return this.declarations.get(type);
  }

  unregister(type: TypeReference): boolean {
    return this.declarations.delete(type);
  }

  clear(): void {
    this.declarations.clear();
  }
}

/**
 * Process-wide registry used by registerRelation
 */
export const defaultRelationRegistry = new RelationRegistry();

/**
 * Declares the relations of a type in the default registry
 */
export function registerRelation(type: TypeReference, declaration: RelationDeclaration): void {
  defaultRelationRegistry.register(type, declaration);
}

/**
 * Answers for types with declared relations. A declared item relation
 * without a collection relation gets the `List` suffix; a declared
 * collection relation alone leaves the item relation to later providers.
 */
export class AnnotationLinkRelationProvider implements LinkRelationProvider {
  constructor(private readonly registry: RelationRegistry = defaultRelationRegistry) {}

  getItemResourceRelFor(type: TypeReference): string | undefined {
    return this.registry.lookup(type)?.itemRelation;
  }

  getCollectionResourceRelFor(type: TypeReference): string | undefined {
    const declaration = this.registry.lookup(type);
    if (!declaration) return undefined;

    if (declaration.collectionRelation) {
      return declaration.collectionRelation;
    }
    return declaration.itemRelation ? `${declaration.itemRelation}${COLLECTION_SUFFIX}` : undefined;
  }
}

/**
 * Consults providers in order and returns the first answer
 */
export class DelegatingLinkRelationProvider implements LinkRelationProvider {
  private readonly providers: readonly LinkRelationProvider[];

  constructor(...providers: LinkRelationProvider[]) {
    this.providers = providers.length > 0
      ? providers
      : [new AnnotationLinkRelationProvider(), new DefaultLinkRelationProvider()];
  }

  getItemResourceRelFor(type: TypeReference): string {
    for (const provider of this.providers) {
      const rel = provider.getItemResourceRelFor(type);
      if (rel !== undefined) return rel;
    }
    throw new ValidationError(`No item relation available for type ${typeNameOf(type)}`, 'type');
  }

  getCollectionResourceRelFor(type: TypeReference): string {
    for (const provider of this.providers) {
      const rel = provider.getCollectionResourceRelFor(type);
      if (rel !== undefined) return rel;
    }
    throw new ValidationError(`No collection relation available for type ${typeNameOf(type)}`, 'type');
  }

  /**
   * Both relations of a type
   */
  getRelationsFor(type: TypeReference): RelationNames {
    return {
      itemRelation: this.getItemResourceRelFor(type),
      collectionRelation: this.getCollectionResourceRelFor(type)
    };
  }
}
