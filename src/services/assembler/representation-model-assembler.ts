/**
 * Representation Model Assembler
 *
 * Converts domain objects into representation models. The support base
 * class adds the collection self link and the `createModelWithId` helper
 * from a controller's registered routes.
 */

import { CollectionModel, EntityModel, type RepresentationModel } from '../../models/representation-model.js';
import type { ControllerClass } from '../web/route-registry.js';
import type { WebLinkBuilder } from '../web/web-link-builder.js';

/**
 * Converts entities into models
 */
export interface RepresentationModelAssembler<T, D extends RepresentationModel> {
  toModel(entity: T): D;
  toCollectionModel(entities: Iterable<T>): CollectionModel<D>;
}

/**
 * Base assembler bound to a controller
 */
export abstract class RepresentationModelAssemblerSupport<T, D extends RepresentationModel>
  implements RepresentationModelAssembler<T, D>
{
  /**
   * @param collectionHandler - handler serving the collection; the
   *   controller base path is used when omitted
   */
  constructor(
    protected readonly links: WebLinkBuilder,
    protected readonly controller: ControllerClass,
    protected readonly collectionHandler?: string
  ) {}

  abstract toModel(entity: T): D;

  /**
   * Converts every entity and adds a self link to the collection
   */
  toCollectionModel(entities: Iterable<T>): CollectionModel<D> {
    const models = Array.from(entities, entity => this.toModel(entity));
    return CollectionModel.of(models, this.links.linkTo(this.controller, this.collectionHandler).withSelfRel());
  }

  /**
   * Wraps an entity with a self link to `<controller base path>/<id>`
   */
  protected createModelWithId<E extends object>(id: string | number, entity: E): EntityModel<E> {
    return EntityModel.of(entity, this.links.linkTo(this.controller).slash(id).withSelfRel());
  }
}
