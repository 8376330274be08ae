// Controllers shared by the web tests

import type { Request, Response } from 'express';
import { z } from 'zod';
import { ValidationError } from '../../core/errors.js';
import { affordance } from '../../models/affordance.js';
import { CollectionModel, EntityModel } from '../../models/representation-model.js';
import type { RouteDefinition } from './route-registry.js';
import { linksOf, sendHal } from './middleware.js';

export class Order {
  constructor(public readonly id: number, public readonly total: number) {}
}

export const ORDERS: readonly Order[] = [new Order(1, 20), new Order(2, 5)];

const OrderInput = z.object({
  total: z.number().describe('Order total'),
  note: z.string().optional()
});

export class OrderController {
  static readonly basePath = '/orders';
  static readonly routes: readonly RouteDefinition[] = [
    { handler: 'list', method: 'GET', path: '/', query: ['page', 'size'] },
    { handler: 'show', method: 'GET', path: '/:id' },
    { handler: 'update', method: 'PUT', path: '/:id' },
    { handler: 'lines', method: 'GET', path: '/:id/lines/:lineId?' },
    { handler: 'fail', method: 'GET', path: '/fail/boom' }
  ];

  list(_req: Request, res: Response): void {
    const links = linksOf(res);
    const models = ORDERS.map(order =>
      EntityModel.of(order, links.linkTo(OrderController, 'show', { id: order.id }).withSelfRel())
    );
    sendHal(res, CollectionModel.of(models, links.linkTo(OrderController, 'list').withSelfRel()));
  }

  async show(req: Request, res: Response): Promise<void> {
    const order = await Promise.resolve(ORDERS.find(candidate => String(candidate.id) === req.params.id));
    if (!order) {
      throw new ValidationError(`Unknown order ${req.params.id ?? ''}`, 'id');
    }

    const links = linksOf(res);
    const self = links
      .linkTo(OrderController, 'show', { id: order.id })
      .withSelfRel()
      .andAffordance(affordance('PUT', { name: 'update', input: OrderInput }));

    sendHal(res, EntityModel.of(order, self, links.linkTo(OrderController, 'list').withRel('orders')));
  }

  update(_req: Request, res: Response): void {
    res.status(204).end();
  }

  lines(_req: Request, res: Response): void {
    res.status(204).end();
  }

  fail(): void {
    throw new Error('boom');
  }
}

/**
 * Declares a route its class does not implement
 */
export class BrokenController {
  static readonly basePath = '/broken';
  static readonly routes: readonly RouteDefinition[] = [{ handler: 'missing', method: 'GET', path: '/' }];
}
