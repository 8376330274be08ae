/**
 * Route Registry
 *
 * Records the routes controllers declare in their static `routes` table
 * so links can be built to them, and installs the handlers on an
 * Express router.
 */

import type { NextFunction, Request, Response, Router } from 'express';
import { ConfigurationError, RouteNotFoundError, ValidationError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import { HTTP_METHODS, type HttpMethod } from '../../models/types.js';

const log = logger.child('routes');

/**
 * A route a controller handler serves
 */
export interface RouteDefinition {
  handler: string;
  method: HttpMethod;
  /** Express path relative to the controller base path, e.g. `/:id` */
  path: string;
  /** Optional query parameters; unsupplied ones render as a template */
  query?: readonly string[];
}

/**
 * A controller class: a name, a base path and its route table
 */
export interface ControllerClass {
  readonly name: string;
  readonly basePath?: string;
  readonly routes: readonly RouteDefinition[];
}

/**
 * A registered route with its full path
 */
export interface RegisteredRoute extends RouteDefinition {
  controller: string;
  fullPath: string;
}

type RequestHandlerMethod = (req: Request, res: Response, next: NextFunction) => unknown;

/**
 * Joins path fragments with single slashes; the result starts with `/`
 */
export function joinPaths(...fragments: string[]): string {
  const joined = fragments
    .filter(fragment => fragment.length > 0)
    .join('/')
    .replace(/\/{2,}/g, '/');
  const normalized = joined.startsWith('/') ? joined : `/${joined}`;
  return normalized.length > 1 && normalized.endsWith('/') ? normalized.slice(0, -1) : normalized;
}

function controllerName(controller: ControllerClass | string): string {
  return typeof controller === 'string' ? controller : controller.name;
}

/**
 * Route Registry Implementation
 */
export class RouteRegistry {
  private readonly routes = new Map<string, RegisteredRoute>();
  private readonly basePaths = new Map<string, string>();

  /**
   * Records every route of a controller
   *
   * @throws ValidationError for unnamed controllers, unknown methods or duplicate handlers
   */
  registerController(controller: ControllerClass): void {
    const name = controller.name;
    if (!name) {
      throw new ValidationError('Controllers must be named classes', 'controller');
    }

    const basePath = joinPaths(controller.basePath ?? '');
    this.basePaths.set(name, basePath);

    for (const route of controller.routes) {
      if (!HTTP_METHODS.includes(route.method)) {
        throw new ValidationError(`Unsupported HTTP method "${route.method}" on ${name}.${route.handler}`, 'method');
      }

      const key = `${name}.${route.handler}`;
      if (this.routes.has(key)) {
        throw new ValidationError(`Handler ${key} is declared twice`, 'handler');
      }

      const registered: RegisteredRoute = {
        ...route,
        controller: name,
        fullPath: joinPaths(basePath, route.path)
      };
      this.routes.set(key, registered);
      log.debug('Registered route', { handler: key, method: route.method, path: registered.fullPath });
    }
  }

  /**
   * @throws RouteNotFoundError when the handler was never registered
   */
  getRoute(controller: ControllerClass | string, handler: string): RegisteredRoute {
    const name = controllerName(controller);
    const route = this.routes.get(`${name}.${handler}`);
    if (!route) {
      throw new RouteNotFoundError(name, handler);
    }
    return route;
  }

  /**
   * @throws RouteNotFoundError when the controller was never registered
   */
  getBasePath(controller: ControllerClass | string): string {
    const name = controllerName(controller);
    const basePath = this.basePaths.get(name);
    if (basePath === undefined) {
      throw new RouteNotFoundError(name, '*');
    }
    return basePath;
  }

  getRoutes(): RegisteredRoute[] {
    return [...this.routes.values()];
  }

  /**
   * Installs a controller instance's handlers on a router. Rejected
   * promises are forwarded to Express error handling.
   *
   * @throws ConfigurationError when the instance lacks a declared handler
   */
  mount(router: Router, instance: object, controller: ControllerClass): void {
    if (!this.basePaths.has(controller.name)) {
      this.registerController(controller);
    }

    for (const route of controller.routes) {
      const candidate: unknown = Reflect.get(instance, route.handler);
      if (typeof candidate !== 'function') {
        throw new ConfigurationError(`${controller.name} does not implement handler ${route.handler}`, {
          controller: controller.name,
          handler: route.handler
        });
      }

      const method: RequestHandlerMethod = (req, res, next) => Reflect.apply(candidate, instance, [req, res, next]);
      const handler = (req: Request, res: Response, next: NextFunction): void => {
        Promise.resolve()
          .then(() => method(req, res, next))
          .catch(next);
      };

      const path = this.getRoute(controller, route.handler).fullPath;
      const target = router.route(path);

      switch (route.method) {
        case 'GET':
          target.get(handler);
          break;
        case 'HEAD':
          target.head(handler);
          break;
        case 'POST':
          target.post(handler);
          break;
        case 'PUT':
          target.put(handler);
          break;
        case 'PATCH':
          target.patch(handler);
          break;
        case 'DELETE':
          target.delete(handler);
          break;
        case 'OPTIONS':
          target.options(handler);
          break;
      }
    }
  }
}
