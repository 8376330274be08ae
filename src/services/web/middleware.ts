/**
 * Express Middleware
 *
 * `hateoas()` gives every request a link builder bound to its base URI
 * and a `res.hal()` helper that renders models in the negotiated media
 * type. `problemHandler()` renders errors as problem documents.
 */

import { STATUS_CODES } from 'node:http';
import type { ErrorRequestHandler, Request, RequestHandler, Response } from 'express';
import { ConfigurationError, HypermediaError, NotAcceptableError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import type { RepresentationModel } from '../../models/representation-model.js';
import { MediaTypes } from '../../models/types.js';
import type { WebConfig } from '../config/config-service.js';
import { HalFormsSerializer } from '../serialization/hal-forms-serializer.js';
import { HalSerializer, type HalOptions } from '../serialization/hal-serializer.js';
import { resolveBaseUri } from './forwarded.js';
import type { RouteRegistry } from './route-registry.js';
import { joinPaths } from './route-registry.js';
import { WebLinkBuilder } from './web-link-builder.js';

const log = logger.child('web');

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Response {
      hal?: (model: RepresentationModel, status?: number) => void;
    }
  }
}

/**
 * Media types `res.hal()` can produce, in order of preference
 */
export const HYPERMEDIA_TYPES: readonly string[] = [
  MediaTypes.HAL_JSON,
  MediaTypes.HAL_FORMS_JSON,
  MediaTypes.JSON
];

export interface HateoasOptions {
  registry: RouteRegistry;
  halOptions?: Partial<HalOptions>;
  web?: Partial<WebConfig>;
}

/**
 * RFC 7807 problem document
 */
export interface ProblemDocument {
  [extension: string]: unknown;
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
}

/**
 * Builds the problem document for an error
 */
export function toProblem(error: unknown, instance?: string): ProblemDocument {
  const status = error instanceof HypermediaError ? error.statusCode : 500;
  const problem: ProblemDocument = {
    type: 'about:blank',
    title: STATUS_CODES[status] ?? 'Error',
    status
  };

  if (error instanceof HypermediaError) {
    problem.detail = error.message;
    problem.code = error.code;
  } else {
    problem.detail = 'Unexpected error';
  }
  if (instance !== undefined) {
    problem.instance = instance;
  }
  return problem;
}

function sendProblem(res: Response, problem: ProblemDocument): void {
  res.status(problem.status);
  res.type(MediaTypes.PROBLEM_JSON);
  res.json(problem);
}

/**
 * The link builder the middleware attached to a response
 *
 * @throws ConfigurationError when `hateoas()` is not installed
 */
export function linksOf(res: Response): WebLinkBuilder {
  const links: unknown = res.locals.links;
  if (!(links instanceof WebLinkBuilder)) {
    throw new ConfigurationError('hateoas() middleware is not installed');
  }
  return links;
}

/**
 * Renders a model through `res.hal()`
 *
 * @throws ConfigurationError when `hateoas()` is not installed
 */
export function sendHal(res: Response, model: RepresentationModel, status?: number): void {
  if (!res.hal) {
    throw new ConfigurationError('hateoas() middleware is not installed');
  }
  res.hal(model, status);
}

function negotiate(req: Request): string | undefined {
  const accepted = req.accepts([...HYPERMEDIA_TYPES]);
  return accepted === false ? undefined : accepted;
}

/**
 * Hypermedia middleware
 */
export function hateoas(options: HateoasOptions): RequestHandler {
  const web: WebConfig = {
    trustForwardedHeaders: options.web?.trustForwardedHeaders ?? true,
    basePath: options.web?.basePath ?? ''
  };
  const basePath = web.basePath ? joinPaths(web.basePath) : '';
  const hal = new HalSerializer(options.halOptions);
  const forms = new HalFormsSerializer(options.halOptions);

  return (req, res, next) => {
    const baseUri = `${resolveBaseUri(req, web)}${basePath === '/' ? '' : basePath}`;
    res.locals.links = new WebLinkBuilder(options.registry, baseUri);

    res.hal = (model, status = 200) => {
      const mediaType = negotiate(req);

      if (mediaType === undefined) {
        const accept = req.get('accept') ?? '';
        log.warn('No acceptable hypermedia type', { accept, path: req.originalUrl });
        sendProblem(res, toProblem(new NotAcceptableError(accept, HYPERMEDIA_TYPES), req.originalUrl));
        return;
      }

      if (mediaType === MediaTypes.HAL_FORMS_JSON) {
        res.status(status).type(MediaTypes.HAL_FORMS_JSON).json(forms.serialize(model));
        return;
      }

      res.status(status).type(MediaTypes.HAL_JSON).json(hal.serialize(model));
    };

    next();
  };
}

/**
 * Error middleware rendering `application/problem+json`
 */
export function problemHandler(): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const problem = toProblem(err, req.originalUrl);
    if (problem.status >= 500) {
      log.exception(err instanceof Error ? err : new Error(String(err)), { path: req.originalUrl });
    }
    sendProblem(res, problem);
  };
}
