// Error hierarchy for halkit

/**
 * Base error class for all hypermedia errors
 */
export abstract class HypermediaError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

/**
 * Validation errors for invalid input
 */
export class ValidationError extends HypermediaError {
  readonly code = 'VALIDATION_ERROR';
  readonly statusCode = 400;

  constructor(message: string, public readonly field?: string, context?: Record<string, unknown>) {
    super(message, { ...context, field });
  }
}

/**
 * Raised when a required link is absent
 */
export class LinkNotFoundError extends HypermediaError {
  readonly code = 'LINK_NOT_FOUND';
  readonly statusCode = 404;

  constructor(public readonly rel: string) {
    super(`No link with rel '${rel}' found`, { rel });
  }
}

/**
 * Malformed RFC 8288 link values
 */
export class LinkParseError extends HypermediaError {
  readonly code = 'LINK_PARSE_ERROR';
  readonly statusCode = 400;

  constructor(message: string, public readonly input: string) {
    super(message, { input });
  }
}

/**
 * Malformed URI templates
 */
export class UriTemplateError extends HypermediaError {
  readonly code = 'URI_TEMPLATE_ERROR';
  readonly statusCode = 400;

  constructor(message: string, public readonly template: string, public readonly position?: number) {
    super(message, { template, position });
  }
}

/**
 * HAL documents that fail schema validation
 */
export class HalParseError extends HypermediaError {
  readonly code = 'HAL_PARSE_ERROR';
  readonly statusCode = 400;
}

/**
 * Link building against a handler nobody registered
 */
export class RouteNotFoundError extends HypermediaError {
  readonly code = 'ROUTE_NOT_FOUND';
  readonly statusCode = 500;

  constructor(controller: string, handler: string) {
    super(`No route registered for ${controller}.${handler}`, { controller, handler });
  }
}

/**
 * Content negotiation failures
 */
export class NotAcceptableError extends HypermediaError {
  readonly code = 'NOT_ACCEPTABLE';
  readonly statusCode = 406;

  constructor(accept: string, supported: readonly string[]) {
    super(`None of the supported media types match '${accept}'`, { accept, supported: [...supported] });
  }
}

/**
 * Wiring mistakes: missing middleware, handlers a controller does not implement
 */
export class ConfigurationError extends HypermediaError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly statusCode = 500;
}
