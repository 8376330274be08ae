// Affordances: HTTP actions advertised on a link's target

import { z } from 'zod';
import { ValidationError } from '../core/errors.js';
import { HTTP_METHODS, type HttpMethod } from './types.js';

/**
 * An input property of an affordance
 */
export interface AffordanceProperty {
  name: string;
  required?: boolean;
  readOnly?: boolean;
  prompt?: string;
  regex?: string;
  type?: string;
}

/**
 * An action a client can perform on a link's target
 */
export interface Affordance {
  /** Template name; the first affordance of a link renders as "default" */
  name?: string;
  method: HttpMethod;
  title?: string;
  contentType?: string;
  properties: readonly AffordanceProperty[];
}

/**
 * Options for building an affordance
 */
export interface AffordanceOptions {
  name?: string;
  title?: string;
  contentType?: string;
  /** Input payload schema; its fields become the affordance properties */
  input?: z.AnyZodObject;
  properties?: AffordanceProperty[];
}

/**
 * Strips optional, nullable and default wrappers off a field schema
 */
function unwrap(schema: z.ZodTypeAny): z.ZodTypeAny {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return unwrap(schema.unwrap());
  }
  if (schema instanceof z.ZodDefault) {
    return unwrap(schema.removeDefault());
  }
  return schema;
}

/**
 * Derives the HAL-FORMS input type of a field
 */
function inputTypeOf(schema: z.ZodTypeAny): string | undefined {
  if (schema instanceof z.ZodString) {
    if (schema.isEmail) return 'email';
    if (schema.isURL) return 'url';
    if (schema.isDatetime) return 'datetime-local';
    return 'text';
  }
  if (schema instanceof z.ZodNumber || schema instanceof z.ZodBigInt) return 'number';
  if (schema instanceof z.ZodBoolean) return 'checkbox';
  if (schema instanceof z.ZodDate) return 'date';
  return undefined;
}

function regexOf(schema: z.ZodTypeAny): string | undefined {
  if (!(schema instanceof z.ZodString)) return undefined;
  for (const check of schema._def.checks) {
    if (check.kind === 'regex') {
      return check.regex.source;
    }
  }
  return undefined;
}

/**
 * Derives affordance properties from an object schema, in declaration order
 */
export function propertiesFromSchema(schema: z.AnyZodObject): AffordanceProperty[] {
  return Object.entries<z.ZodTypeAny>(schema.shape).map(([name, field]) => {
    const fieldSchema: z.ZodTypeAny = field;
    const inner = unwrap(fieldSchema);
    const property: AffordanceProperty = { name };

    if (!fieldSchema.isOptional()) {
      property.required = true;
    }
    if (fieldSchema.description) {
      property.prompt = fieldSchema.description;
    }
    const regex = regexOf(inner);
    if (regex) {
      property.regex = regex;
    }
    const type = inputTypeOf(inner);
    if (type) {
      property.type = type;
    }

    return property;
  });
}

/**
 * Builds an affordance for the given HTTP method
 */
export function affordance(method: string, options: AffordanceOptions = {}): Affordance {
  const normalized = method.toUpperCase();
  const httpMethod = HTTP_METHODS.find(m => m === normalized);

  if (!httpMethod) {
    throw new ValidationError(`Unsupported HTTP method "${method}"`, 'method');
  }

  const properties = options.input
    ? propertiesFromSchema(options.input)
    : [...(options.properties ?? [])];

  const result: Affordance = { method: httpMethod, properties };
  if (options.name) result.name = options.name;
  if (options.title) result.title = options.title;
  if (options.contentType) result.contentType = options.contentType;

  return Object.freeze(result);
}
