// Core type definitions for halkit

/**
 * A class (or abstract class) whose instances are rendered as resources
 */
export type ResourceClass = abstract new (...args: never[]) => object;

/**
 * Identifies a resource type: a class, or a plain type name for data
 * that has no class of its own
 */
export type TypeReference = ResourceClass | string;

// HTTP methods an affordance or route can use
export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS';

export const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'];

// Media types halkit renders
export const MediaTypes = {
  HAL_JSON: 'application/hal+json',
  HAL_FORMS_JSON: 'application/prs.hal-forms+json',
  JSON: 'application/json',
  PROBLEM_JSON: 'application/problem+json'
} as const;

export type MediaType = (typeof MediaTypes)[keyof typeof MediaTypes];

/**
 * Resolves the name of a type reference
 */
export function typeNameOf(type: TypeReference): string {
  return typeof type === 'string' ? type : type.name;
}
