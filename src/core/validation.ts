// Input validation for relations, type names and page metadata

import { ValidationError } from './errors.js';

/**
 * Control characters and whitespace are not allowed inside a relation name
 */
// eslint-disable-next-line no-control-regex
export const ILLEGAL_REL_CHARS = /[\s\x00-\x1f"]/;

/**
 * Maximum lengths for various fields
 */
export const MAX_LENGTHS = {
  rel: 512,
  typeName: 256,
  curieName: 64
};

/**
 * Validates a link relation name
 */
export function validateRel(rel: string): string {
  if (!rel || typeof rel !== 'string') {
    throw new ValidationError('Link relation is required', 'rel');
  }

  const trimmed = rel.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('Link relation cannot be empty', 'rel');
  }

  if (trimmed.length > MAX_LENGTHS.rel) {
    throw new ValidationError(`Link relation exceeds maximum length of ${MAX_LENGTHS.rel}`, 'rel');
  }

  if (ILLEGAL_REL_CHARS.test(trimmed)) {
    throw new ValidationError(`Invalid link relation "${trimmed}"`, 'rel');
  }

  return trimmed;
}

/**
 * Validates a type name used for relation derivation
 */
export function validateTypeName(name: string): string {
  if (!name || typeof name !== 'string') {
    throw new ValidationError('Type name is required (anonymous types have no relation)', 'type');
  }

  const trimmed = name.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('Type name cannot be empty', 'type');
  }

  if (trimmed.length > MAX_LENGTHS.typeName) {
    throw new ValidationError(`Type name exceeds maximum length of ${MAX_LENGTHS.typeName}`, 'type');
  }

  return trimmed;
}

/**
 * Validates a curie name and its URI template
 */
export function validateCurie(name: string, template: string): void {
  if (!name || name.trim().length === 0) {
    throw new ValidationError('Curie name cannot be empty', 'curie');
  }

  if (name.length > MAX_LENGTHS.curieName || !/^[A-Za-z_][A-Za-z0-9_.-]*$/.test(name)) {
    throw new ValidationError(`Invalid curie name "${name}"`, 'curie');
  }

  if (!template.includes('{rel}')) {
    throw new ValidationError(`Curie template for "${name}" must contain {rel}`, 'curie', { template });
  }
}

/**
 * Validates a non-negative integer
 */
export function validateNonNegativeInteger(value: number, field: string): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${field} must be a non-negative integer, got ${value}`, field);
  }
  return value;
}
