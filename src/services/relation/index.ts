/**
 * Relation Module
 *
 * Relation names derived from resource types, with explicit overrides.
 *
 * @module services/relation
 */

export * from './relation-provider.js';
