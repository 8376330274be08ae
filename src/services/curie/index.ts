/**
 * Curie Module
 *
 * @module services/curie
 */

export * from './curie-provider.js';
