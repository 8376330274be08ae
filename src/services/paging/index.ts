/**
 * Paging Module
 *
 * @module services/paging
 */

export * from './paged-model-assembler.js';
