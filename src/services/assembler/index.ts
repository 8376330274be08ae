/**
 * Assembler Module
 *
 * @module services/assembler
 */

export * from './representation-model-assembler.js';
