// Export all hypermedia models

export * from './types.js';
export * from './link-relation.js';
export * from './affordance.js';
export * from './link.js';
export * from './links.js';
export * from './representation-model.js';
