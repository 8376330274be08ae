// Export all services

export * from './uri-template/index.js';
export * from './relation/index.js';
export * from './curie/index.js';
export * from './serialization/index.js';
export * from './paging/index.js';
export * from './web/index.js';
export * from './assembler/index.js';
export * from './config/index.js';
