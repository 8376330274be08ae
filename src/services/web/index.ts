/**
 * Web Module
 *
 * Express integration: route registry, link building, forwarded
 * headers, hypermedia middleware and problem documents.
 *
 * @module services/web
 */

export * from './route-registry.js';
export * from './forwarded.js';
export * from './web-link-builder.js';
export * from './middleware.js';
