/**
 * URI Template Module
 *
 * RFC 6570 template parsing and expansion.
 *
 * @module services/uri-template
 */

export * from './uri-template.js';
