/**
 * Serialization Module
 *
 * HAL and HAL-FORMS rendering, HAL parsing and RFC 8288 Link headers.
 *
 * @module services/serialization
 */

export * from './hal-serializer.js';
export * from './hal-forms-serializer.js';
export * from './hal-deserializer.js';
export * from './link-header.js';
