/**
 * SCHEMA MODULE
 */

export * from './schema.aliases.js';
export * from './schema.resolver.js';
