/**
 * ARTIFACTS MODULE
 */

export * from './dataset.js';
export * from './artifact.loader.js';
export * from './artifact.cache.js';
export * from './artifact.catalog.js';
