/**
 * RECORD FILTER MODULE
 */

export * from './record-filter.types.js';
export * from './record-filter.engine.js';
export * from './explorer.criteria.js';
