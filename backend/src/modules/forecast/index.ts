/**
 * FORECAST MODULE
 */

export * from './forecast.types.js';
export * from './forecast.validator.js';
export * from './forecast.fallback.js';
export * from './forecast.reconciler.js';
