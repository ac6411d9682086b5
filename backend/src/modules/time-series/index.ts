/**
 * TIME SERIES MODULE
 */

export * from './time-series.types.js';
export * from './period.utils.js';
export * from './monthly.aggregator.js';
export * from './group.aggregator.js';
