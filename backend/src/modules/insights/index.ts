/**
 * INSIGHTS MODULE
 */

export * from './insights.types.js';
export { InsightsService, type InsightsServiceDeps } from './insights.service.js';
export { registerInsightsRoutes, type InsightsRoutesOptions } from './insights.routes.js';
