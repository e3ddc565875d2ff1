/**
 * HEALTH MODULE
 */

export * from './health.service.js';
export { registerHealthRoutes } from './health.routes.js';
