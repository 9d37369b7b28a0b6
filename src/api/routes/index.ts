/**
 * API Routes
 */

export { createHealthRoutes } from './health.js';
export { createMatchingRoutes } from './matching.js';
