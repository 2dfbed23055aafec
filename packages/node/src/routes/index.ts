/**
 * Route barrel: re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createPlanRoutes } from "./plans.js";
export { createStatsRoutes } from "./stats.js";
export { createEventRoutes } from "./events.js";
