/**
 * API Routes
 */

export { default as healthRoutes } from './health.js';
export { default as jobMatchRoutes } from './jobMatches.js';
export { default as cvProfileRoutes } from './cvProfile.js';
