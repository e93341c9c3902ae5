export { default as healthRoutes } from './health-routes.js';
export { default as eventRoutes } from './event-routes.js';
export { default as queryRoutes } from './query-routes.js';
export { createApiKeyGuard } from './auth-guard.js';
