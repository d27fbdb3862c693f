export { getRootVersion, healthRoutes } from './routes.js';
export type { HealthRoutesOptions } from './routes.js';
