/**
 * HTTP API layer.
 */

export * from './types.js';
export * from './handlers/index.js';
export { registerRoutes } from './routes.js';
export type { RouteOptions } from './routes.js';
export { replyWithError } from './errors.js';
export { parseInput, resolveWindow } from './schemas.js';
