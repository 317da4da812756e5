export { buildServer } from './server.js';
export type { ServerOptions } from './server.js';
export { statusForOutcome } from './turn-routes.js';
export { default as assistantPlugin } from './assistant-plugin.js';
export { default as turnRoutes } from './turn-routes.js';
export { default as sessionRoutes } from './session-routes.js';
export { default as healthRoutes } from './health-routes.js';
