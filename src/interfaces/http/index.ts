export { default as statsPlugin } from './stats-plugin.js';
export { default as healthRoutes } from './health-routes.js';
export { buildHttpServer } from './server.js';
export type { HttpServerOptions } from './server.js';
