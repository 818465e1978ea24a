export { default as bridgePlugin } from './bridge-plugin.js';
export type { BridgeStatus, BridgePluginOptions } from './bridge-plugin.js';
export { default as statusRoutes } from './status-routes.js';
export { buildStatusServer } from './server.js';
export type { StatusServerOptions } from './server.js';
