export { default as eventRoutes } from './event-routes.js';
export { default as attachmentRoutes } from './attachment-routes.js';
export { default as exportRoutes } from './export-routes.js';
export { default as healthRoutes } from './health-routes.js';
export { default as authPlugin, tokensMatch, extractBearer } from './auth.js';
export { default as errorHandlerPlugin, STATUS_BY_CODE } from './error-handler.js';
export { default as coordinatorPlugin } from './coordinator-plugin.js';
