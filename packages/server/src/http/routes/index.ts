export { handleApiRoutes } from './api.js';
export { handleSessionRoutes } from './sessions.js';
