/**
 * Controller exports
 */
export { createPanelController, zonePath, NO_TOKEN_MESSAGE, NO_ZONES_MESSAGE, type PanelController, type PanelControllerDeps } from './panelController.js';
export { createHealthCheck, APP_VERSION, type HealthStatus } from './healthController.js';
