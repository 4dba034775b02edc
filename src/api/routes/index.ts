/**
 * Panel Routes
 * HTML forms can only GET and POST, so updates and deletes are POSTs to their own paths
 */
import { Router } from 'express';
import { createPanelController, type PanelControllerDeps } from '../controllers/panelController.js';

export function createPanelRouter(deps: PanelControllerDeps): Router {
  const router = Router();
  const panel = createPanelController(deps);

  router.get('/', panel.showPanel);

  router.post('/session/token', panel.setToken);
  router.post('/session/clear', panel.clearToken);

  router.post('/zones/:zoneId/records', panel.createRecord);
  router.post('/zones/:zoneId/records/:recordId', panel.updateRecord);
  router.post('/zones/:zoneId/records/:recordId/delete', panel.deleteRecord);

  return router;
}
