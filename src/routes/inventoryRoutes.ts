import { Router } from 'express';
import { AppDeps } from '../types/index.js';
import { createInventoryController } from '../controllers/inventoryController.js';
import { validateSearch } from '../middleware/maintenanceValidation.js';

export const createInventoryRoutes = (deps: AppDeps): Router => {
  const router = Router();
  const { searchHosts, searchGroups } = createInventoryController(deps);

  router.post('/hosts/search', validateSearch, searchHosts);
  router.post('/groups/search', validateSearch, searchGroups);

  return router;
};
