import { Router } from 'express';
import { AppDeps } from '../types/index.js';
import { createMaintenanceController } from '../controllers/maintenanceController.js';
import { createAuthenticate } from '../middleware/auth.js';
import {
  createMaintenanceRateLimiter,
  validateCreateMaintenance,
  validateListQuery,
  validatePreview,
} from '../middleware/maintenanceValidation.js';

export const createMaintenanceRoutes = (deps: AppDeps): Router => {
  const router = Router();
  const ctrl = createMaintenanceController(deps);

  router.get('/', validateListQuery, ctrl.listMaintenances);
  router.get('/examples', ctrl.getExamples);
  router.post('/preview', validatePreview, ctrl.previewSchedule);

  // Writes go to Zabbix: authenticated and rate-limited per user
  router.post(
    '/',
    createAuthenticate(deps.zabbix),
    createMaintenanceRateLimiter(),
    validateCreateMaintenance,
    ctrl.createMaintenance,
  );

  return router;
};
