import { Router } from 'express';
import { AppDeps } from '../types/index.js';
import { createStatusController } from '../controllers/statusController.js';

export const createStatusRoutes = (deps: AppDeps): Router => {
  const router = Router();
  const { getHealth } = createStatusController(deps);

  router.get('/', getHealth);

  return router;
};
