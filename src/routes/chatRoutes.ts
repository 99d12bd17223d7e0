import { Router } from 'express';
import { AppDeps } from '../types/index.js';
import { createChatController } from '../controllers/chatController.js';
import { createAuthenticate } from '../middleware/auth.js';
import { validateChat } from '../middleware/maintenanceValidation.js';

export const createChatRoutes = (deps: AppDeps): Router => {
  const router = Router();
  const { chat } = createChatController(deps);

  // Only logged-in Zabbix users can query the assistant
  router.post('/', createAuthenticate(deps.zabbix), validateChat, chat);

  return router;
};
