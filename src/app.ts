import express, { Express } from 'express';
import cors from 'cors';
import { AppDeps } from './types/index.js';
import { requestLogger } from './middleware/requestLogger.js';
import { globalErrorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createChatRoutes } from './routes/chatRoutes.js';
import { createMaintenanceRoutes } from './routes/maintenanceRoutes.js';
import { createInventoryRoutes } from './routes/inventoryRoutes.js';
import { createStatusRoutes } from './routes/statusRoutes.js';

export interface AppOptions {
  /** CORS origin of the Zabbix frontend hosting the widget. */
  clientUrl: string;
}

export const createApp = (deps: AppDeps, options: AppOptions): Express => {
  const app = express();

  // Middleware
  app.use(cors({ origin: options.clientUrl, credentials: true }));
  app.use(express.json());
  app.use(requestLogger);

  // Routes
  app.use('/api/health', createStatusRoutes(deps));
  app.use('/api/chat', createChatRoutes(deps));
  app.use('/api/maintenance', createMaintenanceRoutes(deps));
  app.use('/api/inventory', createInventoryRoutes(deps));

  app.use(notFoundHandler);
  app.use(globalErrorHandler);

  return app;
};
