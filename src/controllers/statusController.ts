import { Request, Response } from 'express';
import { AppDeps } from '../types/index.js';
import { logger } from '../middleware/requestLogger.js';

export const createStatusController = ({ zabbix, llm }: AppDeps) => {
  /**
   * Service health: Zabbix reachability and the active LLM provider.
   * GET /api/health
   * Always 200; `status` is "degraded" when Zabbix does not answer.
   */
  const getHealth = async (_req: Request, res: Response): Promise<void> => {
    let zabbixVersion: string | null = null;
    try {
      zabbixVersion = await zabbix.getVersion();
    } catch (error) {
      logger.warn({
        type: 'health',
        message: 'Zabbix version probe failed',
        error: error instanceof Error ? error.message : String(error),
      });
    }

    res.json({
      success: true,
      data: {
        status: zabbixVersion ? 'healthy' : 'degraded',
        timestamp: new Date().toISOString(),
        zabbixConnected: zabbixVersion !== null,
        zabbixVersion,
        aiProvider: llm.provider,
        aiConfigured: llm.configured,
      },
    });
  };

  return { getHealth };
};
