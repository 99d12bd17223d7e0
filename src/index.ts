import { loadConfig } from './config/index.js';
import { createApp } from './app.js';
import { logger } from './middleware/requestLogger.js';
import { createLLMClient } from './utils/llmProvider.js';
import { ZabbixClient } from './utils/zabbixClient.js';

const config = loadConfig();

const zabbix = new ZabbixClient(config.zabbix);
const llm = createLLMClient(config.llm, config.clientUrl);
const app = createApp({ zabbix, llm }, { clientUrl: config.clientUrl });

// Start server
const start = async (): Promise<void> => {
  if (!config.zabbix.apiUrl || !config.zabbix.token) {
    logger.warn({ type: 'startup', message: 'ZABBIX_API_URL or ZABBIX_TOKEN is not set' });
  }
  if (!llm.configured) {
    logger.warn({ type: 'startup', message: `No API key configured for LLM provider "${llm.provider}"` });
  }

  try {
    const version = await zabbix.getVersion();
    logger.info({ type: 'startup', message: 'Connected to Zabbix API', zabbixVersion: version });
  } catch (error) {
    logger.warn({
      type: 'startup',
      message: 'Zabbix API not reachable; starting in degraded mode',
      error: error instanceof Error ? error.message : String(error),
    });
  }

  app.listen(config.port, () => {
    logger.info({ type: 'startup', message: `Server running on port ${config.port}`, llmProvider: llm.provider });
  });
};

start().catch((error: unknown) => {
  logger.error({
    type: 'startup',
    message: 'Failed to start server',
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
