import dotenv from 'dotenv';
dotenv.config();

export type LLMProviderName = 'openai' | 'gemini' | 'openrouter';

export interface ZabbixConfig {
  apiUrl: string;
  token: string;
  timeoutMs: number;
}

export interface LLMConfig {
  /** Which chat-completions backend is used */
  provider: LLMProviderName;
  /** Overrides the provider's chat-completions URL (OpenAI-compatible gateways) */
  baseUrl: string;
  openAiApiKey: string;
  openAiModel: string;
  geminiApiKey: string;
  geminiModel: string;
  openRouterApiKey: string;
  openRouterModel: string;
}

export interface Config {
  port: number;
  clientUrl: string;
  zabbix: ZabbixConfig;
  llm: LLMConfig;
}

const parseProvider = (value: string | undefined): LLMProviderName => {
  const v = value?.trim().toLowerCase();
  if (v === 'openai' || v === 'openrouter') return v;
  return 'gemini';
};

/**
 * Build the configuration from environment variables.  Called once at
 * startup; the result is passed explicitly to the clients that need it.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config => ({
  port: Number(env.PORT) || 5001,
  clientUrl: env.CLIENT_URL || 'http://localhost:8080',
  zabbix: {
    apiUrl: env.ZABBIX_API_URL || '',
    token: env.ZABBIX_TOKEN || '',
    timeoutMs: Number(env.ZABBIX_TIMEOUT_MS) || 30_000,
  },
  llm: {
    provider: parseProvider(env.LLM_PROVIDER ?? env.AI_PROVIDER),
    baseUrl: env.LLM_BASE_URL || '',
    openAiApiKey: env.OPENAI_API_KEY || '',
    openAiModel: env.OPENAI_MODEL || '',
    geminiApiKey: env.GOOGLE_API_KEY || '',
    geminiModel: env.GEMINI_MODEL || '',
    openRouterApiKey: env.OPENROUTER_API_KEY || '',
    openRouterModel: env.OPENROUTER_MODEL || '',
  },
});
