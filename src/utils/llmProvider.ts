/**
 * Unified LLM provider: OpenAI, Google Gemini and OpenRouter.
 *
 * All three expose an OpenAI-compatible chat-completions endpoint, so one
 * request loop serves them.  The configured model is tried first, then the
 * provider's fallback list; a model is skipped on 429, HTTP error, timeout
 * or empty answer.
 *
 * Select the backend with LLM_PROVIDER ("openai" | "gemini" | "openrouter").
 */

import { z } from 'zod';
import type { LLMConfig, LLMProviderName } from '../config/index.js';
import { logger } from '../middleware/requestLogger.js';

/* ------------------------------------------------------------------ */
/*  Types                                                             */
/* ------------------------------------------------------------------ */

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMCallOptions {
  /** Messages to send (system + user) */
  messages: LLMMessage[];
  /** Maximum tokens in the response (default: 1024) */
  maxTokens?: number;
  /** Sampling temperature (default: 0.1) */
  temperature?: number;
  /** Per-model timeout in ms (default: 30_000) */
  timeoutMs?: number;
  /** Ask for a JSON object response */
  jsonMode?: boolean;
  /** Log prefix (default: "LLM") */
  logPrefix?: string;
}

export interface LLMClient {
  readonly provider: LLMProviderName;
  /** False when the provider's API key is missing. */
  readonly configured: boolean;
  complete(opts: LLMCallOptions): Promise<string>;
}

/** No model of the active provider produced an answer. */
export class LLMUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LLMUnavailableError';
  }
}

/* ------------------------------------------------------------------ */
/*  Provider configuration                                            */
/* ------------------------------------------------------------------ */

const FALLBACK_MODELS: Record<LLMProviderName, string[]> = {
  openai: ['gpt-4o-mini', 'gpt-4.1-mini'],
  gemini: ['gemini-2.0-flash', 'gemini-1.5-flash'],
  openrouter: [
    'meta-llama/llama-3.3-70b-instruct:free',
    'google/gemma-3-27b-it:free',
    'mistralai/mistral-small-3.1-24b-instruct:free',
  ],
};

const BASE_URLS: Record<LLMProviderName, string> = {
  openai: 'https://api.openai.com/v1/chat/completions',
  gemini: 'https://generativelanguage.googleapis.com/v1beta/openai/chat/completions',
  openrouter: 'https://openrouter.ai/api/v1/chat/completions',
};

const API_KEY_ENV: Record<LLMProviderName, string> = {
  openai: 'OPENAI_API_KEY',
  gemini: 'GOOGLE_API_KEY',
  openrouter: 'OPENROUTER_API_KEY',
};

interface ProviderConfig {
  baseUrl: string;
  apiKey: string;
  models: string[];
  headers: Record<string, string>;
}

function getProviderConfig(cfg: LLMConfig, clientUrl: string): ProviderConfig {
  const preferred = {
    openai: { apiKey: cfg.openAiApiKey, model: cfg.openAiModel },
    gemini: { apiKey: cfg.geminiApiKey, model: cfg.geminiModel },
    openrouter: { apiKey: cfg.openRouterApiKey, model: cfg.openRouterModel },
  }[cfg.provider];

  const models = [
    ...new Set([preferred.model, ...FALLBACK_MODELS[cfg.provider]].filter(Boolean)),
  ];

  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    Authorization: `Bearer ${preferred.apiKey}`,
  };
  if (cfg.provider === 'openrouter') {
    headers['HTTP-Referer'] = clientUrl;
    headers['X-Title'] = 'Maintenance Assistant';
  }

  return {
    baseUrl: cfg.baseUrl || BASE_URLS[cfg.provider],
    apiKey: preferred.apiKey,
    models,
    headers,
  };
}

/* ------------------------------------------------------------------ */
/*  Response parsing                                                  */
/* ------------------------------------------------------------------ */

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          reasoning: z.string().nullish(),
          reasoning_content: z.string().nullish(),
        }),
      }),
    )
    .min(1),
});

/** First non-empty of content / reasoning_content / reasoning. */
function answerOf(data: unknown): string {
  const parsed = completionSchema.safeParse(data);
  if (!parsed.success) return '';
  const msg = parsed.data.choices[0].message;
  return msg.content?.trim() || msg.reasoning_content?.trim() || msg.reasoning?.trim() || '';
}

/* ------------------------------------------------------------------ */
/*  Core LLM call                                                     */
/* ------------------------------------------------------------------ */

/**
 * Build a client for the configured provider.  Models are tried in order
 * until one returns a non-empty answer.
 */
export function createLLMClient(cfg: LLMConfig, clientUrl = ''): LLMClient {
  const providerCfg = getProviderConfig(cfg, clientUrl);
  const provider = cfg.provider;

  const complete = async (opts: LLMCallOptions): Promise<string> => {
    const {
      messages,
      maxTokens = 1024,
      temperature = 0.1,
      timeoutMs = 30_000,
      jsonMode = false,
      logPrefix = 'LLM',
    } = opts;

    if (!providerCfg.apiKey) {
      throw new LLMUnavailableError(
        `${API_KEY_ENV[provider]} is not configured (provider=${provider})`,
      );
    }

    let lastError = '';
    const overallStart = Date.now();

    for (const model of providerCfg.models) {
      const modelStart = Date.now();
      const ac = new AbortController();
      const timer = setTimeout(() => ac.abort(), timeoutMs);

      try {
        const body: Record<string, unknown> = {
          model,
          messages,
          max_tokens: maxTokens,
          temperature,
        };
        if (jsonMode) body.response_format = { type: 'json_object' };

        const res = await fetch(providerCfg.baseUrl, {
          method: 'POST',
          headers: providerCfg.headers,
          body: JSON.stringify(body),
          signal: ac.signal,
        });

        if (res.status === 429) {
          await res.text(); // consume body to release socket
          lastError = `Rate limited (${model})`;
          logger.warn({ type: 'llm', prefix: logPrefix, provider, model, outcome: 'rate_limited' });
          continue;
        }

        if (!res.ok) {
          const errBody = await res.text();
          lastError = `${model} error ${res.status}: ${errBody.substring(0, 200)}`;
          logger.warn({ type: 'llm', prefix: logPrefix, provider, model, outcome: 'http_error', status: res.status });
          continue;
        }

        const answer = answerOf(await res.json());
        if (answer) {
          logger.info({
            type: 'llm',
            prefix: logPrefix,
            provider,
            model,
            outcome: 'success',
            duration: `${Date.now() - modelStart}ms`,
            total: `${Date.now() - overallStart}ms`,
          });
          return answer;
        }

        lastError = `Empty answer (${model})`;
        logger.warn({ type: 'llm', prefix: logPrefix, provider, model, outcome: 'empty' });
      } catch (err: unknown) {
        if (err instanceof Error && err.name === 'AbortError') {
          lastError = `Timeout after ${timeoutMs / 1000}s (${model})`;
          logger.warn({ type: 'llm', prefix: logPrefix, provider, model, outcome: 'timeout' });
        } else {
          lastError = err instanceof Error ? err.message : String(err);
          logger.warn({ type: 'llm', prefix: logPrefix, provider, model, outcome: 'error', error: lastError });
        }
      } finally {
        clearTimeout(timer);
      }
    }

    throw new LLMUnavailableError(`[${provider}] All models failed. Last: ${lastError}`);
  };

  return {
    provider,
    configured: Boolean(providerCfg.apiKey),
    complete,
  };
}
