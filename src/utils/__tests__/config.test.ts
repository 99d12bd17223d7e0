/**
 * Unit tests for src/config/index.ts
 *
 * Run with:
 *   npx tsx --test src/utils/__tests__/config.test.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { loadConfig } from '../../config/index.js';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});
    assert.equal(config.port, 5001);
    assert.equal(config.clientUrl, 'http://localhost:8080');
    assert.deepEqual(config.zabbix, { apiUrl: '', token: '', timeoutMs: 30_000 });
    assert.equal(config.llm.provider, 'gemini');
    assert.equal(config.llm.baseUrl, '');
  });

  it('reads Zabbix settings', () => {
    const config = loadConfig({
      PORT: '8081',
      ZABBIX_API_URL: 'http://zabbix.local/api_jsonrpc.php',
      ZABBIX_TOKEN: 'test-token',
      ZABBIX_TIMEOUT_MS: '5000',
    });
    assert.equal(config.port, 8081);
    assert.deepEqual(config.zabbix, {
      apiUrl: 'http://zabbix.local/api_jsonrpc.php',
      token: 'test-token',
      timeoutMs: 5000,
    });
  });

  it('normalises the provider name', () => {
    assert.equal(loadConfig({ LLM_PROVIDER: ' OpenAI ' }).llm.provider, 'openai');
    assert.equal(loadConfig({ LLM_PROVIDER: 'openrouter' }).llm.provider, 'openrouter');
    assert.equal(loadConfig({ LLM_PROVIDER: 'something-else' }).llm.provider, 'gemini');
  });

  it('accepts AI_PROVIDER as an alias', () => {
    assert.equal(loadConfig({ AI_PROVIDER: 'openai' }).llm.provider, 'openai');
    assert.equal(loadConfig({ AI_PROVIDER: 'openai', LLM_PROVIDER: 'openrouter' }).llm.provider, 'openrouter');
  });
});
