import { Request } from 'express';
import type { LLMClient } from '../utils/llmProvider.js';
import type { ZabbixApi } from '../utils/zabbixClient.js';

/** Zabbix user as sent by the frontend widget in `user_info`. */
export interface ZabbixUserInfo {
  userid: string;
  username?: string;
  name?: string;
  surname?: string;
}

export interface AuthRequest extends Request {
  user?: ZabbixUserInfo;
}

/** Collaborators injected into the app, replaced by fakes in tests. */
export interface AppDeps {
  zabbix: ZabbixApi;
  llm: LLMClient;
}
