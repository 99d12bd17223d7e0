/**
 * Zabbix JSON-RPC client (API 7.x).
 *
 * Every call is a POST of `{ jsonrpc: '2.0', method, params, id }` with a
 * Bearer API token.  Results are parsed with zod so callers only ever see
 * typed values; anything that does not match is treated as a bad upstream
 * response.
 *
 * Controllers talk to the `ZabbixApi` interface so tests can substitute a
 * fake without a network.
 */

import { z } from 'zod';
import type { ZabbixConfig } from '../config/index.js';
import { logger } from '../middleware/requestLogger.js';
import { AppError, Errors } from './AppError.js';
import type { TimePeriodRecord } from './recurrenceCodec.js';

/* ------------------------------------------------------------------ */
/*  Response schemas                                                  */
/* ------------------------------------------------------------------ */

const hostSchema = z.object({
  hostid: z.string(),
  host: z.string(),
  name: z.string(),
});

const hostGroupSchema = z.object({
  groupid: z.string(),
  name: z.string(),
});

const userSchema = z.object({
  userid: z.string(),
  username: z.string().optional(),
});

const tagSchema = z.object({
  tag: z.string(),
  value: z.string().optional(),
});

const periodValue = z.union([z.number(), z.string()]).nullable().optional();

const storedTimePeriodSchema = z.object({
  timeperiod_type: periodValue,
  start_date: periodValue,
  period: periodValue,
  start_time: periodValue,
  every: periodValue,
  dayofweek: periodValue,
  day: periodValue,
  month: periodValue,
});

const maintenanceSchema = z.object({
  maintenanceid: z.string(),
  name: z.string(),
  description: z.string().default(''),
  active_since: z.coerce.number(),
  active_till: z.coerce.number(),
  timeperiods: z.array(storedTimePeriodSchema).default([]),
  hosts: z.array(hostSchema).default([]),
  hostgroups: z.array(hostGroupSchema).default([]),
  tags: z.array(tagSchema).default([]),
});

const rpcErrorSchema = z.object({
  code: z.number(),
  message: z.string(),
  data: z.string().optional(),
});

const rpcEnvelopeSchema = z.object({
  result: z.unknown().optional(),
  error: rpcErrorSchema.optional(),
});

/* ------------------------------------------------------------------ */
/*  Types                                                             */
/* ------------------------------------------------------------------ */

export type ZabbixHost = z.infer<typeof hostSchema>;
export type ZabbixHostGroup = z.infer<typeof hostGroupSchema>;
export type ZabbixUser = z.infer<typeof userSchema>;
export type ZabbixTag = z.infer<typeof tagSchema>;
export type ZabbixMaintenance = z.infer<typeof maintenanceSchema>;

/** Trigger-tag filter as accepted by `host.get` and `maintenance.create`. */
export interface TagFilter {
  tag: string;
  value?: string;
  /** 0 = contains, 1 = equals (Zabbix tag operators). */
  operator?: number;
}

export interface MaintenanceCreateParams {
  name: string;
  description: string;
  /** Epoch seconds. */
  activeSince: number;
  /** Epoch seconds. */
  activeTill: number;
  hostIds: string[];
  groupIds: string[];
  tags?: TagFilter[];
  timeperiods: TimePeriodRecord[];
}

export interface ZabbixApi {
  getHosts(hostNames: string[]): Promise<ZabbixHost[]>;
  searchHosts(term: string): Promise<ZabbixHost[]>;
  getHostsByTags(tags: TagFilter[]): Promise<ZabbixHost[]>;
  getHostGroups(groupNames: string[]): Promise<ZabbixHostGroup[]>;
  searchHostGroups(term: string): Promise<ZabbixHostGroup[]>;
  getUser(userid: string): Promise<ZabbixUser | null>;
  /** Returns the new maintenance id. */
  createMaintenance(params: MaintenanceCreateParams): Promise<string>;
  listMaintenances(limit: number): Promise<ZabbixMaintenance[]>;
  getVersion(): Promise<string>;
}

/* ------------------------------------------------------------------ */
/*  Errors                                                            */
/* ------------------------------------------------------------------ */

/** The API answered with a JSON-RPC `error` object. */
export class ZabbixApiError extends Error {
  constructor(
    public readonly method: string,
    public readonly rpcCode: number,
    message: string,
    public readonly data?: string,
  ) {
    super(message);
    this.name = 'ZabbixApiError';
  }
}

/** The API could not be reached or returned something other than JSON-RPC. */
export class ZabbixUnavailableError extends Error {
  constructor(public readonly method: string, message: string) {
    super(message);
    this.name = 'ZabbixUnavailableError';
  }
}

/**
 * Translate client failures into AppErrors for the global handler.
 * Anything else is passed through untouched.
 */
export function toMonitoringError(err: unknown): unknown {
  if (err instanceof AppError) return err;
  if (err instanceof ZabbixApiError) {
    return Errors.upstream(`Zabbix rejected ${err.method}: ${err.data || err.message}`);
  }
  if (err instanceof ZabbixUnavailableError) {
    return Errors.serviceUnavailable('The Zabbix API is not reachable right now.');
  }
  return err;
}

/* ------------------------------------------------------------------ */
/*  Client                                                            */
/* ------------------------------------------------------------------ */

const HOST_OUTPUT = ['hostid', 'host', 'name'];
const GROUP_OUTPUT = ['groupid', 'name'];
const SEARCH_LIMIT = 20;

/** Maintenance with data collection. */
const MAINTENANCE_TYPE_WITH_DATA = 0;

export class ZabbixClient implements ZabbixApi {
  private requestId = 0;

  constructor(private readonly cfg: ZabbixConfig) {}

  /**
   * Perform one JSON-RPC call and parse `result` with `schema`.
   * `apiinfo.version` must be sent without credentials.
   */
  private async call<S extends z.ZodTypeAny>(
    method: string,
    params: Record<string, unknown>,
    schema: S,
    authenticated = true,
  ): Promise<z.infer<S>> {
    if (!this.cfg.apiUrl) {
      throw new ZabbixUnavailableError(method, 'ZABBIX_API_URL is not configured');
    }

    const headers: Record<string, string> = { 'Content-Type': 'application/json-rpc' };
    if (authenticated) headers.Authorization = `Bearer ${this.cfg.token}`;

    const ac = new AbortController();
    const timer = setTimeout(() => ac.abort(), this.cfg.timeoutMs);
    const started = Date.now();

    let payload: unknown;
    try {
      const res = await fetch(this.cfg.apiUrl, {
        method: 'POST',
        headers,
        body: JSON.stringify({ jsonrpc: '2.0', method, params, id: ++this.requestId }),
        signal: ac.signal,
      });

      if (!res.ok) {
        await res.text();
        throw new ZabbixUnavailableError(method, `HTTP ${res.status}`);
      }
      payload = await res.json();
    } catch (err: unknown) {
      if (err instanceof ZabbixUnavailableError) throw err;
      const reason =
        err instanceof Error && err.name === 'AbortError'
          ? `timeout after ${this.cfg.timeoutMs}ms`
          : err instanceof Error
            ? err.message
            : String(err);
      logger.error({ type: 'zabbix', method, error: reason, duration: `${Date.now() - started}ms` });
      throw new ZabbixUnavailableError(method, reason);
    } finally {
      clearTimeout(timer);
    }

    const envelope = rpcEnvelopeSchema.safeParse(payload);
    if (!envelope.success) {
      throw new ZabbixUnavailableError(method, 'response is not a JSON-RPC envelope');
    }

    if (envelope.data.error) {
      const { code, message, data } = envelope.data.error;
      logger.warn({ type: 'zabbix', method, code, message, data });
      throw new ZabbixApiError(method, code, message, data);
    }

    const parsed = schema.safeParse(envelope.data.result);
    if (!parsed.success) {
      throw new ZabbixUnavailableError(method, `unexpected result shape for ${method}`);
    }

    logger.info({ type: 'zabbix', method, duration: `${Date.now() - started}ms` });
    return parsed.data;
  }

  /* ---- Hosts ------------------------------------------------------ */

  async getHosts(hostNames: string[]): Promise<ZabbixHost[]> {
    if (hostNames.length === 0) return [];
    return this.call(
      'host.get',
      { output: HOST_OUTPUT, filter: { host: hostNames } },
      z.array(hostSchema),
    );
  }

  async searchHosts(term: string): Promise<ZabbixHost[]> {
    return this.call(
      'host.get',
      {
        output: HOST_OUTPUT,
        search: { host: term, name: term },
        searchByAny: true,
        searchWildcardsEnabled: true,
        limit: SEARCH_LIMIT,
      },
      z.array(hostSchema),
    );
  }

  async getHostsByTags(tags: TagFilter[]): Promise<ZabbixHost[]> {
    if (tags.length === 0) return [];
    return this.call(
      'host.get',
      // evaltype 0: And/Or
      { output: HOST_OUTPUT, evaltype: 0, tags },
      z.array(hostSchema),
    );
  }

  /* ---- Host groups ------------------------------------------------ */

  async getHostGroups(groupNames: string[]): Promise<ZabbixHostGroup[]> {
    if (groupNames.length === 0) return [];
    return this.call(
      'hostgroup.get',
      { output: GROUP_OUTPUT, filter: { name: groupNames } },
      z.array(hostGroupSchema),
    );
  }

  async searchHostGroups(term: string): Promise<ZabbixHostGroup[]> {
    return this.call(
      'hostgroup.get',
      {
        output: GROUP_OUTPUT,
        search: { name: term },
        searchWildcardsEnabled: true,
        limit: SEARCH_LIMIT,
      },
      z.array(hostGroupSchema),
    );
  }

  /* ---- Users ------------------------------------------------------ */

  async getUser(userid: string): Promise<ZabbixUser | null> {
    const users = await this.call(
      'user.get',
      { output: ['userid', 'username'], userids: [userid] },
      z.array(userSchema),
    );
    return users[0] ?? null;
  }

  /* ---- Maintenance ------------------------------------------------ */

  async createMaintenance(params: MaintenanceCreateParams): Promise<string> {
    const body: Record<string, unknown> = {
      name: params.name,
      active_since: params.activeSince,
      active_till: params.activeTill,
      description: params.description,
      maintenance_type: MAINTENANCE_TYPE_WITH_DATA,
      timeperiods: params.timeperiods,
    };
    if (params.hostIds.length > 0) body.hosts = params.hostIds.map((hostid) => ({ hostid }));
    if (params.groupIds.length > 0) body.groups = params.groupIds.map((groupid) => ({ groupid }));
    if (params.tags && params.tags.length > 0) body.tags = params.tags;

    const result = await this.call(
      'maintenance.create',
      body,
      z.object({ maintenanceids: z.array(z.string()).min(1) }),
    );
    return result.maintenanceids[0];
  }

  async listMaintenances(limit: number): Promise<ZabbixMaintenance[]> {
    return this.call(
      'maintenance.get',
      {
        output: ['maintenanceid', 'name', 'active_since', 'active_till', 'description'],
        selectHosts: HOST_OUTPUT,
        selectHostGroups: GROUP_OUTPUT,
        selectTags: ['tag', 'value'],
        selectTimeperiods: 'extend',
        sortfield: 'active_since',
        sortorder: 'DESC',
        limit,
      },
      z.array(maintenanceSchema),
    );
  }

  /* ---- Misc ------------------------------------------------------- */

  async getVersion(): Promise<string> {
    return this.call('apiinfo.version', {}, z.string(), false);
  }
}
