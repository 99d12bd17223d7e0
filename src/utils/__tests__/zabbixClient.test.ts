/**
 * Unit tests for src/utils/zabbixClient.ts, against an in-process
 * JSON-RPC stand-in.
 *
 * Run with:
 *   npx tsx --test src/utils/__tests__/zabbixClient.test.ts
 */

import { after, before, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { Server } from 'node:http';
import express from 'express';
import {
  ZabbixApiError,
  ZabbixClient,
  ZabbixUnavailableError,
  toMonitoringError,
} from '../zabbixClient.js';
import { AppError } from '../AppError.js';

/* ================================================================== */
/*  Stand-in server                                                   */
/* ================================================================== */

interface ReceivedCall {
  method: string;
  params: Record<string, unknown>;
  id: number;
  authorization?: string;
}

interface StubReply {
  status?: number;
  body?: unknown;
  delayMs?: number;
}

let received: ReceivedCall[] = [];
let respond: (method: string) => StubReply = () => ({ body: { jsonrpc: '2.0', result: [], id: 1 } });

const rpcResult = (result: unknown): StubReply => ({ body: { jsonrpc: '2.0', result, id: 1 } });

let server: Server;
let apiUrl = '';

before(async () => {
  const app = express();
  // The client posts with the JSON-RPC media type
  app.use(express.json({ type: ['application/json', 'application/json-rpc'] }));
  app.post('/api_jsonrpc.php', (req, res) => {
    received.push({
      method: req.body.method,
      params: req.body.params,
      id: req.body.id,
      authorization: req.headers.authorization,
    });
    const reply = respond(req.body.method);
    const send = () => res.status(reply.status ?? 200).json(reply.body ?? {});
    if (reply.delayMs) setTimeout(send, reply.delayMs);
    else send();
  });

  await new Promise<void>((resolve) => {
    server = app.listen(0, () => resolve());
  });
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('server did not bind a port');
  apiUrl = `http://127.0.0.1:${address.port}/api_jsonrpc.php`;
});

after(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

beforeEach(() => {
  received = [];
});

const client = (timeoutMs = 2_000) => new ZabbixClient({ apiUrl, token: 'test-token', timeoutMs });

/* ================================================================== */
/*  Requests                                                          */
/* ================================================================== */

describe('ZabbixClient requests', () => {
  it('looks hosts up by exact technical name with the bearer token', async () => {
    respond = () => rpcResult([{ hostid: '10084', host: 'srv-web01', name: 'Web 01' }]);

    const hosts = await client().getHosts(['srv-web01']);

    assert.deepEqual(hosts, [{ hostid: '10084', host: 'srv-web01', name: 'Web 01' }]);
    assert.equal(received.length, 1);
    assert.equal(received[0].method, 'host.get');
    assert.deepEqual(received[0].params.filter, { host: ['srv-web01'] });
    assert.equal(received[0].authorization, 'Bearer test-token');
  });

  it('skips the call for an empty name list', async () => {
    const hosts = await client().getHosts([]);
    assert.deepEqual(hosts, []);
    assert.equal(received.length, 0);
  });

  it('searches hosts by technical or visible name', async () => {
    respond = () => rpcResult([]);
    await client().searchHosts('web');
    assert.deepEqual(received[0].params.search, { host: 'web', name: 'web' });
    assert.equal(received[0].params.searchByAny, true);
    assert.equal(received[0].params.limit, 20);
  });

  it('sends apiinfo.version without credentials', async () => {
    respond = () => rpcResult('7.2.0');
    const version = await client().getVersion();
    assert.equal(version, '7.2.0');
    assert.equal(received[0].method, 'apiinfo.version');
    assert.equal(received[0].authorization, undefined);
  });

  it('returns null for an unknown user', async () => {
    respond = () => rpcResult([]);
    const user = await client().getUser('999');
    assert.equal(user, null);
    assert.deepEqual(received[0].params.userids, ['999']);
  });

  it('creates a maintenance with host references and the time period', async () => {
    respond = () => rpcResult({ maintenanceids: ['42'] });

    const id = await client().createMaintenance({
      name: 'AI Maintenance: srv-web01',
      description: 'Patch',
      activeSince: 1_700_000_000,
      activeTill: 1_700_007_200,
      hostIds: ['10084'],
      groupIds: [],
      timeperiods: [{ timeperiod_type: 0, start_date: 1_700_000_000, period: 7200 }],
    });

    assert.equal(id, '42');
    assert.deepEqual(received[0].params, {
      name: 'AI Maintenance: srv-web01',
      active_since: 1_700_000_000,
      active_till: 1_700_007_200,
      description: 'Patch',
      maintenance_type: 0,
      timeperiods: [{ timeperiod_type: 0, start_date: 1_700_000_000, period: 7200 }],
      hosts: [{ hostid: '10084' }],
    });
  });

  it('coerces string timestamps and fills missing lists when listing', async () => {
    respond = () =>
      rpcResult([
        {
          maintenanceid: '7',
          name: 'Nightly',
          active_since: '1700000000',
          active_till: '1700086400',
          timeperiods: [{ timeperiod_type: '2', start_time: '7200', period: '3600', every: '1' }],
        },
      ]);

    const [m] = await client().listMaintenances(10);

    assert.equal(m.active_since, 1_700_000_000);
    assert.equal(m.active_till, 1_700_086_400);
    assert.equal(m.description, '');
    assert.deepEqual(m.hosts, []);
    assert.deepEqual(m.hostgroups, []);
    assert.equal(m.timeperiods[0].timeperiod_type, '2');
    assert.equal(received[0].params.limit, 10);
  });
});

/* ================================================================== */
/*  Failures                                                          */
/* ================================================================== */

describe('ZabbixClient failures', () => {
  it('raises ZabbixApiError for a JSON-RPC error', async () => {
    respond = () => ({
      body: {
        jsonrpc: '2.0',
        error: { code: -32602, message: 'Invalid params.', data: 'Incorrect value for field "name".' },
        id: 1,
      },
    });

    await assert.rejects(client().searchHostGroups('db'), (err: unknown) => {
      if (!(err instanceof ZabbixApiError)) throw new Error('expected a ZabbixApiError');
      assert.equal(err.method, 'hostgroup.get');
      assert.equal(err.rpcCode, -32602);
      assert.equal(err.data, 'Incorrect value for field "name".');
      return true;
    });
  });

  it('raises ZabbixUnavailableError for HTTP errors', async () => {
    respond = () => ({ status: 500, body: { oops: true } });
    await assert.rejects(client().getVersion(), ZabbixUnavailableError);
  });

  it('raises ZabbixUnavailableError for an unexpected result shape', async () => {
    respond = () => rpcResult({ not: 'a list' });
    await assert.rejects(client().searchHosts('x'), ZabbixUnavailableError);
  });

  it('times out slow calls', async () => {
    respond = () => ({ ...rpcResult('7.2.0'), delayMs: 500 });
    await assert.rejects(client(50).getVersion(), /timeout after 50ms/);
  });

  it('fails fast when no URL is configured', async () => {
    const unconfigured = new ZabbixClient({ apiUrl: '', token: '', timeoutMs: 1000 });
    await assert.rejects(unconfigured.getVersion(), /ZABBIX_API_URL is not configured/);
    assert.equal(received.length, 0);
  });
});

describe('toMonitoringError', () => {
  it('maps JSON-RPC errors to 502', () => {
    const mapped = toMonitoringError(new ZabbixApiError('maintenance.create', -32500, 'Application error.', 'No permissions.'));
    if (!(mapped instanceof AppError)) throw new Error('expected an AppError');
    assert.equal(mapped.statusCode, 502);
    assert.equal(mapped.code, 'MONITORING_API_ERROR');
    assert.equal(mapped.message, 'Zabbix rejected maintenance.create: No permissions.');
  });

  it('maps connectivity errors to 503', () => {
    const mapped = toMonitoringError(new ZabbixUnavailableError('host.get', 'ECONNREFUSED'));
    if (!(mapped instanceof AppError)) throw new Error('expected an AppError');
    assert.equal(mapped.statusCode, 503);
    assert.equal(mapped.code, 'SERVICE_UNAVAILABLE');
  });

  it('leaves other errors alone', () => {
    const err = new Error('boom');
    assert.equal(toMonitoringError(err), err);
  });
});
