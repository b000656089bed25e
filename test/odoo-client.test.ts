// This test suite verifies the Odoo JSON-RPC client contract, retry policy, and fault mapping.

import { afterEach, describe, expect, it, vi } from 'vitest';
import { OdooClient } from '../src/odoo/client.js';
import type { BackendClientConfig } from '../src/types/domain.js';
import { BackendError, ConnectivityError } from '../src/utils/errors.js';

const clientConfig: BackendClientConfig = {
  url: 'http://odoo.local:8069/',
  database: 'crm_test',
  username: 'admin',
  password: 'test-secret',
  requestTimeoutMs: 1_000,
  maxRetries: 0,
  retryBaseDelayMs: 1
};

interface RpcBody {
  params: { service: string; method: string; args: unknown[] };
}

function readRpcBody(init?: RequestInit): RpcBody {
  return JSON.parse(String(init?.body)) as RpcBody;
}

function jsonResponse(payload: unknown, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: async () => payload,
    text: async () => JSON.stringify(payload)
  };
}

// This helper answers login with uid 7 and delegates every other call to the given result factory.
function stubOdoo(onCall: (body: RpcBody) => unknown) {
  const fetchMock = vi.fn(async (_input: string | URL, init?: RequestInit) => {
    const body = readRpcBody(init);
    if (body.params.service === 'common' && body.params.method === 'login') {
      return jsonResponse({ jsonrpc: '2.0', id: 1, result: 7 });
    }

    return jsonResponse({ jsonrpc: '2.0', id: 2, result: onCall(body) });
  });

  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('odoo client', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('authenticates and then sends execute_kw with database, uid, and password', async () => {
    const fetchMock = stubOdoo(() => 42);
    const client = new OdooClient(clientConfig);

    expect(client.url).toBe('http://odoo.local:8069');
    expect(client.isConnected).toBe(false);

    await client.connect();
    const result = await client.executeKw('crm.lead', 'search_count', [[['type', '=', 'lead']]], {});

    expect(result).toBe(42);
    expect(client.isConnected).toBe(true);
    expect(String(fetchMock.mock.calls[0]?.[0])).toBe('http://odoo.local:8069/jsonrpc');
    expect(readRpcBody(fetchMock.mock.calls[0]?.[1]).params).toEqual({
      service: 'common',
      method: 'login',
      args: ['crm_test', 'admin', 'test-secret']
    });
    expect(readRpcBody(fetchMock.mock.calls[1]?.[1]).params).toEqual({
      service: 'object',
      method: 'execute_kw',
      args: ['crm_test', 7, 'test-secret', 'crm.lead', 'search_count', [[['type', '=', 'lead']]], {}]
    });
  });

  it('connects on demand before the first execute_kw', async () => {
    const fetchMock = stubOdoo(() => true);
    const client = new OdooClient(clientConfig);

    await client.executeKw('crm.lead', 'write', [[1], { name: 'Renamed' }]);

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(readRpcBody(fetchMock.mock.calls[0]?.[1]).params.method).toBe('login');
  });

  it('rejects a login that returns false', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => jsonResponse({ jsonrpc: '2.0', id: 1, result: false }))
    );
    const client = new OdooClient(clientConfig);

    await expect(client.connect()).rejects.toThrow(BackendError);
    await expect(client.connect()).rejects.toThrow('Odoo authentication failed. Check database, username and password.');
    expect(client.isConnected).toBe(false);
  });

  it('surfaces Odoo faults with the server-side message', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () =>
        jsonResponse({
          jsonrpc: '2.0',
          id: 1,
          error: { code: 200, message: 'Odoo Server Error', data: { message: 'Invalid field crm.lead.bogus' } }
        })
      )
    );
    const client = new OdooClient(clientConfig);

    await expect(client.getServerVersion()).rejects.toThrow('Invalid field crm.lead.bogus');
  });

  it('reads server_version from common.version', async () => {
    stubOdoo(() => ({ server_version: '17.0+e', protocol_version: 1 }));
    const client = new OdooClient(clientConfig);

    await expect(client.getServerVersion()).resolves.toBe('17.0+e');
  });

  it('retries once on 503 and then succeeds', async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(jsonResponse({ message: 'unavailable' }, 503))
      .mockResolvedValueOnce(jsonResponse({ jsonrpc: '2.0', id: 1, result: { server_version: '16.0' } }));
    vi.stubGlobal('fetch', fetchMock);
    const client = new OdooClient({ ...clientConfig, maxRetries: 1 });

    await expect(client.getServerVersion()).resolves.toBe('16.0');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('maps exhausted transport failures to ConnectivityError and drops the session', async () => {
    let failTransport = false;
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        if (failTransport) {
          throw new Error('connect ECONNREFUSED');
        }
        return jsonResponse({ jsonrpc: '2.0', id: 1, result: 7 });
      })
    );
    const client = new OdooClient(clientConfig);
    await client.connect();

    failTransport = true;
    const failure = client.executeKw('crm.lead', 'search_count', [[]]);

    await expect(failure).rejects.toThrow(ConnectivityError);
    await expect(failure).rejects.toThrow('Odoo request failed: connect ECONNREFUSED');
    expect(client.isConnected).toBe(false);
  });

  it('passes search_read options as kwargs and keeps only record objects', async () => {
    const fetchMock = stubOdoo(() => [{ id: 1, name: 'Alpha' }, 3, null, { id: 2, name: 'Beta' }]);
    const client = new OdooClient(clientConfig);

    const rows = await client.searchRead('res.partner', [['name', 'ilike', 'a']], ['id', 'name'], {
      limit: 5,
      order: 'name asc'
    });

    expect(rows).toEqual([
      { id: 1, name: 'Alpha' },
      { id: 2, name: 'Beta' }
    ]);
    expect(readRpcBody(fetchMock.mock.calls[1]?.[1]).params.args).toEqual([
      'crm_test',
      7,
      'test-secret',
      'res.partner',
      'search_read',
      [[['name', 'ilike', 'a']]],
      { fields: ['id', 'name'], limit: 5, order: 'name asc' }
    ]);
  });
});
