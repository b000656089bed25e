// This test suite verifies the HTTP surface: health, message submission status codes, CORS, and the SSE stream.

import { get, type ClientRequest, type IncomingMessage } from 'node:http';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createServer, type ServerResources } from '../src/server.js';
import { FakeBackend, buildTestConfig } from './helpers.js';
import type { AppConfig } from '../src/config/config.js';

// This reader buffers the stream text so assertions can wait for a fragment without consuming the socket.
class SseReader {
  private buffer = '';
  private readonly waiters: Array<() => void> = [];

  public constructor(response: IncomingMessage) {
    response.setEncoding('utf8');
    response.on('data', (chunk: string) => {
      this.buffer += chunk;
      for (const wake of this.waiters.splice(0)) {
        wake();
      }
    });
  }

  public async waitFor(fragment: string): Promise<string> {
    while (!this.buffer.includes(fragment)) {
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }

    return this.buffer;
  }
}

function openSse(url: string): Promise<{ request: ClientRequest; response: IncomingMessage }> {
  return new Promise((resolve, reject) => {
    const request = get(url, (response) => {
      // Destroying the request mid-stream surfaces as an aborted response; the tests expect that.
      response.on('error', () => undefined);
      resolve({ request, response });
    });
    request.on('error', reject);
  });
}

function readEndpoint(text: string): string {
  const match = /event: endpoint\ndata: (\S+)\n\n/.exec(text);
  if (!match?.[1]) {
    throw new Error('endpoint event missing');
  }

  return match[1];
}

describe('transport routes', () => {
  let resources: ServerResources | null = null;

  function start(overrides: Partial<AppConfig> = {}, backend = new FakeBackend()): ServerResources {
    resources = createServer(buildTestConfig(overrides), { backend });
    return resources;
  }

  afterEach(async () => {
    await resources?.app.close();
    resources = null;
  });

  it('reports health without touching the backend', async () => {
    const backend = new FakeBackend();
    const { app } = start({}, backend);

    const response = await app.inject({ method: 'GET', url: '/health' });
    const body: unknown = response.json();

    expect(response.statusCode).toBe(200);
    expect(response.headers['access-control-allow-origin']).toBe('*');
    expect(body).toMatchObject({
      status: 'healthy',
      service: 'odoo-crm-mcp',
      tools_loaded: 15,
      initialized: false,
      protocol_version: null,
      sessions: 0
    });
    expect(body).toHaveProperty('timestamp');
    expect(backend.calls).toEqual([]);
  });

  it('answers tools/list with 200 and no-buffer headers', async () => {
    const { app } = start();

    const response = await app.inject({
      method: 'POST',
      url: '/messages',
      payload: { jsonrpc: '2.0', id: 1, method: 'tools/list' }
    });

    expect(response.statusCode).toBe(200);
    expect(response.headers['cache-control']).toBe('no-cache, no-store, must-revalidate');
    expect(response.headers['x-accel-buffering']).toBe('no');
    expect(response.headers.connection).toBe('keep-alive');
    expect(response.json()).toHaveProperty('result.tools.0.name', 'odoo_version');
  });

  it('reads raw bodies under any content type on the trailing-slash path', async () => {
    const { app } = start();

    const response = await app.inject({
      method: 'POST',
      url: '/messages/',
      headers: { 'content-type': 'text/plain' },
      payload: '{"jsonrpc":"2.0","id":"a","method":"ping"}'
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ jsonrpc: '2.0', id: 'a', result: {} });
  });

  it('answers malformed JSON with 400 and a -32700 envelope', async () => {
    const { app } = start();

    const response = await app.inject({
      method: 'POST',
      url: '/messages',
      headers: { 'content-type': 'application/json' },
      payload: '{"jsonrpc":'
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toHaveProperty('error.code', -32700);
    expect(response.json()).toHaveProperty('id', null);
  });

  it('answers unknown methods with 400 and a -32601 envelope', async () => {
    const { app } = start();

    const response = await app.inject({
      method: 'POST',
      url: '/messages',
      payload: { jsonrpc: '2.0', id: 4, method: 'prompts/list' }
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      jsonrpc: '2.0',
      id: 4,
      error: { code: -32601, message: 'Unknown method: prompts/list' }
    });
  });

  it('answers an oversized body with 413 and the no-buffer headers', async () => {
    const { app } = start();

    const response = await app.inject({
      method: 'POST',
      url: '/messages',
      headers: { 'content-type': 'text/plain' },
      payload: 'x'.repeat(1024 * 1024 + 1)
    });

    expect(response.statusCode).toBe(413);
    expect(response.headers['cache-control']).toBe('no-cache, no-store, must-revalidate');
    expect(response.headers['x-accel-buffering']).toBe('no');
    expect(response.json()).toHaveProperty('error.code', 'FST_ERR_CTP_BODY_TOO_LARGE');
  });

  it('acknowledges notification-only input with 202 and no body', async () => {
    const { app } = start();

    const response = await app.inject({
      method: 'POST',
      url: '/messages',
      payload: { jsonrpc: '2.0', method: 'notifications/initialized' }
    });

    expect(response.statusCode).toBe(202);
    expect(response.body).toBe('');
  });

  it('runs a CRM tool end to end and records the handshake in health', async () => {
    const { app } = start();

    await app.inject({
      method: 'POST',
      url: '/messages',
      payload: { jsonrpc: '2.0', id: 1, method: 'initialize', params: { protocolVersion: '2024-11-05' } }
    });
    const call = await app.inject({
      method: 'POST',
      url: '/messages',
      payload: { jsonrpc: '2.0', id: 2, method: 'tools/call', params: { name: 'odoo_version', arguments: {} } }
    });
    const health = await app.inject({ method: 'GET', url: '/health' });

    expect(call.statusCode).toBe(200);
    expect(call.json()).toEqual({
      jsonrpc: '2.0',
      id: 2,
      result: {
        content: [{ type: 'text', text: 'Connected to: http://odoo.test\nDatabase: crm_test\nVersion: 17.0' }],
        isError: false
      }
    });
    expect(health.json()).toHaveProperty('initialized', true);
    expect(health.json()).toHaveProperty('protocol_version', '2024-11-05');
  });

  it('answers CORS preflight with 204', async () => {
    const { app } = start();

    const response = await app.inject({ method: 'OPTIONS', url: '/messages' });

    expect(response.statusCode).toBe(204);
    expect(response.headers['access-control-allow-origin']).toBe('*');
    expect(response.headers['access-control-allow-methods']).toBe('GET, POST, OPTIONS');
  });

  it('returns a JSON 404 for unknown routes', async () => {
    const { app } = start();

    const response = await app.inject({ method: 'GET', url: '/nowhere' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      ok: false,
      error: { code: 'not_found', message: 'Route not found: GET /nowhere' }
    });
  });

  it('answers HEAD on the stream path with headers only and opens no session', async () => {
    const { app, sessions } = start({ heartbeatIntervalMs: 20 });

    const response = await app.inject({ method: 'HEAD', url: '/sse' });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('text/event-stream; charset=utf-8');
    expect(response.headers['x-accel-buffering']).toBe('no');
    expect(response.body).toBe('');
    expect(sessions.size).toBe(0);
  });

  it('opens an SSE session, announces it, and releases it on disconnect', async () => {
    const { app, sessions } = start();
    const address = await app.listen({ host: '127.0.0.1', port: 0 });

    const { request, response } = await openSse(`${address}/sse`);
    const reader = new SseReader(response);
    const text = await reader.waitFor('event: ready\n');
    const endpoint = readEndpoint(text);
    const sessionId = endpoint.replace('/messages?session_id=', '');

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('text/event-stream; charset=utf-8');
    expect(response.headers['x-accel-buffering']).toBe('no');
    expect(sessionId).toMatch(/^[0-9a-f]{32}$/);
    expect(text).toBe(
      `event: endpoint\ndata: ${endpoint}\n\nevent: session\ndata: ${sessionId}\n\nevent: ready\ndata: MCP server ready\n\n`
    );
    expect(sessions.get(sessionId)?.open).toBe(true);

    const correlated = await app.inject({
      method: 'POST',
      url: endpoint,
      payload: { jsonrpc: '2.0', id: 3, method: 'ping' }
    });
    expect(correlated.statusCode).toBe(200);
    expect(correlated.json()).toEqual({ jsonrpc: '2.0', id: 3, result: {} });

    request.destroy();
    await vi.waitFor(() => {
      expect(sessions.size).toBe(0);
    });
  });

  it('sends heartbeats after the opening events', async () => {
    const { app, sessions } = start({ heartbeatIntervalMs: 20 });
    const address = await app.listen({ host: '127.0.0.1', port: 0 });

    const { request, response } = await openSse(`${address}/sse`);
    const reader = new SseReader(response);
    const text = await reader.waitFor('event: heartbeat\n');

    expect(text).toMatch(
      /event: ready\ndata: MCP server ready\n\nevent: heartbeat\ndata: \d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\n\n/
    );

    request.destroy();
    await vi.waitFor(() => {
      expect(sessions.size).toBe(0);
    });
  });

  it('writes responses onto the stream in push mode', async () => {
    const { app, sessions } = start({ responseDelivery: 'push' });
    const address = await app.listen({ host: '127.0.0.1', port: 0 });

    const { request, response } = await openSse(`${address}/sse`);
    const reader = new SseReader(response);
    const endpoint = readEndpoint(await reader.waitFor('event: ready\n'));

    const accepted = await app.inject({
      method: 'POST',
      url: endpoint,
      payload: { jsonrpc: '2.0', id: 7, method: 'ping' }
    });
    const text = await reader.waitFor('event: message\n');

    expect(accepted.statusCode).toBe(202);
    expect(accepted.json()).toEqual({ status: 'accepted' });
    expect(text.endsWith('event: message\ndata: {"jsonrpc":"2.0","id":7,"result":{}}\n\n')).toBe(true);

    request.destroy();
    await vi.waitFor(() => {
      expect(sessions.size).toBe(0);
    });
  });

  it('closes open streams when the server shuts down', async () => {
    const { app, sessions } = start();
    const address = await app.listen({ host: '127.0.0.1', port: 0 });

    const { response } = await openSse(`${address}/sse`);
    const reader = new SseReader(response);
    await reader.waitFor('event: ready\n');
    const ended = new Promise<void>((resolve) => response.on('end', () => resolve()));

    await app.close();
    resources = null;
    await ended;

    expect(sessions.size).toBe(0);
  });
});
