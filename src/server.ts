// This module wires the transport routes, request logging hooks, and lifecycle resources.

import Fastify, { type FastifyInstance, type FastifyRequest } from 'fastify';
import type { AppConfig } from './config/config.js';
import { NO_BUFFER_HEADERS } from './http/sse.js';
import { registerTransportRoutes } from './http/transport.js';
import { RpcDispatcher } from './mcp/dispatcher.js';
import { InitializationState } from './mcp/initialization.js';
import { buildToolRegistry, type RegisteredTool, type ToolRegistry } from './mcp/registry.js';
import { SessionManager } from './mcp/sessions.js';
import { buildCrmTools } from './mcp/tools.js';
import { createBackendClient } from './odoo/runtime.js';
import type { BackendRpcClient } from './types/domain.js';
import { AppError } from './utils/errors.js';
import { buildLoggerOptions, errorForLog, sanitizeForLog } from './utils/logger.js';

export interface ServerDeps {
  // Replaces the configured Odoo client, mainly for tests.
  backend?: BackendRpcClient;
  tools?: Iterable<RegisteredTool>;
}

export interface ServerResources {
  app: FastifyInstance;
  registry: ToolRegistry;
  sessions: SessionManager;
  initialization: InitializationState;
  dispatcher: RpcDispatcher;
  backend: BackendRpcClient;
}

// This helper builds a safe header snapshot for request diagnostics without leaking secrets.
function buildRequestHeaderSnapshot(headers: FastifyRequest['headers']): unknown {
  return sanitizeForLog({
    host: headers.host ?? null,
    'x-forwarded-for': headers['x-forwarded-for'] ?? null,
    'x-forwarded-proto': headers['x-forwarded-proto'] ?? null,
    'user-agent': headers['user-agent'] ?? null,
    accept: headers.accept ?? null,
    'content-type': headers['content-type'] ?? null,
    'content-length': headers['content-length'] ?? null
  });
}

// This function builds and configures the full HTTP application.
export function createServer(config: AppConfig, deps: ServerDeps = {}): ServerResources {
  const app = Fastify({
    logger: buildLoggerOptions(config.logLevel),
    bodyLimit: 1024 * 1024,
    trustProxy: true
  });

  // The dispatcher owns JSON decoding so malformed bodies become JSON-RPC parse errors, not Fastify 400s.
  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  const requestStartTimes = new WeakMap<FastifyRequest, bigint>();

  // This hook enriches request logs with consistent route and request-id metadata.
  app.addHook('onRequest', async (request) => {
    requestStartTimes.set(request, process.hrtime.bigint());

    request.log.info(
      {
        event: 'http_request_start',
        requestId: request.id,
        method: request.method,
        path: request.url,
        ip: request.ip,
        headers: buildRequestHeaderSnapshot(request.headers)
      },
      'http_request_start'
    );
  });

  // This hook logs response completion including status and duration for request tracing.
  app.addHook('onResponse', async (request, reply) => {
    const startTime = requestStartTimes.get(request);
    const durationMs = startTime ? Number(process.hrtime.bigint() - startTime) / 1_000_000 : undefined;

    request.log.info(
      {
        event: 'http_request_complete',
        requestId: request.id,
        statusCode: reply.statusCode,
        method: request.method,
        path: request.url,
        durationMs
      },
      'http_request_complete'
    );
  });

  app.addHook('onTimeout', async (request) => {
    request.log.warn(
      {
        event: 'http_request_timeout',
        requestId: request.id,
        method: request.method,
        path: request.url
      },
      'http_request_timeout'
    );
  });

  const registry = buildToolRegistry(deps.tools ?? buildCrmTools());
  const backend = deps.backend ?? createBackendClient(config, app.log);
  const initialization = new InitializationState();
  const dispatcher = new RpcDispatcher({
    registry,
    backend,
    initialization,
    logger: app.log,
    toolTimeoutMs: config.toolTimeoutMs,
    strictInitialize: config.strictInitialize
  });
  const sessions = new SessionManager({
    idleTimeoutMs: config.sessionIdleTimeoutMs,
    sweepIntervalMs: config.sessionSweepIntervalMs,
    logger: app.log
  });
  sessions.start();

  app.log.info(
    {
      event: 'mcp_tools_registered',
      toolCount: registry.size,
      tools: Array.from(registry.list(), (tool) => tool.name)
    },
    'mcp_tools_registered'
  );

  registerTransportRoutes(app, {
    dispatcher,
    sessions,
    registry,
    initialization,
    heartbeatIntervalMs: config.heartbeatIntervalMs,
    responseDelivery: config.responseDelivery
  });

  // Open event streams would otherwise keep close() waiting on their sockets.
  app.addHook('preClose', async () => {
    sessions.closeAll('server_shutdown');
  });

  // This handler maps internal exceptions into structured JSON errors.
  app.setErrorHandler((error, request, reply) => {
    const normalized =
      error instanceof AppError
        ? error
        : new AppError(error.statusCode ?? 500, error.code || 'internal_error', error.message);

    request.log.error(
      {
        event: 'http_request_failed',
        requestId: request.id,
        code: normalized.code,
        details: sanitizeForLog(normalized.details),
        error: errorForLog(error)
      },
      'http_request_failed'
    );

    reply.headers(NO_BUFFER_HEADERS);
    reply.status(normalized.statusCode).send({
      ok: false,
      error: {
        code: normalized.code,
        message: normalized.message
      }
    });
  });

  app.setNotFoundHandler((request, reply) => {
    const error = new AppError(404, 'not_found', `Route not found: ${request.method} ${request.url}`);

    request.log.warn(
      {
        event: 'http_route_not_found',
        requestId: request.id,
        method: request.method,
        path: request.url
      },
      'http_route_not_found'
    );

    reply.status(404).send({
      ok: false,
      error: {
        code: error.code,
        message: error.message
      }
    });
  });

  return {
    app,
    registry,
    sessions,
    initialization,
    dispatcher,
    backend
  };
}
