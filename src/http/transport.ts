// This module exposes the health, SSE stream, and message submission endpoints on top of the dispatcher.

import type { FastifyBaseLogger, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { ResponseDelivery } from '../config/config.js';
import type { RpcDispatcher } from '../mcp/dispatcher.js';
import type { InitializationState } from '../mcp/initialization.js';
import type { ToolRegistry } from '../mcp/registry.js';
import type { SessionManager } from '../mcp/sessions.js';
import { isJsonObject } from '../utils/json.js';
import { errorForLog } from '../utils/logger.js';
import { MCP_SERVER_NAME } from '../version.js';
import { CORS_HEADERS, NO_BUFFER_HEADERS, SSE_HEADERS, SseStream } from './sse.js';

export const MESSAGES_PATH = '/messages';
export const READY_MESSAGE = 'MCP server ready';

export interface TransportDeps {
  dispatcher: RpcDispatcher;
  sessions: SessionManager;
  registry: ToolRegistry;
  initialization: InitializationState;
  heartbeatIntervalMs: number;
  responseDelivery: ResponseDelivery;
}

// This helper reads the correlation token clients copy from the endpoint event.
function readSessionId(query: unknown): string | null {
  if (!isJsonObject(query)) {
    return null;
  }

  const value = query.session_id ?? query.sessionId;
  return typeof value === 'string' && value.length > 0 ? value : null;
}

function readRawBody(body: unknown): string {
  if (typeof body === 'string') {
    return body;
  }

  return Buffer.isBuffer(body) ? body.toString('utf8') : '';
}

// This helper runs one dispatch in the background and writes its response onto the session stream.
async function pushResponse(deps: TransportDeps, sessionId: string, raw: string, logger: FastifyBaseLogger): Promise<void> {
  const outcome = await deps.dispatcher.handle(raw, logger);
  if (outcome.body === null) {
    return;
  }

  const delivered = deps.sessions.deliver(sessionId, 'message', JSON.stringify(outcome.body));
  logger.info({ event: 'mcp_push_response', sessionId, delivered }, 'mcp_push_response');
}

export function registerTransportRoutes(fastify: FastifyInstance, deps: TransportDeps): void {
  // Hijacked SSE replies skip this hook and carry the same headers through SSE_HEADERS.
  fastify.addHook('onSend', async (_request, reply, payload) => {
    reply.headers(CORS_HEADERS);
    return payload;
  });

  fastify.options('*', async (_request, reply) => {
    return reply.code(204).send();
  });

  // This endpoint reports liveness, registry size, and handshake state without side effects.
  fastify.get('/health', async () => {
    return {
      status: 'healthy',
      service: MCP_SERVER_NAME,
      tools_loaded: deps.registry.size,
      initialized: deps.initialization.initialized,
      protocol_version: deps.initialization.protocolVersion,
      sessions: deps.sessions.size,
      timestamp: new Date().toISOString()
    };
  });

  // HEAD probes get the stream headers only and open no session.
  fastify.head('/sse', async (_request, reply) => {
    return reply.code(200).headers(SSE_HEADERS).send();
  });

  // This endpoint holds an event stream open until the client disconnects or the process shuts down.
  fastify.get('/sse', { exposeHeadRoute: false }, async (request, reply) => {
    reply.hijack();
    reply.raw.writeHead(200, SSE_HEADERS);

    let sessionId = '';
    const stream = new SseStream(reply.raw, {
      heartbeatIntervalMs: deps.heartbeatIntervalMs,
      logger: request.log,
      onHeartbeat: () => {
        deps.sessions.touch(sessionId);
      }
    });
    sessionId = deps.sessions.openSession(stream);

    reply.raw.on('close', () => {
      deps.sessions.close(sessionId, 'client_disconnected');
    });

    stream.send('endpoint', `${MESSAGES_PATH}?session_id=${sessionId}`);
    stream.send('session', sessionId);
    stream.send('ready', READY_MESSAGE);
    stream.startHeartbeat();

    request.log.info(
      {
        event: 'mcp_sse_stream_opened',
        sessionId,
        heartbeatIntervalMs: deps.heartbeatIntervalMs
      },
      'mcp_sse_stream_opened'
    );
  });

  const handleMessages = async (request: FastifyRequest, reply: FastifyReply) => {
    reply.headers(NO_BUFFER_HEADERS);

    const sessionId = readSessionId(request.query);
    const requestLogger = request.log.child({ component: 'mcp', sessionId });
    if (sessionId) {
      deps.sessions.touch(sessionId);
    }

    const raw = readRawBody(request.body);

    if (deps.responseDelivery === 'push' && sessionId && deps.sessions.get(sessionId)?.open) {
      pushResponse(deps, sessionId, raw, requestLogger).catch((error: unknown) => {
        requestLogger.error({ event: 'mcp_push_response_failed', sessionId, error: errorForLog(error) }, 'mcp_push_response_failed');
      });
      return reply.code(202).send({ status: 'accepted' });
    }

    const outcome = await deps.dispatcher.handle(raw, requestLogger);
    if (outcome.body === null) {
      return reply.code(202).send();
    }

    return reply.code(outcome.failed ? 400 : 200).send(outcome.body);
  };

  fastify.post(MESSAGES_PATH, handleMessages);
  fastify.post(`${MESSAGES_PATH}/`, handleMessages);
}
