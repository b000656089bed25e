// This module decodes JSON-RPC envelopes, routes MCP methods to the tool registry, and encodes responses.

import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';
import type { BackendRpcClient } from '../types/domain.js';
import type {
  JsonRpcError,
  JsonRpcId,
  JsonRpcRequest,
  JsonRpcResponse,
  JsonValue,
  ToolCallResult
} from '../types/mcp.js';
import {
  AppError,
  InvalidParamsError,
  MalformedRequestError,
  MethodNotFoundError,
  NotInitializedError,
  ToolExecutionError,
  normalizeError
} from '../utils/errors.js';
import { isJsonObject, parseJsonBody } from '../utils/json.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import { InitializationState } from './initialization.js';
import type { RegisteredTool, ToolRegistry } from './registry.js';

export interface DispatcherOptions {
  registry: ToolRegistry;
  backend: BackendRpcClient;
  initialization: InitializationState;
  logger: FastifyBaseLogger;
  toolTimeoutMs: number;
  strictInitialize: boolean;
}

export type DecodedMessage = JsonRpcRequest | Array<JsonRpcRequest | MalformedRequestError>;

export interface DispatchOutcome {
  body: JsonRpcResponse | JsonRpcResponse[] | null;
  // True when a single (non-batch) exchange ended in an error envelope.
  failed: boolean;
}

function isJsonRpcId(value: unknown): value is JsonRpcId {
  return value === null || typeof value === 'string' || typeof value === 'number';
}

// This helper maps application errors into the fixed JSON-RPC error code ranges.
export function toRpcError(error: AppError): JsonRpcError {
  switch (error.code) {
    case 'parse_error':
      return { code: -32700, message: error.message, data: error.details };
    case 'invalid_request':
      return { code: -32600, message: error.message, data: error.details };
    case 'method_not_found':
    case 'tool_not_found':
      return { code: -32601, message: error.message };
    case 'invalid_params':
      return { code: -32602, message: error.message, data: error.details };
    case 'not_initialized':
      return { code: -32002, message: error.message };
    default:
      return {
        code: -32603,
        message: error.message,
        data: error.details === undefined ? { code: error.code } : { code: error.code, details: error.details }
      };
  }
}

export function encodeResult(id: JsonRpcId, result: unknown): JsonRpcResponse {
  return { jsonrpc: '2.0', id, result };
}

export function encodeError(id: JsonRpcId, error: AppError): JsonRpcResponse {
  return { jsonrpc: '2.0', id, error: toRpcError(error) };
}

// This helper wraps a tool's JSON value into MCP text content plus structured content for object payloads.
export function toToolCallResult(value: JsonValue): ToolCallResult {
  const text = typeof value === 'string' ? value : JSON.stringify(value, null, 2);
  return isJsonObject(value)
    ? { content: [{ type: 'text', text }], structuredContent: value, isError: false }
    : { content: [{ type: 'text', text }], isError: false };
}

// This function validates one decoded JSON value as a JSON-RPC request envelope.
export function decodeEnvelope(value: unknown): JsonRpcRequest {
  if (!isJsonObject(value)) {
    throw new MalformedRequestError('invalid_request', 'JSON-RPC request must be an object.');
  }

  const id = isJsonRpcId(value.id) ? value.id : null;
  if (value.id !== undefined && !isJsonRpcId(value.id)) {
    throw new MalformedRequestError('invalid_request', 'JSON-RPC id must be a string, number, or null.');
  }

  if (value.jsonrpc !== undefined && value.jsonrpc !== '2.0') {
    throw new MalformedRequestError('invalid_request', 'Unsupported JSON-RPC version.', undefined, id);
  }

  if (typeof value.method !== 'string' || value.method.length === 0) {
    throw new MalformedRequestError('invalid_request', 'JSON-RPC request is missing method.', undefined, id);
  }

  if (value.params !== undefined && !isJsonObject(value.params)) {
    throw new MalformedRequestError('invalid_request', 'JSON-RPC params must be an object.', undefined, id);
  }

  const request: JsonRpcRequest = { jsonrpc: '2.0', method: value.method };
  if (value.id !== undefined) {
    request.id = id;
  }
  if (value.params !== undefined) {
    request.params = value.params;
  }

  return request;
}

export class RpcDispatcher {
  private readonly registry: ToolRegistry;
  private readonly backend: BackendRpcClient;
  private readonly initialization: InitializationState;
  private readonly logger: FastifyBaseLogger;
  private readonly toolTimeoutMs: number;
  private readonly strictInitialize: boolean;

  public constructor(options: DispatcherOptions) {
    this.registry = options.registry;
    this.backend = options.backend;
    this.initialization = options.initialization;
    this.logger = options.logger.child({ component: 'mcp_dispatcher' });
    this.toolTimeoutMs = options.toolTimeoutMs;
    this.strictInitialize = options.strictInitialize;
  }

  // This method parses raw bytes; a batch keeps invalid items as errors so valid siblings still run.
  public decode(raw: string | Buffer): DecodedMessage {
    const value = parseJsonBody(raw);

    if (!Array.isArray(value)) {
      return decodeEnvelope(value);
    }

    if (value.length === 0) {
      throw new MalformedRequestError('invalid_request', 'JSON-RPC batch must not be empty.');
    }

    return value.map((item) => {
      try {
        return decodeEnvelope(item);
      } catch (error) {
        if (error instanceof MalformedRequestError) {
          return error;
        }
        throw error;
      }
    });
  }

  // This method runs decode, route, and encode in order for one request body and never throws.
  public async handle(raw: string | Buffer, logger: FastifyBaseLogger = this.logger): Promise<DispatchOutcome> {
    let decoded: DecodedMessage;
    try {
      decoded = this.decode(raw);
    } catch (error) {
      const appError = normalizeError(error);
      const id = error instanceof MalformedRequestError ? error.requestId : null;
      logger.warn(
        {
          event: 'mcp_request_malformed',
          code: appError.code,
          message: appError.message,
          rpcRequestId: id
        },
        'mcp_request_malformed'
      );
      return { body: encodeError(id, appError), failed: true };
    }

    if (!Array.isArray(decoded)) {
      const response = await this.dispatch(decoded, logger);
      return { body: response, failed: response !== null && 'error' in response };
    }

    logger.info({ event: 'mcp_batch_received', batchSize: decoded.length }, 'mcp_batch_received');

    const settled = await Promise.all(
      decoded.map((item) =>
        item instanceof MalformedRequestError ? Promise.resolve(encodeError(item.requestId, item)) : this.dispatch(item, logger)
      )
    );
    const responses = settled.filter((response): response is JsonRpcResponse => response !== null);

    return { body: responses.length > 0 ? responses : null, failed: false };
  }

  // This method handles one request and returns either a response or null for notifications.
  public async dispatch(request: JsonRpcRequest, logger: FastifyBaseLogger = this.logger): Promise<JsonRpcResponse | null> {
    const isNotification = request.id === undefined;
    const requestId = request.id ?? null;
    const startedAt = Date.now();
    const rpcTraceId = randomUUID();

    logger.info(
      {
        event: 'mcp_rpc_request_received',
        rpcTraceId,
        rpcRequestId: requestId,
        method: request.method,
        notification: isNotification
      },
      'mcp_rpc_request_received'
    );

    try {
      const result = await this.route(request, logger, rpcTraceId);
      return isNotification ? null : encodeResult(requestId, result);
    } catch (error) {
      const appError = normalizeError(error);

      logger.error(
        {
          event: 'mcp_rpc_request_failed',
          rpcTraceId,
          rpcRequestId: requestId,
          method: request.method,
          code: appError.code,
          statusCode: appError.statusCode,
          details: sanitizeForLog(appError.details),
          error: errorForLog(error),
          durationMs: Date.now() - startedAt
        },
        'mcp_rpc_request_failed'
      );

      return isNotification ? null : encodeError(requestId, appError);
    } finally {
      logger.info(
        {
          event: 'mcp_rpc_request_completed',
          rpcTraceId,
          rpcRequestId: requestId,
          method: request.method,
          durationMs: Date.now() - startedAt
        },
        'mcp_rpc_request_completed'
      );
    }
  }

  private async route(request: JsonRpcRequest, logger: FastifyBaseLogger, rpcTraceId: string): Promise<unknown> {
    const params = request.params ?? {};

    switch (request.method) {
      case 'initialize': {
        const { result, firstCall } = this.initialization.initialize(params.protocolVersion);
        logger.info(
          {
            event: firstCall ? 'mcp_initialized' : 'mcp_initialize_repeated',
            rpcTraceId,
            requestedProtocolVersion: sanitizeForLog(params.protocolVersion),
            protocolVersion: result.protocolVersion,
            clientInfo: sanitizeForLog(params.clientInfo)
          },
          firstCall ? 'mcp_initialized' : 'mcp_initialize_repeated'
        );
        return result;
      }

      case 'notifications/initialized':
      case 'notifications/cancelled':
        return {};

      case 'ping':
        return {};

      case 'tools/list':
        return { tools: Array.from(this.registry.list()) };

      case 'tools/call':
        return this.callTool(params, logger, rpcTraceId);

      default:
        throw new MethodNotFoundError(request.method);
    }
  }

  private async callTool(
    params: Record<string, unknown>,
    logger: FastifyBaseLogger,
    rpcTraceId: string
  ): Promise<ToolCallResult> {
    const name = params.name;
    if (typeof name !== 'string') {
      throw new InvalidParamsError('tools/call requires params.name as string.');
    }

    const args = params.arguments ?? {};
    if (!isJsonObject(args)) {
      throw new InvalidParamsError('tools/call requires params.arguments as an object.');
    }

    if (!this.initialization.initialized) {
      if (this.strictInitialize) {
        throw new NotInitializedError();
      }

      logger.warn({ event: 'mcp_tool_call_before_initialize', rpcTraceId, toolName: name }, 'mcp_tool_call_before_initialize');
    }

    const tool = this.registry.lookup(name);
    const missing = tool.requiredFields.filter((field) => args[field] === undefined);
    if (missing.length > 0) {
      throw new InvalidParamsError(`Missing required arguments for ${name}: ${missing.join(', ')}`, { missing });
    }

    const value = await this.invokeTool(tool, args, logger, rpcTraceId);
    return toToolCallResult(value);
  }

  // Timing and logging wrap the call here so registry entries are never modified.
  private async invokeTool(
    tool: RegisteredTool,
    args: Record<string, unknown>,
    logger: FastifyBaseLogger,
    rpcTraceId: string
  ): Promise<JsonValue> {
    const startedAt = Date.now();
    const toolLogger = logger.child({ toolName: tool.name, rpcTraceId });

    toolLogger.info(
      {
        event: 'mcp_tool_execution_started',
        arguments: sanitizeForLog(args)
      },
      'mcp_tool_execution_started'
    );

    try {
      const value = await withTimeout(
        tool.invoke({ backend: this.backend, logger: toolLogger, rpcTraceId }, args),
        this.toolTimeoutMs,
        () => new ToolExecutionError(`Tool ${tool.name} timed out after ${this.toolTimeoutMs}ms.`, { timeoutMs: this.toolTimeoutMs }, 'tool_timeout')
      );

      toolLogger.info(
        {
          event: 'mcp_tool_execution_completed',
          durationMs: Date.now() - startedAt
        },
        'mcp_tool_execution_completed'
      );

      return value;
    } catch (error) {
      toolLogger.error(
        {
          event: 'mcp_tool_execution_failed',
          durationMs: Date.now() - startedAt,
          error: errorForLog(error)
        },
        'mcp_tool_execution_failed'
      );

      if (error instanceof ToolExecutionError) {
        throw error;
      }

      const cause = normalizeError(error);
      throw new ToolExecutionError(`Tool ${tool.name} failed: ${cause.message}`, { cause: cause.code });
    }
  }
}
