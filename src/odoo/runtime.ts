// This module builds the backend client from configuration and owns the reconnect policy tool handlers rely on.

import type { FastifyBaseLogger } from 'fastify';
import pLimit from 'p-limit';
import type { AppConfig } from '../config/config.js';
import type {
  BackendRpcClient,
  OdooDomain,
  OdooRecord,
  SearchReadOptions
} from '../types/domain.js';
import { ConnectivityError } from '../utils/errors.js';
import { errorForLog } from '../utils/logger.js';
import { OdooClient } from './client.js';

type Limit = ReturnType<typeof pLimit>;

// This wrapper funnels every backend call through one slot for clients that cannot take concurrent calls.
export class SerializedBackendClient implements BackendRpcClient {
  private readonly inner: BackendRpcClient;
  private readonly limit: Limit = pLimit(1);

  public constructor(inner: BackendRpcClient) {
    this.inner = inner;
  }

  public get url(): string {
    return this.inner.url;
  }

  public get database(): string {
    return this.inner.database;
  }

  public get isConnected(): boolean {
    return this.inner.isConnected;
  }

  public connect(): Promise<void> {
    return this.limit(() => this.inner.connect());
  }

  public searchRead(
    model: string,
    domain: OdooDomain,
    fields: string[],
    options?: SearchReadOptions
  ): Promise<OdooRecord[]> {
    return this.limit(() => this.inner.searchRead(model, domain, fields, options));
  }

  public executeKw(model: string, method: string, args: unknown[], kwargs?: Record<string, unknown>): Promise<unknown> {
    return this.limit(() => this.inner.executeKw(model, method, args, kwargs));
  }

  public getServerVersion(): Promise<string> {
    return this.limit(() => this.inner.getServerVersion());
  }
}

// This helper builds the configured backend client, serialized when the deployment requires it.
export function createBackendClient(config: AppConfig, logger?: FastifyBaseLogger): BackendRpcClient {
  const client = new OdooClient(config.odoo, logger);

  logger?.debug(
    {
      event: 'backend_client_built',
      url: client.url,
      database: client.database,
      requestTimeoutMs: config.odoo.requestTimeoutMs,
      maxRetries: config.odoo.maxRetries,
      serializeCalls: config.serializeBackendCalls
    },
    'backend_client_built'
  );

  return config.serializeBackendCalls ? new SerializedBackendClient(client) : client;
}

// This helper connects when needed and retries once after reconnecting on a connectivity failure.
export async function withBackendConnection<T>(
  client: BackendRpcClient,
  logger: FastifyBaseLogger,
  work: (client: BackendRpcClient) => Promise<T>
): Promise<T> {
  if (!client.isConnected) {
    logger.warn({ event: 'backend_disconnected_connecting', url: client.url }, 'backend_disconnected_connecting');
    await client.connect();
  }

  try {
    return await work(client);
  } catch (error) {
    if (!(error instanceof ConnectivityError)) {
      throw error;
    }

    logger.warn(
      {
        event: 'backend_reconnect_attempt',
        url: client.url,
        error: errorForLog(error)
      },
      'backend_reconnect_attempt'
    );

    await client.connect();
    return work(client);
  }
}
