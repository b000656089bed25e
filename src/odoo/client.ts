// This module wraps Odoo JSON-RPC calls with timeout, retry, and session-uid bookkeeping.

import { setTimeout as sleep } from 'node:timers/promises';
import type { FastifyBaseLogger } from 'fastify';
import type {
  BackendClientConfig,
  BackendRpcClient,
  OdooDomain,
  OdooRecord,
  SearchReadOptions
} from '../types/domain.js';
import { AppError, BackendError, ConnectivityError } from '../utils/errors.js';
import { isJsonObject } from '../utils/json.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';

type OdooService = 'common' | 'object';

// This helper extracts the most specific message from an Odoo fault payload.
function describeOdooFault(fault: Record<string, unknown>): string {
  const data = fault.data;
  if (isJsonObject(data) && typeof data.message === 'string' && data.message.length > 0) {
    return data.message;
  }

  return typeof fault.message === 'string' ? fault.message : 'Odoo returned an error.';
}

// This class executes authenticated Odoo RPC operations through the /jsonrpc endpoint.
export class OdooClient implements BackendRpcClient {
  public readonly url: string;
  public readonly database: string;
  private readonly config: BackendClientConfig;
  private readonly logger?: FastifyBaseLogger;
  private uid: number | null = null;
  private nextRpcId = 1;

  public constructor(config: BackendClientConfig, logger?: FastifyBaseLogger) {
    this.url = config.url.endsWith('/') ? config.url.slice(0, -1) : config.url;
    this.database = config.database;
    this.config = config;
    this.logger = logger?.child({
      component: 'odoo_client'
    });
  }

  public get isConnected(): boolean {
    return this.uid !== null;
  }

  // This helper applies exponential backoff with jitter between retries.
  private async waitWithBackoff(attempt: number): Promise<number> {
    const jitter = Math.floor(Math.random() * 100);
    const delay = this.config.retryBaseDelayMs * 2 ** attempt + jitter;
    await sleep(delay);
    return delay;
  }

  private log(level: 'debug' | 'info' | 'warn' | 'error', event: string, details?: Record<string, unknown>): void {
    const sanitized = sanitizeForLog(details ?? {});
    this.logger?.[level](
      {
        event,
        ...(isJsonObject(sanitized) ? sanitized : {})
      },
      event
    );
  }

  // This helper performs one JSON-RPC call with timeout and bounded retry on transient failures.
  private async call(service: OdooService, method: string, args: unknown[]): Promise<unknown> {
    const maxAttempts = Math.max(1, this.config.maxRetries + 1);
    const startedAt = Date.now();
    const rpcId = this.nextRpcId;
    this.nextRpcId += 1;

    for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
      const abortController = new AbortController();
      const timer = setTimeout(() => abortController.abort(), this.config.requestTimeoutMs);
      const attemptNumber = attempt + 1;

      try {
        const response = await fetch(`${this.url}/jsonrpc`, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json'
          },
          body: JSON.stringify({
            jsonrpc: '2.0',
            method: 'call',
            params: { service, method, args },
            id: rpcId
          }),
          signal: abortController.signal
        });

        if (response.status === 429 || (response.status >= 500 && response.status <= 599)) {
          if (attempt < maxAttempts - 1) {
            const delayMs = await this.waitWithBackoff(attempt);
            this.log('warn', 'odoo_request_retry_scheduled', {
              service,
              method,
              attempt: attemptNumber,
              status: response.status,
              delayMs
            });
            continue;
          }

          throw new ConnectivityError(`Odoo responded with HTTP ${response.status}.`, { status: response.status });
        }

        if (!response.ok) {
          const message = await response.text();
          throw new BackendError(message || `Odoo request failed with HTTP ${response.status}.`, {
            status: response.status
          });
        }

        const payload: unknown = await response.json();
        if (!isJsonObject(payload)) {
          throw new BackendError('Odoo returned a non-object JSON-RPC payload.');
        }

        if (isJsonObject(payload.error)) {
          throw new BackendError(describeOdooFault(payload.error), sanitizeForLog(payload.error));
        }

        this.log('debug', 'odoo_request_completed', {
          service,
          method,
          attemptsUsed: attemptNumber,
          durationMs: Date.now() - startedAt
        });

        return payload.result;
      } catch (error) {
        if (error instanceof AppError) {
          this.log('error', 'odoo_request_failed', {
            service,
            method,
            attempt: attemptNumber,
            code: error.code,
            error: errorForLog(error)
          });
          if (error instanceof ConnectivityError) {
            this.uid = null;
          }
          throw error;
        }

        if (attempt >= maxAttempts - 1) {
          const message = error instanceof Error ? error.message : 'unknown transport error';
          this.log('error', 'odoo_request_failed_transport', {
            service,
            method,
            attempt: attemptNumber,
            durationMs: Date.now() - startedAt,
            error: errorForLog(error)
          });
          this.uid = null;
          throw new ConnectivityError(`Odoo request failed: ${message}`);
        }

        const delayMs = await this.waitWithBackoff(attempt);
        this.log('warn', 'odoo_request_retry_transport', {
          service,
          method,
          attempt: attemptNumber,
          delayMs,
          error: errorForLog(error)
        });
      } finally {
        clearTimeout(timer);
      }
    }

    this.uid = null;
    throw new ConnectivityError('Odoo request failed after retries.');
  }

  // This method authenticates against the configured database and stores the session uid.
  public async connect(): Promise<void> {
    const result = await this.call('common', 'login', [this.database, this.config.username, this.config.password]);
    if (typeof result !== 'number' || result <= 0) {
      this.uid = null;
      throw new BackendError('Odoo authentication failed. Check database, username and password.');
    }

    this.uid = result;
    this.log('info', 'odoo_connected', {
      url: this.url,
      database: this.database,
      uid: result
    });
  }

  // This method returns the server_version string reported by the common service.
  public async getServerVersion(): Promise<string> {
    const result = await this.call('common', 'version', []);
    if (isJsonObject(result) && typeof result.server_version === 'string') {
      return result.server_version;
    }

    throw new BackendError('Odoo version payload did not include server_version.');
  }

  public async executeKw(
    model: string,
    method: string,
    args: unknown[],
    kwargs: Record<string, unknown> = {}
  ): Promise<unknown> {
    if (this.uid === null) {
      await this.connect();
    }

    return this.call('object', 'execute_kw', [
      this.database,
      this.uid,
      this.config.password,
      model,
      method,
      args,
      kwargs
    ]);
  }

  public async searchRead(
    model: string,
    domain: OdooDomain,
    fields: string[],
    options: SearchReadOptions = {}
  ): Promise<OdooRecord[]> {
    const kwargs: Record<string, unknown> = { fields };
    if (options.limit !== undefined) {
      kwargs.limit = options.limit;
    }
    if (options.offset !== undefined) {
      kwargs.offset = options.offset;
    }
    if (options.order !== undefined) {
      kwargs.order = options.order;
    }

    const result = await this.executeKw(model, 'search_read', [domain], kwargs);
    if (!Array.isArray(result)) {
      throw new BackendError(`search_read on ${model} did not return a list.`);
    }

    return result.filter((row): row is OdooRecord => isJsonObject(row));
  }
}
