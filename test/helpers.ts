// Shared fixtures for the test suites: a silent logger, a scripted in-memory backend, and a baseline config.

import type { FastifyBaseLogger } from 'fastify';
import pino from 'pino';
import type { AppConfig } from '../src/config/config.js';
import type { BackendRpcClient, OdooDomain, OdooRecord, SearchReadOptions } from '../src/types/domain.js';
import { isJsonObject } from '../src/utils/json.js';

export const silentLogger: FastifyBaseLogger = pino({ level: 'silent' });

export interface BackendCall {
  model: string;
  method: string;
  args: unknown[];
  kwargs: Record<string, unknown>;
}

export type BackendScript = (call: BackendCall) => unknown;

// This fake records every execute_kw call and answers from a script, so tools run without an Odoo server.
export class FakeBackend implements BackendRpcClient {
  public readonly url = 'http://odoo.test';
  public readonly database = 'crm_test';
  public readonly calls: BackendCall[] = [];
  public connectCalls = 0;
  public connected: boolean;
  public serverVersion = '17.0';
  private readonly script: BackendScript;

  public constructor(script: BackendScript = () => [], options: { connected?: boolean } = {}) {
    this.script = script;
    this.connected = options.connected ?? true;
  }

  public get isConnected(): boolean {
    return this.connected;
  }

  public async connect(): Promise<void> {
    this.connectCalls += 1;
    this.connected = true;
  }

  public async searchRead(
    model: string,
    domain: OdooDomain,
    fields: string[],
    options: SearchReadOptions = {}
  ): Promise<OdooRecord[]> {
    const result = await this.executeKw(model, 'search_read', [domain], { fields, ...options });
    return Array.isArray(result) ? result.filter(isJsonObject) : [];
  }

  public async executeKw(
    model: string,
    method: string,
    args: unknown[],
    kwargs: Record<string, unknown> = {}
  ): Promise<unknown> {
    const call = { model, method, args, kwargs };
    this.calls.push(call);
    return this.script(call);
  }

  public async getServerVersion(): Promise<string> {
    return this.serverVersion;
  }
}

export function buildTestConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    host: '127.0.0.1',
    port: 0,
    logLevel: 'silent',
    odoo: {
      url: 'http://odoo.test',
      database: 'crm_test',
      username: 'admin',
      password: 'test-secret',
      requestTimeoutMs: 1_000,
      maxRetries: 0,
      retryBaseDelayMs: 1
    },
    toolTimeoutMs: 5_000,
    heartbeatIntervalMs: 30_000,
    sessionIdleTimeoutMs: 600_000,
    sessionSweepIntervalMs: 60_000,
    strictInitialize: false,
    responseDelivery: 'pull',
    serializeBackendCalls: false,
    ...overrides
  };
}
