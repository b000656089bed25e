// This module parses process environment into one validated runtime configuration object.

import { z } from 'zod';
import type { BackendClientConfig } from '../types/domain.js';
import { AppError } from '../utils/errors.js';

export type ResponseDelivery = 'pull' | 'push';

export interface AppConfig {
  host: string;
  port: number;
  logLevel: string;
  odoo: BackendClientConfig;
  toolTimeoutMs: number;
  heartbeatIntervalMs: number;
  sessionIdleTimeoutMs: number;
  sessionSweepIntervalMs: number;
  strictInitialize: boolean;
  responseDelivery: ResponseDelivery;
  serializeBackendCalls: boolean;
}

// Environment flags arrive as strings, so "false" and "0" must not read as truthy.
const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .default('false')
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  HOST: z.string().trim().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65_535).default(8000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  ODOO_URL: z.string().trim().url(),
  ODOO_DB: z.string().trim().min(1),
  ODOO_USERNAME: z.string().trim().min(1),
  ODOO_PASSWORD: z.string().min(1),
  ODOO_TIMEOUT_MS: z.coerce.number().int().min(100).default(10_000),
  ODOO_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  ODOO_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(350),
  TOOL_TIMEOUT_MS: z.coerce.number().int().min(100).default(5_000),
  SSE_HEARTBEAT_INTERVAL_MS: z.coerce.number().int().min(1_000).default(30_000),
  SESSION_IDLE_TIMEOUT_MS: z.coerce.number().int().min(1_000).default(600_000),
  SESSION_SWEEP_INTERVAL_MS: z.coerce.number().int().min(1_000).default(60_000),
  MCP_STRICT_INITIALIZE: booleanFlag,
  MCP_RESPONSE_DELIVERY: z.enum(['pull', 'push']).default('pull'),
  BACKEND_SERIALIZE_CALLS: booleanFlag
});

// This helper loads configuration and fails fast with every invalid variable listed.
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new AppError(500, 'invalid_config', 'Invalid configuration. Check environment variables.', {
      variables: parsed.error.flatten().fieldErrors
    });
  }

  const values = parsed.data;
  return {
    host: values.HOST,
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    odoo: {
      url: values.ODOO_URL,
      database: values.ODOO_DB,
      username: values.ODOO_USERNAME,
      password: values.ODOO_PASSWORD,
      requestTimeoutMs: values.ODOO_TIMEOUT_MS,
      maxRetries: values.ODOO_MAX_RETRIES,
      retryBaseDelayMs: values.ODOO_RETRY_BASE_DELAY_MS
    },
    toolTimeoutMs: values.TOOL_TIMEOUT_MS,
    heartbeatIntervalMs: values.SSE_HEARTBEAT_INTERVAL_MS,
    sessionIdleTimeoutMs: values.SESSION_IDLE_TIMEOUT_MS,
    sessionSweepIntervalMs: values.SESSION_SWEEP_INTERVAL_MS,
    strictInitialize: values.MCP_STRICT_INITIALIZE,
    responseDelivery: values.MCP_RESPONSE_DELIVERY,
    serializeBackendCalls: values.BACKEND_SERIALIZE_CALLS
  };
}
