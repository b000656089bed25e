// This module frames Server-Sent Events and runs the per-stream heartbeat loop.

import type { FastifyBaseLogger } from 'fastify';
import type { SessionSink } from '../mcp/sessions.js';
import { errorForLog } from '../utils/logger.js';

// These headers stop reverse proxies from buffering or caching payloads.
export const NO_BUFFER_HEADERS = {
  'Cache-Control': 'no-cache, no-store, must-revalidate',
  Connection: 'keep-alive',
  'X-Accel-Buffering': 'no'
} as const;

export const CORS_HEADERS = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type, Authorization',
  'Access-Control-Allow-Methods': 'GET, POST, OPTIONS'
} as const;

export const SSE_HEADERS = {
  'Content-Type': 'text/event-stream; charset=utf-8',
  ...NO_BUFFER_HEADERS,
  ...CORS_HEADERS
} as const;

// Multi-line payloads become one data line each, as the event-stream format requires.
export function formatSseEvent(event: string, data: string): string {
  const dataLines = data
    .split(/\r\n|\r|\n/)
    .map((line) => `data: ${line}`)
    .join('\n');
  return `event: ${event}\n${dataLines}\n\n`;
}

// Writable side of an HTTP response as far as the stream needs it.
export interface SseTarget {
  write(chunk: string): boolean;
  end(): void;
  readonly writableEnded: boolean;
  readonly destroyed: boolean;
}

export interface SseStreamOptions {
  heartbeatIntervalMs: number;
  logger: FastifyBaseLogger;
  // Called after each heartbeat the socket accepted without buffering.
  onHeartbeat?: () => void;
}

export class SseStream implements SessionSink {
  private readonly target: SseTarget;
  private readonly heartbeatIntervalMs: number;
  private readonly logger: FastifyBaseLogger;
  private readonly onHeartbeat?: () => void;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private isClosed = false;

  public constructor(target: SseTarget, options: SseStreamOptions) {
    this.target = target;
    this.heartbeatIntervalMs = options.heartbeatIntervalMs;
    this.logger = options.logger;
    this.onHeartbeat = options.onHeartbeat;
  }

  public get closed(): boolean {
    return this.isClosed || this.target.writableEnded || this.target.destroyed;
  }

  public send(event: string, data: string): boolean {
    if (this.closed) {
      return false;
    }

    try {
      return this.target.write(formatSseEvent(event, data));
    } catch (error) {
      this.logger.warn({ event: 'sse_write_failed', sseEvent: event, error: errorForLog(error) }, 'sse_write_failed');
      this.close();
      return false;
    }
  }

  public startHeartbeat(): void {
    if (this.heartbeatTimer || this.closed) {
      return;
    }

    this.heartbeatTimer = setInterval(() => {
      if (this.send('heartbeat', new Date().toISOString())) {
        this.onHeartbeat?.();
      }
    }, this.heartbeatIntervalMs);
  }

  // Idempotent: stops the heartbeat and ends the response if it is still writable.
  public close(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }

    if (this.isClosed) {
      return;
    }

    this.isClosed = true;
    if (!this.target.writableEnded && !this.target.destroyed) {
      this.target.end();
    }
  }
}
