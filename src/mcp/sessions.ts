// This module issues SSE session tokens, tracks liveness, and correlates POSTed messages with open streams.

import { randomBytes } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';

export interface Session {
  sessionId: string;
  createdAt: Date;
  lastActivity: Date;
  open: boolean;
}

// Outbound side of a session; the SSE stream implements it.
export interface SessionSink {
  send(event: string, data: string): boolean;
  close(): void;
}

export interface SessionManagerOptions {
  idleTimeoutMs: number;
  sweepIntervalMs: number;
  logger: FastifyBaseLogger;
  now?: () => Date;
}

interface SessionEntry {
  session: Session;
  sink: SessionSink | null;
}

export class SessionManager {
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly idleTimeoutMs: number;
  private readonly sweepIntervalMs: number;
  private readonly logger: FastifyBaseLogger;
  private readonly now: () => Date;
  private sweepTimer: NodeJS.Timeout | null = null;

  public constructor(options: SessionManagerOptions) {
    this.idleTimeoutMs = options.idleTimeoutMs;
    this.sweepIntervalMs = options.sweepIntervalMs;
    this.logger = options.logger.child({ component: 'mcp_sessions' });
    this.now = options.now ?? (() => new Date());
  }

  public get size(): number {
    return this.sessions.size;
  }

  // This method creates a session with a 128-bit random token and returns the token.
  public openSession(sink: SessionSink | null = null): string {
    let sessionId = randomBytes(16).toString('hex');
    while (this.sessions.has(sessionId)) {
      sessionId = randomBytes(16).toString('hex');
    }

    const now = this.now();
    this.sessions.set(sessionId, {
      session: {
        sessionId,
        createdAt: now,
        lastActivity: now,
        open: true
      },
      sink
    });

    this.logger.info({ event: 'mcp_session_opened', sessionId, openSessions: this.sessions.size }, 'mcp_session_opened');
    return sessionId;
  }

  // Disconnect races are expected, so an unknown id is logged and reported as false.
  public touch(sessionId: string): boolean {
    const entry = this.sessions.get(sessionId);
    if (!entry) {
      this.logger.debug({ event: 'mcp_session_touch_unknown', sessionId }, 'mcp_session_touch_unknown');
      return false;
    }

    entry.session.lastActivity = this.now();
    return true;
  }

  public get(sessionId: string): Session | undefined {
    const entry = this.sessions.get(sessionId);
    return entry ? { ...entry.session } : undefined;
  }

  // This method writes one event to the session's stream; false when the session or its sink is gone.
  public deliver(sessionId: string, event: string, data: string): boolean {
    const entry = this.sessions.get(sessionId);
    if (!entry?.sink) {
      this.logger.warn({ event: 'mcp_session_deliver_unavailable', sessionId, sseEvent: event }, 'mcp_session_deliver_unavailable');
      return false;
    }

    const written = entry.sink.send(event, data);
    if (written) {
      entry.session.lastActivity = this.now();
    }
    return written;
  }

  public close(sessionId: string, reason: string): boolean {
    const entry = this.sessions.get(sessionId);
    if (!entry) {
      return false;
    }

    entry.session.open = false;
    this.sessions.delete(sessionId);
    entry.sink?.close();

    this.logger.info(
      {
        event: 'mcp_session_closed',
        sessionId,
        reason,
        lifetimeMs: this.now().getTime() - entry.session.createdAt.getTime(),
        openSessions: this.sessions.size
      },
      'mcp_session_closed'
    );
    return true;
  }

  // This method closes every session idle past the threshold and returns their ids.
  public sweepIdle(): string[] {
    const cutoff = this.now().getTime() - this.idleTimeoutMs;
    const expired: string[] = [];

    for (const [sessionId, entry] of this.sessions) {
      if (entry.session.lastActivity.getTime() < cutoff) {
        expired.push(sessionId);
      }
    }

    for (const sessionId of expired) {
      this.close(sessionId, 'idle_timeout');
    }

    return expired;
  }

  public start(): void {
    if (this.sweepTimer) {
      return;
    }

    this.sweepTimer = setInterval(() => {
      this.sweepIdle();
    }, this.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  public closeAll(reason: string): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }

    for (const sessionId of Array.from(this.sessions.keys())) {
      this.close(sessionId, reason);
    }
  }
}
