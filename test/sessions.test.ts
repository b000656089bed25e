// This test suite verifies session token issuance, activity tracking, delivery, and idle expiry.

import { afterEach, describe, expect, it, vi } from 'vitest';
import { SessionManager, type SessionSink } from '../src/mcp/sessions.js';
import { silentLogger } from './helpers.js';

class RecordingSink implements SessionSink {
  public readonly events: Array<{ event: string; data: string }> = [];
  public closed = false;

  public send(event: string, data: string): boolean {
    if (this.closed) {
      return false;
    }

    this.events.push({ event, data });
    return true;
  }

  public close(): void {
    this.closed = true;
  }
}

function buildManager(clock: { now: number }): SessionManager {
  return new SessionManager({
    idleTimeoutMs: 1_000,
    sweepIntervalMs: 500,
    logger: silentLogger,
    now: () => new Date(clock.now)
  });
}

describe('session manager', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('issues distinct 32-character hex tokens', () => {
    const manager = buildManager({ now: 0 });

    const first = manager.openSession();
    const second = manager.openSession();

    expect(first).toMatch(/^[0-9a-f]{32}$/);
    expect(second).toMatch(/^[0-9a-f]{32}$/);
    expect(first).not.toBe(second);
    expect(manager.size).toBe(2);
  });

  it('records activity on touch and reports unknown ids without throwing', () => {
    const clock = { now: 1_000 };
    const manager = buildManager(clock);
    const sessionId = manager.openSession();

    clock.now = 1_500;
    expect(manager.touch(sessionId)).toBe(true);
    expect(manager.get(sessionId)?.lastActivity.getTime()).toBe(1_500);
    expect(manager.get(sessionId)?.createdAt.getTime()).toBe(1_000);
    expect(manager.touch('0'.repeat(32))).toBe(false);
  });

  it('returns snapshots that do not alias the stored session', () => {
    const manager = buildManager({ now: 0 });
    const sessionId = manager.openSession();

    const snapshot = manager.get(sessionId);
    if (snapshot) {
      snapshot.open = false;
    }

    expect(manager.get(sessionId)?.open).toBe(true);
  });

  it('closes the sink and forgets the session on close', () => {
    const manager = buildManager({ now: 0 });
    const sink = new RecordingSink();
    const sessionId = manager.openSession(sink);

    expect(manager.close(sessionId, 'client_disconnected')).toBe(true);
    expect(manager.close(sessionId, 'client_disconnected')).toBe(false);
    expect(sink.closed).toBe(true);
    expect(manager.get(sessionId)).toBeUndefined();
    expect(manager.touch(sessionId)).toBe(false);
    expect(manager.size).toBe(0);
  });

  it('delivers events to the session sink and counts delivery as activity', () => {
    const clock = { now: 0 };
    const manager = buildManager(clock);
    const sink = new RecordingSink();
    const sessionId = manager.openSession(sink);

    clock.now = 700;
    expect(manager.deliver(sessionId, 'message', '{"id":1}')).toBe(true);

    expect(sink.events).toEqual([{ event: 'message', data: '{"id":1}' }]);
    expect(manager.get(sessionId)?.lastActivity.getTime()).toBe(700);
    expect(manager.deliver('unknown', 'message', '{}')).toBe(false);
    expect(manager.deliver(manager.openSession(), 'message', '{}')).toBe(false);
  });

  it('expires only sessions idle past the threshold', () => {
    const clock = { now: 0 };
    const manager = buildManager(clock);
    const idle = manager.openSession(new RecordingSink());
    const active = manager.openSession(new RecordingSink());

    clock.now = 900;
    manager.touch(active);
    clock.now = 1_500;

    expect(manager.sweepIdle()).toEqual([idle]);
    expect(manager.get(idle)).toBeUndefined();
    expect(manager.get(active)?.open).toBe(true);
  });

  it('runs the sweeper on its interval once started', () => {
    vi.useFakeTimers();
    const clock = { now: 0 };
    const manager = buildManager(clock);
    const sessionId = manager.openSession();

    manager.start();
    clock.now = 2_000;
    vi.advanceTimersByTime(500);

    expect(manager.get(sessionId)).toBeUndefined();
    manager.closeAll('test_done');
  });

  it('closes every session on closeAll', () => {
    const manager = buildManager({ now: 0 });
    const sinks = [new RecordingSink(), new RecordingSink()];
    for (const sink of sinks) {
      manager.openSession(sink);
    }

    manager.closeAll('server_shutdown');

    expect(manager.size).toBe(0);
    expect(sinks.every((sink) => sink.closed)).toBe(true);
  });
});
