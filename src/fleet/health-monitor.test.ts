/**
 * Health Monitor Tests
 *
 * Drives one or more monitors through boot, burst, polling, expiry and
 * forced stop with fake timers and an in-process provider.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { HealthMonitor, monitorTiming, type HealthMonitorDeps, type MonitorTiming } from './health-monitor.js';
import { FleetRegistry } from './registry.js';
import { DeathChannel } from './death-channel.js';
import { FakeProvider, RecordingEvents } from '../test-support/fake-provider.js';
import type { DeathNotice, FleetNode } from '../types.js';

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

const TIMING: MonitorTiming = {
  bootDelayMs: 5_000,
  pollIntervalMs: 30_000,
  checkTimeoutMs: 5_000,
  maxStrikes: 3,
};

interface Harness extends HealthMonitorDeps {
  provider: FakeProvider;
  events: RecordingEvents;
  notices: DeathNotice[];
}

function makeHarness(): Harness {
  const deaths = new DeathChannel();
  const notices: DeathNotice[] = [];
  deaths.subscribe(async notice => {
    notices.push(notice);
  });
  return {
    provider: new FakeProvider(),
    registry: new FleetRegistry(),
    deaths,
    timing: TIMING,
    events: new RecordingEvents(),
    notices,
  };
}

function watch(h: Harness, id: string): HealthMonitor {
  const node: FleetNode = {
    id,
    hostname: `${id}.test`,
    type: 'fast',
    status: 'booting',
    consecutiveFailures: 0,
    launchedAt: new Date(),
    expiresAt: new Date(Date.now() + 3_600_000),
  };
  h.provider.running.add(id);
  const monitor = new HealthMonitor(node, h);
  h.registry.add(node, monitor);
  monitor.start();
  return monitor;
}

// ---------------------------------------------------------------------------
// HealthMonitor
// ---------------------------------------------------------------------------

describe('HealthMonitor', () => {
  let h: Harness;

  beforeEach(() => {
    vi.useFakeTimers();
    h = makeHarness();
  });

  afterEach(() => {
    for (const node of h.registry.list()) h.registry.monitorOf(node.id)?.stop();
    vi.useRealTimers();
  });

  it('waits out the boot delay before the first check', async () => {
    watch(h, 'wl-1');

    await vi.advanceTimersByTimeAsync(4_999);
    expect(h.provider.checks).toEqual([]);
    expect(h.registry.get('wl-1')?.status).toBe('booting');

    await vi.advanceTimersByTimeAsync(1);
    expect(h.provider.checks).toEqual(['wl-1']);
    expect(h.registry.get('wl-1')?.status).toBe('healthy');
  });

  it('kills a node that fails all three boot checks', async () => {
    h.provider.down.add('wl-1');
    watch(h, 'wl-1');

    await vi.advanceTimersByTimeAsync(5_000);

    expect(h.provider.checks).toEqual(['wl-1', 'wl-1', 'wl-1']);
    expect(h.provider.stops).toEqual(['wl-1']);
    expect(h.registry.get('wl-1')?.status).toBe('dead');
    expect(h.notices).toHaveLength(1);
    expect(h.notices[0]?.reason).toBe('health-checks-failed');
    expect(h.notices[0]?.node.status).toBe('dead');
  });

  it('recovers when a retry in the boot burst passes', async () => {
    h.provider.script('wl-1', 'unhealthy', 'error');
    watch(h, 'wl-1');

    await vi.advanceTimersByTimeAsync(5_000);

    expect(h.provider.checks).toHaveLength(3);
    expect(h.registry.get('wl-1')).toMatchObject({ status: 'healthy', consecutiveFailures: 0 });
    expect(h.provider.stops).toEqual([]);
    expect(h.notices).toEqual([]);
  });

  it('counts one strike per poll tick once the node has booted', async () => {
    watch(h, 'wl-1');
    await vi.advanceTimersByTimeAsync(5_000);
    h.provider.down.add('wl-1');

    await vi.advanceTimersByTimeAsync(30_000);
    expect(h.provider.checks).toHaveLength(2);
    expect(h.registry.get('wl-1')).toMatchObject({ status: 'unhealthy', consecutiveFailures: 1 });

    await vi.advanceTimersByTimeAsync(30_000);
    expect(h.provider.checks).toHaveLength(3);
    expect(h.registry.get('wl-1')).toMatchObject({ status: 'unhealthy', consecutiveFailures: 2 });
    expect(h.provider.stops).toEqual([]);

    await vi.advanceTimersByTimeAsync(30_000);
    expect(h.provider.checks).toHaveLength(4);
    expect(h.registry.get('wl-1')?.status).toBe('dead');
    expect(h.provider.stops).toEqual(['wl-1']);
    expect(h.notices.map(n => n.reason)).toEqual(['health-checks-failed']);
  });

  it('resets the strike count on a passed poll', async () => {
    watch(h, 'wl-1');
    await vi.advanceTimersByTimeAsync(5_000);
    h.provider.script('wl-1', 'unhealthy', 'unhealthy', 'healthy', 'unhealthy', 'unhealthy');

    await vi.advanceTimersByTimeAsync(5 * 30_000);

    expect(h.provider.checks).toHaveLength(6);
    expect(h.registry.get('wl-1')).toMatchObject({ status: 'unhealthy', consecutiveFailures: 2 });
    expect(h.notices).toEqual([]);
  });

  it('treats a workload missing from the running listing as expired', async () => {
    watch(h, 'wl-1');
    await vi.advanceTimersByTimeAsync(5_000);
    h.provider.running.delete('wl-1');

    await vi.advanceTimersByTimeAsync(30_000);

    expect(h.provider.checks).toEqual(['wl-1']);
    expect(h.provider.stops).toEqual([]);
    expect(h.registry.get('wl-1')?.status).toBe('dead');
    expect(h.notices.map(n => n.reason)).toEqual(['expired']);
  });

  it('keeps checking when the running listing is unavailable', async () => {
    watch(h, 'wl-1');
    await vi.advanceTimersByTimeAsync(5_000);
    h.provider.listError = new Error('listing unavailable');

    await vi.advanceTimersByTimeAsync(30_000);

    expect(h.provider.checks).toEqual(['wl-1', 'wl-1']);
    expect(h.registry.get('wl-1')?.status).toBe('healthy');
    expect(h.notices).toEqual([]);
  });

  it('halts during the boot delay without touching the provider', async () => {
    const monitor = watch(h, 'wl-1');
    await vi.advanceTimersByTimeAsync(1_000);

    monitor.stop();
    expect(h.registry.get('wl-1')?.status).toBe('stopped');
    await monitor.done;

    await vi.advanceTimersByTimeAsync(60_000);
    expect(h.provider.checks).toEqual([]);
    expect(h.provider.stops).toEqual([]);
    expect(h.notices).toEqual([]);
  });

  it('abandons a check that is in flight when stopped', async () => {
    h.provider.hanging.add('wl-1');
    const monitor = watch(h, 'wl-1');
    await vi.advanceTimersByTimeAsync(5_000);
    expect(h.provider.checks).toEqual(['wl-1']);

    monitor.stop();
    await monitor.done;

    expect(h.registry.get('wl-1')?.status).toBe('stopped');
    expect(h.provider.checks).toEqual(['wl-1']);
    expect(h.provider.stops).toEqual([]);
    expect(h.notices).toEqual([]);
  });

  it('announces the death even when the stop call fails', async () => {
    h.provider.down.add('wl-1');
    h.provider.stopFailures.add('wl-1');
    watch(h, 'wl-1');

    await vi.advanceTimersByTimeAsync(5_000);

    expect(h.provider.stops).toEqual(['wl-1']);
    expect(h.events.types()).toEqual(['NODE_STOP_FAILED']);
    expect(h.events.events[0]?.message).toBe('Failed to stop wl-1: Provider POST /stop failed (500): stop failed');
    expect(h.notices).toHaveLength(1);
  });

  it('leaves a dead node dead when stopped afterwards', async () => {
    h.provider.down.add('wl-1');
    const monitor = watch(h, 'wl-1');
    await vi.advanceTimersByTimeAsync(5_000);

    monitor.stop();
    expect(h.registry.get('wl-1')?.status).toBe('dead');
  });

  it('runs each node independently', async () => {
    h.provider.down.add('wl-1');
    watch(h, 'wl-1');
    watch(h, 'wl-2');

    await vi.advanceTimersByTimeAsync(5_000);

    expect(h.registry.get('wl-1')?.status).toBe('dead');
    expect(h.registry.get('wl-2')?.status).toBe('healthy');
    expect(h.provider.stops).toEqual(['wl-1']);
  });
});

describe('monitorTiming()', () => {
  it('converts configured seconds to milliseconds', () => {
    expect(monitorTiming({
      bootDelaySeconds: 5,
      pollIntervalSeconds: 30,
      healthCheckTimeoutSeconds: 5,
      maxStrikes: 3,
    })).toEqual({ bootDelayMs: 5_000, pollIntervalMs: 30_000, checkTimeoutMs: 5_000, maxStrikes: 3 });
  });
});
