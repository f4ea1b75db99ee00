import { describe, it, expect } from 'vitest';
import { DeathChannel } from './death-channel.js';
import type { DeathNotice } from '../types.js';

function notice(id: string): DeathNotice {
  return {
    node: {
      id,
      hostname: `${id}.test`,
      type: 'fast',
      status: 'dead',
      consecutiveFailures: 0,
      launchedAt: new Date('2026-01-01T00:00:00Z'),
      expiresAt: new Date('2026-01-01T01:00:00Z'),
    },
    reason: 'health-checks-failed',
    at: new Date('2026-01-01T00:10:00Z'),
  };
}

describe('DeathChannel', () => {
  it('delivers notices one at a time in arrival order', async () => {
    const channel = new DeathChannel();
    const trace: string[] = [];
    let release: () => void = () => {};
    const firstBlocked = new Promise<void>(resolve => {
      release = resolve;
    });

    channel.subscribe(async n => {
      trace.push(`start ${n.node.id}`);
      if (n.node.id === 'wl-1') await firstBlocked;
      trace.push(`end ${n.node.id}`);
    });

    channel.push(notice('wl-1'));
    channel.push(notice('wl-2'));
    expect(channel.pending).toBe(1);

    release();
    await channel.idle();

    expect(trace).toEqual(['start wl-1', 'end wl-1', 'start wl-2', 'end wl-2']);
    expect(channel.busy).toBe(false);
  });

  it('holds notices until a consumer subscribes', async () => {
    const channel = new DeathChannel();
    const seen: string[] = [];

    channel.push(notice('wl-1'));
    channel.subscribe(async n => {
      seen.push(n.node.id);
    });
    await channel.idle();

    expect(seen).toEqual(['wl-1']);
  });

  it('keeps delivering after a handler throws', async () => {
    const channel = new DeathChannel();
    const seen: string[] = [];
    channel.subscribe(async n => {
      seen.push(n.node.id);
      if (n.node.id === 'wl-1') throw new Error('boom');
    });

    channel.push(notice('wl-1'));
    channel.push(notice('wl-2'));
    await channel.idle();

    expect(seen).toEqual(['wl-1', 'wl-2']);
  });

  it('drops notices pushed after close', async () => {
    const channel = new DeathChannel();
    const seen: string[] = [];
    channel.subscribe(async n => {
      seen.push(n.node.id);
    });

    channel.push(notice('wl-1'));
    await channel.close();
    channel.push(notice('wl-2'));
    await channel.idle();

    expect(seen).toEqual(['wl-1']);
    expect(channel.pending).toBe(0);
  });

  it('allows a single consumer', () => {
    const channel = new DeathChannel();
    channel.subscribe(async () => {});
    expect(() => channel.subscribe(async () => {})).toThrow('DeathChannel already has a consumer');
  });
});
