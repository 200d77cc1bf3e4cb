import { Agent, MockAgent } from 'undici';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createPoolFactory, SessionManager } from './sessionManager.js';

describe('SessionManager', () => {
  const managers: SessionManager[] = [];
  const track = (manager: SessionManager) => {
    managers.push(manager);
    return manager;
  };

  afterEach(async () => {
    await Promise.all(managers.splice(0).map((manager) => manager.close()));
  });

  it('creates nothing until the pool is acquired', () => {
    const factory = vi.fn(() => new MockAgent());
    const manager = track(new SessionManager(factory));

    expect(manager.created).toBe(false);
    expect(factory).not.toHaveBeenCalled();
  });

  it('returns the same pool on every acquire', () => {
    const factory = vi.fn(() => new MockAgent());
    const manager = track(new SessionManager(factory));

    const first = manager.acquire();
    const second = manager.acquire();

    expect(first).toBe(second);
    expect(factory).toHaveBeenCalledTimes(1);
    expect(manager.created).toBe(true);
  });

  it('runs the factory once for concurrent first callers', async () => {
    const factory = vi.fn(() => new MockAgent());
    const manager = track(new SessionManager(factory));

    const pools = await Promise.all([
      Promise.resolve().then(() => manager.acquire()),
      Promise.resolve().then(() => manager.acquire()),
      Promise.resolve().then(() => manager.acquire()),
    ]);

    expect(new Set(pools).size).toBe(1);
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it('closes the pool and creates a fresh one afterwards', async () => {
    const manager = track(new SessionManager(() => new MockAgent()));
    const first = manager.acquire();
    const close = vi.spyOn(first, 'close');

    await manager.close();

    expect(close).toHaveBeenCalledTimes(1);
    expect(manager.created).toBe(false);
    expect(manager.acquire()).not.toBe(first);
  });

  it('closing an unused manager is a no-op', async () => {
    const manager = new SessionManager();

    await expect(manager.close()).resolves.toBeUndefined();
  });

  it('builds a keep-alive agent by default', () => {
    const manager = track(new SessionManager());

    expect(manager.acquire()).toBeInstanceOf(Agent);
  });

  it('shares one process-wide manager', () => {
    expect(SessionManager.shared()).toBe(SessionManager.shared());
  });
});

describe('createPoolFactory', () => {
  it('creates a new agent per call', async () => {
    const factory = createPoolFactory({ connections: 2 });
    const first = factory();
    const second = factory();

    expect(first).toBeInstanceOf(Agent);
    expect(first).not.toBe(second);

    await Promise.all([first.close(), second.close()]);
  });
});
