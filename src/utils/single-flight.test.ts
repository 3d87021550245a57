import { describe, it, expect, vi } from 'vitest';
import { LazySingleton } from './single-flight.js';

describe('LazySingleton', () => {
  it('runs one build for concurrent callers', async () => {
    const build = vi.fn(async () => ({ built: true }));
    const singleton = new LazySingleton(build);

    const [a, b, c] = await Promise.all([singleton.get(), singleton.get(), singleton.get()]);

    expect(build).toHaveBeenCalledTimes(1);
    expect(a).toBe(b);
    expect(b).toBe(c);
  });

  it('rebuilds after the ttl', async () => {
    let clock = 0;
    let builds = 0;
    const singleton = new LazySingleton(async () => ++builds, 1000, () => clock);

    await expect(singleton.get()).resolves.toBe(1);
    clock = 999;
    await expect(singleton.get()).resolves.toBe(1);
    clock = 1000;
    await expect(singleton.get()).resolves.toBe(2);
  });

  it('does not cache a failed build', async () => {
    const build = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('schema unavailable'))
      .mockResolvedValueOnce('ready');
    const singleton = new LazySingleton(build);

    await expect(singleton.get()).rejects.toThrow('schema unavailable');
    await expect(singleton.get()).resolves.toBe('ready');
    expect(singleton.isBuilt()).toBe(true);
  });

  it('ignores a build that finishes after invalidate', async () => {
    let release: (value: string) => void = () => {};
    const build = vi
      .fn<() => Promise<string>>()
      .mockImplementationOnce(() => new Promise((resolve) => (release = resolve)))
      .mockResolvedValueOnce('fresh');
    const singleton = new LazySingleton(build);

    const stale = singleton.get();
    singleton.invalidate();
    release('stale');

    await expect(stale).resolves.toBe('stale');
    expect(singleton.isBuilt()).toBe(false);
    await expect(singleton.get()).resolves.toBe('fresh');
  });
});
