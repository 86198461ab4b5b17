import { describe, expect, it, vi } from 'vitest';
import { DocumentCache } from './document-cache';

describe('DocumentCache', () => {
  it('shares one load between concurrent callers', async () => {
    const cache = new DocumentCache<string>();
    const load = vi.fn(async (key: string) => `doc:${key}`);

    const [a, b] = await Promise.all([cache.get('x.pdf', load), cache.get('x.pdf', load)]);

    expect(a).toBe('doc:x.pdf');
    expect(b).toBe('doc:x.pdf');
    expect(load).toHaveBeenCalledTimes(1);
    expect(cache.has('x.pdf')).toBe(true);
    expect(cache.size).toBe(1);
  });

  it('forgets a failed load', async () => {
    const cache = new DocumentCache<string>();

    await expect(cache.get('x.pdf', async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(cache.has('x.pdf')).toBe(false);
    expect(await cache.get('x.pdf', async () => 'ok')).toBe('ok');
  });

  it('keeps a newer load when a load from before clear() fails', async () => {
    const cache = new DocumentCache<string>();
    let rejectStale: (err: Error) => void = () => {};
    const stale = cache.get(
      'x.pdf',
      () =>
        new Promise<string>((_, reject) => {
          rejectStale = reject;
        })
    );

    await cache.clear();
    const fresh = cache.get('x.pdf', async () => 'fresh');
    rejectStale(new Error('stale'));
    await expect(stale).rejects.toThrow('stale');

    const reload = vi.fn(async () => 'reloaded');
    expect(cache.has('x.pdf')).toBe(true);
    expect(cache.get('x.pdf', reload)).toBe(fresh);
    expect(reload).not.toHaveBeenCalled();
    expect(await fresh).toBe('fresh');
  });

  it('disposes loaded values on clear', async () => {
    const cache = new DocumentCache<string>();
    await cache.get('a', async () => 'A');
    await cache.get('b', async () => 'B');
    const dispose = vi.fn();

    await cache.clear(dispose);

    expect(dispose.mock.calls).toEqual([['A'], ['B']]);
    expect(cache.size).toBe(0);
  });
});
