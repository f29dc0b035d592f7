import { describe, expect, it } from 'vitest';
import { mkGame } from '../src/engine/test-helpers';
import { GameStore } from './store';

function deferred() {
  let release: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { promise, release };
}

describe('GameStore', () => {
  it('rejects unknown ids with GameNotFound', async () => {
    const store = new GameStore();
    await expect(store.withGame('nope', () => 1)).rejects.toMatchObject({ kind: 'GameNotFound' });
  });

  it('refuses to insert the same id twice', () => {
    const store = new GameStore();
    store.insert(mkGame('solo', { id: 'a' }));
    expect(() => store.insert(mkGame('solo', { id: 'a' }))).toThrow('Game a already exists.');
  });

  it('runs operations on one game strictly in order', async () => {
    const store = new GameStore();
    store.insert(mkGame('solo', { id: 'a' }));
    const gate = deferred();
    const seen: string[] = [];

    const slow = store.withGame('a', async () => {
      await gate.promise;
      seen.push('slow');
    });
    const fast = store.withGame('a', () => {
      seen.push('fast');
    });
    gate.release();
    await Promise.all([slow, fast]);

    expect(seen).toEqual(['slow', 'fast']);
  });

  it('keeps serving a game after an operation fails', async () => {
    const store = new GameStore();
    store.insert(mkGame('solo', { id: 'a' }));

    const failing = store.withGame('a', () => {
      throw new Error('boom');
    });
    const next = store.withGame('a', (game) => game.id);

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('a');
  });

  it('drops games idle for longer than the ttl', async () => {
    let now = 0;
    const store = new GameStore({ ttlMs: 1000, now: () => now });
    store.insert(mkGame('solo', { id: 'a' }));
    store.insert(mkGame('solo', { id: 'b' }));

    now = 800;
    await store.withGame('a', () => undefined);
    now = 1500;

    expect(store.reap()).toBe(1);
    expect(store.has('a')).toBe(true);
    expect(store.has('b')).toBe(false);
    await expect(store.withGame('b', () => undefined)).rejects.toMatchObject({ kind: 'GameNotFound' });
  });

  it('never reaps with a ttl of zero', () => {
    let now = 0;
    const store = new GameStore({ now: () => now });
    store.insert(mkGame('solo', { id: 'a' }));
    now = Number.MAX_SAFE_INTEGER;
    expect(store.reap()).toBe(0);
    expect(store.size).toBe(1);
  });

  it('draws a fresh id when the first one is taken', () => {
    const ids = ['123456', '654321'];
    const store = new GameStore({ idFactory: () => ids.shift() ?? 'exhausted' });
    store.insert(mkGame('solo', { id: '123456' }));
    expect(store.newId()).toBe('654321');
  });
});
