import { describe, expect, it, vi } from 'vitest';
import { silentLogger } from '../lib/log';
import type { HttpClient } from './http';
import { createPokeApiIllustrations } from './illustrations';

function stubClient(get: HttpClient['get']): HttpClient {
  return { get, post: vi.fn() };
}

describe('createPokeApiIllustrations', () => {
  it('prefers the official artwork and capitalises the name', async () => {
    const get = vi.fn(async () => ({
      data: {
        name: 'PIKACHU',
        sprites: { front_default: 'small.png', other: { 'official-artwork': { front_default: 'art.png' } } },
      },
    }));
    const provider = createPokeApiIllustrations({ client: stubClient(get), logger: silentLogger });

    await expect(provider.resolve(25)).resolves.toEqual({ id: 25, name: 'Pikachu', image: 'art.png' });
    expect(get).toHaveBeenCalledWith('/pokemon/25');
  });

  it('uses the default sprite when there is no artwork', async () => {
    const get = vi.fn(async () => ({ data: { name: 'eevee', sprites: { front_default: 'small.png', other: {} } } }));
    const provider = createPokeApiIllustrations({ client: stubClient(get), logger: silentLogger });

    await expect(provider.resolve(133)).resolves.toEqual({ id: 133, name: 'Eevee', image: 'small.png' });
  });

  it('looks each id up once', async () => {
    const get = vi.fn(async () => ({ data: { name: 'mew' } }));
    const provider = createPokeApiIllustrations({ client: stubClient(get), logger: silentLogger });

    await Promise.all([provider.resolve(151), provider.resolve(151)]);
    await provider.resolve(151);
    expect(get).toHaveBeenCalledTimes(1);
    expect(provider.cacheSize()).toBe(1);
  });

  it('falls back to a generic name and the static sprite when the lookup fails', async () => {
    const get = vi.fn(async () => {
      throw new Error('offline');
    });
    const provider = createPokeApiIllustrations({ client: stubClient(get), logger: silentLogger });

    await expect(provider.resolve(7)).resolves.toEqual({
      id: 7,
      name: 'Pokemon 7',
      image: 'https://raw.githubusercontent.com/PokeAPI/sprites/master/sprites/pokemon/7.png',
    });
  });

  it('falls back when the payload has the wrong shape', async () => {
    const get = vi.fn(async () => ({ data: { name: 42 } }));
    const provider = createPokeApiIllustrations({ client: stubClient(get), logger: silentLogger });

    await expect(provider.resolve(9)).resolves.toMatchObject({ name: 'Pokemon 9' });
  });
});
