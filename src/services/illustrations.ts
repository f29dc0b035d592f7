import { z } from 'zod';
import { fallbackIllustration, type Illustration, type IllustrationProvider } from '../engine';
import { createLogger, describeError, type Logger } from '../lib/log';
import { createHttpClient, type HttpClient } from './http';

const SpriteSchema = z.object({ front_default: z.string().nullish() }).partial();

const PokemonSchema = z.object({
  name: z.string().optional(),
  sprites: z
    .object({
      front_default: z.string().nullish(),
      other: z.object({ 'official-artwork': SpriteSchema.optional() }).partial().optional(),
    })
    .partial()
    .optional(),
});

export interface PokeApiOptions {
  baseUrl?: string;
  timeoutMs?: number;
  client?: HttpClient;
  logger?: Logger;
}

export interface CachedIllustrationProvider extends IllustrationProvider {
  cacheSize(): number;
}

function capitalize(name: string): string {
  return name.charAt(0).toUpperCase() + name.slice(1).toLowerCase();
}

export function createPokeApiIllustrations(options: PokeApiOptions = {}): CachedIllustrationProvider {
  const client = options.client ?? createHttpClient(options.baseUrl ?? 'https://pokeapi.co/api/v2', options.timeoutMs ?? 3000);
  const logger = options.logger ?? createLogger('illustrations');
  // The pool is small and static, so entries are never evicted
  const cache = new Map<number, Promise<Illustration>>();

  async function lookup(id: number): Promise<Illustration> {
    try {
      const { data } = await client.get(`/pokemon/${id}`);
      const parsed = PokemonSchema.parse(data);
      const fallback = fallbackIllustration(id);
      const image =
        parsed.sprites?.other?.['official-artwork']?.front_default || parsed.sprites?.front_default || fallback.image;
      return { id, name: parsed.name ? capitalize(parsed.name) : fallback.name, image };
    } catch (error) {
      logger.warn('lookup failed, using fallback', { id, error: describeError(error) });
      return fallbackIllustration(id);
    }
  }

  return {
    resolve(id) {
      let hit = cache.get(id);
      if (!hit) {
        hit = lookup(id);
        cache.set(id, hit);
      }
      return hit;
    },
    cacheSize: () => cache.size,
  };
}
