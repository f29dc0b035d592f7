import themePools from '../data/themes.json';
import { EMOJI_PAIR_BASE, FLAG_PAIR_BASE, POKEMON_MAX_ID, POKEMON_MIN_ID } from './constants';
import { GameError } from './errors';
import type { Card, Difficulty, Rng, Theme } from './types';
import { sample, seedToRng, shuffle } from './utils';

export interface Illustration {
  id: number;
  name: string;
  image: string;
}

export interface IllustrationProvider {
  resolve(id: number): Promise<Illustration>;
}

export interface DeckOptions {
  theme: Theme;
  pairs: number;
  // A seed makes the deck reproducible; an explicit rng wins over it
  seed?: string | number | null;
  rng?: Rng;
  illustrations?: IllustrationProvider;
}

interface DeckItem {
  pairKey: number;
  name: string;
  image: string | null;
  emoji: string | null;
}

export const EMOJI_POOL: readonly string[] = themePools.emoji;
export const FLAG_POOL: readonly string[] = themePools.flags;

const POKEMON_POOL: number[] = Array.from(
  { length: POKEMON_MAX_ID - POKEMON_MIN_ID + 1 },
  (_, i) => POKEMON_MIN_ID + i
);

export function staticSpriteUrl(id: number): string {
  return `https://raw.githubusercontent.com/PokeAPI/sprites/master/sprites/pokemon/${id}.png`;
}

export function fallbackIllustration(id: number): Illustration {
  return { id, name: `Pokemon ${id}`, image: staticSpriteUrl(id) };
}

const offlineIllustrations: IllustrationProvider = {
  resolve: (id) => Promise.resolve(fallbackIllustration(id)),
};

export function poolSize(theme: Theme): number {
  if (theme === 'pokemon') return POKEMON_POOL.length;
  if (theme === 'emoji') return EMOJI_POOL.length;
  return FLAG_POOL.length;
}

// Calendar day in the server's local time zone
export function dailySeed(day: Date, difficulty: Difficulty, theme: Theme): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const date = `${day.getFullYear()}-${pad(day.getMonth() + 1)}-${pad(day.getDate())}`;
  return `${date}-${difficulty}-${theme}`;
}

function resolveRng(options: DeckOptions): Rng {
  if (options.rng) return options.rng;
  if (options.seed !== undefined && options.seed !== null) return seedToRng(options.seed);
  return Math.random;
}

async function drawItems(theme: Theme, pairs: number, rng: Rng, illustrations: IllustrationProvider): Promise<DeckItem[]> {
  if (theme === 'pokemon') {
    const ids = sample(POKEMON_POOL, pairs, rng);
    const resolved = await Promise.all(ids.map((id) => illustrations.resolve(id)));
    return resolved.map((it, i) => ({ pairKey: ids[i], name: it.name, image: it.image, emoji: null }));
  }
  const pool = theme === 'emoji' ? EMOJI_POOL : FLAG_POOL;
  const base = theme === 'emoji' ? EMOJI_PAIR_BASE : FLAG_PAIR_BASE;
  const label = theme === 'emoji' ? 'Emoji' : 'Flag';
  return sample([...pool], pairs, rng).map((glyph, i) => ({
    pairKey: base + i,
    name: `${label} ${glyph}`,
    image: null,
    emoji: glyph,
  }));
}

export async function buildDeck(options: DeckOptions): Promise<Card[]> {
  const { theme, pairs } = options;
  if (!Number.isInteger(pairs) || pairs < 1) {
    throw new GameError('InvalidRequest', `Pair count must be a positive integer, got ${pairs}.`);
  }
  const available = poolSize(theme);
  if (pairs > available) {
    throw new GameError('InsufficientPoolSize', `Theme '${theme}' has ${available} items, ${pairs} pairs requested.`);
  }

  const rng = resolveRng(options);
  const items = await drawItems(theme, pairs, rng, options.illustrations ?? offlineIllustrations);

  const cards: Card[] = [];
  items.forEach((item, i) => {
    for (const id of [i * 2, i * 2 + 1]) {
      cards.push({ id, ...item, flipped: false, matched: false });
    }
  });
  return shuffle(cards, rng);
}
