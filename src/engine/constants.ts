import type { Difficulty, OpponentProfile } from './types';

export const PAIRS_BY_DIFFICULTY: Record<Difficulty, number> = {
  easy: 6,
  medium: 8,
  hard: 12,
};

// epsilon = chance of a deliberately random move
// memoryWindow = how many recent flips the opponent can recall
export const OPPONENT_PROFILES: Record<Difficulty, OpponentProfile> = {
  easy: { epsilon: 0.5, memoryWindow: 6 },
  medium: { epsilon: 0.2, memoryWindow: 12 },
  hard: { epsilon: 0.05, memoryWindow: 'all' },
};

// Commentary fires every N matches (match commentary) or N moves (miss commentary)
export const COMMENTARY_FREQUENCY = 3;

export const EMOJI_PAIR_BASE = 10_000;
export const FLAG_PAIR_BASE = 20_000;

// Gen 1 creatures
export const POKEMON_MIN_ID = 1;
export const POKEMON_MAX_ID = 150;

export const TIME_BONUS_SECONDS_PER_POINT = 10;

export const HISTORY_READ_LIMIT = 20;
export const COMMENTARY_READ_LIMIT = 5;
export const MEMORY_HUD_LIMIT = 8;
