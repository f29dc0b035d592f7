import { createGame } from './state';
import type { Card, GameMode, GameState, Rng } from './types';

// Cards 2k and 2k+1 form pair k (pair key 100 + k), laid out in id order
export const mkCards = (pairs: number): Card[] =>
  Array.from({ length: pairs * 2 }, (_, id) => {
    const k = Math.floor(id / 2);
    return { id, pairKey: 100 + k, name: `Card ${k}`, image: null, emoji: `e${k}`, flipped: false, matched: false };
  });

export const HOST_TOKEN = 'host-token';
export const GUEST_TOKEN = 'guest-token';

export const mkGame = (mode: GameMode = 'solo', overrides: Partial<GameState> = {}): GameState => {
  const game = createGame({
    id: 'g1',
    difficulty: 'easy',
    theme: 'emoji',
    mode,
    cards: mkCards(6),
    aiDifficulty: mode === 'vs_ai' ? 'hard' : null,
    hostToken: HOST_TOKEN,
    createdAt: 0,
  });
  if (mode === 'vs_human') {
    game.seats.player2.token = GUEST_TOKEN;
    game.player2Joined = true;
  }
  return Object.assign(game, overrides);
};

export const constantRng = (value: number): Rng => () => value;
