import { COMMENTARY_FREQUENCY, PAIRS_BY_DIFFICULTY } from './constants';
import type { Card, Difficulty, GameMode, GameState, PublicCard, Scoreboard, Seat, SeatKind, SeatScore, SeatState, Theme } from './types';
import { roundTo } from './utils';

export interface NewGameOptions {
  id: string;
  difficulty: Difficulty;
  theme: Theme;
  mode: GameMode;
  cards: Card[];
  seed?: string | null;
  aiDifficulty?: Difficulty | null;
  timeAttack?: boolean;
  timeSeconds?: number;
  // player1 token; ignored in solo
  hostToken?: string | null;
  createdAt?: number;
}

function emptySeat(kind: SeatKind, token: string | null): SeatState {
  return { kind, token, score: 0, attempts: 0, pairsWon: 0, streak: 0 };
}

export function createGame(options: NewGameOptions): GameState {
  const { mode } = options;
  const hostToken = mode === 'solo' ? null : options.hostToken ?? null;
  const guestKind: SeatKind = mode === 'vs_ai' ? 'ai' : mode === 'vs_human' ? 'human' : 'empty';
  const timeAttack = Boolean(options.timeAttack);

  return {
    id: options.id,
    difficulty: options.difficulty,
    pairs: PAIRS_BY_DIFFICULTY[options.difficulty],
    theme: options.theme,
    seed: options.seed ?? null,
    mode,
    aiDifficulty: mode === 'vs_ai' ? options.aiDifficulty ?? 'medium' : null,
    timeAttack,
    timeSeconds: timeAttack ? Math.max(0, Math.trunc(options.timeSeconds ?? 0)) : 0,
    timeBonusClaimed: false,
    cards: options.cards.map((card) => ({ ...card })),
    currentFlipped: [],
    currentPlayer: 'player1',
    seats: {
      player1: emptySeat('human', hostToken),
      player2: emptySeat(guestKind, null),
    },
    player2Joined: mode !== 'vs_human',
    bestStreak: 0,
    moves: 0,
    matches: 0,
    moveHistory: [],
    mistakes: [],
    commentaryHistory: [],
    opponentMemory: new Map(),
    commentaryFrequency: COMMENTARY_FREQUENCY,
    createdAt: options.createdAt ?? Date.now(),
  };
}

export function otherSeat(seat: Seat): Seat {
  return seat === 'player1' ? 'player2' : 'player1';
}

export function findCard(game: GameState, cardId: number): Card | undefined {
  return game.cards.find((card) => card.id === cardId);
}

/** Masks every face that is not currently showing. */
export function publicCard(card: Card): PublicCard {
  const visible = card.flipped || card.matched;
  return {
    id: card.id,
    flipped: card.flipped,
    matched: card.matched,
    name: visible ? card.name : null,
    image: visible ? card.image : null,
    emoji: visible ? card.emoji : null,
  };
}

export function publicView(game: GameState): PublicCard[] {
  return game.cards.map(publicCard);
}

// Unmasked, pair keys included. Debug/preview only.
export function fullView(game: GameState): Card[] {
  return game.cards.map((card) => ({ ...card }));
}

export function accuracy(seat: SeatState): number {
  if (seat.attempts === 0) return 0;
  return roundTo((seat.pairsWon / seat.attempts) * 100, 1);
}

function seatScore(seat: SeatState): SeatScore {
  return {
    score: seat.score,
    accuracy: accuracy(seat),
    streak: seat.streak,
    attempts: seat.attempts,
    pairsWon: seat.pairsWon,
  };
}

export function scoreboard(game: GameState): Scoreboard {
  return {
    player1: seatScore(game.seats.player1),
    player2: seatScore(game.seats.player2),
    bestStreak: game.bestStreak,
    currentPlayer: game.currentPlayer,
  };
}

export function isComplete(game: GameState): boolean {
  return game.matches === game.pairs;
}

export function seatLabel(game: GameState, seat: Seat): string {
  if (game.mode === 'vs_human') return seat === 'player1' ? 'Player 1' : 'Player 2';
  if (game.mode === 'vs_ai' && seat === 'player2') return 'The AI';
  return 'Player';
}
