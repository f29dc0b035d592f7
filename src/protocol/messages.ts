import { z } from 'zod';
import {
  COMMENTARY_READ_LIMIT,
  isComplete,
  publicView,
  scoreboard,
  type Card,
  type CommentaryEntry,
  type FlipOutcome,
  type GameErrorKind,
  type GameState,
  type MoveRecord,
  type OpponentMemoryEntry,
  type PublicCard,
  type Scoreboard,
  type SeatScore,
} from '../engine';

// --- requests ---

export const DifficultySchema = z.enum(['easy', 'medium', 'hard']);
export const ThemeSchema = z.enum(['pokemon', 'emoji', 'flags']);
export const SeatSchema = z.enum(['player1', 'player2']);

export const NewGameRequestSchema = z.object({
  difficulty: DifficultySchema.default('medium'),
  theme: ThemeSchema.default('pokemon'),
  multiplayer: z.boolean().default(false),
  ai_mode: z.boolean().default(false),
  ai_difficulty: DifficultySchema.default('medium'),
  daily: z.boolean().default(false),
  seed: z
    .union([z.string(), z.number()])
    .nullish()
    .transform((seed) => (seed === null || seed === undefined ? null : String(seed))),
  time_attack: z.boolean().default(false),
  time_seconds: z.number().int().nonnegative().nullish(),
});
export type NewGameRequest = z.infer<typeof NewGameRequestSchema>;

export const FlipRequestSchema = z.object({
  card_id: z.number().int(),
  player: SeatSchema.default('player1'),
  player_token: z.string().nullish(),
});
export type FlipRequest = z.infer<typeof FlipRequestSchema>;

export const TimeBonusRequestSchema = z.object({
  seconds_left: z.number().default(0),
  player_token: z.string().nullish(),
});

export const ResetRequestSchema = z.object({
  player_token: z.string().nullish(),
});

export const RoastQuerySchema = z.object({
  player: SeatSchema.default('player1'),
});

// --- responses ---

export interface SeatScorePayload {
  score: number;
  accuracy: number;
  streak: number;
  attempts: number;
  pairs_won: number;
}

export interface ScoresPayload {
  player1: SeatScorePayload;
  player2: SeatScorePayload;
  best_streak: number;
  current_player: Scoreboard['currentPlayer'];
}

export interface PreviewCardPayload extends PublicCard {
  pair_key: number;
}

export interface MovePayload {
  card_id: number;
  pair_key: number;
  name: string;
  move_number: number;
  player: MoveRecord['player'];
}

export interface StatePayload {
  game_id: string;
  mode: GameState['mode'];
  difficulty: GameState['difficulty'];
  theme: GameState['theme'];
  pairs: number;
  cards: PublicCard[];
  scores: ScoresPayload;
  current_player: GameState['currentPlayer'];
  player2_joined: boolean;
  moves: number;
  matches: number;
  game_complete: boolean;
  commentary_history: CommentaryEntry[];
}

export type FlipPayload =
  | {
      success: true;
      match: null;
      card: PublicCard;
      player: string;
      scores: ScoresPayload;
      cards_state: PublicCard[];
      commentary_history: CommentaryEntry[];
    }
  | {
      success: true;
      match: boolean;
      cards: PublicCard[];
      player: string;
      points_awarded: number;
      moves: number;
      matches: number;
      game_won: boolean;
      next_player: string;
      commentary: string;
      scores: ScoresPayload;
      cards_state: PublicCard[];
      commentary_history: CommentaryEntry[];
    };

export interface MemoryPayload {
  pair_key: number;
  name: string;
  seen: number;
}

export interface ErrorPayload {
  success: false;
  error: GameErrorKind;
  message: string;
}

function seatScorePayload(seat: SeatScore): SeatScorePayload {
  return {
    score: seat.score,
    accuracy: seat.accuracy,
    streak: seat.streak,
    attempts: seat.attempts,
    pairs_won: seat.pairsWon,
  };
}

export function toScoresPayload(scores: Scoreboard): ScoresPayload {
  return {
    player1: seatScorePayload(scores.player1),
    player2: seatScorePayload(scores.player2),
    best_streak: scores.bestStreak,
    current_player: scores.currentPlayer,
  };
}

export function toPreviewCard(card: Card): PreviewCardPayload {
  return {
    id: card.id,
    pair_key: card.pairKey,
    flipped: card.flipped,
    matched: card.matched,
    name: card.name,
    image: card.image,
    emoji: card.emoji,
  };
}

export function toMovePayload(move: MoveRecord): MovePayload {
  return {
    card_id: move.cardId,
    pair_key: move.pairKey,
    name: move.name,
    move_number: move.moveNumber,
    player: move.player,
  };
}

export function toMemoryPayload(entry: OpponentMemoryEntry): MemoryPayload {
  return { pair_key: entry.pairKey, name: entry.name, seen: entry.seen };
}

export function recentCommentary(game: GameState, limit: number = COMMENTARY_READ_LIMIT): CommentaryEntry[] {
  return game.commentaryHistory.slice(-limit).map((entry) => ({ ...entry }));
}

export function toStatePayload(game: GameState): StatePayload {
  return {
    game_id: game.id,
    mode: game.mode,
    difficulty: game.difficulty,
    theme: game.theme,
    pairs: game.pairs,
    cards: publicView(game),
    scores: toScoresPayload(scoreboard(game)),
    current_player: game.currentPlayer,
    player2_joined: game.player2Joined,
    moves: game.moves,
    matches: game.matches,
    game_complete: isComplete(game),
    commentary_history: recentCommentary(game),
  };
}

export function toFlipPayload(
  game: GameState,
  outcome: Exclude<FlipOutcome, { kind: 'rejected' }>,
  commentary: string
): FlipPayload {
  const board = { cards_state: publicView(game), commentary_history: recentCommentary(game) };
  if (outcome.kind === 'first_card') {
    return {
      success: true,
      match: null,
      card: outcome.card,
      player: outcome.player,
      scores: toScoresPayload(outcome.scores),
      ...board,
    };
  }
  return {
    success: true,
    match: outcome.match,
    cards: outcome.cards,
    player: outcome.player,
    points_awarded: outcome.pointsAwarded,
    moves: outcome.moves,
    matches: outcome.matches,
    game_won: outcome.gameWon,
    next_player: outcome.nextPlayer,
    commentary,
    scores: toScoresPayload(outcome.scores),
    ...board,
  };
}
