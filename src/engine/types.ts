export type Difficulty = 'easy' | 'medium' | 'hard';
export type Theme = 'pokemon' | 'emoji' | 'flags';
export type GameMode = 'solo' | 'vs_ai' | 'vs_human';
export type Seat = 'player1' | 'player2';
export type SeatKind = 'human' | 'ai' | 'empty';

export interface Card {
  id: number;
  pairKey: number;
  name: string;
  image: string | null;
  emoji: string | null;
  flipped: boolean;
  matched: boolean;
}

// What a client is allowed to see of a card
export interface PublicCard {
  id: number;
  flipped: boolean;
  matched: boolean;
  name: string | null;
  image: string | null;
  emoji: string | null;
}

export interface SeatState {
  kind: SeatKind;
  token: string | null;
  score: number;
  attempts: number;
  pairsWon: number;
  streak: number;
}

export interface MoveRecord {
  cardId: number;
  pairKey: number;
  name: string;
  moveNumber: number;
  player: Seat;
}

export type CommentaryType = 'match' | 'endgame' | 'miss';

export interface CommentaryEntry {
  text: string;
  type: CommentaryType;
  player: Seat;
  move: number;
}

export interface CommentaryRequest {
  type: CommentaryType;
  prompt: string;
}

export interface GameState {
  id: string;
  difficulty: Difficulty;
  pairs: number;
  theme: Theme;
  seed: string | null;
  mode: GameMode;
  aiDifficulty: Difficulty | null;
  timeAttack: boolean;
  timeSeconds: number;
  // Set once the end-of-round bonus has been paid out
  timeBonusClaimed: boolean;
  cards: Card[];
  currentFlipped: number[];
  currentPlayer: Seat;
  seats: Record<Seat, SeatState>;
  player2Joined: boolean;
  bestStreak: number;
  moves: number;
  matches: number;
  moveHistory: MoveRecord[];
  mistakes: string[];
  commentaryHistory: CommentaryEntry[];
  opponentMemory: Map<number, number[]>;
  commentaryFrequency: number;
  createdAt: number;
}

export interface SeatScore {
  score: number;
  accuracy: number;
  streak: number;
  attempts: number;
  pairsWon: number;
}

export interface Scoreboard {
  player1: SeatScore;
  player2: SeatScore;
  bestStreak: number;
  currentPlayer: Seat;
}

export interface FlipInput {
  cardId: number;
  player: Seat;
  token?: string | null;
}

export type FlipOutcome =
  | { kind: 'rejected'; error: FlipRejection; message: string }
  | { kind: 'first_card'; card: PublicCard; player: Seat; scores: Scoreboard }
  | {
      kind: 'resolved';
      match: boolean;
      cards: [PublicCard, PublicCard];
      player: Seat;
      pointsAwarded: number;
      moves: number;
      matches: number;
      gameWon: boolean;
      nextPlayer: Seat;
      scores: Scoreboard;
      commentary: CommentaryRequest | null;
    };

export type FlipRejection = 'InvalidPlayerForMode' | 'TokenRequired' | 'InvalidToken' | 'NotYourTurn' | 'InvalidCard';

export interface OpponentProfile {
  epsilon: number;
  // 'all' means the whole move history is remembered
  memoryWindow: number | 'all';
}

export type OpponentReason = 'complete_pair' | 'known_pair' | 'explore' | 'unknown' | 'fallback';

export interface OpponentDecision {
  cardId: number;
  reason: OpponentReason;
}

export interface OpponentMemoryEntry {
  pairKey: number;
  name: string;
  seen: number;
}

export type Rng = () => number;
