import { randomUUID } from 'node:crypto';
import {
  HISTORY_READ_LIMIT,
  OPPONENT_PROFILES,
  PAIRS_BY_DIFFICULTY,
  applyTimeBonus,
  buildDeck,
  chooseOpponentMove,
  createGame,
  dailySeed,
  flipCard,
  fullView,
  opponentMemorySummary,
  publicView,
  recordCommentary,
  resetUnmatched,
  roastPrompt,
  GameError,
  type GameMode,
  type GameState,
  type IllustrationProvider,
  type PublicCard,
  type Rng,
  type Seat,
  type CommentaryEntry,
} from '../src/engine';
import { createLogger, type Logger } from '../src/lib/log';
import {
  toFlipPayload,
  toMemoryPayload,
  toMovePayload,
  toPreviewCard,
  toStatePayload,
  type FlipPayload,
  type FlipRequest,
  type MemoryPayload,
  type MovePayload,
  type NewGameRequest,
  type PreviewCardPayload,
  type StatePayload,
} from '../src/protocol/messages';
import type { Commentator } from '../src/services/commentary';
import type { GameStore } from './store';

export interface SeatGrantPayload extends StatePayload {
  player_token: string | null;
  seat: Seat;
}

export interface NewGamePayload extends SeatGrantPayload {
  ai_difficulty: GameState['aiDifficulty'];
  seed: string | null;
  daily: boolean;
  time_attack: boolean;
  time_seconds: number;
  preview_cards?: PreviewCardPayload[];
}

export interface GameService {
  createGame(request: NewGameRequest): Promise<NewGamePayload>;
  joinGame(id: string): Promise<SeatGrantPayload>;
  getState(id: string, token: string | undefined): Promise<StatePayload>;
  flip(id: string, request: FlipRequest): Promise<FlipPayload>;
  reset(id: string, token: string | undefined): Promise<{ cards: PublicCard[] }>;
  timeBonus(id: string, secondsLeft: number, token: string | undefined): Promise<{ bonus: number; player_score: number }>;
  roast(id: string, seat: Seat): Promise<{ roast: string }>;
  opponentMove(id: string): Promise<{ card_id: number }>;
  history(id: string): Promise<{ move_history: MovePayload[]; commentary_history: CommentaryEntry[] }>;
  opponentMemory(id: string): Promise<{ memory: MemoryPayload[] }>;
}

export interface GameServiceDeps {
  store: GameStore;
  illustrations: IllustrationProvider;
  commentator: Commentator;
  previewCards?: boolean;
  // Opponent randomness; seeded in tests
  rng?: Rng;
  today?: () => Date;
  tokenFactory?: () => string;
  logger?: Logger;
}

function modeFor(request: NewGameRequest): GameMode {
  if (request.multiplayer) return 'vs_human';
  return request.ai_mode ? 'vs_ai' : 'solo';
}

// Seat holders only, outside solo play
function authorizeViewer(game: GameState, token: string | undefined): void {
  if (game.mode === 'solo') return;
  if (!token) {
    throw new GameError('TokenRequired', 'A player token is required to view this game.');
  }
  const { player1, player2 } = game.seats;
  if (token !== player1.token && token !== player2.token) {
    throw new GameError('InvalidToken', 'Token does not match any seat in this game.');
  }
}

function requireOpponent(game: GameState) {
  if (game.mode !== 'vs_ai' || !game.aiDifficulty) {
    throw new GameError('InvalidPlayerForMode', 'No AI opponent configured for this game.');
  }
  return OPPONENT_PROFILES[game.aiDifficulty];
}

export function createGameService(deps: GameServiceDeps): GameService {
  const { store, illustrations, commentator } = deps;
  const rng = deps.rng ?? Math.random;
  const today = deps.today ?? (() => new Date());
  const tokenFactory = deps.tokenFactory ?? randomUUID;
  const logger = deps.logger ?? createLogger('game');

  return {
    async createGame(request) {
      const mode = modeFor(request);
      const { difficulty, theme } = request;
      const seed = request.seed ?? (request.daily ? dailySeed(today(), difficulty, theme) : null);
      const timeAttack = mode === 'vs_human' ? false : request.time_attack;

      const cards = await buildDeck({ theme, pairs: PAIRS_BY_DIFFICULTY[difficulty], seed, illustrations });
      const game = createGame({
        id: store.newId(),
        difficulty,
        theme,
        mode,
        cards,
        seed,
        aiDifficulty: mode === 'vs_ai' ? request.ai_difficulty : null,
        timeAttack,
        timeSeconds: request.time_seconds ?? 0,
        hostToken: mode === 'solo' ? null : tokenFactory(),
      });
      store.insert(game);
      logger.info('game_created', { gameId: game.id, mode, difficulty, theme, seeded: seed !== null });

      const payload: NewGamePayload = {
        ...toStatePayload(game),
        player_token: game.seats.player1.token,
        seat: 'player1',
        ai_difficulty: game.aiDifficulty,
        seed: game.seed,
        daily: request.daily,
        time_attack: game.timeAttack,
        time_seconds: game.timeSeconds,
      };
      if (deps.previewCards && mode === 'solo') {
        payload.preview_cards = fullView(game).map(toPreviewCard);
      }
      return payload;
    },

    joinGame(id) {
      return store.withGame<SeatGrantPayload>(id, (game) => {
        if (game.mode !== 'vs_human') {
          throw new GameError('InvalidPlayerForMode', 'Only two-player games can be joined.');
        }
        if (game.player2Joined) {
          throw new GameError('SeatTaken', 'The player2 seat is already taken.');
        }
        const token = tokenFactory();
        game.seats.player2.token = token;
        game.player2Joined = true;
        logger.info('player_joined', { gameId: game.id, seat: 'player2' });
        return { ...toStatePayload(game), player_token: token, seat: 'player2' };
      });
    },

    getState(id, token) {
      return store.withGame(id, (game) => {
        authorizeViewer(game, token);
        return toStatePayload(game);
      });
    },

    flip(id, request) {
      return store.withGame(id, async (game) => {
        const outcome = flipCard(game, {
          cardId: request.card_id,
          player: request.player,
          token: request.player_token,
        });
        if (outcome.kind === 'rejected') {
          throw new GameError(outcome.error, outcome.message);
        }

        let commentary = '';
        if (outcome.kind === 'resolved' && outcome.commentary) {
          // State is already settled; the commentator cannot fail this flip
          commentary = await commentator.comment(outcome.commentary.prompt);
          recordCommentary(game, { text: commentary, type: outcome.commentary.type, player: outcome.player, move: outcome.moves });
        }
        if (outcome.kind === 'resolved' && outcome.gameWon) {
          logger.info('game_completed', { gameId: game.id, moves: game.moves });
        }
        return toFlipPayload(game, outcome, commentary);
      });
    },

    reset(id, token) {
      return store.withGame(id, (game) => {
        authorizeViewer(game, token);
        resetUnmatched(game);
        return { cards: publicView(game) };
      });
    },

    timeBonus(id, secondsLeft, token) {
      return store.withGame(id, (game) => {
        authorizeViewer(game, token);
        if (!game.timeAttack) {
          throw new GameError('InvalidRequest', 'Time bonus only applies to time-attack games.');
        }
        if (game.timeBonusClaimed) {
          throw new GameError('InvalidRequest', 'Time bonus was already awarded for this game.');
        }
        const bonus = applyTimeBonus(game, secondsLeft);
        return { bonus, player_score: game.seats.player1.score };
      });
    },

    roast(id, seat) {
      return store.withGame(id, async (game) => {
        if (game.mode === 'solo' && seat !== 'player1') {
          throw new GameError('InvalidPlayerForMode', 'Solo games only have player1.');
        }
        return { roast: await commentator.comment(roastPrompt(game, seat)) };
      });
    },

    opponentMove(id) {
      return store.withGame(id, (game) => {
        const decision = chooseOpponentMove(game, requireOpponent(game), rng);
        if (!decision) {
          throw new GameError('NoValidMoves', 'No cards left for the opponent to flip.');
        }
        return { card_id: decision.cardId };
      });
    },

    history(id) {
      return store.withGame(id, (game) => ({
        move_history: game.moveHistory.slice(-HISTORY_READ_LIMIT).map(toMovePayload),
        commentary_history: game.commentaryHistory.map((entry) => ({ ...entry })),
      }));
    },

    opponentMemory(id) {
      return store.withGame(id, (game) => {
        requireOpponent(game);
        return { memory: opponentMemorySummary(game).map(toMemoryPayload) };
      });
    },
  };
}
