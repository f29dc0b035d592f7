import { rememberCard } from './ai';
import { matchPrompt, missPrompt } from './commentary';
import { TIME_BONUS_SECONDS_PER_POINT } from './constants';
import { findCard, isComplete, otherSeat, publicCard, scoreboard } from './state';
import type { Card, CommentaryEntry, CommentaryRequest, FlipInput, FlipOutcome, FlipRejection, GameState } from './types';

function reject(error: FlipRejection, message: string): FlipOutcome {
  return { kind: 'rejected', error, message };
}

// Checks seat, token, turn and card, in that order. Returns null when the flip may proceed.
export function validateFlip(game: GameState, input: FlipInput): FlipOutcome | null {
  const { player, cardId, token } = input;
  const seat = game.seats[player];

  if (game.mode === 'solo' && player !== 'player1') {
    return reject('InvalidPlayerForMode', 'Solo games only have player1.');
  }
  if (player === 'player2' && !game.player2Joined) {
    return reject('InvalidPlayerForMode', 'Nobody has joined the player2 seat yet.');
  }

  if (game.mode !== 'solo' && seat.kind === 'human') {
    if (!token) return reject('TokenRequired', `A player token is required to act as ${player}.`);
    if (token !== seat.token) return reject('InvalidToken', `Token does not match ${player}.`);
  }

  if (player !== game.currentPlayer) {
    return reject('NotYourTurn', `It is ${game.currentPlayer}'s turn.`);
  }

  const card = findCard(game, cardId);
  if (!card || card.matched || card.flipped) {
    return reject('InvalidCard', `Card ${cardId} cannot be flipped.`);
  }
  return null;
}

export function flipCard(game: GameState, input: FlipInput): FlipOutcome {
  const rejection = validateFlip(game, input);
  if (rejection) return rejection;

  const { player, cardId } = input;
  const actor = game.seats[player];
  const card = findCard(game, cardId);
  if (!card) return reject('InvalidCard', `Card ${cardId} cannot be flipped.`);

  card.flipped = true;
  game.currentFlipped.push(card.id);
  game.moveHistory.push({
    cardId: card.id,
    pairKey: card.pairKey,
    name: card.name,
    moveNumber: game.moveHistory.length + 1,
    player,
  });
  if (game.mode === 'vs_ai') {
    rememberCard(game.opponentMemory, card.pairKey, card.id);
  }

  if (game.currentFlipped.length < 2) {
    return { kind: 'first_card', card: publicCard(card), player, scores: scoreboard(game) };
  }

  const [first, second] = game.currentFlipped.map((id) => findCard(game, id)).filter((c): c is Card => c !== undefined);
  game.currentFlipped = [];
  game.moves += 1;
  actor.attempts += 1;

  const match = first.pairKey === second.pairKey;
  let pointsAwarded = 0;
  let commentary: CommentaryRequest | null = null;

  if (match) {
    first.matched = true;
    second.matched = true;
    game.matches += 1;
    actor.pairsWon += 1;
    actor.streak += 1;
    pointsAwarded = 1 + Math.max(0, actor.streak - 1);
    actor.score += pointsAwarded;
    game.bestStreak = Math.max(game.bestStreak, game.seats.player1.streak, game.seats.player2.streak);
    if (isComplete(game) || game.matches % game.commentaryFrequency === 0) {
      commentary = matchPrompt(game, player);
    }
  } else {
    game.mistakes.push(`${first.name}-${second.name}`);
    actor.streak = 0;
    if (game.moves % game.commentaryFrequency === 0) {
      commentary = missPrompt(game, player);
    }
  }

  // A match does not earn another turn
  if (game.mode !== 'solo') {
    game.currentPlayer = otherSeat(player);
  }

  return {
    kind: 'resolved',
    match,
    cards: [publicCard(first), publicCard(second)],
    player,
    pointsAwarded,
    moves: game.moves,
    matches: game.matches,
    gameWon: isComplete(game),
    nextPlayer: game.currentPlayer,
    scores: scoreboard(game),
    commentary,
  };
}

/** Turns every unmatched card face-down again. */
export function resetUnmatched(game: GameState): void {
  for (const card of game.cards) {
    if (!card.matched) card.flipped = false;
  }
  game.currentFlipped = [];
}

export function applyTimeBonus(game: GameState, secondsLeft: number): number {
  const bonus = Math.floor(Math.max(0, secondsLeft) / TIME_BONUS_SECONDS_PER_POINT);
  game.seats.player1.score += bonus;
  game.timeBonusClaimed = true;
  return bonus;
}

export function recordCommentary(game: GameState, entry: CommentaryEntry): void {
  game.commentaryHistory.push(entry);
}
