import { isComplete, seatLabel } from './state';
import type { CommentaryRequest, GameState, Seat } from './types';

function endgamePrompt(game: GameState): string {
  const { pairs, moves } = game;
  if (game.mode === 'solo') {
    if (moves <= pairs + 3) {
      return `Player won ${pairs}-pair memory in ${moves} moves (near optimal). Short grudging compliment (1 sentence).`;
    }
    return `Player won but took ${moves} moves for ${pairs} pairs. Gentle mock (1 sentence).`;
  }

  const s1 = game.seats.player1.score;
  const s2 = game.seats.player2.score;
  const p1 = seatLabel(game, 'player1');
  const p2 = seatLabel(game, 'player2');
  if (s1 === s2) {
    return `${p1} and ${p2} tied ${s1}-${s2} in a ${pairs}-pair memory game. Snarky remark about the draw (1 sentence).`;
  }
  const [winner, loser, high, low] = s1 > s2 ? [p1, p2, s1, s2] : [p2, p1, s2, s1];
  return `${winner} beat ${loser} ${high}-${low} in a ${pairs}-pair memory game. Short mocking verdict for the loser (1 sentence).`;
}

export function matchPrompt(game: GameState, actor: Seat): CommentaryRequest {
  if (isComplete(game)) {
    return { type: 'endgame', prompt: endgamePrompt(game) };
  }
  const who = seatLabel(game, actor);
  const efficiency = (game.pairs / Math.max(game.moves, 1)) * 100;
  if (efficiency > 80) {
    return { type: 'match', prompt: `${who} doing very well. Short competitive response (1 sentence).` };
  }
  return { type: 'match', prompt: `${who} made match but struggling. Playful jab (1 sentence).` };
}

export function missPrompt(game: GameState, actor: Seat): CommentaryRequest {
  const who = seatLabel(game, actor);
  const last = game.mistakes[game.mistakes.length - 1];
  const repeated = last === undefined ? 0 : game.mistakes.filter((m) => m === last).length;
  if (repeated >= 3) {
    return { type: 'miss', prompt: `${who} flipped same wrong pair ${repeated} times. Funny roast (1 sentence).` };
  }
  if (game.moves >= game.pairs * 2) {
    return { type: 'miss', prompt: `${who} at ${game.moves} moves for ${game.pairs} pairs. Sarcastic comment (1 sentence).` };
  }
  return { type: 'miss', prompt: `${who} missed. Short sassy comment (1 sentence).` };
}

export function roastPrompt(game: GameState, seat: Seat): string {
  const who = seatLabel(game, seat);
  const { attempts, pairsWon } = game.seats[seat];
  const optimal = game.pairs;
  const ratio = optimal > 0 ? attempts / optimal : 1;
  if (ratio > 3) {
    return `${who} took ${attempts} moves for ${pairsWon}/${game.pairs} pairs (should be ~${optimal}). Savage roast (1 sentence).`;
  }
  if (ratio > 2) {
    return `${who} at ${attempts} moves, ${pairsWon}/${game.pairs} matched. Struggling. Roast (1 sentence).`;
  }
  return `${who} doing well - ${attempts} moves, ${pairsWon}/${game.pairs} pairs. Competitive response (1 sentence).`;
}
