import { MEMORY_HUD_LIMIT } from './constants';
import type { Card, GameState, MoveRecord, OpponentDecision, OpponentMemoryEntry, OpponentProfile, Rng } from './types';
import { pickRandom } from './utils';

export function rememberCard(memory: Map<number, number[]>, pairKey: number, cardId: number): void {
  const ids = memory.get(pairKey);
  if (!ids) {
    memory.set(pairKey, [cardId]);
  } else if (!ids.includes(cardId)) {
    ids.push(cardId);
  }
}

function recentMoves(history: MoveRecord[], window: OpponentProfile['memoryWindow']): MoveRecord[] {
  if (window === 'all') return history;
  return window > 0 ? history.slice(-window) : [];
}

// Replaces the opponent's memory with what it can recall from the trailing window
export function refreshOpponentMemory(game: GameState, profile: OpponentProfile): Map<number, number[]> {
  const memory = new Map<number, number[]>();
  for (const move of recentMoves(game.moveHistory, profile.memoryWindow)) {
    rememberCard(memory, move.pairKey, move.cardId);
  }
  game.opponentMemory = memory;
  return memory;
}

/**
 * Picks the next card for the scripted opponent. Only reveals recorded in the
 * move history are used, never the hidden faces.
 *
 * Priority: finish the face-up card's pair, open a fully known pair, random
 * exploration (epsilon), an unseen card, any card. Returns null on a board
 * with nothing left to flip.
 */
export function chooseOpponentMove(game: GameState, profile: OpponentProfile, rng: Rng = Math.random): OpponentDecision | null {
  const memory = refreshOpponentMemory(game, profile);

  const available = game.cards.filter((card) => !card.matched && !card.flipped);
  if (available.length === 0) return null;
  const availableIds = new Set(available.map((card) => card.id));

  const known = new Map<number, number[]>();
  for (const [pairKey, ids] of memory) {
    const open = ids.filter((id) => availableIds.has(id));
    if (open.length > 0) known.set(pairKey, open);
  }

  if (game.currentFlipped.length === 1) {
    const faceUp = game.cards.find((card) => card.id === game.currentFlipped[0]);
    const mate = faceUp ? known.get(faceUp.pairKey)?.find((id) => id !== faceUp.id) : undefined;
    if (mate !== undefined) return { cardId: mate, reason: 'complete_pair' };
  }

  for (const ids of known.values()) {
    if (new Set(ids).size >= 2) return { cardId: ids[0], reason: 'known_pair' };
  }

  if (rng() < profile.epsilon) {
    return { cardId: pickRandom(available, rng).id, reason: 'explore' };
  }

  const seen = new Set<number>();
  for (const ids of memory.values()) ids.forEach((id) => seen.add(id));
  const unknown = available.filter((card: Card) => !seen.has(card.id));
  if (unknown.length > 0) {
    return { cardId: pickRandom(unknown, rng).id, reason: 'unknown' };
  }

  return { cardId: pickRandom(available, rng).id, reason: 'fallback' };
}

export function opponentMemorySummary(game: GameState, limit: number = MEMORY_HUD_LIMIT): OpponentMemoryEntry[] {
  const entries: OpponentMemoryEntry[] = [];
  for (const [pairKey, ids] of game.opponentMemory) {
    const card = game.cards.find((c) => c.pairKey === pairKey);
    entries.push({ pairKey, name: card ? card.name : `#${pairKey}`, seen: new Set(ids).size });
  }
  entries.sort((a, b) => b.seen - a.seen);
  return entries.slice(0, limit);
}
