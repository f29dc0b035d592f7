import { describe, expect, it } from 'vitest';
import { matchPrompt, missPrompt, roastPrompt } from './commentary';
import { mkGame } from './test-helpers';

describe('matchPrompt', () => {
  it('mocks a slow solo win', () => {
    const game = mkGame('solo', { matches: 6, moves: 14 });
    expect(matchPrompt(game, 'player1')).toEqual({
      type: 'endgame',
      prompt: 'Player won but took 14 moves for 6 pairs. Gentle mock (1 sentence).',
    });
  });

  it('names the winner of a versus game', () => {
    const game = mkGame('vs_ai', { matches: 6, moves: 12 });
    game.seats.player1.score = 2;
    game.seats.player2.score = 7;
    expect(matchPrompt(game, 'player2').prompt).toBe(
      'The AI beat Player 7-2 in a 6-pair memory game. Short mocking verdict for the loser (1 sentence).'
    );
  });

  it('calls a draw a draw', () => {
    const game = mkGame('vs_human', { matches: 6, moves: 12 });
    game.seats.player1.score = 4;
    game.seats.player2.score = 4;
    expect(matchPrompt(game, 'player1').prompt).toBe(
      'Player 1 and Player 2 tied 4-4 in a 6-pair memory game. Snarky remark about the draw (1 sentence).'
    );
  });

  it('jabs at an inefficient mid-game match', () => {
    const game = mkGame('vs_human', { matches: 3, moves: 9 });
    expect(matchPrompt(game, 'player2')).toEqual({
      type: 'match',
      prompt: 'Player 2 made match but struggling. Playful jab (1 sentence).',
    });
  });
});

describe('missPrompt', () => {
  it('turns sarcastic once moves reach twice the pair count', () => {
    const game = mkGame('solo', { moves: 12, mistakes: ['a-b', 'c-d'] });
    expect(missPrompt(game, 'player1').prompt).toBe('Player at 12 moves for 6 pairs. Sarcastic comment (1 sentence).');
  });
});

describe('roastPrompt', () => {
  it('scales with attempts per pair', () => {
    const game = mkGame('vs_ai');
    game.seats.player2.attempts = 19;
    game.seats.player2.pairsWon = 2;
    expect(roastPrompt(game, 'player2')).toBe(
      'The AI took 19 moves for 2/6 pairs (should be ~6). Savage roast (1 sentence).'
    );

    game.seats.player1.attempts = 13;
    game.seats.player1.pairsWon = 4;
    expect(roastPrompt(game, 'player1')).toBe('Player at 13 moves, 4/6 matched. Struggling. Roast (1 sentence).');

    game.seats.player1.attempts = 5;
    expect(roastPrompt(game, 'player1')).toBe('Player doing well - 5 moves, 4/6 pairs. Competitive response (1 sentence).');
  });
});
