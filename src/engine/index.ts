export * from './types';
export * from './constants';
export * from './errors';
export { buildDeck, dailySeed, fallbackIllustration, staticSpriteUrl, poolSize, EMOJI_POOL, FLAG_POOL } from './deck';
export type { DeckOptions, Illustration, IllustrationProvider } from './deck';
export { createGame, publicView, publicCard, fullView, accuracy, scoreboard, isComplete, otherSeat, seatLabel, findCard } from './state';
export type { NewGameOptions } from './state';
export { flipCard, validateFlip, resetUnmatched, applyTimeBonus, recordCommentary } from './rules';
export { chooseOpponentMove, refreshOpponentMemory, rememberCard, opponentMemorySummary } from './ai';
export { matchPrompt, missPrompt, roastPrompt } from './commentary';
export { shuffle, sample, pickRandom, seedToRng, mulberry32, xmur3, roundTo } from './utils';
