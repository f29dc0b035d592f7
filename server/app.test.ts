import type { Server } from 'node:http';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { fullView } from '../src/engine';
import { silentLogger } from '../src/lib/log';
import { createCommentator, FALLBACK_TAUNTS } from '../src/services/commentary';
import { createApp, formatZodError } from './app';
import { createGameService } from './service';
import { GameStore } from './store';

type Json = Record<string, unknown>;

const store = new GameStore();
let server: Server;
let baseUrl = '';

beforeAll(async () => {
  let issued = 0;
  const service = createGameService({
    store,
    illustrations: { resolve: async (id) => ({ id, name: `Mon ${id}`, image: `img/${id}.png` }) },
    commentator: createCommentator({ provider: null, rng: () => 0 }),
    tokenFactory: () => `token-${++issued}`,
    logger: silentLogger,
  });
  const app = createApp(service, silentLogger);
  await new Promise<void>((resolve) => {
    server = app.listen(0, '127.0.0.1', () => resolve());
  });
  const address = server.address();
  if (address && typeof address === 'object') baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

function isJson(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function call(method: string, path: string, body?: unknown, headers: Record<string, string> = {}) {
  const res = await fetch(`${baseUrl}${path}`, {
    method,
    headers: { 'content-type': 'application/json', ...headers },
    body: body === undefined ? undefined : typeof body === 'string' ? body : JSON.stringify(body),
  });
  const payload: unknown = await res.json();
  return { status: res.status, body: isJson(payload) ? payload : {} };
}

async function newGame(input: Json) {
  const { body } = await call('POST', '/api/game/new', { difficulty: 'easy', theme: 'emoji', ...input });
  return { id: String(body.game_id), token: typeof body.player_token === 'string' ? body.player_token : '' };
}

async function firstPair(id: string): Promise<[number, number]> {
  const cards = await store.withGame(id, fullView);
  const mate = cards.find((card) => card.id !== cards[0].id && card.pairKey === cards[0].pairKey);
  return [cards[0].id, mate ? mate.id : -1];
}

describe('GET /health', () => {
  it('answers ok', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.text()).toBe('ok');
  });
});

describe('POST /api/game/new', () => {
  it('creates a face-down solo board', async () => {
    const { status, body } = await call('POST', '/api/game/new', { difficulty: 'medium', theme: 'flags' });
    expect(status).toBe(200);
    expect(body).toMatchObject({ mode: 'solo', pairs: 8, moves: 0, game_complete: false, player_token: null });
    expect(body.cards).toHaveLength(16);
  });

  it('rejects an unknown difficulty', async () => {
    const { status, body } = await call('POST', '/api/game/new', { difficulty: 'extreme' });
    expect(status).toBe(400);
    expect(body.error).toBe('InvalidRequest');
    expect(String(body.message)).toMatch(/^Invalid request: 'difficulty': /);
  });

  it('rejects a body that is not JSON', async () => {
    const { status, body } = await call('POST', '/api/game/new', '{"difficulty":');
    expect(status).toBe(400);
    expect(body).toEqual({ success: false, error: 'InvalidRequest', message: 'Request body is not valid JSON.' });
  });
});

describe('solo play', () => {
  it('scores a matched pair', async () => {
    const { id } = await newGame({});
    const [a, b] = await firstPair(id);

    const first = await call('POST', `/api/game/${id}/flip`, { card_id: a });
    expect(first.body).toMatchObject({ success: true, match: null, player: 'player1' });

    const second = await call('POST', `/api/game/${id}/flip`, { card_id: b });
    expect(second.status).toBe(200);
    expect(second.body).toMatchObject({ match: true, points_awarded: 1, moves: 1, matches: 1, game_won: false, commentary: '' });
  });

  it('rejects a card id that is not on the board', async () => {
    const { id } = await newGame({});
    const { status, body } = await call('POST', `/api/game/${id}/flip`, { card_id: 99 });
    expect(status).toBe(400);
    expect(body).toMatchObject({ success: false, error: 'InvalidCard', message: 'Card 99 cannot be flipped.' });
  });

  it('returns a canned roast when no model is configured', async () => {
    const { id } = await newGame({});
    const { status, body } = await call('GET', `/api/game/${id}/roast?player=player1`);
    expect(status).toBe(200);
    expect(body).toEqual({ roast: FALLBACK_TAUNTS[0] });
  });

  it('turns unmatched cards back over on reset', async () => {
    const { id } = await newGame({});
    await call('POST', `/api/game/${id}/flip`, { card_id: 0 });
    const { body } = await call('POST', `/api/game/${id}/reset`);
    expect(Array.isArray(body.cards) && body.cards.every((card) => isJson(card) && card.flipped === false)).toBe(true);
  });
});

describe('two-player play', () => {
  it('enforces seat tokens and turn order', async () => {
    const { id, token } = await newGame({ multiplayer: true });
    expect(token).not.toBe('');

    expect((await call('POST', `/api/game/${id}/flip`, { card_id: 0 })).status).toBe(401);
    expect((await call('POST', `/api/game/${id}/flip`, { card_id: 0, player_token: 'wrong' })).status).toBe(403);
    expect((await call('POST', `/api/game/${id}/flip`, { card_id: 0, player: 'player2' })).body.error).toBe('InvalidPlayerForMode');

    const joined = await call('POST', `/api/game/${id}/join`);
    expect(joined.body).toMatchObject({ seat: 'player2', player2_joined: true });
    const guest = String(joined.body.player_token);

    const early = await call('POST', `/api/game/${id}/flip`, { card_id: 0, player: 'player2', player_token: guest });
    expect(early.status).toBe(409);
    expect(early.body.error).toBe('NotYourTurn');

    expect((await call('POST', `/api/game/${id}/join`)).status).toBe(409);
  });

  it('only lets seat holders turn cards back over', async () => {
    const { id, token } = await newGame({ multiplayer: true });
    expect((await call('POST', `/api/game/${id}/reset`)).status).toBe(401);
    expect((await call('POST', `/api/game/${id}/reset`, { player_token: token })).status).toBe(200);
    expect((await call('POST', `/api/game/${id}/reset`, undefined, { 'x-player-token': token })).status).toBe(200);
  });

  it('serves state to seat holders only', async () => {
    const { id, token } = await newGame({ multiplayer: true });
    expect((await call('GET', `/api/game/${id}/state`)).status).toBe(401);
    expect((await call('GET', `/api/game/${id}/state`, undefined, { 'x-player-token': token })).status).toBe(200);
    expect((await call('GET', `/api/game/${id}/state?player_token=${token}`)).body.game_id).toBe(id);
  });
});

describe('opponent endpoints', () => {
  it('suggests a card that is still in play', async () => {
    const { id } = await newGame({ ai_mode: true });
    const { status, body } = await call('GET', `/api/game/${id}/opponent-move`);
    expect(status).toBe(200);
    expect(typeof body.card_id).toBe('number');
  });

  it('reports an empty memory before anything is flipped', async () => {
    const { id } = await newGame({ ai_mode: true });
    const { body } = await call('GET', `/api/game/${id}/opponent-memory`);
    expect(body).toEqual({ memory: [] });
  });
});

describe('POST /api/game/:id/time-bonus', () => {
  it('pays a time-attack game once', async () => {
    const { id } = await newGame({ time_attack: true, time_seconds: 60 });
    const first = await call('POST', `/api/game/${id}/time-bonus`, { seconds_left: 42 });
    expect(first.body).toEqual({ bonus: 4, player_score: 4 });

    const again = await call('POST', `/api/game/${id}/time-bonus`, { seconds_left: 42 });
    expect(again.status).toBe(400);
    expect(again.body.error).toBe('InvalidRequest');
  });
});

describe('unknown games', () => {
  it('answer 404', async () => {
    const { status, body } = await call('GET', '/api/game/000000/history');
    expect(status).toBe(404);
    expect(body.error).toBe('GameNotFound');
  });
});

describe('formatZodError', () => {
  it('lists every issue with its path', () => {
    const result = z.object({ card_id: z.number() }).safeParse({});
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodError(result.error)).toBe("Invalid request: 'card_id': Required");
    }
  });
});
