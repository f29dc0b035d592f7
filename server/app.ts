import express, { type ErrorRequestHandler, type Request, type RequestHandler, type Response } from 'express';
import { ZodError } from 'zod';
import { isGameError, type GameErrorKind } from '../src/engine';
import { createLogger, describeError, type Logger } from '../src/lib/log';
import {
  FlipRequestSchema,
  NewGameRequestSchema,
  ResetRequestSchema,
  RoastQuerySchema,
  TimeBonusRequestSchema,
  type ErrorPayload,
} from '../src/protocol/messages';
import type { GameService } from './service';

const STATUS_BY_KIND: Record<GameErrorKind, number> = {
  GameNotFound: 404,
  TokenRequired: 401,
  InvalidToken: 403,
  NotYourTurn: 409,
  InvalidCard: 400,
  InvalidPlayerForMode: 400,
  NoValidMoves: 400,
  InsufficientPoolSize: 400,
  SeatTaken: 409,
  InvalidRequest: 400,
};

export function formatZodError(err: ZodError): string {
  const issues = err.issues.map((issue) => {
    const path = issue.path.length > 0 ? `'${issue.path.join('.')}'` : 'input';
    return `${path}: ${issue.message}`;
  });
  return `Invalid request: ${issues.join('; ')}`;
}

function route(handler: (req: Request, res: Response) => Promise<unknown>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).then(
      (body) => res.json(body),
      (error: unknown) => next(error)
    );
  };
}

// Body field first, then the query string, then the header
function playerToken(req: Request, fromBody?: string | null): string | undefined {
  if (fromBody) return fromBody;
  const fromQuery = req.query.player_token;
  if (typeof fromQuery === 'string' && fromQuery) return fromQuery;
  return req.get('x-player-token') || undefined;
}

function sendError(res: Response, status: number, error: GameErrorKind, message: string) {
  const payload: ErrorPayload = { success: false, error, message };
  res.status(status).json(payload);
}

export function createApp(service: GameService, logger: Logger = createLogger('http')) {
  const app = express();
  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.type('text/plain').send('ok');
  });

  const api = express.Router();

  api.post('/new', route((req) => service.createGame(NewGameRequestSchema.parse(req.body ?? {}))));
  api.post('/:id/join', route((req) => service.joinGame(req.params.id)));
  api.get('/:id/state', route((req) => service.getState(req.params.id, playerToken(req))));
  api.post('/:id/flip', route((req) => service.flip(req.params.id, FlipRequestSchema.parse(req.body ?? {}))));
  api.post(
    '/:id/reset',
    route((req) => service.reset(req.params.id, playerToken(req, ResetRequestSchema.parse(req.body ?? {}).player_token)))
  );
  api.post(
    '/:id/time-bonus',
    route((req) => {
      const body = TimeBonusRequestSchema.parse(req.body ?? {});
      return service.timeBonus(req.params.id, body.seconds_left, playerToken(req, body.player_token));
    })
  );
  api.get('/:id/roast', route((req) => service.roast(req.params.id, RoastQuerySchema.parse(req.query).player)));
  api.get('/:id/opponent-move', route((req) => service.opponentMove(req.params.id)));
  api.get('/:id/history', route((req) => service.history(req.params.id)));
  api.get('/:id/opponent-memory', route((req) => service.opponentMemory(req.params.id)));

  app.use('/api/game', api);

  const onError: ErrorRequestHandler = (err: unknown, req, res, _next) => {
    if (isGameError(err)) {
      sendError(res, STATUS_BY_KIND[err.kind], err.kind, err.message);
      return;
    }
    if (err instanceof ZodError) {
      sendError(res, 400, 'InvalidRequest', formatZodError(err));
      return;
    }
    // Malformed JSON from express.json()
    if (err instanceof SyntaxError) {
      sendError(res, 400, 'InvalidRequest', 'Request body is not valid JSON.');
      return;
    }
    logger.error('unhandled error', { method: req.method, path: req.path, error: describeError(err) });
    res.status(500).json({ success: false, error: 'InternalError', message: 'Internal server error.' });
  };
  app.use(onError);

  return app;
}
