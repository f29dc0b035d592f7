export type GameErrorKind =
  | 'GameNotFound'
  | 'TokenRequired'
  | 'InvalidToken'
  | 'NotYourTurn'
  | 'InvalidCard'
  | 'InvalidPlayerForMode'
  | 'NoValidMoves'
  | 'InsufficientPoolSize'
  | 'SeatTaken'
  | 'InvalidRequest';

export class GameError extends Error {
  readonly kind: GameErrorKind;

  constructor(kind: GameErrorKind, message: string) {
    super(message);
    this.name = 'GameError';
    this.kind = kind;
  }
}

export function isGameError(error: unknown): error is GameError {
  return error instanceof GameError;
}
