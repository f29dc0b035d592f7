import { GameError, type GameState } from '../src/engine';

interface StoreEntry {
  game: GameState;
  lastAccess: number;
  // Tail of the operation chain for this game
  queue: Promise<unknown>;
}

export interface GameStoreOptions {
  // Idle time after which a game is dropped; 0 keeps games forever
  ttlMs?: number;
  now?: () => number;
  idFactory?: () => string;
}

function randomGameId(): string {
  return String(100000 + Math.floor(Math.random() * 900000));
}

/**
 * Registry of live games. Operations on one game run strictly one after the
 * other; different games never wait on each other.
 */
export class GameStore {
  private readonly entries = new Map<string, StoreEntry>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly idFactory: () => string;

  constructor(options: GameStoreOptions = {}) {
    this.ttlMs = options.ttlMs ?? 0;
    this.now = options.now ?? Date.now;
    this.idFactory = options.idFactory ?? randomGameId;
  }

  get size(): number {
    return this.entries.size;
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  newId(): string {
    this.reap();
    let id = this.idFactory();
    while (this.entries.has(id)) id = this.idFactory();
    return id;
  }

  insert(game: GameState): void {
    this.reap();
    if (this.entries.has(game.id)) {
      throw new Error(`Game ${game.id} already exists.`);
    }
    this.entries.set(game.id, { game, lastAccess: this.now(), queue: Promise.resolve() });
  }

  withGame<T>(id: string, fn: (game: GameState) => T | Promise<T>): Promise<T> {
    this.reap();
    const entry = this.entries.get(id);
    if (!entry) {
      return Promise.reject(new GameError('GameNotFound', `Game ${id} not found.`));
    }
    entry.lastAccess = this.now();
    const run = entry.queue.then(() => fn(entry.game));
    // The caller sees failures through `run`; the chain itself must keep going
    entry.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  reap(): number {
    if (this.ttlMs <= 0) return 0;
    const cutoff = this.now() - this.ttlMs;
    let removed = 0;
    for (const [id, entry] of this.entries) {
      if (entry.lastAccess < cutoff) {
        this.entries.delete(id);
        removed += 1;
      }
    }
    return removed;
  }
}
