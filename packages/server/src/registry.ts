// packages/server/src/registry.ts

import {
  GameNotFoundError,
  UnknownDeckError,
  createGameState,
  type DeckCatalog,
  type GameState,
  type RoundState,
} from "poker-rules";
import { BroadcastHub } from "./hub";
import { genGameCode, normalizeCode } from "./ids";
import { RoomQueue, sessionKey } from "./roomQueue";

export interface GameSession {
  code: string;
  state: GameState;
  hub: BroadcastHub;
}

export interface CreateGameOptions {
  deckId?: number;
  name?: string;
}

export interface GameSummary {
  code: string;
  name: string;
  deckId: number;
  roundState: RoundState;
  round: number;
  players: number;
  connected: number;
  createdAt: number;
}

export interface GameRegistryOptions {
  decks: DeckCatalog;
  generateCode?: () => string;
  maxCodeAttempts?: number;
  now?: () => number;
}

/**
 * Process-wide code → session map. One instance is built at startup and
 * handed to the HTTP routes and the WebSocket engine.
 */
export class GameRegistry {
  readonly decks: DeckCatalog;
  readonly queue = new RoomQueue();

  private readonly sessions = new Map<string, GameSession>();
  private readonly generateCode: () => string;
  private readonly maxCodeAttempts: number;
  private readonly now: () => number;

  constructor(options: GameRegistryOptions) {
    this.decks = options.decks;
    this.generateCode = options.generateCode ?? (() => genGameCode());
    this.maxCodeAttempts = options.maxCodeAttempts ?? 100;
    this.now = options.now ?? Date.now;
  }

  /**
   * Stores a new empty session and returns its code. The admin is whoever
   * joins first. Unknown deck IDs fall back to the default deck.
   */
  createGame(options: CreateGameOptions = {}): string {
    const code = this.allocateCode();

    let deck = this.decks.defaultDeck();
    if (options.deckId !== undefined) {
      try {
        deck = this.decks.getDeck(options.deckId);
      } catch (err) {
        if (!(err instanceof UnknownDeckError)) throw err;
      }
    }

    const state = createGameState({
      code,
      deck,
      name: options.name,
      createdAt: this.now(),
    });
    this.sessions.set(code, { code, state, hub: new BroadcastHub() });
    return code;
  }

  getSession(code: string): GameSession {
    const session = this.findSession(code);
    if (!session) {
      throw new GameNotFoundError(code);
    }
    return session;
  }

  findSession(code: string): GameSession | undefined {
    return this.sessions.get(normalizeCode(code));
  }

  /** Idempotent. Returns whether a session was removed. */
  removeSession(code: string): boolean {
    return this.sessions.delete(normalizeCode(code));
  }

  get size(): number {
    return this.sessions.size;
  }

  listSummaries(): GameSummary[] {
    return Array.from(this.sessions.values()).map((session) => summarize(session));
  }

  summary(code: string): GameSummary {
    return summarize(this.getSession(code));
  }

  /**
   * Runs `task` on the session's queue. The session is looked up inside the
   * queue, so a task queued behind the removal of its session sees
   * GameNotFoundError instead of a stale session.
   */
  runExclusive<T>(code: string, task: (session: GameSession) => Promise<T> | T): Promise<T> {
    const key = sessionKey(normalizeCode(code));
    return this.queue.enqueue(key, () => task(this.getSession(code)));
  }

  private allocateCode(): string {
    for (let attempt = 0; attempt < this.maxCodeAttempts; attempt++) {
      const code = normalizeCode(this.generateCode());
      if (!this.sessions.has(code)) return code;
    }
    throw new Error(`Could not allocate a free game code after ${this.maxCodeAttempts} attempts`);
  }
}

function summarize(session: GameSession): GameSummary {
  const players = Object.values(session.state.players);
  return {
    code: session.code,
    name: session.state.name,
    deckId: session.state.deck.id,
    roundState: session.state.roundState,
    round: session.state.round,
    players: players.length,
    connected: players.filter((p) => p.connected).length,
    createdAt: session.state.createdAt,
  };
}
