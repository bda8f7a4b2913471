// packages/rules/src/model.ts

export type PlayerId = string;

export interface Card {
  label: string;
  value: number;
  /** Abstention card ("?", coffee): counted for consensus, never averaged */
  abstain?: boolean;
}

export interface Deck {
  id: number;
  name: string;
  cards: readonly Card[];
}

export interface DeckSummary {
  id: number;
  name: string;
  cardCount: number;
}

export type RoundState = "init" | "voting" | "revealed";

export interface PlayerState {
  id: PlayerId;
  displayName: string;
  connected: boolean;
  observing: boolean;
  vote: Card | null;
  /** Monotonic per session, used for admin succession */
  joinOrder: number;
}

export interface GameState {
  code: string;
  name: string;
  deck: Deck;
  adminId: PlayerId | null;
  players: Record<PlayerId, PlayerState>;
  roundState: RoundState;
  round: number;
  ticketUrl: string | null;
  createdAt: number;
  nextJoinOrder: number;
}

export type GameAction =
  | {
      type: "join";
      /** Identity presented by the client, if any */
      playerId?: PlayerId;
      /** Identity to assign when this is not a rejoin */
      issuedId: PlayerId;
      displayName: string;
    }
  | { type: "leave"; playerId: PlayerId }
  | { type: "setConnected"; playerId: PlayerId; connected: boolean }
  | { type: "toggleObserving"; playerId: PlayerId }
  | { type: "castVote"; playerId: PlayerId; card: Card }
  | { type: "startRound"; playerId: PlayerId; ticketUrl?: string | null }
  | { type: "reveal"; playerId: PlayerId };

export type GameEvent =
  | { type: "playerJoined"; playerId: PlayerId; displayName: string }
  | { type: "playerRejoined"; playerId: PlayerId }
  | { type: "playerLeft"; playerId: PlayerId }
  | { type: "playerConnection"; playerId: PlayerId; connected: boolean }
  | { type: "observingChanged"; playerId: PlayerId; observing: boolean }
  | { type: "adminChanged"; adminId: PlayerId | null; previousAdminId: PlayerId | null }
  | { type: "voteCast"; playerId: PlayerId }
  | { type: "roundStarted"; round: number }
  | { type: "votesRevealed"; round: number; voteCount: number }
  | { type: "sessionEmptied" };

export interface ApplyResult {
  state: GameState;
  events: GameEvent[];
}

export interface CreateGameStateOptions {
  code: string;
  deck: Deck;
  name?: string;
  createdAt?: number;
}

export function createGameState(options: CreateGameStateOptions): GameState {
  return {
    code: options.code,
    name: options.name ?? `Game ${options.code}`,
    deck: options.deck,
    adminId: null,
    players: {},
    roundState: "init",
    round: 0,
    ticketUrl: null,
    createdAt: options.createdAt ?? Date.now(),
    nextJoinOrder: 0,
  };
}

export function listPlayers(state: GameState): PlayerState[] {
  return Object.values(state.players).sort((a, b) => a.joinOrder - b.joinOrder);
}

export function isAdmin(state: GameState, playerId: PlayerId): boolean {
  return state.adminId !== null && state.adminId === playerId;
}

export function isEmpty(state: GameState): boolean {
  return Object.keys(state.players).length === 0;
}
