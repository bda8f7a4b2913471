// packages/rules/src/players.ts

import type {
  ApplyResult,
  GameAction,
  GameEvent,
  GameState,
  PlayerId,
  PlayerState,
} from "./model";
import { isEmpty } from "./model";
import { UnknownPlayerError } from "./errors";

type JoinAction = Extract<GameAction, { type: "join" }>;
type LeaveAction = Extract<GameAction, { type: "leave" }>;
type SetConnectedAction = Extract<GameAction, { type: "setConnected" }>;
type ToggleObservingAction = Extract<GameAction, { type: "toggleObserving" }>;

function requirePlayer(state: GameState, playerId: PlayerId): PlayerState {
  const player = state.players[playerId];
  if (!player) {
    throw new UnknownPlayerError(playerId);
  }
  return player;
}

/**
 * Picks the next admin: earliest-joined connected player, otherwise the
 * earliest-joined player still in the game.
 */
export function electAdmin(players: PlayerState[]): PlayerId | null {
  const ordered = [...players].sort((a, b) => a.joinOrder - b.joinOrder);
  const connected = ordered.find((p) => p.connected);
  return connected?.id ?? ordered[0]?.id ?? null;
}

export function applyJoin(state: GameState, action: JoinAction): ApplyResult {
  const existing = action.playerId ? state.players[action.playerId] : undefined;

  if (existing) {
    // Rejoin: vote, observer flag and admin status survive.
    const displayName = action.displayName.trim() || existing.displayName;
    const player: PlayerState = { ...existing, displayName, connected: true };
    return {
      state: { ...state, players: { ...state.players, [player.id]: player } },
      events: [{ type: "playerRejoined", playerId: player.id }],
    };
  }

  const player: PlayerState = {
    id: action.issuedId,
    displayName: action.displayName.trim() || "Anonymous",
    connected: true,
    observing: false,
    vote: null,
    joinOrder: state.nextJoinOrder,
  };

  const events: GameEvent[] = [
    { type: "playerJoined", playerId: player.id, displayName: player.displayName },
  ];

  let adminId = state.adminId;
  if (adminId === null || isEmpty(state)) {
    adminId = player.id;
    events.push({ type: "adminChanged", adminId, previousAdminId: state.adminId });
  }

  return {
    state: {
      ...state,
      players: { ...state.players, [player.id]: player },
      adminId,
      nextJoinOrder: state.nextJoinOrder + 1,
    },
    events,
  };
}

export function applyLeave(state: GameState, action: LeaveAction): ApplyResult {
  requirePlayer(state, action.playerId);

  const { [action.playerId]: _removed, ...players } = state.players;
  const events: GameEvent[] = [{ type: "playerLeft", playerId: action.playerId }];

  let adminId = state.adminId;
  if (adminId === action.playerId) {
    adminId = electAdmin(Object.values(players));
    events.push({ type: "adminChanged", adminId, previousAdminId: action.playerId });
  }

  if (Object.keys(players).length === 0) {
    events.push({ type: "sessionEmptied" });
  }

  return { state: { ...state, players, adminId }, events };
}

export function applySetConnected(
  state: GameState,
  action: SetConnectedAction
): ApplyResult {
  const player = requirePlayer(state, action.playerId);
  if (player.connected === action.connected) {
    return { state, events: [] };
  }

  return {
    state: {
      ...state,
      players: {
        ...state.players,
        [player.id]: { ...player, connected: action.connected },
      },
    },
    events: [
      { type: "playerConnection", playerId: player.id, connected: action.connected },
    ],
  };
}

export function applyToggleObserving(
  state: GameState,
  action: ToggleObservingAction
): ApplyResult {
  const player = requirePlayer(state, action.playerId);
  const observing = !player.observing;
  // Revealed results stay as they were; the vote goes at the next startRound.
  const vote = observing && state.roundState === "voting" ? null : player.vote;

  return {
    state: {
      ...state,
      players: {
        ...state.players,
        [player.id]: { ...player, observing, vote },
      },
    },
    events: [{ type: "observingChanged", playerId: player.id, observing }],
  };
}
