// packages/rules/src/round.ts

import type { ApplyResult, GameAction, GameState, PlayerId, PlayerState } from "./model";
import { isAdmin } from "./model";
import { findCard } from "./deckCatalog";
import {
  InvalidStateError,
  NotAuthorizedError,
  UnknownCardError,
  UnknownPlayerError,
} from "./errors";

type CastVoteAction = Extract<GameAction, { type: "castVote" }>;
type StartRoundAction = Extract<GameAction, { type: "startRound" }>;
type RevealAction = Extract<GameAction, { type: "reveal" }>;

function requireAdmin(state: GameState, playerId: PlayerId, what: string) {
  if (!state.players[playerId]) {
    throw new UnknownPlayerError(playerId);
  }
  if (!isAdmin(state, playerId)) {
    throw new NotAuthorizedError(`Only the admin can ${what}`);
  }
}

function clearVotes(players: GameState["players"]): GameState["players"] {
  const cleared: Record<PlayerId, PlayerState> = {};
  for (const [id, player] of Object.entries(players)) {
    cleared[id] = player.vote === null ? player : { ...player, vote: null };
  }
  return cleared;
}

export function applyStartRound(
  state: GameState,
  action: StartRoundAction
): ApplyResult {
  requireAdmin(state, action.playerId, "start a round");
  if (state.roundState === "voting") {
    throw new InvalidStateError("A round is already in progress");
  }

  const round = state.round + 1;
  return {
    state: {
      ...state,
      players: clearVotes(state.players),
      roundState: "voting",
      round,
      ticketUrl: action.ticketUrl ?? null,
    },
    events: [{ type: "roundStarted", round }],
  };
}

export function applyReveal(state: GameState, action: RevealAction): ApplyResult {
  requireAdmin(state, action.playerId, "reveal the votes");
  if (state.roundState !== "voting") {
    throw new InvalidStateError("Votes can only be revealed while voting");
  }

  // Partial reveals are allowed: stragglers simply show as not voted.
  const voteCount = Object.values(state.players).filter((p) => p.vote !== null).length;
  return {
    state: { ...state, roundState: "revealed" },
    events: [{ type: "votesRevealed", round: state.round, voteCount }],
  };
}

export function applyCastVote(state: GameState, action: CastVoteAction): ApplyResult {
  if (state.roundState !== "voting") {
    throw new InvalidStateError("Votes are only accepted while voting");
  }

  const player = state.players[action.playerId];
  if (!player) {
    throw new UnknownPlayerError(action.playerId);
  }

  const card = findCard(state.deck, action.card);
  if (!card) {
    throw new UnknownCardError(action.card.label, state.deck.name);
  }

  if (player.observing) {
    throw new InvalidStateError("Observers cannot vote");
  }

  return {
    state: {
      ...state,
      players: { ...state.players, [player.id]: { ...player, vote: card } },
    },
    events: [{ type: "voteCast", playerId: player.id }],
  };
}
