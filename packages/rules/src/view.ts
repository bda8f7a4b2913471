// packages/rules/src/view.ts

import type { Card, GameState, PlayerId, RoundState } from "./model";
import { listPlayers } from "./model";
import { computeAggregate, type VoteAggregate } from "./aggregate";

export interface PlayerView {
  id: PlayerId;
  displayName: string;
  connected: boolean;
  observing: boolean;
  isAdmin: boolean;
  hasVoted: boolean;
  /** Present only once the round is revealed */
  card?: Card;
}

export interface SessionSnapshot {
  type: "snapshot";
  code: string;
  name: string;
  roundState: RoundState;
  round: number;
  ticketUrl: string | null;
  deck: { id: number; name: string; cards: Card[] };
  adminId: PlayerId | null;
  players: PlayerView[];
  aggregate?: VoteAggregate;
}

/**
 * Build the snapshot every connection of a session receives.
 * - Before reveal only `hasVoted` is exposed, never the card.
 * - After reveal each voter's card and the aggregate are included.
 */
export function makeSnapshot(state: GameState): SessionSnapshot {
  const revealed = state.roundState === "revealed";

  const players = listPlayers(state).map((player): PlayerView => {
    const view: PlayerView = {
      id: player.id,
      displayName: player.displayName,
      connected: player.connected,
      observing: player.observing,
      isAdmin: player.id === state.adminId,
      hasVoted: player.vote !== null,
    };
    if (revealed && player.vote) {
      view.card = { ...player.vote };
    }
    return view;
  });

  const snapshot: SessionSnapshot = {
    type: "snapshot",
    code: state.code,
    name: state.name,
    roundState: state.roundState,
    round: state.round,
    ticketUrl: state.ticketUrl,
    deck: {
      id: state.deck.id,
      name: state.deck.name,
      cards: state.deck.cards.map((card) => ({ ...card })),
    },
    adminId: state.adminId,
    players,
  };

  if (revealed) {
    const votes: Card[] = [];
    for (const player of listPlayers(state)) {
      if (player.vote) votes.push(player.vote);
    }
    snapshot.aggregate = computeAggregate(votes, state.deck);
  }

  return snapshot;
}
