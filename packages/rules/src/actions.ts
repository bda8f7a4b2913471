// packages/rules/src/actions.ts

import type { ApplyResult, GameAction, GameState } from "./model";
import {
  applyJoin,
  applyLeave,
  applySetConnected,
  applyToggleObserving,
} from "./players";
import { applyCastVote, applyReveal, applyStartRound } from "./round";

/**
 * Applies one action to the session state.
 * Throws a PokerRuleError when the action is rejected; the input state is
 * never modified.
 */
export function applyAction(state: GameState, action: GameAction): ApplyResult {
  switch (action.type) {
    case "join":
      return applyJoin(state, action);
    case "leave":
      return applyLeave(state, action);
    case "setConnected":
      return applySetConnected(state, action);
    case "toggleObserving":
      return applyToggleObserving(state, action);
    case "castVote":
      return applyCastVote(state, action);
    case "startRound":
      return applyStartRound(state, action);
    case "reveal":
      return applyReveal(state, action);
  }
}
