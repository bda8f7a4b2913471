import {
  applyAction,
  createGameState,
  type Card,
  type Deck,
  type GameAction,
  type GameState,
} from "../index";

export const FIB_DECK: Deck = {
  id: 1,
  name: "Fibonacci",
  cards: [
    { label: "1/2", value: 0.5 },
    { label: "1", value: 1 },
    { label: "2", value: 2 },
    { label: "3", value: 3 },
    { label: "5", value: 5 },
    { label: "8", value: 8 },
    { label: "?", value: 100, abstain: true },
  ],
};

export function card(label: string): Card {
  const found = FIB_DECK.cards.find((c) => c.label === label);
  if (!found) throw new Error(`no card ${label} in test deck`);
  return found;
}

export function newGame(code = "AB12"): GameState {
  return createGameState({ code, deck: FIB_DECK, createdAt: 0 });
}

export function apply(state: GameState, action: GameAction): GameState {
  return applyAction(state, action).state;
}

export function join(state: GameState, id: string, name = id): GameState {
  return apply(state, { type: "join", issuedId: id, displayName: name });
}

/** Game with the given players joined in order and a round in progress. */
export function votingGame(...ids: string[]): GameState {
  let state = newGame();
  for (const id of ids) state = join(state, id);
  return apply(state, { type: "startRound", playerId: ids[0] });
}
