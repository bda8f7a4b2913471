// packages/rules/src/errors.ts

export type PokerErrorCode =
  | "GAME_NOT_FOUND"
  | "UNKNOWN_DECK"
  | "UNKNOWN_CARD"
  | "UNKNOWN_PLAYER"
  | "INVALID_STATE"
  | "NOT_AUTHORIZED";

/**
 * Base class for rejections raised by the session rules.
 * A rule error never leaves a half-applied state behind: transitions throw
 * before building the next state.
 */
export class PokerRuleError extends Error {
  readonly code: PokerErrorCode;

  constructor(code: PokerErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class GameNotFoundError extends PokerRuleError {
  constructor(code: string) {
    super("GAME_NOT_FOUND", `No game with code '${code}' exists`);
  }
}

export class UnknownDeckError extends PokerRuleError {
  constructor(deckId: number) {
    super("UNKNOWN_DECK", `No deck exists with ID ${deckId}`);
  }
}

export class UnknownCardError extends PokerRuleError {
  constructor(label: string, deckName: string) {
    super("UNKNOWN_CARD", `Card '${label}' is not part of deck '${deckName}'`);
  }
}

export class UnknownPlayerError extends PokerRuleError {
  constructor(playerId: string) {
    super("UNKNOWN_PLAYER", `Player '${playerId}' is not in this game`);
  }
}

export class InvalidStateError extends PokerRuleError {
  constructor(message: string) {
    super("INVALID_STATE", message);
  }
}

export class NotAuthorizedError extends PokerRuleError {
  constructor(message = "Only the admin can do that") {
    super("NOT_AUTHORIZED", message);
  }
}

export function isPokerRuleError(err: unknown): err is PokerRuleError {
  return err instanceof PokerRuleError;
}
