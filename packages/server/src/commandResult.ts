// packages/server/src/commandResult.ts

import type { GameEvent } from "poker-rules";

export type CommandRejectedCode =
  | "BAD_REQUEST"
  | "INVALID_PAYLOAD"
  | "PAYLOAD_TOO_LARGE"
  | "RATE_LIMITED"
  | "NOT_JOINED"
  | "GAME_NOT_FOUND"
  | "UNKNOWN_DECK"
  | "UNKNOWN_CARD"
  | "UNKNOWN_PLAYER"
  | "INVALID_STATE"
  | "NOT_AUTHORIZED"
  | "SERVER_ERROR";

export interface CommandAccepted {
  ok: true;
  stateChanged: boolean;
  events: GameEvent[];
}

export interface CommandRejected {
  ok: false;
  code: CommandRejectedCode;
  message?: string;
}

export type CommandResult = CommandAccepted | CommandRejected;

export function accepted(params: {
  stateChanged: boolean;
  events?: GameEvent[];
}): CommandAccepted {
  return {
    ok: true,
    stateChanged: params.stateChanged,
    events: params.events ?? [],
  };
}

export function rejected(code: CommandRejectedCode, message?: string): CommandRejected {
  return {
    ok: false,
    code,
    message,
  };
}
