import type { PlayerId, SessionSnapshot } from "poker-rules";
import type { CommandRejectedCode } from "./commandResult";
import type { ClientMessage } from "./schemas";

export type JoinAckMessage = {
  type: "joinAck";
  code: string;
  playerId: PlayerId;
  isAdmin: boolean;
};

export type JoinRejectedMessage = {
  type: "joinRejected";
  reason: "game_not_found";
  message: string;
};

export type ActionRejectedMessage = {
  type: "actionRejected";
  action: ClientMessage["type"];
  code: CommandRejectedCode;
  message: string;
};

export type LeftMessage = {
  type: "left";
  code: string | null;
};

export type ErrorMessage = {
  type: "error";
  code: CommandRejectedCode;
  message: string;
};

export type ServerMessage =
  | SessionSnapshot
  | JoinAckMessage
  | JoinRejectedMessage
  | ActionRejectedMessage
  | LeftMessage
  | ErrorMessage;

/** Close codes sent to the transport. */
export const CLOSE_GAME_NOT_FOUND = 4000;
export const CLOSE_REPLACED = 4001;
export const CLOSE_SEND_FAILED = 4002;
