// packages/server/src/engine.ts

import type { FastifyBaseLogger } from "fastify";
import {
  GameNotFoundError,
  applyAction,
  isPokerRuleError,
  makeSnapshot,
  type ApplyResult,
  type GameAction,
  type GameEvent,
  type PlayerId,
} from "poker-rules";
import {
  accepted,
  rejected,
  type CommandRejected,
  type CommandRejectedCode,
  type CommandResult,
} from "./commandResult";
import { deliver, type SnapshotSink } from "./hub";
import { genConnId, genPlayerId, normalizeCode } from "./ids";
import {
  CLOSE_GAME_NOT_FOUND,
  CLOSE_REPLACED,
  CLOSE_SEND_FAILED,
  type ServerMessage,
} from "./messages";
import { logPoker, type PokerLogEntry } from "./pokerLogger";
import type { GameRegistry, GameSession } from "./registry";
import { RoomQueue } from "./roomQueue";
import { ClientMessageSchema, type ClientMessage } from "./schemas";

type JoinMessage = Extract<ClientMessage, { type: "join" }>;

interface ConnectionMeta {
  connId: string;
  sink: SnapshotSink;
  code: string | null;
  playerId: PlayerId | null;
  rate: { windowStartMs: number; messageCount: number } | null;
}

export interface PokerEngineOptions {
  registry: GameRegistry;
  logger: FastifyBaseLogger;
  reconnectGraceMs?: number;
  maxPayloadBytes?: number;
  rateLimitWindowMs?: number;
  rateLimitMaxMessages?: number;
  generatePlayerId?: () => PlayerId;
  debug?: boolean;
}

const EVENT_TAGS: Partial<Record<GameEvent["type"], string>> = {
  playerJoined: "poker:join",
  playerRejoined: "poker:join",
  playerLeft: "poker:leave",
  adminChanged: "poker:admin:changed",
  roundStarted: "poker:round:start",
  votesRevealed: "poker:round:reveal",
};

function graceKey(code: string, playerId: PlayerId): string {
  return `${code}:${playerId}`;
}

/**
 * Binds transport connections to game sessions and runs every session
 * mutation on that session's queue, broadcasting the resulting snapshot
 * before the next queued operation starts.
 */
export class PokerEngine {
  private readonly registry: GameRegistry;
  private readonly logger: FastifyBaseLogger;
  private readonly reconnectGraceMs: number;
  private readonly maxPayloadBytes: number;
  private readonly rateLimitWindowMs: number;
  private readonly rateLimitMaxMessages: number;
  private readonly generatePlayerId: () => PlayerId;
  private readonly debug: boolean;

  private readonly connections = new Map<string, ConnectionMeta>();
  /** Messages of one connection are handled one after another. */
  private readonly inbound = new RoomQueue();
  private readonly graceTimers = new Map<string, ReturnType<typeof setTimeout>>();

  constructor(options: PokerEngineOptions) {
    this.registry = options.registry;
    this.logger = options.logger;
    this.reconnectGraceMs = options.reconnectGraceMs ?? 45_000;
    this.maxPayloadBytes = options.maxPayloadBytes ?? 16 * 1024;
    this.rateLimitWindowMs = options.rateLimitWindowMs ?? 1000;
    this.rateLimitMaxMessages = options.rateLimitMaxMessages ?? 30;
    this.generatePlayerId = options.generatePlayerId ?? genPlayerId;
    this.debug = options.debug ?? false;
  }

  // ============ Connection lifecycle ============

  connect(sink: SnapshotSink): string {
    const connId = genConnId();
    this.connections.set(connId, { connId, sink, code: null, playerId: null, rate: null });
    return connId;
  }

  bindingOf(connId: string): { code: string; playerId: PlayerId } | null {
    const meta = this.connections.get(connId);
    if (!meta || meta.code === null || meta.playerId === null) return null;
    return { code: meta.code, playerId: meta.playerId };
  }

  get pendingGraceTimers(): number {
    return this.graceTimers.size;
  }

  /**
   * Transport closed or errored. The player keeps vote and admin status and
   * is removed only if they do not rejoin within the grace period.
   */
  async disconnect(connId: string): Promise<void> {
    const meta = this.connections.get(connId);
    if (!meta) return;
    this.connections.delete(connId);
    if (meta.code === null) return;

    try {
      await this.registry.runExclusive(meta.code, async (session) => {
        if (!session.hub.get(connId)) return;
        const playerId = this.detachFromSession(session, connId);
        this.log({ tag: "poker:disconnect", code: session.code, connId, playerId });
        await this.broadcastState(session);
      });
    } catch (err) {
      if (err instanceof GameNotFoundError) return;
      this.log({ tag: "poker:error", code: meta.code, connId, message: "disconnect failed", err });
    }
  }

  shutdown(): void {
    for (const timer of this.graceTimers.values()) clearTimeout(timer);
    this.graceTimers.clear();
  }

  // ============ Inbound messages ============

  async handleRaw(connId: string, raw: string): Promise<CommandResult> {
    const meta = this.connections.get(connId);
    if (!meta) return rejected("NOT_JOINED", "Unknown connection");

    if (Buffer.byteLength(raw) > this.maxPayloadBytes) {
      return this.sendError(meta, "PAYLOAD_TOO_LARGE", "Payload too large");
    }
    if (!this.consumeRateBudget(meta)) {
      this.log({ tag: "poker:rate_limited", connId, code: meta.code });
      return this.sendError(meta, "RATE_LIMITED", "Too many messages");
    }

    return this.inbound.enqueue(connId, () => this.processRaw(meta, raw));
  }

  async handleMessage(connId: string, msg: ClientMessage): Promise<CommandResult> {
    const meta = this.connections.get(connId);
    if (!meta) return rejected("NOT_JOINED", "Unknown connection");
    return this.inbound.enqueue(connId, () => this.dispatch(meta, msg));
  }

  private async processRaw(meta: ConnectionMeta, raw: string): Promise<CommandResult> {
    let parsedJson: unknown;
    try {
      parsedJson = JSON.parse(raw);
    } catch {
      return this.sendError(meta, "BAD_REQUEST", "Invalid JSON");
    }

    const parsed = ClientMessageSchema.safeParse(parsedJson);
    if (!parsed.success) {
      return this.sendError(meta, "INVALID_PAYLOAD", "Invalid message payload");
    }

    try {
      return await this.dispatch(meta, parsed.data);
    } catch (err) {
      this.log({ tag: "poker:error", connId: meta.connId, message: "unhandled message error", err });
      return this.sendError(meta, "SERVER_ERROR", "Failed to process message");
    }
  }

  private dispatch(meta: ConnectionMeta, msg: ClientMessage): Promise<CommandResult> {
    this.log({ tag: "poker:incoming", connId: meta.connId, type: msg.type });

    switch (msg.type) {
      case "join":
        return this.join(meta, msg);
      case "leave":
        return this.leave(meta);
      case "sync":
        return this.sync(meta);
      case "castVote": {
        const { card } = msg;
        return this.act(meta, msg.type, (playerId) => ({ type: "castVote", playerId, card }));
      }
      case "startRound": {
        const { ticketUrl } = msg;
        return this.act(meta, msg.type, (playerId) => ({ type: "startRound", playerId, ticketUrl }));
      }
      case "reveal":
        return this.act(meta, msg.type, (playerId) => ({ type: "reveal", playerId }));
      case "observe":
        return this.act(meta, msg.type, (playerId) => ({ type: "toggleObserving", playerId }));
    }
  }

  // ============ Handlers ============

  private async join(meta: ConnectionMeta, msg: JoinMessage): Promise<CommandResult> {
    const code = normalizeCode(msg.code);
    const sameBinding = meta.code === code && meta.playerId === msg.playerId;
    if (meta.code !== null && !sameBinding) {
      await this.releaseBinding(meta);
    }

    try {
      return await this.registry.runExclusive(code, async (session) => {
        if (!this.connections.has(meta.connId)) {
          return rejected("NOT_JOINED", "Connection closed");
        }

        const known =
          msg.playerId !== undefined && session.state.players[msg.playerId]
            ? msg.playerId
            : undefined;
        const playerId = known ?? this.generatePlayerId();
        const result = applyAction(session.state, {
          type: "join",
          playerId: known,
          issuedId: playerId,
          displayName: msg.name ?? "",
        });

        this.clearGrace(session.code, playerId);
        for (const other of session.hub.connectionsOf(playerId)) {
          if (other.connId === meta.connId) continue;
          session.hub.detach(other.connId);
          this.unbind(other.connId);
          other.sink.close(CLOSE_REPLACED, "Replaced by a newer connection");
        }

        session.hub.attach(meta.connId, playerId, meta.sink);
        meta.code = session.code;
        meta.playerId = playerId;
        this.commit(session, result);

        await this.reply(
          meta,
          {
            type: "joinAck",
            code: session.code,
            playerId,
            isAdmin: session.state.adminId === playerId,
          },
          session
        );
        await this.broadcastState(session);
        return accepted({ stateChanged: true, events: result.events });
      });
    } catch (err) {
      if (!(err instanceof GameNotFoundError)) throw err;
      this.log({ tag: "poker:join_rejected", code, connId: meta.connId, message: err.message });
      await this.reply(meta, {
        type: "joinRejected",
        reason: "game_not_found",
        message: err.message,
      });
      meta.sink.close(CLOSE_GAME_NOT_FOUND, err.message);
      return rejected("GAME_NOT_FOUND", err.message);
    }
  }

  private async leave(meta: ConnectionMeta): Promise<CommandResult> {
    if (meta.code === null) {
      await this.reply(meta, { type: "left", code: null });
      return accepted({ stateChanged: false });
    }

    try {
      return await this.registry.runExclusive(meta.code, async (session) => {
        const playerId = meta.playerId;
        if (meta.code !== session.code || playerId === null) {
          await this.reply(meta, { type: "left", code: null }, session);
          return accepted({ stateChanged: false });
        }

        session.hub.detach(meta.connId);
        this.unbind(meta.connId);
        this.clearGrace(session.code, playerId);

        const events = session.state.players[playerId]
          ? this.removePlayer(session, playerId)
          : [];
        this.log({ tag: "poker:leave", code: session.code, connId: meta.connId, playerId });

        await this.reply(meta, { type: "left", code: session.code }, session);
        await this.broadcastState(session);
        return accepted({ stateChanged: events.length > 0, events });
      });
    } catch (err) {
      if (!(err instanceof GameNotFoundError)) throw err;
      const code = meta.code;
      this.unbind(meta.connId);
      await this.reply(meta, { type: "left", code });
      return accepted({ stateChanged: false });
    }
  }

  private async sync(meta: ConnectionMeta): Promise<CommandResult> {
    if (meta.code === null) {
      return this.rejectAction(meta, "sync", rejected("NOT_JOINED", "Join a game first"));
    }
    try {
      return await this.registry.runExclusive(meta.code, async (session) => {
        await this.reply(meta, makeSnapshot(session.state), session);
        return accepted({ stateChanged: false });
      });
    } catch (err) {
      if (!(err instanceof GameNotFoundError)) throw err;
      this.unbind(meta.connId);
      return this.rejectAction(meta, "sync", rejected("GAME_NOT_FOUND", err.message));
    }
  }

  /** Runs one player-scoped rule action; rejections go to this connection only. */
  private async act(
    meta: ConnectionMeta,
    type: ClientMessage["type"],
    build: (playerId: PlayerId) => GameAction
  ): Promise<CommandResult> {
    if (meta.code === null) {
      return this.rejectAction(meta, type, rejected("NOT_JOINED", "Join a game first"));
    }

    try {
      return await this.registry.runExclusive(meta.code, async (session) => {
        const playerId = meta.playerId;
        if (meta.code !== session.code || playerId === null) {
          return this.rejectAction(
            meta,
            type,
            rejected("NOT_JOINED", "Join a game first"),
            session
          );
        }

        let result: ApplyResult;
        try {
          result = applyAction(session.state, build(playerId));
        } catch (err) {
          if (!isPokerRuleError(err)) throw err;
          this.log({
            tag: "poker:commandRejected",
            code: session.code,
            playerId,
            action: type,
            reason: err.code,
          });
          return this.rejectAction(meta, type, rejected(err.code, err.message), session);
        }

        this.commit(session, result);
        await this.broadcastState(session);
        return accepted({ stateChanged: result.events.length > 0, events: result.events });
      });
    } catch (err) {
      if (!(err instanceof GameNotFoundError)) throw err;
      this.unbind(meta.connId);
      return this.rejectAction(meta, type, rejected("GAME_NOT_FOUND", err.message));
    }
  }

  // ============ Session helpers (run inside the session queue) ============

  private commit(session: GameSession, result: ApplyResult): void {
    session.state = result.state;
    for (const event of result.events) {
      this.log({ tag: EVENT_TAGS[event.type] ?? "poker:event", code: session.code, event });
    }
  }

  /** Removes the player; an emptied session is dropped from the registry. */
  private removePlayer(session: GameSession, playerId: PlayerId): GameEvent[] {
    const result = applyAction(session.state, { type: "leave", playerId });
    this.commit(session, result);
    if (result.events.some((event) => event.type === "sessionEmptied")) {
      this.registry.removeSession(session.code);
      this.log({ tag: "poker:game:remove", code: session.code });
    }
    return result.events;
  }

  /**
   * Detaches one connection. When it was the player's last connection the
   * player is marked disconnected and the grace timer starts.
   */
  private detachFromSession(session: GameSession, connId: string): PlayerId | null {
    const member = session.hub.detach(connId);
    this.unbind(connId);
    if (!member) return null;

    const player = session.state.players[member.playerId];
    if (!player || session.hub.connectionsOf(member.playerId).length > 0) {
      return member.playerId;
    }

    this.commit(
      session,
      applyAction(session.state, {
        type: "setConnected",
        playerId: member.playerId,
        connected: false,
      })
    );
    this.scheduleGrace(session.code, member.playerId);
    return member.playerId;
  }

  private async releaseBinding(meta: ConnectionMeta): Promise<void> {
    if (meta.code === null) return;
    try {
      await this.registry.runExclusive(meta.code, async (session) => {
        if (meta.code !== session.code) return;
        this.detachFromSession(session, meta.connId);
        await this.broadcastState(session);
      });
    } catch (err) {
      if (!(err instanceof GameNotFoundError)) throw err;
      this.unbind(meta.connId);
    }
  }

  /**
   * Sends the current snapshot to every connection of the session. Failed
   * deliveries count as disconnects, after which the remaining connections
   * get a fresh snapshot.
   */
  private async broadcastState(session: GameSession): Promise<void> {
    if (this.registry.findSession(session.code) !== session) return;

    let failures = await session.hub.broadcast(makeSnapshot(session.state));
    while (failures.length > 0) {
      for (const failure of failures) {
        this.log({
          tag: "poker:send_failed",
          code: session.code,
          connId: failure.connId,
          playerId: failure.playerId,
          message: failure.error === undefined ? "send returned false" : String(failure.error),
        });
        this.dropFailedConnection(session, failure.connId);
      }
      if (session.hub.size === 0) return;
      failures = await session.hub.broadcast(makeSnapshot(session.state));
    }
    this.log({ tag: "poker:broadcast", code: session.code, recipients: session.hub.size });
  }

  /** A connection whose delivery failed is detached and closed. */
  private dropFailedConnection(session: GameSession, connId: string): void {
    const member = session.hub.get(connId);
    this.detachFromSession(session, connId);
    this.connections.delete(connId);
    member?.sink.close(CLOSE_SEND_FAILED, "Delivery failed");
  }

  private scheduleGrace(code: string, playerId: PlayerId): void {
    this.clearGrace(code, playerId);
    const key = graceKey(code, playerId);

    const timer = setTimeout(() => {
      this.graceTimers.delete(key);
      void this.registry
        .runExclusive(code, async (session) => {
          const player = session.state.players[playerId];
          if (!player || player.connected) return;
          if (session.hub.connectionsOf(playerId).length > 0) return;

          this.log({ tag: "poker:grace:expired", code, playerId });
          this.removePlayer(session, playerId);
          await this.broadcastState(session);
        })
        .catch((err) => {
          if (err instanceof GameNotFoundError) return;
          this.log({ tag: "poker:error", code, playerId, message: "grace expiry failed", err });
        });
    }, this.reconnectGraceMs);
    timer.unref?.();

    this.graceTimers.set(key, timer);
  }

  private clearGrace(code: string, playerId: PlayerId): void {
    const key = graceKey(code, playerId);
    const timer = this.graceTimers.get(key);
    if (!timer) return;
    clearTimeout(timer);
    this.graceTimers.delete(key);
  }

  // ============ Outbound helpers ============

  private unbind(connId: string): void {
    const meta = this.connections.get(connId);
    if (!meta) return;
    meta.code = null;
    meta.playerId = null;
  }

  /**
   * Sends to one connection. A failed send on a bound connection is handled
   * like a failed broadcast. Pass `session` when already running on that
   * session's queue.
   */
  private async reply(
    meta: ConnectionMeta,
    message: ServerMessage,
    session?: GameSession
  ): Promise<void> {
    const result = await deliver(meta.sink, message);
    if (result.ok) return;

    this.log({
      tag: "poker:send_failed",
      connId: meta.connId,
      type: message.type,
      message: result.error === undefined ? "send returned false" : String(result.error),
    });

    if (session) {
      if (!session.hub.get(meta.connId)) return;
      this.dropFailedConnection(session, meta.connId);
      await this.broadcastState(session);
      return;
    }
    if (meta.code === null) return;

    try {
      await this.registry.runExclusive(meta.code, async (current) => {
        if (!current.hub.get(meta.connId)) return;
        this.dropFailedConnection(current, meta.connId);
        await this.broadcastState(current);
      });
    } catch (err) {
      if (!(err instanceof GameNotFoundError)) throw err;
    }
  }

  private async rejectAction(
    meta: ConnectionMeta,
    action: ClientMessage["type"],
    result: CommandRejected,
    session?: GameSession
  ): Promise<CommandRejected> {
    await this.reply(
      meta,
      {
        type: "actionRejected",
        action,
        code: result.code,
        message: result.message ?? "Action rejected",
      },
      session
    );
    return result;
  }

  private async sendError(
    meta: ConnectionMeta,
    code: CommandRejectedCode,
    message: string
  ): Promise<CommandRejected> {
    await this.reply(meta, { type: "error", code, message });
    return rejected(code, message);
  }

  private consumeRateBudget(meta: ConnectionMeta): boolean {
    const now = Date.now();
    const current = meta.rate;
    if (!current || now - current.windowStartMs >= this.rateLimitWindowMs) {
      meta.rate = { windowStartMs: now, messageCount: 1 };
      return true;
    }

    if (current.messageCount >= this.rateLimitMaxMessages) {
      return false;
    }

    current.messageCount += 1;
    return true;
  }

  private log(entry: PokerLogEntry): void {
    logPoker(this.logger, entry, this.debug);
  }
}
