// packages/server/src/hub.ts

import type { PlayerId } from "poker-rules";
import type { ServerMessage } from "./messages";

/**
 * One live client channel. Implementations may wrap a socket, a queue or a
 * test double; `send` resolves to false instead of throwing when delivery fails.
 */
export interface SnapshotSink {
  send(message: ServerMessage): Promise<boolean>;
  close(code: number, reason: string): void;
}

export interface HubMember {
  connId: string;
  playerId: PlayerId;
  sink: SnapshotSink;
}

export interface SendFailure {
  connId: string;
  playerId: PlayerId;
  error?: unknown;
}

export async function deliver(
  sink: SnapshotSink,
  message: ServerMessage
): Promise<{ ok: boolean; error?: unknown }> {
  try {
    return { ok: await sink.send(message) };
  } catch (error) {
    return { ok: false, error };
  }
}

/**
 * Live connections of one session, each bound to a player.
 */
export class BroadcastHub {
  private readonly members = new Map<string, HubMember>();

  attach(connId: string, playerId: PlayerId, sink: SnapshotSink): void {
    this.members.set(connId, { connId, playerId, sink });
  }

  detach(connId: string): HubMember | undefined {
    const member = this.members.get(connId);
    if (member) this.members.delete(connId);
    return member;
  }

  get(connId: string): HubMember | undefined {
    return this.members.get(connId);
  }

  connectionsOf(playerId: PlayerId): HubMember[] {
    return Array.from(this.members.values()).filter((m) => m.playerId === playerId);
  }

  get size(): number {
    return this.members.size;
  }

  /**
   * Sends to every member concurrently. Never throws; returns the members
   * whose delivery failed, which stay attached until the caller detaches them.
   */
  async broadcast(message: ServerMessage): Promise<SendFailure[]> {
    const targets = Array.from(this.members.values());
    const results = await Promise.all(
      targets.map(async (member) => ({ member, result: await deliver(member.sink, message) }))
    );

    return results
      .filter(({ result }) => !result.ok)
      .map(({ member, result }) => ({
        connId: member.connId,
        playerId: member.playerId,
        error: result.error,
      }));
  }
}
