import assert from "node:assert/strict";
import { test } from "node:test";
import { setTimeout as sleep } from "node:timers/promises";
import { CLOSE_GAME_NOT_FOUND, CLOSE_REPLACED, CLOSE_SEND_FAILED } from "../messages";
import { FakeSink, joinAs, setupEngine } from "./fakes";

const THREE = { label: "3", value: 3 };

test("first joiner becomes admin and receives ack then snapshot", async () => {
  const { registry, engine } = setupEngine();
  const code = registry.createGame();
  assert.equal(code, "AB12");

  const p1 = await joinAs(engine, code, "Alice");
  assert.equal(p1.result.ok, true);
  assert.deepEqual(p1.sink.messages[0], {
    type: "joinAck",
    code: "AB12",
    playerId: "p1",
    isAdmin: true,
  });
  const snapshot = p1.sink.lastSnapshot();
  assert.equal(snapshot.adminId, "p1");
  assert.equal(snapshot.roundState, "init");
  assert.deepEqual(snapshot.players, [
    {
      id: "p1",
      displayName: "Alice",
      connected: true,
      observing: false,
      isAdmin: true,
      hasVoted: false,
    },
  ]);
  engine.shutdown();
});

test("a full round: join mid-vote, vote, reveal", async () => {
  const { registry, engine } = setupEngine();
  const code = registry.createGame();

  const p1 = await joinAs(engine, code, "Alice");
  await engine.handleMessage(p1.connId, { type: "startRound" });
  assert.equal(p1.sink.lastSnapshot().roundState, "voting");
  assert.equal(p1.sink.lastSnapshot().round, 1);

  const p2 = await joinAs(engine, "ab12", "Bob");
  assert.deepEqual(p2.sink.last("joinAck"), {
    type: "joinAck",
    code: "AB12",
    playerId: "p2",
    isAdmin: false,
  });
  assert.equal(p2.sink.lastSnapshot().roundState, "voting");

  const vote = await engine.handleMessage(p1.connId, { type: "castVote", card: THREE });
  assert.equal(vote.ok, true);
  const voting = p2.sink.lastSnapshot();
  assert.equal(voting.players[0].hasVoted, true);
  assert.equal(voting.players[0].card, undefined);
  assert.equal(voting.players[1].hasVoted, false);

  await engine.handleMessage(p1.connId, { type: "reveal" });
  const revealed = p2.sink.lastSnapshot();
  assert.equal(revealed.roundState, "revealed");
  assert.deepEqual(revealed.players[0].card, THREE);
  assert.equal(revealed.players[1].card, undefined);
  assert.equal(revealed.aggregate?.voteCount, 1);
  assert.equal(revealed.aggregate?.average, 3);
  assert.equal(revealed.aggregate?.consensus, true);
  engine.shutdown();
});

test("admin leaving hands admin to the next player; last leave removes the game", async () => {
  const { registry, engine } = setupEngine();
  const code = registry.createGame();
  const p1 = await joinAs(engine, code, "Alice");
  const p2 = await joinAs(engine, code, "Bob");

  const left = await engine.handleMessage(p1.connId, { type: "leave" });
  assert.equal(left.ok, true);
  assert.deepEqual(p1.sink.last("left"), { type: "left", code: "AB12" });
  assert.equal(engine.bindingOf(p1.connId), null);

  const afterLeave = p2.sink.lastSnapshot();
  assert.equal(afterLeave.adminId, "p2");
  assert.deepEqual(
    afterLeave.players.map((p) => p.id),
    ["p2"]
  );

  await engine.handleMessage(p2.connId, { type: "leave" });
  assert.equal(registry.findSession(code), undefined);
  assert.equal(registry.size, 0);
  engine.shutdown();
});

test("a card outside the deck is rejected to the sender only", async () => {
  const { registry, engine } = setupEngine();
  const code = registry.createGame();
  const p1 = await joinAs(engine, code, "Alice");
  const p2 = await joinAs(engine, code, "Bob");
  await engine.handleMessage(p1.connId, { type: "startRound" });
  const p2Count = p2.sink.messages.length;

  const result = await engine.handleMessage(p1.connId, {
    type: "castVote",
    card: { label: "4", value: 4 },
  });
  assert.deepEqual(result, {
    ok: false,
    code: "UNKNOWN_CARD",
    message: "Card '4' is not part of deck 'Fibonacci'",
  });
  assert.deepEqual(p1.sink.messages[p1.sink.messages.length - 1], {
    type: "actionRejected",
    action: "castVote",
    code: "UNKNOWN_CARD",
    message: "Card '4' is not part of deck 'Fibonacci'",
  });
  assert.equal(p2.sink.messages.length, p2Count);
  assert.equal(registry.getSession(code).state.players.p1.vote, null);
  engine.shutdown();
});

test("joining an unknown game is rejected and the connection closed", async () => {
  const { engine } = setupEngine();
  const { sink, connId, result } = await joinAs(engine, "zz99", "Alice");

  assert.deepEqual(result, {
    ok: false,
    code: "GAME_NOT_FOUND",
    message: "No game with code 'ZZ99' exists",
  });
  assert.deepEqual(sink.messages, [
    {
      type: "joinRejected",
      reason: "game_not_found",
      message: "No game with code 'ZZ99' exists",
    },
  ]);
  assert.deepEqual(sink.closed, {
    code: CLOSE_GAME_NOT_FOUND,
    reason: "No game with code 'ZZ99' exists",
  });
  assert.equal(engine.bindingOf(connId), null);
});

test("only the admin may start and reveal rounds", async () => {
  const { registry, engine } = setupEngine();
  const code = registry.createGame();
  const p1 = await joinAs(engine, code, "Alice");
  const p2 = await joinAs(engine, code, "Bob");

  const start = await engine.handleMessage(p2.connId, { type: "startRound" });
  assert.equal(start.ok, false);
  assert.equal(p2.sink.last("actionRejected").code, "NOT_AUTHORIZED");

  await engine.handleMessage(p1.connId, { type: "startRound" });
  const reveal = await engine.handleMessage(p2.connId, { type: "reveal" });
  assert.equal(reveal.ok, false);
  assert.equal(p2.sink.last("actionRejected").action, "reveal");
  assert.equal(registry.getSession(code).state.roundState, "voting");
  engine.shutdown();
});

test("startRound carries the ticket URL into the snapshot", async () => {
  const { registry, engine } = setupEngine();
  const code = registry.createGame();
  const p1 = await joinAs(engine, code, "Alice");

  await engine.handleMessage(p1.connId, {
    type: "startRound",
    ticketUrl: "https://tracker.example/T-1",
  });
  assert.equal(p1.sink.lastSnapshot().ticketUrl, "https://tracker.example/T-1");
  engine.shutdown();
});

test("observers cannot vote", async () => {
  const { registry, engine } = setupEngine();
  const code = registry.createGame();
  const p1 = await joinAs(engine, code, "Alice");
  const p2 = await joinAs(engine, code, "Bob");
  await engine.handleMessage(p1.connId, { type: "startRound" });

  await engine.handleMessage(p2.connId, { type: "observe" });
  assert.equal(p1.sink.lastSnapshot().players[1].observing, true);

  const vote = await engine.handleMessage(p2.connId, { type: "castVote", card: THREE });
  assert.equal(vote.ok, false);
  assert.equal(p2.sink.last("actionRejected").code, "INVALID_STATE");
  engine.shutdown();
});

test("sync answers the requesting connection only", async () => {
  const { registry, engine } = setupEngine();
  const code = registry.createGame();
  const p1 = await joinAs(engine, code, "Alice");
  const p2 = await joinAs(engine, code, "Bob");
  const before = { p1: p1.sink.messages.length, p2: p2.sink.messages.length };

  const result = await engine.handleMessage(p2.connId, { type: "sync" });
  assert.deepEqual(result, { ok: true, stateChanged: false, events: [] });
  assert.equal(p1.sink.messages.length, before.p1);
  assert.equal(p2.sink.messages.length, before.p2 + 1);
  assert.equal(p2.sink.lastSnapshot().players.length, 2);
  engine.shutdown();
});

test("actions before joining are rejected with NOT_JOINED", async () => {
  const { engine } = setupEngine();
  const sink = new FakeSink();
  const connId = engine.connect(sink);

  const result = await engine.handleMessage(connId, { type: "reveal" });
  assert.equal(result.ok, false);
  assert.deepEqual(sink.messages, [
    {
      type: "actionRejected",
      action: "reveal",
      code: "NOT_JOINED",
      message: "Join a game first",
    },
  ]);

  await engine.handleMessage(connId, { type: "leave" });
  assert.deepEqual(sink.last("left"), { type: "left", code: null });
});

test("malformed input gets structured errors", async () => {
  const { engine } = setupEngine({ maxPayloadBytes: 64 });
  const sink = new FakeSink();
  const connId = engine.connect(sink);

  await engine.handleRaw(connId, "not json");
  await engine.handleRaw(connId, JSON.stringify({ type: "dance" }));
  await engine.handleRaw(connId, JSON.stringify({ type: "join", code: "A" }));
  await engine.handleRaw(connId, "x".repeat(65));

  assert.deepEqual(
    sink.ofType("error").map((m) => m.code),
    ["BAD_REQUEST", "INVALID_PAYLOAD", "INVALID_PAYLOAD", "PAYLOAD_TOO_LARGE"]
  );
});

test("messages over the rate limit are dropped", async () => {
  const { engine } = setupEngine({ rateLimitMaxMessages: 2, rateLimitWindowMs: 60_000 });
  const sink = new FakeSink();
  const connId = engine.connect(sink);
  const sync = JSON.stringify({ type: "sync" });

  await engine.handleRaw(connId, sync);
  await engine.handleRaw(connId, sync);
  const third = await engine.handleRaw(connId, sync);

  assert.deepEqual(third, { ok: false, code: "RATE_LIMITED", message: "Too many messages" });
  assert.deepEqual(sink.last("error"), {
    type: "error",
    code: "RATE_LIMITED",
    message: "Too many messages",
  });
});

test("handleRaw dispatches valid JSON messages", async () => {
  const { registry, engine } = setupEngine();
  const code = registry.createGame();
  const sink = new FakeSink();
  const connId = engine.connect(sink);

  const result = await engine.handleRaw(
    connId,
    JSON.stringify({ type: "join", code, name: "Alice" })
  );
  assert.equal(result.ok, true);
  assert.deepEqual(engine.bindingOf(connId), { code: "AB12", playerId: "p1" });
  engine.shutdown();
});

test("a second connection for the same player replaces the first", async () => {
  const { registry, engine } = setupEngine();
  const code = registry.createGame();
  const first = await joinAs(engine, code, "Alice");

  const second = await joinAs(engine, code, "", "p1");
  assert.deepEqual(first.sink.closed, {
    code: CLOSE_REPLACED,
    reason: "Replaced by a newer connection",
  });
  assert.equal(engine.bindingOf(first.connId), null);
  assert.deepEqual(second.sink.last("joinAck"), {
    type: "joinAck",
    code: "AB12",
    playerId: "p1",
    isAdmin: true,
  });
  assert.equal(second.sink.lastSnapshot().players[0].displayName, "Alice");

  // the replaced transport closing afterwards must not disconnect the player
  await engine.disconnect(first.connId);
  assert.equal(registry.getSession(code).state.players.p1.connected, true);
  assert.equal(engine.pendingGraceTimers, 0);
  engine.shutdown();
});

test("disconnect keeps the player until the grace period expires", async () => {
  const { registry, engine } = setupEngine({ reconnectGraceMs: 20 });
  const code = registry.createGame();
  const p1 = await joinAs(engine, code, "Alice");
  const p2 = await joinAs(engine, code, "Bob");

  await engine.disconnect(p1.connId);
  const during = p2.sink.lastSnapshot();
  assert.equal(during.adminId, "p1");
  assert.equal(during.players[0].connected, false);
  assert.equal(engine.pendingGraceTimers, 1);

  await sleep(80);
  assert.equal(engine.pendingGraceTimers, 0);
  const after = p2.sink.lastSnapshot();
  assert.equal(after.adminId, "p2");
  assert.deepEqual(
    after.players.map((p) => p.id),
    ["p2"]
  );
  engine.shutdown();
});

test("grace expiry of the last player removes the game", async () => {
  const { registry, engine } = setupEngine({ reconnectGraceMs: 10 });
  const code = registry.createGame();
  const p1 = await joinAs(engine, code, "Alice");

  await engine.disconnect(p1.connId);
  assert.equal(registry.size, 1);
  await sleep(60);
  assert.equal(registry.size, 0);
  engine.shutdown();
});

test("rejoining within the grace period keeps vote and admin", async () => {
  const { registry, engine } = setupEngine({ reconnectGraceMs: 60_000 });
  const code = registry.createGame();
  const p1 = await joinAs(engine, code, "Alice");
  const p2 = await joinAs(engine, code, "Bob");
  await engine.handleMessage(p1.connId, { type: "startRound" });
  await engine.handleMessage(p1.connId, { type: "castVote", card: THREE });

  await engine.disconnect(p1.connId);
  assert.equal(engine.pendingGraceTimers, 1);

  const back = await joinAs(engine, code, "Alice", "p1");
  assert.equal(engine.pendingGraceTimers, 0);
  assert.equal(back.sink.last("joinAck").isAdmin, true);
  const snapshot = p2.sink.lastSnapshot();
  assert.equal(snapshot.adminId, "p1");
  assert.equal(snapshot.players[0].connected, true);
  assert.equal(snapshot.players[0].hasVoted, true);
  engine.shutdown();
});

test("a failed delivery counts as a disconnect and the rest get a fresh snapshot", async () => {
  const { registry, engine } = setupEngine({ reconnectGraceMs: 60_000 });
  const code = registry.createGame();
  const p1 = await joinAs(engine, code, "Alice");
  const p2 = await joinAs(engine, code, "Bob");
  p2.sink.failing = true;
  const before = p1.sink.ofType("snapshot").length;

  await engine.handleMessage(p1.connId, { type: "startRound" });

  const snapshots = p1.sink.ofType("snapshot").slice(before);
  assert.equal(snapshots.length, 2);
  assert.equal(snapshots[0].players[1].connected, true);
  assert.equal(snapshots[1].players[1].connected, false);
  assert.equal(snapshots[1].roundState, "voting");
  assert.deepEqual(p2.sink.closed, { code: CLOSE_SEND_FAILED, reason: "Delivery failed" });
  assert.equal(engine.bindingOf(p2.connId), null);
  assert.equal(engine.pendingGraceTimers, 1);
  engine.shutdown();
});

test("concurrent commands are broadcast in queue order", async () => {
  const { registry, engine } = setupEngine();
  const code = registry.createGame();
  const p1 = await joinAs(engine, code, "Alice");
  const before = p1.sink.ofType("snapshot").length;

  await Promise.all([
    engine.handleMessage(p1.connId, { type: "startRound" }),
    engine.handleMessage(p1.connId, { type: "reveal" }),
    engine.handleMessage(p1.connId, { type: "startRound" }),
  ]);

  const states = p1.sink
    .ofType("snapshot")
    .slice(before)
    .map((s) => `${s.roundState}:${s.round}`);
  assert.deepEqual(states, ["voting:1", "revealed:1", "voting:2"]);
  engine.shutdown();
});

test("joining another game releases the previous binding", async () => {
  const { registry, engine } = setupEngine({ reconnectGraceMs: 60_000 });
  const first = registry.createGame();
  const second = registry.createGame();
  assert.equal(second, "CD34");

  const p1 = await joinAs(engine, first, "Alice");
  await engine.handleMessage(p1.connId, { type: "join", code: second, name: "Alice" });

  assert.deepEqual(engine.bindingOf(p1.connId), { code: "CD34", playerId: "p2" });
  assert.equal(registry.getSession(first).state.players.p1.connected, false);
  assert.equal(registry.getSession(first).hub.size, 0);
  assert.equal(engine.pendingGraceTimers, 1);
  engine.shutdown();
});

test("messages from one connection are handled in arrival order", async () => {
  const { registry, engine } = setupEngine();
  const code = registry.createGame();
  const sink = new FakeSink();
  const connId = engine.connect(sink);

  const [joined, started, voted] = await Promise.all([
    engine.handleRaw(connId, JSON.stringify({ type: "join", code, name: "Alice" })),
    engine.handleRaw(connId, JSON.stringify({ type: "startRound" })),
    engine.handleMessage(connId, { type: "castVote", card: THREE }),
  ]);

  assert.equal(joined.ok, true);
  assert.equal(started.ok, true);
  assert.equal(voted.ok, true);
  assert.equal(registry.getSession(code).state.roundState, "voting");
  assert.deepEqual(registry.getSession(code).state.players.p1.vote, THREE);
  assert.equal(sink.ofType("actionRejected").length, 0);
  engine.shutdown();
});

test("observing after reveal keeps the revealed card and aggregate", async () => {
  const { registry, engine } = setupEngine();
  const code = registry.createGame();
  const p1 = await joinAs(engine, code, "Alice");
  const p2 = await joinAs(engine, code, "Bob");
  await engine.handleMessage(p1.connId, { type: "startRound" });
  await engine.handleMessage(p1.connId, { type: "castVote", card: THREE });
  await engine.handleMessage(p2.connId, { type: "castVote", card: { label: "8", value: 8 } });
  await engine.handleMessage(p1.connId, { type: "reveal" });
  assert.equal(p1.sink.lastSnapshot().aggregate?.average, 5.5);

  await engine.handleMessage(p2.connId, { type: "observe" });
  const snapshot = p1.sink.lastSnapshot();
  assert.equal(snapshot.roundState, "revealed");
  assert.equal(snapshot.players[1].observing, true);
  assert.deepEqual(snapshot.players[1].card, { label: "8", value: 8 });
  assert.equal(snapshot.aggregate?.average, 5.5);
  engine.shutdown();
});

test("a failed direct reply counts as a disconnect", async () => {
  const { registry, engine } = setupEngine({ reconnectGraceMs: 60_000 });
  const code = registry.createGame();
  const p1 = await joinAs(engine, code, "Alice");
  const p2 = await joinAs(engine, code, "Bob");
  p2.sink.failing = true;

  const result = await engine.handleMessage(p2.connId, { type: "reveal" });
  assert.equal(result.ok, false);
  assert.deepEqual(p2.sink.closed, { code: CLOSE_SEND_FAILED, reason: "Delivery failed" });
  assert.equal(engine.bindingOf(p2.connId), null);
  assert.equal(p1.sink.lastSnapshot().players[1].connected, false);
  assert.equal(engine.pendingGraceTimers, 1);
  engine.shutdown();
});

test("a failed error reply outside a session task also disconnects", async () => {
  const { registry, engine } = setupEngine({ reconnectGraceMs: 60_000 });
  const code = registry.createGame();
  const p1 = await joinAs(engine, code, "Alice");
  const p2 = await joinAs(engine, code, "Bob");
  p2.sink.failing = true;

  const result = await engine.handleRaw(p2.connId, "not json");
  assert.deepEqual(result, { ok: false, code: "BAD_REQUEST", message: "Invalid JSON" });
  assert.deepEqual(p2.sink.closed, { code: CLOSE_SEND_FAILED, reason: "Delivery failed" });
  assert.equal(registry.getSession(code).state.players.p2.connected, false);
  assert.equal(p1.sink.lastSnapshot().players[1].connected, false);
  engine.shutdown();
});
