import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { MatchHandle } from "@blockduel/shared/types";
import { asPlayer, buildTestRelay, type TestRelay } from "../setup.js";

let relay: TestRelay;

beforeEach(async () => {
  relay = await buildTestRelay();
});

afterEach(async () => {
  await relay.app.close();
});

async function findMatch(playerId: string, body: Record<string, string> = {}) {
  return relay.app.inject({
    method: "POST",
    url: "/api/matches",
    headers: asPlayer(playerId),
    payload: body,
  });
}

async function activeMatch(): Promise<MatchHandle> {
  const res = await findMatch("alice", { opponentId: "bob" });
  return res.json().match;
}

describe("GET /health", () => {
  it("reports ok", async () => {
    const res = await relay.app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json().status).toBe("ok");
  });
});

describe("identity", () => {
  it("rejects requests without x-player-id", async () => {
    const res = await relay.app.inject({ method: "GET", url: "/api/matches" });
    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ error: "Unauthorized" });
  });
});

describe("POST /api/matches", () => {
  it("queues the first automatch request", async () => {
    const res = await findMatch("alice", { displayName: "Alice" });
    expect(res.statusCode).toBe(202);
    const body = res.json();
    expect(body.status).toBe("queued");
    expect(body.match.status).toBe("open");
    expect(body.match.participants).toEqual([{ playerId: "alice", displayName: "Alice" }]);
    expect(body.match.currentParticipantId).toBeNull();
  });

  it("returns the same open match when the player asks again", async () => {
    const first = (await findMatch("alice")).json();
    const second = await findMatch("alice");
    expect(second.statusCode).toBe(202);
    expect(second.json().match.matchId).toBe(first.match.matchId);
    expect(relay.store.matches.size).toBe(1);
  });

  it("pairs a second player with the open match and notifies its creator", async () => {
    const queued = (await findMatch("alice")).json();
    const res = await findMatch("bob", { displayName: "Bob" });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.status).toBe("matched");
    expect(body.match.matchId).toBe(queued.match.matchId);
    expect(body.match.status).toBe("active");
    expect(body.match.currentParticipantId).toBe("alice");
    expect(body.match.participants).toEqual([
      { playerId: "alice", displayName: null },
      { playerId: "bob", displayName: "Bob" },
    ]);

    const pending = await relay.queue.list("alice");
    expect(pending).toHaveLength(1);
    expect(pending[0].type).toBe("match_found");
  });

  it("creates an active match for an invite and notifies the invitee", async () => {
    const res = await findMatch("alice", { opponentId: "bob" });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.match.status).toBe("active");
    expect(body.match.participants.map((p: { playerId: string }) => p.playerId)).toEqual([
      "alice",
      "bob",
    ]);

    const pending = await relay.queue.list("bob");
    expect(pending.map((e) => e.type)).toEqual(["match_found"]);
  });

  it("rejects inviting yourself", async () => {
    const res = await findMatch("alice", { opponentId: "alice" });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "Cannot invite yourself" });
  });
});

describe("GET /api/matches", () => {
  it("lists only the caller's unfinished matches", async () => {
    const match = await activeMatch();
    await findMatch("carol", { opponentId: "dave" });

    const res = await relay.app.inject({ method: "GET", url: "/api/matches", headers: asPlayer("bob") });
    expect(res.statusCode).toBe(200);
    expect(res.json().map((m: MatchHandle) => m.matchId)).toEqual([match.matchId]);
  });
});

describe("GET /api/matches/:id", () => {
  it("returns 404 for an unknown or malformed id", async () => {
    const unknown = await relay.app.inject({
      method: "GET",
      url: "/api/matches/00000000-0000-4000-8000-000000000000",
      headers: asPlayer("alice"),
    });
    expect(unknown.statusCode).toBe(404);

    const malformed = await relay.app.inject({
      method: "GET",
      url: "/api/matches/not-a-uuid",
      headers: asPlayer("alice"),
    });
    expect(malformed.statusCode).toBe(404);
  });

  it("returns 403 to a non-participant", async () => {
    const match = await activeMatch();
    const res = await relay.app.inject({
      method: "GET",
      url: `/api/matches/${match.matchId}`,
      headers: asPlayer("carol"),
    });
    expect(res.statusCode).toBe(403);
  });
});

describe("POST /api/matches/:id/turns", () => {
  async function submit(matchId: string, playerId: string, body: Record<string, string>) {
    return relay.app.inject({
      method: "POST",
      url: `/api/matches/${matchId}/turns`,
      headers: asPlayer(playerId),
      payload: body,
    });
  }

  it("stores the payload, passes the turn and notifies the opponent", async () => {
    const match = await activeMatch();
    await relay.queue.clear("bob");

    const res = await submit(match.matchId, "alice", { payload: "turn-1", nextParticipantId: "bob" });
    expect(res.statusCode).toBe(204);

    const stored = await relay.store.findById(match.matchId);
    expect(stored?.payload).toBe("turn-1");
    expect(stored?.currentParticipantId).toBe("bob");
    expect(stored?.turnCount).toBe(1);

    expect(await relay.queue.list("bob")).toEqual([
      { type: "turn_received", matchId: match.matchId, payload: "turn-1", fromPlayerId: "alice" },
    ]);
  });

  it("rejects a submit from the player who does not hold the turn", async () => {
    const match = await activeMatch();
    const res = await submit(match.matchId, "bob", { payload: "turn-1", nextParticipantId: "alice" });
    expect(res.statusCode).toBe(409);
    expect(res.json()).toEqual({ error: "Not your turn" });
  });

  it("rejects a next participant other than the opponent", async () => {
    const match = await activeMatch();
    const res = await submit(match.matchId, "alice", { payload: "turn-1", nextParticipantId: "carol" });
    expect(res.statusCode).toBe(400);
  });

  it("rejects an oversized payload", async () => {
    const match = await activeMatch();
    const res = await submit(match.matchId, "alice", {
      payload: "x".repeat(1025),
      nextParticipantId: "bob",
    });
    expect(res.statusCode).toBe(413);
    expect(res.json()).toEqual({ error: "Payload exceeds 1024 bytes" });
  });

  it("rejects a body without a payload", async () => {
    const match = await activeMatch();
    const res = await submit(match.matchId, "alice", { nextParticipantId: "bob" });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("Validation error");
  });

  it("rejects turns on a match still waiting for an opponent", async () => {
    const queued = (await findMatch("alice")).json();
    const res = await submit(queued.match.matchId, "alice", { payload: "turn-1", nextParticipantId: "bob" });
    expect(res.statusCode).toBe(409);
    expect(res.json()).toEqual({ error: "Match is not active" });
  });
});

describe("ending a match", () => {
  it("closes the match and forwards the final record", async () => {
    const match = await activeMatch();
    await relay.queue.clear("bob");

    const res = await relay.app.inject({
      method: "POST",
      url: `/api/matches/${match.matchId}/end`,
      headers: asPlayer("alice"),
      payload: { payload: "final" },
    });
    expect(res.statusCode).toBe(204);
    expect(await relay.queue.list("bob")).toEqual([
      { type: "match_ended", matchId: match.matchId, payload: "final", fromPlayerId: "alice" },
    ]);

    const stored = await relay.store.findById(match.matchId);
    expect(stored?.status).toBe("ended");
    expect(stored?.currentParticipantId).toBeNull();

    const again = await relay.app.inject({
      method: "POST",
      url: `/api/matches/${match.matchId}/end`,
      headers: asPlayer("bob"),
      payload: { payload: "final" },
    });
    expect(again.statusCode).toBe(409);
  });

  it("reports a quit without a final record", async () => {
    const match = await activeMatch();
    await relay.queue.clear("bob");

    const res = await relay.app.inject({
      method: "POST",
      url: `/api/matches/${match.matchId}/quit`,
      headers: asPlayer("alice"),
      payload: {},
    });
    expect(res.statusCode).toBe(204);
    expect(await relay.queue.list("bob")).toEqual([
      { type: "participant_quit", matchId: match.matchId, playerId: "alice", payload: null },
    ]);

    const list = await relay.app.inject({ method: "GET", url: "/api/matches", headers: asPlayer("alice") });
    expect(list.json()).toEqual([]);
  });
});
