import type { FastifyInstance } from "fastify";
import { z } from "zod";
import {
  endMatchSchema,
  findMatchSchema,
  quitMatchSchema,
  submitTurnSchema,
} from "@blockduel/shared/schemas";
import type { FindMatchResponse } from "@blockduel/shared/types";
import { HttpError } from "../lib/http-error.js";
import { requirePlayer } from "../middleware/identity.js";
import {
  isMatchParticipant,
  otherParticipant,
  toHandle,
  type MatchStore,
  type StoredMatch,
} from "../store/match-store.js";
import type { ConnectionHub } from "../ws/handler.js";

export interface MatchRoutesOptions {
  store: MatchStore;
  hub: ConnectionHub;
  maxPayloadBytes: number;
}

const matchIdSchema = z.string().uuid();

type MatchParams = { Params: { id: string } };

export async function matchRoutes(app: FastifyInstance, opts: MatchRoutesOptions) {
  const { store, hub, maxPayloadBytes } = opts;

  async function loadForParticipant(id: string, playerId: string): Promise<StoredMatch> {
    const match = matchIdSchema.safeParse(id).success ? await store.findById(id) : null;
    if (!match) throw new HttpError(404, "Match not found");
    if (!isMatchParticipant(match, playerId)) {
      throw new HttpError(403, "Not a participant in this match");
    }
    return match;
  }

  function checkPayloadSize(payload: string) {
    if (Buffer.byteLength(payload, "utf8") > maxPayloadBytes) {
      throw new HttpError(413, `Payload exceeds ${maxPayloadBytes} bytes`);
    }
  }

  // Find or create a match
  app.post("/api/matches", async (request, reply) => {
    const playerId = requirePlayer(request);
    const body = findMatchSchema.parse(request.body ?? {});
    const displayName = body.displayName ?? null;

    if (body.opponentId !== undefined) {
      if (body.opponentId === playerId) throw new HttpError(400, "Cannot invite yourself");
      const match = await store.create({
        playerOneId: playerId,
        playerOneName: displayName,
        playerTwoId: body.opponentId,
        playerTwoName: null,
      });
      await hub.sendToPlayer(body.opponentId, { type: "match_found", match: toHandle(match) });
      const response: FindMatchResponse = { status: "matched", match: toHandle(match) };
      return reply.status(200).send(response);
    }

    const open = await store.findOpenMatch(playerId);
    if (open) {
      const joined = await store.join(open.id, playerId, displayName);
      if (joined) {
        await hub.sendToPlayer(joined.playerOneId, { type: "match_found", match: toHandle(joined) });
        const response: FindMatchResponse = { status: "matched", match: toHandle(joined) };
        return reply.status(200).send(response);
      }
    }

    // Someone already waiting keeps their one open match
    const active = await store.listActiveFor(playerId);
    const waiting =
      active.find((m) => m.status === "open") ??
      (await store.create({ playerOneId: playerId, playerOneName: displayName }));
    const response: FindMatchResponse = { status: "queued", match: toHandle(waiting) };
    return reply.status(202).send(response);
  });

  app.get("/api/matches", async (request) => {
    const playerId = requirePlayer(request);
    const active = await store.listActiveFor(playerId);
    return active.map(toHandle);
  });

  app.get<MatchParams>("/api/matches/:id", async (request) => {
    const playerId = requirePlayer(request);
    const match = await loadForParticipant(request.params.id, playerId);
    return toHandle(match);
  });

  // Hand the turn to the other participant
  app.post<MatchParams>("/api/matches/:id/turns", async (request, reply) => {
    const playerId = requirePlayer(request);
    const body = submitTurnSchema.parse(request.body);
    const match = await loadForParticipant(request.params.id, playerId);

    if (match.status !== "active") throw new HttpError(409, "Match is not active");
    if (match.currentParticipantId !== playerId) throw new HttpError(409, "Not your turn");
    const next = otherParticipant(match, playerId);
    if (next === null || body.nextParticipantId !== next) {
      throw new HttpError(400, "nextParticipantId must be the other participant");
    }
    checkPayloadSize(body.payload);

    const updated = await store.recordTurn(match.id, {
      payload: body.payload,
      expectedCurrentId: playerId,
      nextParticipantId: next,
    });
    if (!updated) throw new HttpError(409, "Turn already advanced");

    await hub.sendToPlayer(next, {
      type: "turn_received",
      matchId: match.id,
      payload: body.payload,
      fromPlayerId: playerId,
    });
    return reply.status(204).send();
  });

  app.post<MatchParams>("/api/matches/:id/end", async (request, reply) => {
    const playerId = requirePlayer(request);
    const body = endMatchSchema.parse(request.body);
    const match = await loadForParticipant(request.params.id, playerId);
    checkPayloadSize(body.payload);

    const closed = await store.close(match.id, body.payload);
    if (!closed) throw new HttpError(409, "Match already ended");

    const other = otherParticipant(match, playerId);
    if (other) {
      await hub.sendToPlayer(other, {
        type: "match_ended",
        matchId: match.id,
        payload: body.payload,
        fromPlayerId: playerId,
      });
    }
    return reply.status(204).send();
  });

  app.post<MatchParams>("/api/matches/:id/quit", async (request, reply) => {
    const playerId = requirePlayer(request);
    const body = quitMatchSchema.parse(request.body ?? {});
    const match = await loadForParticipant(request.params.id, playerId);
    const payload = body.payload ?? null;
    if (payload !== null) checkPayloadSize(payload);

    const closed = await store.close(match.id, payload);
    if (!closed) throw new HttpError(409, "Match already ended");

    const other = otherParticipant(match, playerId);
    if (other) {
      await hub.sendToPlayer(other, {
        type: "participant_quit",
        matchId: match.id,
        playerId,
        payload,
      });
    }
    return reply.status(204).send();
  });
}
