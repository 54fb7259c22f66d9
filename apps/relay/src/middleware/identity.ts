import type { FastifyRequest } from "fastify";
import { HttpError } from "../lib/http-error.js";

const PLAYER_ID_HEADER = "x-player-id";
const MAX_PLAYER_ID_LENGTH = 200;

/**
 * The relay trusts the platform identity the client presents; sign-in
 * happens before a client ever talks to it.
 */
export function requirePlayer(request: FastifyRequest): string {
  const header = request.headers[PLAYER_ID_HEADER];
  const playerId = (Array.isArray(header) ? header[0] : header)?.trim();
  if (!playerId || playerId.length > MAX_PLAYER_ID_LENGTH) {
    throw new HttpError(401, "Unauthorized");
  }
  return playerId;
}
