// ===== Board =====

export const BOARD_SIZE = 8;

export const COLOR_NAMES = [
  "blue",
  "red",
  "green",
  "orange",
  "purple",
  "yellow",
  "pink",
  "teal",
] as const;

export type ColorName = (typeof COLOR_NAMES)[number];

/** A board cell: empty, or the color of the piece that filled it. */
export type Cell = ColorName | null;

/** Row-major 8x8 grid. */
export type Grid = Cell[][];

export interface CellPosition {
  row: number;
  column: number;
}

// ===== Pieces =====

export const SHAPE_IDS = [
  "squareSmall",
  "squareBig",
  "rectWide",
  "rectTall",
  "stick3",
  "stick3Vert",
  "stick4",
  "stick4Vert",
  "stick5",
  "stick5Vert",
  "lShapeSit",
  "lShapeReversed",
  "lShapeStand",
  "lShapeLayingDown",
  "tShapeDown",
  "tShapeUp",
  "blockSingle",
  "cornerTopLeft",
  "cornerTopRight",
  "cornerBottomLeft",
  "cornerBottomRight",
  "cross",
] as const;

export type ShapeId = (typeof SHAPE_IDS)[number];

export interface PieceDescriptor {
  shape: ShapeId;
  color: ColorName;
  /** Offsets relative to the piece origin, in generation order. */
  cells: CellPosition[];
}

export type SelectionMode =
  | { kind: "uniform" }
  | { kind: "strategic" }
  | { kind: "skewed"; difficulty: number };

// ===== Match Record =====

export const MATCH_FORMAT_VERSION = "1.0.0";

export interface Move {
  piece: PieceDescriptor;
  origin: CellPosition;
  scoreDelta: number;
  linesCleared: number;
  timestamp: string;
}

export interface PlayerState {
  playerId: string;
  displayName: string | null;
  score: number;
  board: Grid;
  isBoardLocked: boolean;
  moveHistory: Move[];
}

export type EndReason =
  | "lockout"
  | "resignation"
  | "disconnect"
  | "timeout"
  | "scoreLead";

export interface SyncIncident {
  turnNumber: number;
  reportedBy: string;
  reason: string;
  previousSeed: string;
  at: string;
}

export interface MatchRecord {
  formatVersion: string;
  matchId: string;
  players: [PlayerState, PlayerState];
  turnHolderId: string;
  turnNumber: number;
  /** Unsigned 64-bit seed, decimal string. */
  randomSeed: string;
  selectionMode: SelectionMode;
  pendingPieces: PieceDescriptor[];
  startedAt: string;
  lastUpdatedAt: string;
  ended: boolean;
  winnerId: string | null;
  endReason: EndReason | null;
  endedBy: string | null;
  endedAt: string | null;
  syncIncidents: SyncIncident[];
}

// ===== Relay =====

export type MatchStatus = "open" | "active" | "ended";

export interface MatchParticipant {
  playerId: string;
  displayName: string | null;
}

/** What the relay knows about a match. The payload is an opaque encoded MatchRecord. */
export interface MatchHandle {
  matchId: string;
  status: MatchStatus;
  participants: MatchParticipant[];
  currentParticipantId: string | null;
  payload: string | null;
  turnCount: number;
  createdAt: string;
  updatedAt: string;
}

export type FindMatchResponse =
  | { status: "queued"; match: MatchHandle }
  | { status: "matched"; match: MatchHandle };

// ===== Relay WebSocket Events =====

/** Events sent from Client → Relay */
export type RelayClientEvent = { type: "ping" };

/** Events sent from Relay → Client */
export type RelayServerEvent =
  | { type: "match_found"; match: MatchHandle }
  | { type: "turn_received"; matchId: string; payload: string; fromPlayerId: string }
  | { type: "match_ended"; matchId: string; payload: string; fromPlayerId: string }
  | { type: "participant_quit"; matchId: string; playerId: string; payload: string | null }
  | { type: "pong" };
