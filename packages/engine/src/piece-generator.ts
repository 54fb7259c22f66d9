import type { PieceDescriptor, SelectionMode, ShapeId } from "@blockduel/shared/types";
import { COLOR_NAMES } from "@blockduel/shared/types";
import { SHAPE_ORDER, cellCount, getShape, shapeCells } from "./pieces.js";
import { SeededRandom, colorSeed, mixTurn } from "./random.js";

export const PIECES_PER_TURN = 3;

function weightFor(shape: ShapeId, mode: SelectionMode): number {
  switch (mode.kind) {
    case "uniform":
      return 1;
    case "strategic":
      return getShape(shape).strategicWeight;
    case "skewed":
      return 10 + mode.difficulty * (cellCount(shape) - 1);
  }
}

function pickShape(rng: SeededRandom, mode: SelectionMode): ShapeId {
  if (mode.kind === "uniform") {
    return SHAPE_ORDER[rng.nextInt(SHAPE_ORDER.length)];
  }
  const weights = SHAPE_ORDER.map((shape) => weightFor(shape, mode));
  const total = weights.reduce((sum, w) => sum + w, 0);
  let roll = rng.nextInt(total);
  for (let i = 0; i < SHAPE_ORDER.length; i++) {
    if (roll < weights[i]) return SHAPE_ORDER[i];
    roll -= weights[i];
  }
  return SHAPE_ORDER[SHAPE_ORDER.length - 1];
}

/**
 * Pending pieces for a turn. Pure: the same seed, turn number and mode give
 * the same ordered pieces on every device.
 */
export function generatePieces(
  seed: bigint,
  turnNumber: number,
  mode: SelectionMode,
): PieceDescriptor[] {
  const shapes = new SeededRandom(mixTurn(seed, turnNumber));
  const colors = new SeededRandom(colorSeed(seed, turnNumber));

  const pieces: PieceDescriptor[] = [];
  for (let i = 0; i < PIECES_PER_TURN; i++) {
    const shape = pickShape(shapes, mode);
    pieces.push({
      shape,
      color: COLOR_NAMES[colors.nextInt(COLOR_NAMES.length)],
      cells: shapeCells(shape),
    });
  }
  return pieces;
}

/** Order-sensitive, exact comparison of two piece sequences. */
export function piecesEqual(a: readonly PieceDescriptor[], b: readonly PieceDescriptor[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((piece, i) => pieceEquals(piece, b[i]));
}

export function pieceEquals(a: PieceDescriptor, b: PieceDescriptor): boolean {
  if (a.shape !== b.shape || a.color !== b.color) return false;
  if (a.cells.length !== b.cells.length) return false;
  return a.cells.every((cell, i) => cell.row === b.cells[i].row && cell.column === b.cells[i].column);
}
