import type { CellPosition, ShapeId } from "@blockduel/shared/types";
import { SHAPE_IDS } from "@blockduel/shared/types";

export interface ShapeDefinition {
  /** Row-major occupancy matrix, 1 = filled. */
  matrix: number[][];
  /** Relative weight under the strategic selection mode. */
  strategicWeight: number;
}

// Small, compact shapes weigh more under strategic selection since they
// are the ones most likely to still fit on a crowded board.
const SHAPES: Record<ShapeId, ShapeDefinition> = {
  squareSmall: { matrix: [[1, 1], [1, 1]], strategicWeight: 5 },
  squareBig: { matrix: [[1, 1, 1], [1, 1, 1], [1, 1, 1]], strategicWeight: 1 },
  rectWide: { matrix: [[1, 1, 1], [1, 1, 1]], strategicWeight: 2 },
  rectTall: { matrix: [[1, 1], [1, 1], [1, 1]], strategicWeight: 2 },
  stick3: { matrix: [[1, 1, 1]], strategicWeight: 5 },
  stick3Vert: { matrix: [[1], [1], [1]], strategicWeight: 5 },
  stick4: { matrix: [[1, 1, 1, 1]], strategicWeight: 3 },
  stick4Vert: { matrix: [[1], [1], [1], [1]], strategicWeight: 3 },
  stick5: { matrix: [[1, 1, 1, 1, 1]], strategicWeight: 2 },
  stick5Vert: { matrix: [[1], [1], [1], [1], [1]], strategicWeight: 2 },
  lShapeSit: { matrix: [[1, 1], [1, 0], [1, 0]], strategicWeight: 4 },
  lShapeReversed: { matrix: [[1, 0, 0], [1, 1, 1]], strategicWeight: 4 },
  lShapeStand: { matrix: [[1, 0], [1, 0], [1, 1]], strategicWeight: 4 },
  lShapeLayingDown: { matrix: [[1, 1, 1], [1, 0, 0]], strategicWeight: 4 },
  tShapeDown: { matrix: [[0, 1, 0], [1, 1, 1]], strategicWeight: 4 },
  tShapeUp: { matrix: [[1, 1, 1], [0, 1, 0]], strategicWeight: 4 },
  blockSingle: { matrix: [[1]], strategicWeight: 6 },
  cornerTopLeft: { matrix: [[1, 0], [1, 1]], strategicWeight: 5 },
  cornerTopRight: { matrix: [[0, 1], [1, 1]], strategicWeight: 5 },
  cornerBottomLeft: { matrix: [[1, 1], [1, 0]], strategicWeight: 5 },
  cornerBottomRight: { matrix: [[1, 1], [0, 1]], strategicWeight: 5 },
  cross: { matrix: [[0, 1, 0], [1, 1, 1], [0, 1, 0]], strategicWeight: 2 },
};

/** Catalog order. Generation indexes into this list, so it must never be reordered. */
export const SHAPE_ORDER: readonly ShapeId[] = SHAPE_IDS;

export function getShape(shape: ShapeId): ShapeDefinition {
  return SHAPES[shape];
}

/** Filled cells of a shape, scanned row by row. */
export function shapeCells(shape: ShapeId): CellPosition[] {
  const cells: CellPosition[] = [];
  const { matrix } = SHAPES[shape];
  for (let row = 0; row < matrix.length; row++) {
    for (let column = 0; column < matrix[row].length; column++) {
      if (matrix[row][column]) cells.push({ row, column });
    }
  }
  return cells;
}

export function cellCount(shape: ShapeId): number {
  return shapeCells(shape).length;
}
