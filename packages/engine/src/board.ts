import type { Cell, CellPosition, Grid, Move, PieceDescriptor } from "@blockduel/shared/types";
import { BOARD_SIZE, COLOR_NAMES } from "@blockduel/shared/types";

/**
 * Placement rules the match core needs from the single-player engine.
 * `referencePlacementRules` below is the default; a host game may supply
 * its own as long as both clients use the same one.
 */
export interface PlacementRules {
  canPlace(board: Grid, piece: PieceDescriptor, origin: CellPosition): boolean;
  hasAnyPlacement(board: Grid, piece: PieceDescriptor): boolean;
}

/** Copy-in/copy-out access to the live engine's board. Calls are synchronous. */
export interface BoardBridge {
  captureBoard(): Grid;
  restoreBoard(board: Grid): void;
}

export interface ClearResult {
  rowsCleared: number;
  columnsCleared: number;
  linesCleared: number;
}

export const POINTS_PER_CELL = 1;
export const POINTS_PER_LINE = 10;
export const COMBO_BONUS = 500;

export function createBoard(): Grid {
  return Array.from({ length: BOARD_SIZE }, () =>
    Array.from({ length: BOARD_SIZE }, (): Cell => null)
  );
}

export function cloneBoard(board: Grid): Grid {
  return board.map((row) => [...row]);
}

export function isInBounds({ row, column }: CellPosition): boolean {
  return row >= 0 && row < BOARD_SIZE && column >= 0 && column < BOARD_SIZE;
}

/** True when the grid is 8x8 and every cell is empty or a palette color. */
export function isWellFormedBoard(board: unknown): board is Grid {
  if (!Array.isArray(board) || board.length !== BOARD_SIZE) return false;
  return board.every(
    (row) =>
      Array.isArray(row) &&
      row.length === BOARD_SIZE &&
      row.every((cell) => cell === null || COLOR_NAMES.some((c) => c === cell))
  );
}

export function canPlace(board: Grid, piece: PieceDescriptor, origin: CellPosition): boolean {
  for (const cell of piece.cells) {
    const target = { row: origin.row + cell.row, column: origin.column + cell.column };
    if (!isInBounds(target)) return false;
    if (board[target.row][target.column] !== null) return false;
  }
  return true;
}

export function placePiece(board: Grid, piece: PieceDescriptor, origin: CellPosition): Grid {
  const newBoard = cloneBoard(board);
  for (const cell of piece.cells) {
    const row = origin.row + cell.row;
    const column = origin.column + cell.column;
    if (isInBounds({ row, column })) {
      newBoard[row][column] = piece.color;
    }
  }
  return newBoard;
}

/** Clears every full row and column at once, so a cell on both counts once. */
export function clearLines(board: Grid): { newBoard: Grid; result: ClearResult } {
  const fullRows: number[] = [];
  const fullColumns: number[] = [];
  for (let i = 0; i < BOARD_SIZE; i++) {
    if (board[i].every((cell) => cell !== null)) fullRows.push(i);
    if (board.every((row) => row[i] !== null)) fullColumns.push(i);
  }

  const newBoard = cloneBoard(board);
  for (const row of fullRows) {
    for (let column = 0; column < BOARD_SIZE; column++) newBoard[row][column] = null;
  }
  for (const column of fullColumns) {
    for (let row = 0; row < BOARD_SIZE; row++) newBoard[row][column] = null;
  }

  return {
    newBoard,
    result: {
      rowsCleared: fullRows.length,
      columnsCleared: fullColumns.length,
      linesCleared: fullRows.length + fullColumns.length,
    },
  };
}

export function scorePlacement(piece: PieceDescriptor, result: ClearResult): number {
  let score = piece.cells.length * POINTS_PER_CELL + result.linesCleared * POINTS_PER_LINE;
  if (result.rowsCleared > 0 && result.columnsCleared > 0) score += COMBO_BONUS;
  return score;
}

export interface Placement {
  board: Grid;
  move: Move;
}

/** Places, clears and scores one piece. Null when the piece does not fit at `origin`. */
export function playPiece(
  board: Grid,
  piece: PieceDescriptor,
  origin: CellPosition,
  at: Date = new Date(),
): Placement | null {
  if (!canPlace(board, piece, origin)) return null;
  const { newBoard, result } = clearLines(placePiece(board, piece, origin));
  return {
    board: newBoard,
    move: {
      piece,
      origin: { ...origin },
      scoreDelta: scorePlacement(piece, result),
      linesCleared: result.linesCleared,
      timestamp: at.toISOString(),
    },
  };
}

export function hasAnyPlacement(board: Grid, piece: PieceDescriptor): boolean {
  for (let row = 0; row < BOARD_SIZE; row++) {
    for (let column = 0; column < BOARD_SIZE; column++) {
      if (canPlace(board, piece, { row, column })) return true;
    }
  }
  return false;
}

/** Locked out: no pending piece fits anywhere. */
export function isBoardLocked(
  board: Grid,
  pieces: readonly PieceDescriptor[],
  rules: PlacementRules = referencePlacementRules,
): boolean {
  return !pieces.some((piece) => rules.hasAnyPlacement(board, piece));
}

export const referencePlacementRules: PlacementRules = {
  canPlace,
  hasAnyPlacement,
};

// Serialize board for logs and test failure output
export function serializeBoard(board: Grid): string {
  return board.map((row) => row.map((cell) => (cell === null ? "." : "#")).join("")).join("\n");
}
