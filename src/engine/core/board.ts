import { PIECES } from "./pieces";
import {
  type Board,
  type ActivePiece,
  type PieceId,
  ALL_PIECES,
  BOARD_HEIGHT,
  BOARD_WIDTH,
  EMPTY_CELL,
  GARBAGE_CELL,
  SKYLINE,
  idx,
  isCellBlocked,
  copyBoardCells,
  createBoardCells,
  createGridCoord,
  gridCoordAsNumber,
} from "./types";

export function createEmptyBoard(): Board {
  return {
    cells: createBoardCells(),
    height: BOARD_HEIGHT,
    skyline: SKYLINE,
    width: BOARD_WIDTH,
  };
}

/**
 * Build a board from text rows, listed top to bottom and ending at row 0.
 * Space or "." is empty, a piece letter is that piece, anything else is garbage.
 */
export function boardFromRows(rows: ReadonlyArray<string>): Board {
  if (rows.length > BOARD_HEIGHT) {
    throw new Error(`Board layout has ${String(rows.length)} rows`);
  }
  const board = createEmptyBoard();
  rows.forEach((row, i) => {
    const y = rows.length - 1 - i;
    for (let x = 0; x < BOARD_WIDTH; x++) {
      const ch = row[x] ?? " ";
      board.cells[idx(board, createGridCoord(x), createGridCoord(y))] =
        cellValueForChar(ch);
    }
  });
  return board;
}

function cellValueForChar(ch: string): number {
  if (ch === " " || ch === ".") return EMPTY_CELL;
  if (isPieceId(ch)) return getPieceValue(ch);
  return GARBAGE_CELL;
}

function isPieceId(ch: string): ch is PieceId {
  return ALL_PIECES.some((id) => id === ch);
}

export function getCell(board: Board, x: number, y: number): number {
  if (x < 0 || x >= board.width || y < 0 || y >= board.height) return EMPTY_CELL;
  return board.cells[idx(board, createGridCoord(x), createGridCoord(y))] ?? 0;
}

// Check if a piece can be placed at a given position
export function canPlacePiece(board: Board, piece: ActivePiece): boolean {
  const shape = PIECES[piece.id];
  const cells = shape.cells[piece.rot];

  for (const [dx, dy] of cells) {
    const x = createGridCoord(gridCoordAsNumber(piece.x) + dx);
    const y = createGridCoord(gridCoordAsNumber(piece.y) + dy);

    if (isCellBlocked(board, x, y)) {
      return false;
    }
  }

  return true;
}

// Check if a piece can move in a given direction
export function canMove(
  board: Board,
  piece: ActivePiece,
  dx: number,
  dy: number,
): boolean {
  const newPiece = {
    ...piece,
    x: createGridCoord(gridCoordAsNumber(piece.x) + dx),
    y: createGridCoord(gridCoordAsNumber(piece.y) + dy),
  };

  return canPlacePiece(board, newPiece);
}

// Return a new position if valid; otherwise null
export function tryMove(
  board: Board,
  piece: ActivePiece,
  dx: number,
  dy: number,
): ActivePiece | null {
  if (canMove(board, piece, dx, dy)) {
    return {
      ...piece,
      x: createGridCoord(gridCoordAsNumber(piece.x) + dx),
      y: createGridCoord(gridCoordAsNumber(piece.y) + dy),
    };
  }
  return null;
}

// Drop piece to the lowest reachable row (hard drop, sonic drop, ghost)
export function dropToBottom(board: Board, piece: ActivePiece): ActivePiece {
  let currentPiece = piece;

  while (canMove(board, currentPiece, 0, -1)) {
    currentPiece = {
      ...currentPiece,
      y: createGridCoord(gridCoordAsNumber(currentPiece.y) - 1),
    };
  }

  return currentPiece;
}

// Check if piece is resting on the floor or on other cells
export function isAtBottom(board: Board, piece: ActivePiece): boolean {
  return !canMove(board, piece, 0, -1);
}

// Lock a piece onto the board; cells outside the grid are dropped
export function lockPiece(board: Board, piece: ActivePiece): Board {
  const newCells = copyBoardCells(board.cells);

  const shape = PIECES[piece.id];
  for (const [dx, dy] of shape.cells[piece.rot]) {
    const x = createGridCoord(gridCoordAsNumber(piece.x) + dx);
    const y = createGridCoord(gridCoordAsNumber(piece.y) + dy);
    const xNum = gridCoordAsNumber(x);
    const yNum = gridCoordAsNumber(y);
    if (xNum < 0 || xNum >= board.width) continue;
    if (yNum < 0 || yNum >= board.height) continue;
    newCells[idx(board, x, y)] = getPieceValue(piece.id);
  }

  return { ...board, cells: newCells };
}

// Convert piece ID to cell value
export function getPieceValue(pieceId: PieceId): number {
  const mapping: Record<PieceId, number> = {
    I: 1,
    J: 6,
    L: 7,
    O: 2,
    S: 4,
    T: 3,
    Z: 5,
  };
  return mapping[pieceId];
}

// Rows (bottom-up) whose every cell is filled
export function getCompletedLines(board: Board): ReadonlyArray<number> {
  const completedLines: Array<number> = [];

  for (let y = 0; y < board.height; y++) {
    let isComplete = true;
    for (let x = 0; x < board.width; x++) {
      if (board.cells[idx(board, createGridCoord(x), createGridCoord(y))] === 0) {
        isComplete = false;
        break;
      }
    }
    if (isComplete) {
      completedLines.push(y);
    }
  }

  return completedLines;
}

// Remove rows; everything above a removed row shifts down
export function clearLines(
  board: Board,
  toClear: ReadonlyArray<number>,
): Board {
  if (toClear.length === 0) return board;

  const newCells = createBoardCells();
  const clearedSet = new Set(toClear);

  let newY = 0;
  for (let y = 0; y < board.height; y++) {
    if (clearedSet.has(y)) continue;
    for (let x = 0; x < board.width; x++) {
      const srcIdx = idx(board, createGridCoord(x), createGridCoord(y));
      const dstIdx = idx(board, createGridCoord(x), createGridCoord(newY));
      newCells[dstIdx] = board.cells[srcIdx] ?? 0;
    }
    newY++;
  }

  return { ...board, cells: newCells };
}

export function isBoardEmpty(board: Board): boolean {
  return board.cells.every((v) => v === EMPTY_CELL);
}

// Empty after the given rows are removed (perfect clear check before the rows actually go)
export function isEmptyExceptRows(
  board: Board,
  rows: ReadonlyArray<number>,
): boolean {
  const skip = new Set(rows);
  for (let y = 0; y < board.height; y++) {
    if (skip.has(y)) continue;
    for (let x = 0; x < board.width; x++) {
      if (getCell(board, x, y) !== EMPTY_CELL) return false;
    }
  }
  return true;
}
