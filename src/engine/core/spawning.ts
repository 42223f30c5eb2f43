import { canPlacePiece } from "./board";
import { PIECES } from "./pieces";
import {
  type Board,
  type ActivePiece,
  type PieceId,
  createGridCoord,
  gridCoordAsNumber,
} from "./types";

/**
 * Create a new active piece at its spawn position, on the skyline row
 */
export function createActivePiece(pieceId: PieceId): ActivePiece {
  const [x, y] = PIECES[pieceId].spawn;
  return {
    id: pieceId,
    rot: "spawn",
    x: createGridCoord(x),
    y: createGridCoord(y),
  };
}

/**
 * Check if a piece can spawn at its default position
 */
export function canSpawnPiece(board: Board, pieceId: PieceId): boolean {
  return canPlacePiece(board, createActivePiece(pieceId));
}

/**
 * Block out: the spawn cells are already occupied
 */
export function isBlockOut(board: Board, pieceId: PieceId): boolean {
  return !canSpawnPiece(board, pieceId);
}

/**
 * Lock out: every cell of the locking piece is at or above the skyline
 */
export function isPieceEntirelyAboveSkyline(
  board: Board,
  piece: ActivePiece,
): boolean {
  const shape = PIECES[piece.id];
  for (const [, dy] of shape.cells[piece.rot]) {
    if (gridCoordAsNumber(piece.y) + dy < board.skyline) {
      return false;
    }
  }
  return true;
}
