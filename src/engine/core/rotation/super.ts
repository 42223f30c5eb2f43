// Super Rotation System wall kick tables, expressed as anchor translations
// (bottom-left origin, y up) rather than SRS offset differences, so the basic
// rotation shift is folded into every entry.
import { type ActivePiece, type Board, type Rot } from "../types";

import { type KickList, firstFit, halfTurnKicks, rightTurnsBetween } from "./kicks";

// Keys are "from->to"
export const KICKS_JLSTZ: Readonly<Record<string, KickList>> = {
  "left->spawn": [[0, 1], [-1, 1], [-1, 0], [0, 3], [-1, 3]],
  "left->two": [[0, 0], [-1, 0], [-1, -1], [0, 2], [-1, 2]],
  "right->spawn": [[-1, 1], [0, 1], [0, 0], [-1, 3], [0, 3]],
  "right->two": [[-1, 0], [0, 0], [0, -1], [-1, 2], [0, 2]],
  "spawn->left": [[0, -1], [1, -1], [1, 0], [0, -3], [1, -3]],
  "spawn->right": [[1, -1], [0, -1], [0, 0], [1, -3], [0, -3]],
  "two->left": [[0, 0], [1, 0], [1, 1], [0, -2], [1, -2]],
  "two->right": [[1, 0], [0, 0], [-1, 1], [1, -2], [0, -2]],
};

export const KICKS_I: Readonly<Record<string, KickList>> = {
  "left->spawn": [[-1, 2], [0, 2], [-3, 2], [0, 0], [-3, 3]],
  "left->two": [[-1, 1], [-3, 1], [0, 1], [-3, 0], [0, 3]],
  "right->spawn": [[-2, 2], [0, 2], [-3, 2], [0, 3], [-3, 0]],
  "right->two": [[-2, 1], [-3, 1], [0, 1], [-3, 3], [0, 0]],
  "spawn->left": [[1, -2], [0, -2], [3, -2], [0, 0], [3, -3]],
  "spawn->right": [[2, -2], [0, -2], [3, -2], [0, -3], [3, 0]],
  "two->left": [[1, -1], [3, -1], [0, -1], [3, 0], [0, -3]],
  "two->right": [[2, -1], [3, -1], [0, -1], [3, -3], [0, 0]],
};

export function superRotate(
  piece: ActivePiece,
  targetRot: Rot,
  board: Board,
): ActivePiece | null {
  const turns = rightTurnsBetween(piece.rot, targetRot);
  if (turns === 0) return piece;
  if (turns === 2) {
    return firstFit(board, piece, targetRot, halfTurnKicks(piece.id, piece.rot));
  }
  if (piece.id === "O") return firstFit(board, piece, targetRot, [[0, 0]]);

  const table = piece.id === "I" ? KICKS_I : KICKS_JLSTZ;
  const kicks = table[`${piece.rot}->${targetRot}`];
  if (kicks === undefined) return null;
  return firstFit(board, piece, targetRot, kicks);
}
