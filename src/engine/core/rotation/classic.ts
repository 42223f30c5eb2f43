// Classic right-handed rotation: one fixed translation per turn, no wall kicks.
import { type ActivePiece, type Board, type Rot } from "../types";

import { type Kick, firstFit, rightTurnsBetween } from "./kicks";

function classicKick(piece: ActivePiece, left: boolean): Kick {
  const flat = piece.rot === "spawn" || piece.rot === "two";
  switch (piece.id) {
    case "O":
      return [0, 0];
    case "I":
      return flat ? [2, -1] : [-2, 1];
    case "S":
    case "Z":
      return flat ? [1, 0] : [-1, 0];
    case "T":
    case "L":
    case "J":
      switch (piece.rot) {
        case "spawn":
          return left ? [0, -1] : [1, -1];
        case "right":
          return left ? [-1, 1] : [-1, 0];
        case "two":
          return left ? [1, 0] : [0, 0];
        case "left":
          return left ? [0, 0] : [0, 1];
      }
  }
}

export function classicRotate(
  piece: ActivePiece,
  targetRot: Rot,
  board: Board,
): ActivePiece | null {
  switch (rightTurnsBetween(piece.rot, targetRot)) {
    case 0:
      return piece;
    case 1:
      return firstFit(board, piece, targetRot, [classicKick(piece, false)]);
    case 2:
      // no 180° turn in the classic rules; allow it only in place
      return firstFit(board, piece, targetRot, [[0, 0]]);
    case 3:
      return firstFit(board, piece, targetRot, [classicKick(piece, true)]);
  }
}
