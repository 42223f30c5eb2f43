import { type ActivePiece, type Board, type Rot } from "../types";

import { classicRotate } from "./classic";
import { ocularRotate } from "./ocular";
import { superRotate } from "./super";

export type RotationSystem = "ocular" | "classic" | "super";
export const ROTATION_SYSTEMS: ReadonlyArray<RotationSystem> = [
  "ocular",
  "classic",
  "super",
];

/**
 * Rotate the piece to `targetRot` using the given system's kick table.
 * Returns the first candidate placement that fits, or null if the turn is rejected.
 * A request for the piece's current orientation returns the piece unchanged.
 */
export function tryRotate(
  system: RotationSystem,
  piece: ActivePiece,
  targetRot: Rot,
  board: Board,
): ActivePiece | null {
  switch (system) {
    case "ocular":
      return ocularRotate(piece, targetRot, board);
    case "classic":
      return classicRotate(piece, targetRot, board);
    case "super":
      return superRotate(piece, targetRot, board);
  }
}

export { rotateBy, rightTurnsBetween, dualRot } from "./kicks";
