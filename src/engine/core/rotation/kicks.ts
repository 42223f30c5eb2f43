import { canPlacePiece } from "../board";
import {
  type ActivePiece,
  type Board,
  type PieceId,
  type Rot,
  ALL_ROTS,
  createGridCoord,
  gridCoordAsNumber,
} from "../types";

// Translation applied to the piece anchor after turning, y up
export type Kick = readonly [number, number];
export type KickList = ReadonlyArray<Kick>;

// Index of each orientation in right turns from spawn
const ROT_INDEX: Readonly<Record<Rot, number>> = {
  left: 3,
  right: 1,
  spawn: 0,
  two: 2,
};

export function rotateBy(rot: Rot, rightTurns: number): Rot {
  const i = (((ROT_INDEX[rot] + rightTurns) % 4) + 4) % 4;
  const next = ALL_ROTS[i];
  if (next === undefined) throw new Error(`Bad rotation index ${String(i)}`);
  return next;
}

// Right turns needed to go from one orientation to another (0..3)
export function rightTurnsBetween(from: Rot, to: Rot): 0 | 1 | 2 | 3 {
  const d = (((ROT_INDEX[to] - ROT_INDEX[from]) % 4) + 4) % 4;
  if (d === 1 || d === 2 || d === 3) return d;
  return 0;
}

// Orientation of the mirror image: right and left swap
export function dualRot(rot: Rot): Rot {
  if (rot === "right") return "left";
  if (rot === "left") return "right";
  return rot;
}

// First kick whose translated, rotated piece fits; null if none does
export function firstFit(
  board: Board,
  piece: ActivePiece,
  targetRot: Rot,
  kicks: KickList,
): ActivePiece | null {
  for (const [dx, dy] of kicks) {
    const candidate: ActivePiece = {
      ...piece,
      rot: targetRot,
      x: createGridCoord(gridCoordAsNumber(piece.x) + dx),
      y: createGridCoord(gridCoordAsNumber(piece.y) + dy),
    };
    if (canPlacePiece(board, candidate)) return candidate;
  }
  return null;
}

// 180° turns behave like two free-air quarter turns in one press
export function halfTurnKicks(id: PieceId, rot: Rot): KickList {
  if (id === "O" || id === "I" || id === "S" || id === "Z") return [[0, 0]];
  switch (rot) {
    case "spawn":
      return [[0, -1], [0, 0]];
    case "right":
      return [[-1, 0], [0, 0]];
    case "two":
      return [[0, 1], [0, 0]];
    case "left":
      return [[1, 0], [0, 0]];
  }
}
