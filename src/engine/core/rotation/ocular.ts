// Ocular rotation system.
//
// Only canonical tables are stored. Every other (piece, orientation, direction)
// is the mirror image of a canonical one:
//   I, T  right turn  = mirrored left turn of the same piece, dual orientation
//   Z               = mirrored S, opposite direction, dual orientation
//   J               = mirrored L, opposite direction, dual orientation
// Mirroring a kick (x, y) gives (w_from - w_to - x, y), where w is the piece
// width before and after the turn. Visually identical situations therefore
// always resolve to the same placement.
import { PIECES, pieceWidth } from "../pieces";
import { type ActivePiece, type Board, type PieceId, type Rot } from "../types";

import {
  type KickList,
  dualRot,
  firstFit,
  halfTurnKicks,
  rightTurnsBetween,
  rotateBy,
} from "./kicks";

type Direction = "left" | "right";
type DirectionalTable = Readonly<Record<Rot, KickList>>;

const I_FLAT: KickList = [
  [1, -1], [1, -2], [1, -3], [0, -1], [0, -2], [2, -1], [2, -2], [1, 0], [0, 0],
];
const I_UPRIGHT: KickList = [[-2, 1], [-3, 1], [-1, 1], [0, 1], [-2, 0], [-3, 0]];

const S_LEFT_FLAT: KickList = [[0, 0], [0, -1], [1, 0], [-1, -1]];
const S_LEFT_UPRIGHT: KickList = [[-1, 0], [0, 0], [-1, 1], [0, 1]];
const S_RIGHT_FLAT: KickList = [[1, 0], [1, -1], [0, 0], [0, -1]];
const S_RIGHT_UPRIGHT: KickList = [[0, 0], [-1, 0], [0, -1], [1, 0], [0, 1], [-1, 1]];

type CanonicalTables = Partial<Record<PieceId, Partial<Record<Direction, DirectionalTable>>>>;

const CANONICAL: Readonly<CanonicalTables> = {
  I: {
    left: { left: I_UPRIGHT, right: I_UPRIGHT, spawn: I_FLAT, two: I_FLAT },
  },
  L: {
    left: {
      left: [[0, 0], [-1, 0], [0, 1], [1, 0], [-1, 1]],
      right: [[-1, 1], [-1, 0], [0, 1], [0, 0], [-2, 0]],
      spawn: [[0, -1], [1, -1], [0, 0], [0, -2], [1, 0]],
      two: [[1, 0], [0, 0], [1, -1], [0, -1]],
    },
    right: {
      left: [[0, 1], [0, 0], [-1, 1], [-1, 0], [1, 1]],
      right: [[-1, 0], [0, 0], [0, -1], [0, 1]],
      spawn: [[1, -1], [1, 0], [2, 0], [0, 0], [2, -1]],
      two: [[0, 0], [0, -1], [1, 0], [1, -1], [-1, -1]],
    },
  },
  O: {
    left: { left: [[0, 0]], right: [[0, 0]], spawn: [[0, 0]], two: [[0, 0]] },
    right: { left: [[0, 0]], right: [[0, 0]], spawn: [[0, 0]], two: [[0, 0]] },
  },
  S: {
    left: { left: S_LEFT_UPRIGHT, right: S_LEFT_UPRIGHT, spawn: S_LEFT_FLAT, two: S_LEFT_FLAT },
    right: {
      left: S_RIGHT_UPRIGHT,
      right: S_RIGHT_UPRIGHT,
      spawn: S_RIGHT_FLAT,
      two: S_RIGHT_FLAT,
    },
  },
  T: {
    left: {
      left: [[0, 0], [-1, 0], [0, -1], [-1, -1], [1, -1], [-1, 1]],
      right: [[-1, 1], [-1, 0], [0, 1], [0, 0], [-1, -1]],
      spawn: [[0, -1], [0, 0], [-1, -1], [1, -1], [-1, -2], [1, 0]],
      two: [[1, 0], [0, 0], [1, -1], [0, -1], [1, -2]],
    },
  },
};

function opposite(direction: Direction): Direction {
  return direction === "left" ? "right" : "left";
}

/**
 * Kick list for a quarter turn, resolving non-canonical entries through the
 * piece's mirror partner.
 */
export function ocularKicks(id: PieceId, rot: Rot, direction: Direction): KickList {
  const direct = CANONICAL[id]?.[direction]?.[rot];
  if (direct !== undefined) return direct;

  // Self-mirror pieces keep their id and flip the turn direction;
  // paired pieces also flip it, taking the partner's tables.
  const source = CANONICAL[PIECES[id].mirror]?.[opposite(direction)]?.[dualRot(rot)];
  if (source === undefined) {
    throw new Error(`No ocular kicks for ${id} ${rot} ${direction}`);
  }
  const to = rotateBy(rot, direction === "right" ? 1 : -1);
  const mx = pieceWidth(id, rot) - pieceWidth(id, to);
  return source.map(([x, y]) => [mx - x, y] as const);
}

export function ocularRotate(
  piece: ActivePiece,
  targetRot: Rot,
  board: Board,
): ActivePiece | null {
  switch (rightTurnsBetween(piece.rot, targetRot)) {
    case 0:
      return piece;
    case 1:
      return firstFit(board, piece, targetRot, ocularKicks(piece.id, piece.rot, "right"));
    case 2:
      return firstFit(board, piece, targetRot, halfTurnKicks(piece.id, piece.rot));
    case 3:
      return firstFit(board, piece, targetRot, ocularKicks(piece.id, piece.rot, "left"));
  }
}
