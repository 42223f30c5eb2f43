import {
  type ActivePiece,
  type PieceId,
  type Rot,
  type TetrominoShape,
  gridCoordAsNumber,
} from "./types";

// Cell offsets from the piece anchor (bottom-left of the bounding box), y up
export const PIECES: Readonly<Record<PieceId, TetrominoShape>> = {
  I: {
    cells: {
      left: [[0, 0], [0, 1], [0, 2], [0, 3]],
      right: [[0, 0], [0, 1], [0, 2], [0, 3]],
      spawn: [[0, 0], [1, 0], [2, 0], [3, 0]],
      two: [[0, 0], [1, 0], [2, 0], [3, 0]],
    },
    id: "I",
    mirror: "I",
    spawn: [3, 20],
    symmetry: "mirror",
  },
  J: {
    cells: {
      left: [[0, 0], [1, 0], [1, 1], [1, 2]],
      right: [[0, 0], [0, 1], [0, 2], [1, 2]],
      spawn: [[0, 0], [1, 0], [2, 0], [0, 1]],
      two: [[2, 0], [0, 1], [1, 1], [2, 1]],
    },
    id: "J",
    mirror: "L",
    spawn: [3, 20],
    symmetry: "none",
  },
  L: {
    cells: {
      left: [[1, 0], [1, 1], [0, 2], [1, 2]],
      right: [[0, 0], [1, 0], [0, 1], [0, 2]],
      spawn: [[0, 0], [1, 0], [2, 0], [2, 1]],
      two: [[0, 0], [0, 1], [1, 1], [2, 1]],
    },
    id: "L",
    mirror: "J",
    spawn: [3, 20],
    symmetry: "none",
  },
  O: {
    cells: {
      left: [[0, 0], [1, 0], [0, 1], [1, 1]],
      right: [[0, 0], [1, 0], [0, 1], [1, 1]],
      spawn: [[0, 0], [1, 0], [0, 1], [1, 1]],
      two: [[0, 0], [1, 0], [0, 1], [1, 1]],
    },
    id: "O",
    mirror: "O",
    spawn: [4, 20],
    symmetry: "full",
  },
  S: {
    cells: {
      left: [[1, 0], [0, 1], [1, 1], [0, 2]],
      right: [[1, 0], [0, 1], [1, 1], [0, 2]],
      spawn: [[0, 0], [1, 0], [1, 1], [2, 1]],
      two: [[0, 0], [1, 0], [1, 1], [2, 1]],
    },
    id: "S",
    mirror: "Z",
    spawn: [3, 20],
    symmetry: "point",
  },
  T: {
    cells: {
      left: [[1, 0], [0, 1], [1, 1], [1, 2]],
      right: [[0, 0], [0, 1], [1, 1], [0, 2]],
      spawn: [[0, 0], [1, 0], [2, 0], [1, 1]],
      two: [[1, 0], [0, 1], [1, 1], [2, 1]],
    },
    id: "T",
    mirror: "T",
    spawn: [3, 20],
    symmetry: "mirror",
  },
  Z: {
    cells: {
      left: [[0, 0], [0, 1], [1, 1], [1, 2]],
      right: [[0, 0], [0, 1], [1, 1], [1, 2]],
      spawn: [[1, 0], [2, 0], [0, 1], [1, 1]],
      two: [[1, 0], [2, 0], [0, 1], [1, 1]],
    },
    id: "Z",
    mirror: "S",
    spawn: [3, 20],
    symmetry: "point",
  },
};

export function pieceWidth(id: PieceId, rot: Rot): number {
  let max = 0;
  for (const [dx] of PIECES[id].cells[rot]) max = Math.max(max, dx);
  return max + 1;
}

// Absolute board cells covered by a piece
export function pieceCells(piece: ActivePiece): Array<readonly [number, number]> {
  const x = gridCoordAsNumber(piece.x);
  const y = gridCoordAsNumber(piece.y);
  return PIECES[piece.id].cells[piece.rot].map(
    ([dx, dy]) => [x + dx, y + dy] as const,
  );
}
