// Board dimensions. Row 0 is the bottom row; y grows upward.
export const BOARD_WIDTH = 10 as const;
export const BOARD_HEIGHT = 40 as const;
export const SKYLINE = 20 as const; // rows 0..19 visible, rows >= 20 above the skyline

// Grid coordinates - for board positions (must be integers)
declare const GridCoordBrand: unique symbol;
export type GridCoord = number & { readonly [GridCoordBrand]: true };
export const gridCoordAsNumber = (g: GridCoord): number => g as number;

// GridCoord constructor
export function createGridCoord(value: number): GridCoord {
  if (!Number.isInteger(value)) {
    throw new Error("GridCoord must be an integer");
  }
  return value as GridCoord;
}

// Cell values - 0=empty, 1-7=tetrominos, 8=garbage
export const EMPTY_CELL = 0 as const;
export const GARBAGE_CELL = 8 as const;

// Board representation with enforced dimensions
declare const BoardCellsBrand: unique symbol;
export type BoardCells = Uint8Array & { readonly length: 400 } & {
  readonly [BoardCellsBrand]: true;
};

// BoardCells constructors
export function createBoardCells(): BoardCells {
  return new Uint8Array(BOARD_HEIGHT * BOARD_WIDTH) as BoardCells;
}

export function copyBoardCells(cells: BoardCells): BoardCells {
  return new Uint8Array(cells) as BoardCells;
}

export type Board = {
  readonly width: typeof BOARD_WIDTH;
  readonly height: typeof BOARD_HEIGHT;
  readonly skyline: typeof SKYLINE;
  readonly cells: BoardCells;
};

// Index into the flat cell array; callers check bounds first
export function idx(board: Board, x: GridCoord, y: GridCoord): number {
  return gridCoordAsNumber(y) * board.width + gridCoordAsNumber(x);
}

// Out-of-bounds cells count as blocked
export function isCellBlocked(board: Board, x: GridCoord, y: GridCoord): boolean {
  const xNum = gridCoordAsNumber(x);
  const yNum = gridCoordAsNumber(y);
  if (xNum < 0 || xNum >= board.width) return true;
  if (yNum < 0 || yNum >= board.height) return true;
  return (board.cells[idx(board, x, y)] ?? 0) !== EMPTY_CELL;
}

export type PieceId = "I" | "O" | "T" | "S" | "Z" | "J" | "L";
export const ALL_PIECES: ReadonlyArray<PieceId> = ["I", "O", "T", "S", "Z", "J", "L"];

// spawn=0, right=1 (one right turn), two=2, left=3
export type Rot = "spawn" | "right" | "two" | "left";
export const ALL_ROTS: ReadonlyArray<Rot> = ["spawn", "right", "two", "left"];

// full: every orientation looks alike; mirror: the piece is its own mirror image;
// point: 180° turns look alike; none: no self-symmetry
export type Symmetry = "full" | "mirror" | "point" | "none";

export type TetrominoShape = {
  readonly id: PieceId;
  readonly cells: Readonly<Record<Rot, ReadonlyArray<readonly [number, number]>>>;
  readonly symmetry: Symmetry;
  readonly mirror: PieceId;
  readonly spawn: readonly [number, number]; // anchor column and row at spawn
};

export type ActivePiece = {
  readonly id: PieceId;
  readonly rot: Rot;
  readonly x: GridCoord;
  readonly y: GridCoord;
};
