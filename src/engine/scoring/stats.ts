import { ALL_PIECES, type PieceId } from "../core/types";

export type GameStats = Readonly<{
  piecesPlaced: Readonly<Record<PieceId, number>>;
  linesCleared: number;
  level: number;
  score: number;
  combo: number;
  backToBack: number;
}>;

export function createStats(startLevel: number): GameStats {
  return {
    backToBack: 0,
    combo: 0,
    level: startLevel,
    linesCleared: 0,
    piecesPlaced: { I: 0, J: 0, L: 0, O: 0, S: 0, T: 0, Z: 0 },
    score: 0,
  };
}

export function totalPiecesPlaced(stats: GameStats): number {
  return ALL_PIECES.reduce((sum, id) => sum + stats.piecesPlaced[id], 0);
}

export function countPlacedPiece(stats: GameStats, id: PieceId): GameStats {
  return {
    ...stats,
    piecesPlaced: { ...stats.piecesPlaced, [id]: stats.piecesPlaced[id] + 1 },
  };
}
