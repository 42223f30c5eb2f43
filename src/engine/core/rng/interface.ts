import { type PieceId } from "../types";

export type GeneratorKind = "uniform" | "bag" | "recency" | "sequence";

/**
 * Interface for piece random generators.
 * Generators are immutable: every pull returns the next generator state.
 * Sequences are infinite and continue from wherever the last pull left off.
 */
export type PieceRandomGenerator = {
  readonly kind: GeneratorKind;

  /**
   * Get the next piece from this generator
   * Returns the piece and a new generator state (immutable pattern)
   */
  getNextPiece(): {
    piece: PieceId;
    newRng: PieceRandomGenerator;
  };

  /**
   * Get multiple pieces at once (for the preview queue)
   */
  getNextPieces(count: number): {
    pieces: Array<PieceId>;
    newRng: PieceRandomGenerator;
  };
};

// Shared getNextPieces for generators that only implement single pulls
export function pullPieces(
  rng: PieceRandomGenerator,
  count: number,
): { pieces: Array<PieceId>; newRng: PieceRandomGenerator } {
  const pieces: Array<PieceId> = [];
  let current = rng;
  for (let i = 0; i < count; i++) {
    const result = current.getNextPiece();
    pieces.push(result.piece);
    current = result.newRng;
  }
  return { newRng: current, pieces };
}
