import { ALL_PIECES, type PieceId } from "../types";

import { type PieceRandomGenerator, pullPieces } from "./interface";
import { hashString, nextUnit } from "./random";

/**
 * Independent uniform choice among the seven kinds on every pull.
 */
export class UniformRng implements PieceRandomGenerator {
  readonly kind = "uniform";

  constructor(private readonly seed: number) {}

  getNextPiece(): { piece: PieceId; newRng: PieceRandomGenerator } {
    const draw = nextUnit(this.seed);
    const piece = ALL_PIECES[Math.floor(draw.value * ALL_PIECES.length)];
    if (piece === undefined) throw new Error("Uniform draw out of range");
    return { newRng: new UniformRng(draw.nextSeed), piece };
  }

  getNextPieces(count: number): {
    pieces: Array<PieceId>;
    newRng: PieceRandomGenerator;
  } {
    return pullPieces(this, count);
  }
}

export function createUniformRng(seed: string): PieceRandomGenerator {
  return new UniformRng(hashString(seed));
}
