import { type PieceId } from "../types";

import { type PieceRandomGenerator } from "./interface";

/**
 * RNG that yields a fixed sequence and then repeats.
 * Used for scripted play (puzzle stages, replays in tests).
 */
export class SequenceRng implements PieceRandomGenerator {
  readonly kind = "sequence";

  constructor(
    private readonly sequence: ReadonlyArray<PieceId>,
    private readonly index = 0,
  ) {
    if (sequence.length === 0) throw new Error("Sequence must not be empty");
  }

  getNextPiece(): { piece: PieceId; newRng: PieceRandomGenerator } {
    const piece = this.sequence[this.index];
    if (piece === undefined) throw new Error("Sequence index out of bounds");
    const nextIndex = (this.index + 1) % this.sequence.length;
    return { newRng: new SequenceRng(this.sequence, nextIndex), piece };
  }

  getNextPieces(count: number): {
    pieces: Array<PieceId>;
    newRng: PieceRandomGenerator;
  } {
    const pieces: Array<PieceId> = [];
    let i = this.index;
    for (let c = 0; c < count; c++) {
      const piece = this.sequence[i];
      if (piece === undefined) throw new Error("Sequence index out of bounds");
      pieces.push(piece);
      i = (i + 1) % this.sequence.length;
    }
    return { newRng: new SequenceRng(this.sequence, i), pieces };
  }
}
