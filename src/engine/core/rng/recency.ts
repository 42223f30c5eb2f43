import { ALL_PIECES, type PieceId } from "../types";

import { type PieceRandomGenerator, pullPieces } from "./interface";
import { hashString, shuffle, weightedIndex } from "./random";

// Growth of a kind's weight with the number of pulls since it last appeared
export const RECENCY_EXPONENT = 2.5;

// Pulls since each kind was last emitted (0 = the previous pull)
export type RecencyState = {
  readonly sinceLast: Readonly<Record<PieceId, number>>;
  readonly internalSeed: number;
};

// Weight of each kind in ALL_PIECES order. Never zero, so no kind starves.
export function recencyWeights(
  sinceLast: Readonly<Record<PieceId, number>>,
): Array<number> {
  return ALL_PIECES.map((id) => (sinceLast[id] + 1) ** RECENCY_EXPONENT);
}

// Initial ages are a seeded permutation of 0..6
export function createRecencyState(seed: string): RecencyState {
  const { nextSeed, shuffled } = shuffle(ALL_PIECES, hashString(seed));
  const sinceLast: Record<PieceId, number> = {
    I: 0,
    J: 0,
    L: 0,
    O: 0,
    S: 0,
    T: 0,
    Z: 0,
  };
  shuffled.forEach((id, age) => {
    sinceLast[id] = age;
  });
  return { internalSeed: nextSeed, sinceLast };
}

export function getNextRecencyPiece(state: RecencyState): {
  piece: PieceId;
  newState: RecencyState;
} {
  const { index, nextSeed } = weightedIndex(
    recencyWeights(state.sinceLast),
    state.internalSeed,
  );
  const piece = ALL_PIECES[index];
  if (piece === undefined) throw new Error("Recency draw out of range");

  const sinceLast: Record<PieceId, number> = { ...state.sinceLast };
  for (const id of ALL_PIECES) sinceLast[id] += 1;
  sinceLast[piece] = 0;

  return { newState: { internalSeed: nextSeed, sinceLast }, piece };
}

/**
 * Recency-weighted generator: the longer a kind has been absent, the more
 * likely it becomes, which keeps droughts short without forbidding repeats.
 */
export class RecencyRng implements PieceRandomGenerator {
  readonly kind = "recency";

  constructor(private readonly state: RecencyState) {}

  getNextPiece(): { piece: PieceId; newRng: PieceRandomGenerator } {
    const result = getNextRecencyPiece(this.state);
    return { newRng: new RecencyRng(result.newState), piece: result.piece };
  }

  getNextPieces(count: number): {
    pieces: Array<PieceId>;
    newRng: PieceRandomGenerator;
  } {
    return pullPieces(this, count);
  }

  getState(): RecencyState {
    return this.state;
  }
}

export function createRecencyRng(seed: string): PieceRandomGenerator {
  return new RecencyRng(createRecencyState(seed));
}
