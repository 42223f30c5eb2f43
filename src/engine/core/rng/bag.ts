import { ALL_PIECES, type PieceId } from "../types";

import { type PieceRandomGenerator, pullPieces } from "./interface";
import { hashString, shuffle } from "./random";

export type BagState = {
  readonly multiplicity: number;
  readonly currentBag: ReadonlyArray<PieceId>;
  readonly bagIndex: number;
  readonly internalSeed: number;
};

// Create initial bag state; the first bag is shuffled on the first pull
export function createBagState(seed: string, multiplicity = 1): BagState {
  if (!Number.isInteger(multiplicity) || multiplicity < 1) {
    throw new Error("Bag multiplicity must be a positive integer");
  }
  return {
    bagIndex: 0,
    currentBag: [],
    internalSeed: hashString(seed),
    multiplicity,
  };
}

function fillBag(multiplicity: number): Array<PieceId> {
  const bag: Array<PieceId> = [];
  for (let i = 0; i < multiplicity; i++) bag.push(...ALL_PIECES);
  return bag;
}

// Get next piece from the bag, reshuffling a fresh one once exhausted
export function getNextBagPiece(state: BagState): {
  piece: PieceId;
  newState: BagState;
} {
  let currentBag = state.currentBag;
  let bagIndex = state.bagIndex;
  let internalSeed = state.internalSeed;

  if (bagIndex >= currentBag.length) {
    const shuffleResult = shuffle(fillBag(state.multiplicity), internalSeed);
    currentBag = shuffleResult.shuffled;
    internalSeed = shuffleResult.nextSeed;
    bagIndex = 0;
  }

  const piece = currentBag[bagIndex];
  if (piece === undefined) {
    throw new Error("Bag is empty or corrupted");
  }

  return {
    newState: {
      ...state,
      bagIndex: bagIndex + 1,
      currentBag,
      internalSeed,
    },
    piece,
  };
}

export class BagRng implements PieceRandomGenerator {
  readonly kind = "bag";

  constructor(private readonly state: BagState) {}

  getNextPiece(): { piece: PieceId; newRng: PieceRandomGenerator } {
    const result = getNextBagPiece(this.state);
    return { newRng: new BagRng(result.newState), piece: result.piece };
  }

  getNextPieces(count: number): {
    pieces: Array<PieceId>;
    newRng: PieceRandomGenerator;
  } {
    return pullPieces(this, count);
  }

  getState(): BagState {
    return this.state;
  }
}

export function createBagRng(seed: string, multiplicity = 1): PieceRandomGenerator {
  return new BagRng(createBagState(seed, multiplicity));
}
