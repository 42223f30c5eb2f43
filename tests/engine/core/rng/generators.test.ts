import { describe, test, expect } from "@jest/globals";

import { createBagRng } from "@/engine/core/rng/bag";
import { createGenerator } from "@/engine/core/rng";
import { hashString, nextSeed, shuffle, weightedIndex } from "@/engine/core/rng/random";
import {
  RECENCY_EXPONENT,
  createRecencyState,
  getNextRecencyPiece,
  recencyWeights,
} from "@/engine/core/rng/recency";
import { SequenceRng } from "@/engine/core/rng/sequence";
import { ALL_PIECES, type PieceId } from "@/engine/core/types";

function counts(pieces: ReadonlyArray<PieceId>): Record<PieceId, number> {
  const out: Record<PieceId, number> = { I: 0, J: 0, L: 0, O: 0, S: 0, T: 0, Z: 0 };
  for (const p of pieces) out[p] += 1;
  return out;
}

describe("@/engine/core/rng/random — primitives", () => {
  test("hashString is FNV-1a", () => {
    expect(hashString("")).toBe(0x811c9dc5);
    expect(hashString("a")).toBe(0xe40c292c);
  });

  test("nextSeed stays an unsigned 32-bit integer", () => {
    expect(nextSeed(0)).toBe(1013904223);
    const s = nextSeed(4294967295);
    expect(Number.isInteger(s)).toBe(true);
    expect(s).toBeGreaterThanOrEqual(0);
    expect(s).toBeLessThan(2 ** 32);
  });

  test("shuffle permutes without losing elements", () => {
    const { shuffled } = shuffle([1, 2, 3, 4, 5], 99);
    expect([...shuffled].sort()).toEqual([1, 2, 3, 4, 5]);
  });

  test("weightedIndex never picks a zero weight", () => {
    let seed = 1;
    for (let i = 0; i < 200; i++) {
      const draw = weightedIndex([0, 3, 0, 1], seed);
      seed = draw.nextSeed;
      expect([1, 3]).toContain(draw.index);
    }
  });

  test("weightedIndex rejects weights without a positive sum", () => {
    expect(() => weightedIndex([0, 0], 1)).toThrow("Weights must have a positive sum");
  });
});

describe("@/engine/core/rng/bag — n-bag", () => {
  test("Every window of seven deals each kind once", () => {
    const { pieces } = createBagRng("bag-seed").getNextPieces(28);
    for (let w = 0; w < 4; w++) {
      expect(counts(pieces.slice(w * 7, w * 7 + 7))).toEqual({
        I: 1,
        J: 1,
        L: 1,
        O: 1,
        S: 1,
        T: 1,
        Z: 1,
      });
    }
  });

  test("A double bag deals each kind twice per fourteen", () => {
    const { pieces } = createBagRng("bag-seed", 2).getNextPieces(14);
    expect(counts(pieces)).toEqual({ I: 2, J: 2, L: 2, O: 2, S: 2, T: 2, Z: 2 });
  });

  test("Multiplicity must be a positive integer", () => {
    expect(() => createBagRng("x", 0)).toThrow("Bag multiplicity must be a positive integer");
  });
});

describe("@/engine/core/rng/recency — weighting", () => {
  test("Weight grows as (pulls since last + 1) ^ exponent", () => {
    const weights = recencyWeights({ I: 0, J: 6, L: 5, O: 1, S: 2, T: 3, Z: 4 });
    expect(RECENCY_EXPONENT).toBe(2.5);
    expect(weights[0]).toBe(1);
    expect(weights[1]).toBeCloseTo(5.656854, 5);
    expect(weights[5]).toBeCloseTo(7 ** 2.5, 9);
  });

  test("Initial ages are a permutation of 0..6", () => {
    const { sinceLast } = createRecencyState("ages");
    expect(ALL_PIECES.map((id) => sinceLast[id]).sort()).toEqual([0, 1, 2, 3, 4, 5, 6]);
  });

  test("Pulling resets the drawn kind's age and ages the rest", () => {
    const state = createRecencyState("ages");
    const { newState, piece } = getNextRecencyPiece(state);

    expect(newState.sinceLast[piece]).toBe(0);
    for (const id of ALL_PIECES) {
      if (id !== piece) expect(newState.sinceLast[id]).toBe(state.sinceLast[id] + 1);
    }
  });

  test("No kind is starved over a long run", () => {
    const { pieces } = createGenerator({ kind: "recency" }, "long-run").getNextPieces(200);
    const seen = counts(pieces);
    for (const id of ALL_PIECES) expect(seen[id]).toBeGreaterThan(0);
  });
});

describe("@/engine/core/rng — determinism", () => {
  const kinds = ["uniform", "bag", "recency"] as const;

  test.each(kinds)("%s: the same seed deals the same pieces", (kind) => {
    const a = createGenerator({ kind }, "same").getNextPieces(50).pieces;
    const b = createGenerator({ kind }, "same").getNextPieces(50).pieces;
    const c = createGenerator({ kind }, "other").getNextPieces(50).pieces;

    expect(a).toEqual(b);
    expect(a).not.toEqual(c);
  });

  test("Single pulls and batch pulls agree", () => {
    let rng = createGenerator({ kind: "recency" }, "agree");
    const batch = rng.getNextPieces(10).pieces;
    const single: Array<PieceId> = [];
    for (let i = 0; i < 10; i++) {
      const r = rng.getNextPiece();
      single.push(r.piece);
      rng = r.newRng;
    }
    expect(single).toEqual(batch);
  });

  test("sequence: cycles through its pieces", () => {
    const rng = new SequenceRng(["S", "Z"]);
    expect(rng.getNextPieces(5).pieces).toEqual(["S", "Z", "S", "Z", "S"]);
    expect(() => new SequenceRng([])).toThrow("Sequence must not be empty");
  });
});
