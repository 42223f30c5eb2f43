import { describe, test, expect } from "@jest/globals";

import { type ClearContext } from "@/engine/events";
import {
  computeScoreBonus,
  describeClear,
  isSpecialClear,
  registerLock,
} from "@/engine/scoring/score";
import { countPlacedPiece, createStats, totalPiecesPlaced } from "@/engine/scoring/stats";

function clearOf(partial: Partial<ClearContext>): ClearContext {
  return { backToBack: 0, combo: 1, lines: 1, perfectClear: false, spin: false, ...partial };
}

describe("@/engine/scoring/score — bonus formula", () => {
  test("Single, four-line and perfect single", () => {
    expect(computeScoreBonus(clearOf({}))).toBe(10);
    expect(computeScoreBonus(clearOf({ backToBack: 1, lines: 4 }))).toBe(160);
    expect(computeScoreBonus(clearOf({ backToBack: 1, perfectClear: true }))).toBe(160);
  });

  test("Spin, combo and back-to-back multiply", () => {
    // 10 × 2² × 4 × 3 × 2²
    const clear = clearOf({ backToBack: 2, combo: 3, lines: 2, spin: true });
    expect(computeScoreBonus(clear)).toBe(1920);
  });

  test("Special clears", () => {
    expect(isSpecialClear(4, false, false)).toBe(true);
    expect(isSpecialClear(1, true, false)).toBe(true);
    expect(isSpecialClear(2, false, true)).toBe(true);
    expect(isSpecialClear(3, false, false)).toBe(false);
  });
});

describe("@/engine/scoring/score — combo and back-to-back", () => {
  test("A lock without lines breaks the combo but not back-to-back", () => {
    let stats = createStats(1);

    let r = registerLock(stats, { lines: 4, perfectClear: false, spin: false });
    expect(r.bonus).toBe(160);
    stats = r.stats;

    r = registerLock(stats, { lines: 0, perfectClear: false, spin: false });
    expect(r.clear).toBeNull();
    expect(r.stats).toMatchObject({ backToBack: 1, combo: 0 });
    stats = r.stats;

    r = registerLock(stats, { lines: 4, perfectClear: false, spin: false });
    // 10 × 16 × combo 1 × b2b 2²
    expect(r.bonus).toBe(640);
    expect(r.stats).toMatchObject({ backToBack: 2, combo: 1, score: 800 });
  });

  test("An ordinary clear ends back-to-back", () => {
    const first = registerLock(createStats(1), { lines: 4, perfectClear: false, spin: false });
    const second = registerLock(first.stats, { lines: 1, perfectClear: false, spin: false });

    expect(second.clear).toEqual(clearOf({ combo: 2 }));
    expect(second.bonus).toBe(20);
  });
});

describe("@/engine/scoring/score — descriptors", () => {
  test("Names the clear, then streaks", () => {
    expect(describeClear(clearOf({}), "I")).toBe("Single");
    expect(describeClear(clearOf({ backToBack: 2, combo: 3, lines: 2, spin: true }), "T")).toBe(
      "T-Spin Double, B2B x2, Combo x3",
    );
    expect(describeClear(clearOf({ backToBack: 1, lines: 4, perfectClear: true }), "I")).toBe(
      "Perfect Quadruple",
    );
  });
});

describe("@/engine/scoring/stats — piece counts", () => {
  test("Counts each placed piece by kind", () => {
    let stats = createStats(3);
    stats = countPlacedPiece(stats, "T");
    stats = countPlacedPiece(stats, "T");
    stats = countPlacedPiece(stats, "O");

    expect(stats.piecesPlaced.T).toBe(2);
    expect(totalPiecesPlaced(stats)).toBe(3);
    expect(stats.level).toBe(3);
  });
});
