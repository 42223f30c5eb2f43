import { type PieceId } from "../core/types";
import { type ClearContext } from "../events";

import { type GameStats } from "./stats";

const CLEAR_NAMES: ReadonlyArray<string> = ["Single", "Double", "Triple", "Quadruple"];

/**
 * Score awarded for one line clear:
 * 10 × lines² × (spin ? 4 : 1) × (perfect ? 16 : 1) × combo × max(1, backToBack²)
 */
export function computeScoreBonus(clear: ClearContext): number {
  return (
    10 *
    clear.lines ** 2 *
    (clear.spin ? 4 : 1) *
    (clear.perfectClear ? 16 : 1) *
    clear.combo *
    Math.max(1, clear.backToBack ** 2)
  );
}

// Spins, perfect clears and four-line clears keep back-to-back going
export function isSpecialClear(lines: number, spin: boolean, perfectClear: boolean): boolean {
  return lines >= 4 || spin || perfectClear;
}

/**
 * Update combo and back-to-back for a lock that cleared `lines` rows (possibly zero).
 * Returns the clear context when rows were cleared.
 */
export function registerLock(
  stats: GameStats,
  lock: { lines: number; spin: boolean; perfectClear: boolean },
): { stats: GameStats; clear: ClearContext | null; bonus: number } {
  if (lock.lines === 0) {
    return { bonus: 0, clear: null, stats: { ...stats, combo: 0 } };
  }
  const combo = stats.combo + 1;
  const backToBack = isSpecialClear(lock.lines, lock.spin, lock.perfectClear)
    ? stats.backToBack + 1
    : 0;
  const clear: ClearContext = {
    backToBack,
    combo,
    lines: lock.lines,
    perfectClear: lock.perfectClear,
    spin: lock.spin,
  };
  const bonus = computeScoreBonus(clear);
  return {
    bonus,
    clear,
    stats: { ...stats, backToBack, combo, score: stats.score + bonus },
  };
}

// e.g. "Perfect T-Spin Double, B2B x2, Combo x3"
export function describeClear(clear: ClearContext, pieceId: PieceId): string {
  const head: Array<string> = [];
  if (clear.perfectClear) head.push("Perfect");
  if (clear.spin) head.push(`${pieceId}-Spin`);
  head.push(CLEAR_NAMES[clear.lines - 1] ?? `${String(clear.lines)}-Line Clear`);

  const parts = [head.join(" ")];
  if (clear.backToBack > 1) parts.push(`B2B x${String(clear.backToBack)}`);
  if (clear.combo > 1) parts.push(`Combo x${String(clear.combo)}`);
  return parts.join(", ");
}
