import { type DurationMs } from "../../types/brands";
import { type GameTime } from "../../types/timestamp";

/**
 * Type-safe utilities for working with branded GameTime values.
 * These are the only allowed arithmetic operations on GameTime so that
 * time points and durations do not get mixed up.
 */

/**
 * Adds a duration (or a computed millisecond offset) to a time point.
 */
export function addDuration(base: GameTime, delta: DurationMs | number): GameTime {
  return (base + delta) as GameTime;
}

/**
 * Milliseconds elapsed from `earlier` to `later`.
 */
export function elapsedMs(later: GameTime, earlier: GameTime): number {
  return (later as number) - (earlier as number);
}

export function minTime(a: GameTime, b: GameTime): GameTime {
  return a <= b ? a : b;
}
