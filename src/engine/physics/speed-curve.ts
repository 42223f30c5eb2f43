// Level-dependent gravity and lock delay. Levels start at 1.

// Milliseconds per row for levels 1..19; level 20 and up falls instantly
const DROP_DELAYS_MS: ReadonlyArray<number> = [
  1000, 793, 617.796, 472.729139, 355.196928, 262.00355, 189.677245,
  134.734731, 93.882249, 64.151585, 42.976258, 28.217678, 18.153329,
  11.439342, 7.058616, 4.263557, 2.520084, 1.457139, 0.823907,
];

// Lock delay for levels 20..29; below that 500 ms, above it 150 ms
const HIGH_LEVEL_LOCK_DELAYS_MS: ReadonlyArray<number> = [
  450, 400, 350, 300, 250, 200, 195, 184, 167, 151,
];

export const INSTANT_GRAVITY_LEVEL = 20;

export type SpeedCurve = {
  readonly dropDelayMs: (level: number) => number;
  readonly lockDelayMs: (level: number) => number;
};

export function standardDropDelayMs(level: number): number {
  if (level >= INSTANT_GRAVITY_LEVEL) return 0;
  return DROP_DELAYS_MS[Math.max(1, Math.floor(level)) - 1] ?? 1000;
}

export function standardLockDelayMs(level: number): number {
  if (level < 20) return 500;
  return HIGH_LEVEL_LOCK_DELAYS_MS[Math.floor(level) - 20] ?? 150;
}

export const STANDARD_SPEED_CURVE: SpeedCurve = {
  dropDelayMs: standardDropDelayMs,
  lockDelayMs: standardLockDelayMs,
};

// Soft drop divides the row delay by the soft-drop factor
export function softDropDelayMs(
  curve: SpeedCurve,
  level: number,
  softDropFactor: number,
): number {
  return curve.dropDelayMs(level) / Math.max(softDropFactor, 0.00001);
}
