// timestamp.ts
// Game time is milliseconds on the caller's clock. The engine never reads a real clock.
declare const GameTimeBrand: unique symbol;

export type GameTime = number & { readonly [GameTimeBrand]: true };

// Constructors / guards
export function createGameTime(value: number): GameTime {
  if (value < 0 || !Number.isFinite(value)) {
    throw new Error("GameTime must be a finite, non-negative number.");
  }
  return value as GameTime;
}

export function isGameTime(n: unknown): n is GameTime {
  return typeof n === "number" && n >= 0 && Number.isFinite(n);
}
