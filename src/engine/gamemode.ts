import { ConfigurationError } from "./errors";

export type StatKind = "time" | "score" | "pieces" | "lines" | "level";

// Reaching `threshold` on `stat` ends the game with `outcome`.
// The direction is declared per gamemode, never inferred from the stat.
export type ModeLimit = Readonly<{
  stat: StatKind;
  threshold: number;
  outcome: "Won" | "Lost";
}>;

export type Gamemode = Readonly<{
  name: string;
  startLevel: number;
  incrementLevel: boolean;
  limit: ModeLimit | null;
}>;

export const MAX_LEVEL = 99;
export const LINES_PER_LEVEL = 10;

const STAT_KINDS: ReadonlyArray<StatKind> = ["time", "score", "pieces", "lines", "level"];

/**
 * Validate a gamemode description. Throws ConfigurationError for limits that
 * could never be meaningful (non-positive thresholds, level limits at or
 * below the starting level).
 */
export function createGamemode(input: {
  name: string;
  startLevel?: number;
  incrementLevel?: boolean;
  limit?: ModeLimit | null;
}): Gamemode {
  const startLevel = input.startLevel ?? 1;
  if (!Number.isInteger(startLevel) || startLevel < 1 || startLevel > MAX_LEVEL) {
    throw new ConfigurationError("startLevel", `must be an integer from 1 to ${String(MAX_LEVEL)}`);
  }
  if (input.name.trim().length === 0) {
    throw new ConfigurationError("name", "must not be empty");
  }

  const limit = input.limit ?? null;
  if (limit !== null) {
    if (!STAT_KINDS.includes(limit.stat)) {
      throw new ConfigurationError("limit.stat", `unknown stat "${String(limit.stat)}"`);
    }
    if (!Number.isFinite(limit.threshold) || limit.threshold <= 0) {
      throw new ConfigurationError("limit.threshold", "must be a positive number");
    }
    if (limit.stat !== "time" && !Number.isInteger(limit.threshold)) {
      throw new ConfigurationError("limit.threshold", `must be an integer for ${limit.stat}`);
    }
    if (limit.stat === "level" && limit.threshold <= startLevel) {
      throw new ConfigurationError(
        "limit.threshold",
        "level limit must be above the starting level",
      );
    }
    if (limit.outcome !== "Won" && limit.outcome !== "Lost") {
      throw new ConfigurationError("limit.outcome", "must be Won or Lost");
    }
  }

  return {
    incrementLevel: input.incrementLevel ?? true,
    limit,
    name: input.name,
    startLevel,
  };
}

// Level after the line total moved from `prevLines` to `lines`
export function levelAfterLines(
  mode: Gamemode,
  level: number,
  prevLines: number,
  lines: number,
): number {
  if (!mode.incrementLevel) return level;
  const gained =
    Math.floor(lines / LINES_PER_LEVEL) - Math.floor(prevLines / LINES_PER_LEVEL);
  return Math.min(MAX_LEVEL, level + gained);
}
