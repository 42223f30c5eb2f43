import { debugLog } from "../../utils/debug";
import { type GameTime } from "../../types/timestamp";
import { type StatKind } from "../gamemode";
import { totalPiecesPlaced } from "../scoring/stats";
import { type EngineState, isFinished } from "../types";
import { addDuration, elapsedMs } from "../utils/time";

export function statValue(state: EngineState, stat: StatKind): number {
  const { stats } = state;
  switch (stat) {
    case "time":
      return elapsedMs(state.time, state.startTime);
    case "score":
      return stats.score;
    case "pieces":
      return totalPiecesPlaced(stats);
    case "lines":
      return stats.linesCleared;
    case "level":
      return stats.level;
  }
}

// When a time limit is set, the moment it is reached
export function limitDeadline(state: EngineState): GameTime | null {
  const { limit } = state.mode;
  if (limit === null || limit.stat !== "time") return null;
  return addDuration(state.startTime, limit.threshold);
}

/**
 * End the game once the gamemode's limit stat reaches its threshold.
 * The gamemode declares whether that is a win or a loss.
 */
export function resolveOutcome(state: EngineState): EngineState {
  if (isFinished(state)) return state;
  const { limit } = state.mode;
  if (limit === null) return state;
  if (statValue(state, limit.stat) < limit.threshold) return state;

  debugLog("outcome", `${state.mode.name}: ${limit.stat} limit reached`, {
    outcome: limit.outcome,
    time: state.time,
  });
  return {
    ...state,
    outcome:
      limit.outcome === "Won"
        ? { status: "Won" }
        : { reason: "ModeLimit", status: "Lost" },
  };
}
