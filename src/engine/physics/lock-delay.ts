import { isAtBottom } from "../core/board";
import { gridCoordAsNumber } from "../core/types";
import { cancel, schedule } from "../step/event-queue";

import {
  type LockDelayParams,
  stepLockDelay,
} from "./lock-delay.machine";

import type { EngineState } from "../types";

export function lockDelayParams(state: EngineState): LockDelayParams {
  const { cfg, stats } = state;
  return {
    continuityWindowMs: 2 * cfg.speedCurve.dropDelayMs(stats.level),
    groundTimeMaxMs: cfg.groundTimeMaxMs,
    lockDelayMs: cfg.speedCurve.lockDelayMs(stats.level),
  };
}

/**
 * Re-check ground contact for the active piece and keep the pending Lock
 * event in line with the lock-down state.
 */
export function updateLockDelay(
  state: EngineState,
  repositioned: boolean,
): EngineState {
  const { board, piece } = state;
  if (piece === null) return state;

  const step = stepLockDelay({
    grounded: isAtBottom(board, piece),
    ld: state.lock,
    now: state.time,
    params: lockDelayParams(state),
    repositioned,
    row: gridCoordAsNumber(piece.y),
  });

  if (step.lock === "cancel") {
    return { ...state, events: cancel(state.events, "Lock"), lock: step.ld };
  }
  if (step.lock === "schedule" && step.ld.tag !== "Airborne") {
    return {
      ...state,
      events: schedule(state.events, { kind: "Lock" }, step.ld.deadline),
      lock: step.ld,
    };
  }
  return step.ld === state.lock ? state : { ...state, lock: step.ld };
}
