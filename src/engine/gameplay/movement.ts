import { heldDirection } from "../buttons";
import { dropToBottom, tryMove } from "../core/board";
import { Locked } from "../physics/lock-delay.machine";
import { rotateBy, tryRotate } from "../core/rotation";
import { schedule } from "../step/event-queue";
import { addDuration } from "../utils/time";

import type { StepResult, EngineState } from "../types";

/**
 * Shift one column in the held direction. The first step of a press waits
 * DAS before repeating, later steps repeat every ARR; both stay below the
 * lock delay so a sliding piece cannot be locked between steps.
 */
export function handleMove(
  state: EngineState,
  kind: "MoveSlow" | "MoveFast",
): EngineState {
  const { board, cfg, piece, stats } = state;
  if (piece === null || state.lock.tag === "Locked") return state;

  const dx = heldDirection(state.buttons);
  if (dx === 0) return state;
  const moved = tryMove(board, piece, dx, 0);
  if (moved === null) return state;

  const repeat = kind === "MoveSlow" ? cfg.dasMs : cfg.arrMs;
  const delay = Math.max(
    0,
    Math.min(repeat, cfg.speedCurve.lockDelayMs(stats.level) - 1),
  );
  return {
    ...state,
    events: schedule(state.events, { kind: "MoveFast" }, addDuration(state.time, delay)),
    piece: moved,
  };
}

export function handleRotate(state: EngineState, turns: number): EngineState {
  const { board, cfg, piece } = state;
  if (piece === null || state.lock.tag === "Locked") return state;

  const target = rotateBy(piece.rot, turns);
  if (target === piece.rot) return state;
  const rotated = tryRotate(cfg.rotationSystem, piece, target, board);
  return rotated === null ? state : { ...state, piece: rotated };
}

// Straight to the floor without locking
export function handleSonicDrop(state: EngineState): EngineState {
  const { board, piece } = state;
  if (piece === null || state.lock.tag === "Locked") return state;
  const landed = dropToBottom(board, piece);
  return landed === piece ? state : { ...state, piece: landed };
}

// Straight to the floor, then lock after the hard-drop delay whatever happens meanwhile
export function handleHardDrop(state: EngineState): StepResult {
  const { board, cfg, piece } = state;
  if (piece === null || state.lock.tag === "Locked") {
    return { feedback: [], state };
  }
  const landed = dropToBottom(board, piece);
  const deadline = addDuration(state.time, cfg.hardDropDelayMs);
  return {
    feedback: [{ from: piece, kind: "HardDropped", time: state.time, to: landed }],
    state: {
      ...state,
      events: schedule(state.events, { kind: "Lock" }, deadline),
      lock: Locked(deadline),
      piece: landed,
    },
  };
}
