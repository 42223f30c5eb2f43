import { dropToBottom, tryMove } from "../core/board";
import { schedule } from "../step/event-queue";
import { addDuration } from "../utils/time";

import { softDropDelayMs } from "./speed-curve";

import type { EngineState } from "../types";

// Row delay right now: soft drop divides it while the button is held
export function currentDropDelayMs(state: EngineState): number {
  const { buttons, cfg, stats } = state;
  return buttons.SoftDrop
    ? softDropDelayMs(cfg.speedCurve, stats.level, cfg.softDropFactor)
    : cfg.speedCurve.dropDelayMs(stats.level);
}

/**
 * Gravity tick: move the piece down one row and schedule the next tick.
 * With zero delay the piece falls straight to the floor. A blocked piece
 * stays put and no further tick is scheduled until it moves again.
 */
export function handleFall(state: EngineState): EngineState {
  const { board, piece } = state;
  if (piece === null || state.lock.tag === "Locked") return state;

  const delay = currentDropDelayMs(state);
  if (delay <= 0) {
    const landed = dropToBottom(board, piece);
    return landed === piece ? state : { ...state, piece: landed };
  }

  const moved = tryMove(board, piece, 0, -1);
  if (moved === null) return state;
  return {
    ...state,
    events: schedule(state.events, { kind: "Fall" }, addDuration(state.time, delay)),
    piece: moved,
  };
}

/**
 * Soft drop press: one row down right away, then gravity at soft-drop speed.
 * On the ground it locks immediately unless soft-drop locking is disabled.
 */
export function handleSoftDrop(state: EngineState): EngineState {
  const { board, cfg, piece } = state;
  if (piece === null || state.lock.tag === "Locked") return state;

  const moved = tryMove(board, piece, 0, -1);
  if (moved === null) {
    if (cfg.noSoftDropLock) return state;
    return { ...state, events: schedule(state.events, { kind: "Lock" }, state.time) };
  }
  return {
    ...state,
    events: schedule(
      state.events,
      { kind: "Fall" },
      addDuration(state.time, currentDropDelayMs(state)),
    ),
    piece: moved,
  };
}
