import { debugLog } from "../../utils/debug";
import {
  type ButtonState,
  heldDirection,
  newlyPressed,
  pressedButtons,
  requestedTurns,
} from "../buttons";
import { addDuration } from "../utils/time";

import { type EventQueue, cancel, schedule } from "./event-queue";

import type { EngineState } from "../types";

/**
 * Translate a button snapshot into events at the current time.
 * The snapshot is always recorded; events are only queued while a piece is
 * in play (rotate buttons still held at the next spawn are honoured there).
 */
export function applyButtonChange(state: EngineState, next: ButtonState): EngineState {
  const prev = state.buttons;
  if (state.piece === null) return { ...state, buttons: next };

  const now = state.time;
  let events: EventQueue = state.events;

  const prevDir = heldDirection(prev);
  const nextDir = heldDirection(next);
  if (prevDir === 0 && nextDir !== 0) {
    events = schedule(cancel(events, "MoveFast"), { kind: "MoveSlow" }, now);
  } else if (prevDir !== 0 && nextDir !== 0 && prevDir !== nextDir) {
    events = schedule(cancel(events, "MoveSlow"), { kind: "MoveFast" }, now);
  } else if (prevDir !== 0 && nextDir === 0) {
    events = cancel(cancel(events, "MoveSlow"), "MoveFast");
  }

  const turns = requestedTurns(prev, next);
  if (turns % 4 !== 0) {
    events = schedule(events, { kind: "Rotate", turns }, now);
  }

  if (newlyPressed(prev, next, "SoftDrop")) {
    events = schedule(events, { kind: "SoftDrop" }, now);
  } else if (prev.SoftDrop && !next.SoftDrop) {
    const { cfg, stats } = state;
    events = schedule(
      events,
      { kind: "Fall" },
      addDuration(now, cfg.speedCurve.dropDelayMs(stats.level)),
    );
  }
  if (newlyPressed(prev, next, "SonicDrop")) {
    events = schedule(events, { kind: "SonicDrop" }, now);
  }
  if (newlyPressed(prev, next, "HardDrop")) {
    events = schedule(events, { kind: "HardDrop" }, now);
  }

  debugLog("input", "buttons changed", { pressed: pressedButtons(next), time: now });
  return { ...state, buttons: next, events };
}
