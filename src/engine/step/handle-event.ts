import { heldDirection } from "../buttons";
import { type ActivePiece } from "../core/types";
import { handleLineClear, handleLock } from "../gameplay/lock";
import {
  handleHardDrop,
  handleMove,
  handleRotate,
  handleSonicDrop,
} from "../gameplay/movement";
import { handleSpawn } from "../gameplay/spawn";
import { currentDropDelayMs, handleFall, handleSoftDrop } from "../physics/gravity";
import { updateLockDelay } from "../physics/lock-delay";
import { isFinished } from "../types";
import { addDuration } from "../utils/time";

import { type InternalEvent, isPending, schedule } from "./event-queue";

import type { EngineState, StepResult } from "../types";

function samePlacement(a: ActivePiece, b: ActivePiece): boolean {
  return a.id === b.id && a.rot === b.rot && a.x === b.x && a.y === b.y;
}

function withoutFeedback(state: EngineState): StepResult {
  return { feedback: [], state };
}

function dispatch(state: EngineState, event: InternalEvent): StepResult {
  switch (event.kind) {
    case "Spawn":
      return withoutFeedback(handleSpawn(state));
    case "Fall":
      return withoutFeedback(handleFall(state));
    case "SoftDrop":
      return withoutFeedback(handleSoftDrop(state));
    case "SonicDrop":
      return withoutFeedback(handleSonicDrop(state));
    case "HardDrop":
      return handleHardDrop(state);
    case "MoveSlow":
    case "MoveFast":
      return withoutFeedback(handleMove(state, event.kind));
    case "Rotate":
      return withoutFeedback(handleRotate(state, event.turns));
    case "Lock":
      return handleLock(state);
    case "LineClear":
      return withoutFeedback(handleLineClear(state));
  }
}

/**
 * After the piece changed: resume a held move that had stalled, make sure
 * gravity is ticking, then re-check ground contact. Only moves and
 * rotations count as a reposition for the lock timer.
 */
function settlePiece(
  prev: ActivePiece | null,
  state: EngineState,
  event: InternalEvent,
): EngineState {
  const { piece } = state;
  if (piece === null || isFinished(state) || state.lock.tag === "Locked") {
    return state;
  }

  const changed = prev === null || !samePlacement(prev, piece);
  let next = state;
  if (changed) {
    let events = next.events;
    if (
      heldDirection(next.buttons) !== 0 &&
      !isPending(events, "MoveSlow") &&
      !isPending(events, "MoveFast")
    ) {
      events = schedule(events, { kind: "MoveFast" }, next.time);
    }
    if (!isPending(events, "Fall")) {
      events = schedule(
        events,
        { kind: "Fall" },
        addDuration(next.time, currentDropDelayMs(next)),
      );
    }
    next = { ...next, events };
  }

  const repositioned =
    changed &&
    prev !== null &&
    (event.kind === "MoveSlow" || event.kind === "MoveFast" || event.kind === "Rotate");
  return updateLockDelay(next, repositioned);
}

/**
 * Process one due event. `state.time` must already be the event's time.
 */
export function handleEvent(state: EngineState, event: InternalEvent): StepResult {
  const prev = state.piece;
  const result = dispatch(state, event);
  return {
    feedback: result.feedback,
    state: settlePiece(prev, result.state, event),
  };
}
