import { debugLog } from "../../utils/debug";
import { requestedTurns, NO_BUTTONS } from "../buttons";
import { createActivePiece, isBlockOut } from "../core/spawning";
import { type PieceId, gridCoordAsNumber } from "../core/types";
import { spawnLockDelay } from "../physics/lock-delay.machine";
import { EMPTY_QUEUE, schedule } from "../step/event-queue";

import type { EngineState } from "../types";

// Take the next piece from the preview (or the generator) and top the preview back up
export function takeNextPiece(state: EngineState): {
  id: PieceId;
  queue: ReadonlyArray<PieceId>;
  rng: EngineState["rng"];
} {
  let rng = state.rng;
  let queue: Array<PieceId> = [...state.queue];
  let id = queue.shift();
  if (id === undefined) {
    const pulled = rng.getNextPiece();
    id = pulled.piece;
    rng = pulled.newRng;
  }
  if (queue.length < state.cfg.previewCount) {
    const refill = rng.getNextPieces(state.cfg.previewCount - queue.length);
    queue = [...queue, ...refill.pieces];
    rng = refill.newRng;
  }
  return { id, queue, rng };
}

/**
 * Spawn the next piece on the skyline. A blocked spawn ends the game with
 * BlockOut. Rotate buttons held at spawn turn the piece right away, and
 * gravity ticks once immediately.
 */
export function handleSpawn(state: EngineState): EngineState {
  const { id, queue, rng } = takeNextPiece(state);
  const piece = createActivePiece(id);

  if (isBlockOut(state.board, id)) {
    debugLog("outcome", `block out spawning ${id}`, { time: state.time });
    return {
      ...state,
      events: EMPTY_QUEUE,
      outcome: { reason: "BlockOut", status: "Lost" },
      piece: null,
      queue,
      rng,
    };
  }

  let events = schedule(state.events, { kind: "Fall" }, state.time);
  const turns = requestedTurns(NO_BUTTONS, state.buttons);
  if (turns % 4 !== 0) {
    events = schedule(events, { kind: "Rotate", turns }, state.time);
  }
  debugLog("spawn", `spawned ${id}`, { next: queue, time: state.time });

  return {
    ...state,
    events,
    lock: spawnLockDelay(gridCoordAsNumber(piece.y)),
    piece,
    queue,
    rng,
  };
}
