import { debugLog } from "../../utils/debug";
import {
  canMove,
  clearLines,
  getCompletedLines,
  isAtBottom,
  isEmptyExceptRows,
  lockPiece,
} from "../core/board";
import { isPieceEntirelyAboveSkyline } from "../core/spawning";
import { type Feedback } from "../events";
import { levelAfterLines } from "../gamemode";
import { Locked } from "../physics/lock-delay.machine";
import { describeClear, registerLock } from "../scoring/score";
import { countPlacedPiece } from "../scoring/stats";
import { EMPTY_QUEUE, schedule } from "../step/event-queue";
import { addDuration } from "../utils/time";

import type { EngineState, StepResult } from "../types";

/**
 * Commit the active piece to the board.
 *
 * Ignored when the piece is airborne, or grounded but able to fall (a stale
 * timer). Otherwise: lock out if every cell is at or above the skyline;
 * else write the cells, score any full rows and queue either the line clear
 * or the next spawn. All other pending events are dropped.
 */
export function handleLock(state: EngineState): StepResult {
  const { board, cfg, piece } = state;
  if (piece === null || state.lock.tag === "Airborne") {
    return { feedback: [], state };
  }
  if (state.lock.tag === "Grounded" && !isAtBottom(board, piece)) {
    return { feedback: [], state };
  }

  const now = state.time;
  const feedback: Array<Feedback> = [{ kind: "PieceLockedDown", piece, time: now }];

  if (isPieceEntirelyAboveSkyline(board, piece)) {
    debugLog("outcome", `lock out with ${piece.id}`, { time: now });
    return {
      feedback,
      state: {
        ...state,
        events: EMPTY_QUEUE,
        outcome: { reason: "LockOut", status: "Lost" },
        piece: null,
      },
    };
  }

  // a piece that cannot move up is wedged in: that counts as a spin
  const spin = !canMove(board, piece, 0, 1);
  const newBoard = lockPiece(board, piece);
  const rows = getCompletedLines(newBoard);
  const perfectClear = rows.length > 0 && isEmptyExceptRows(newBoard, rows);
  const scored = registerLock(countPlacedPiece(state.stats, piece.id), {
    lines: rows.length,
    perfectClear,
    spin,
  });

  if (scored.clear !== null) {
    feedback.push(
      { clear: scored.clear, kind: "LinesCleared", rows, time: now },
      {
        bonus: scored.bonus,
        descriptor: describeClear(scored.clear, piece.id),
        kind: "Accolade",
        pieceId: piece.id,
        time: now,
      },
    );
  }
  debugLog("lock", `locked ${piece.id}`, { bonus: scored.bonus, rows, time: now });

  const events =
    rows.length > 0
      ? schedule(EMPTY_QUEUE, { kind: "LineClear" }, addDuration(now, cfg.lineClearDelayMs))
      : schedule(EMPTY_QUEUE, { kind: "Spawn" }, addDuration(now, cfg.appearanceDelayMs));

  return {
    feedback,
    state: {
      ...state,
      board: newBoard,
      events,
      lock: Locked(now),
      piece: null,
      stats: scored.stats,
    },
  };
}

// Remove the full rows once the clear delay is over, then queue the next spawn
export function handleLineClear(state: EngineState): EngineState {
  const { board, cfg, mode, stats } = state;
  const rows = getCompletedLines(board);
  const linesCleared = stats.linesCleared + rows.length;
  return {
    ...state,
    board: clearLines(board, rows),
    events: schedule(
      state.events,
      { kind: "Spawn" },
      addDuration(state.time, cfg.appearanceDelayMs),
    ),
    stats: {
      ...stats,
      level: levelAfterLines(mode, stats.level, stats.linesCleared, linesCleared),
      linesCleared,
    },
  };
}
