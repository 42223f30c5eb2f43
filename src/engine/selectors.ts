import { type ButtonState } from "./buttons";
import { dropToBottom } from "./core/board";
import { type ActivePiece, type Board, type PieceId, copyBoardCells } from "./core/types";
import { type Gamemode } from "./gamemode";
import { type LockDelayState } from "./physics/lock-delay.machine";
import { type GameStats } from "./scoring/stats";
import { type EngineState, type GameOutcome, isFinished } from "./types";
import { elapsedMs } from "./utils/time";

import type { GameTime } from "../types/timestamp";

// Read-only snapshot handed to renderers and modes
export type GameState = Readonly<{
  time: GameTime;
  elapsedMs: number;
  board: Board;
  activePiece: ActivePiece | null;
  ghostPiece: ActivePiece | null;
  lockState: LockDelayState;
  nextPieces: ReadonlyArray<PieceId>;
  buttons: ButtonState;
  stats: GameStats;
  mode: Gamemode;
  outcome: GameOutcome;
  finished: boolean;
}>;

// Where the active piece would land
export const selectGhostPiece = (s: EngineState): ActivePiece | null =>
  s.piece === null ? null : dropToBottom(s.board, s.piece);

export const selectElapsedMs = (s: EngineState): number =>
  elapsedMs(s.time, s.startTime);

// The board is copied; everything else is immutable already
export function selectGameState(s: EngineState): GameState {
  return {
    activePiece: s.piece,
    board: { ...s.board, cells: copyBoardCells(s.board.cells) },
    buttons: s.buttons,
    elapsedMs: selectElapsedMs(s),
    finished: isFinished(s),
    ghostPiece: selectGhostPiece(s),
    lockState: s.lock,
    mode: s.mode,
    nextPieces: s.queue,
    outcome: s.outcome,
    stats: s.stats,
    time: s.time,
  };
}
