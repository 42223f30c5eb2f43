import { type GameTime } from "../types/timestamp";

import { type ButtonState, NO_BUTTONS } from "./buttons";
import { type EngineConfig } from "./config";
import { createEmptyBoard } from "./core/board";
import { type PieceRandomGenerator, createGenerator } from "./core/rng";
import { type ActivePiece, type Board, type PieceId } from "./core/types";
import { type Feedback } from "./events";
import { type Gamemode } from "./gamemode";
import { type LockDelayState, spawnLockDelay } from "./physics/lock-delay.machine";
import { type GameStats, createStats } from "./scoring/stats";
import { type EventQueue, EMPTY_QUEUE, schedule } from "./step/event-queue";

export type LossReason = "BlockOut" | "LockOut" | "ModeLimit" | "Forfeit";

export type GameOutcome =
  | { readonly status: "Ongoing" }
  | { readonly status: "Won" }
  | { readonly status: "Lost"; readonly reason: LossReason };

export const ONGOING: GameOutcome = { status: "Ongoing" };

// Full engine state. Every step returns a new value; nothing is mutated in place.
export type EngineState = {
  readonly cfg: EngineConfig;
  readonly mode: Gamemode;
  readonly startTime: GameTime;
  readonly time: GameTime;
  readonly board: Board;
  readonly piece: ActivePiece | null;
  readonly lock: LockDelayState;
  readonly events: EventQueue;
  readonly queue: ReadonlyArray<PieceId>; // preview, next piece first
  readonly rng: PieceRandomGenerator;
  readonly buttons: ButtonState;
  readonly stats: GameStats;
  readonly outcome: GameOutcome;
};

export type StepResult = {
  readonly state: EngineState;
  readonly feedback: ReadonlyArray<Feedback>;
};

export function isFinished(state: EngineState): boolean {
  return state.outcome.status !== "Ongoing";
}

// The first piece spawns at the start time
export function mkInitialState(
  cfg: EngineConfig,
  mode: Gamemode,
  startTime: GameTime,
): EngineState {
  const rng = createGenerator(cfg.generator, cfg.seed);
  const queueResult = rng.getNextPieces(cfg.previewCount);

  return {
    board: createEmptyBoard(),
    buttons: NO_BUTTONS,
    cfg,
    events: schedule(EMPTY_QUEUE, { kind: "Spawn" }, startTime),
    lock: spawnLockDelay(0),
    mode,
    outcome: ONGOING,
    piece: null,
    queue: queueResult.pieces,
    rng: queueResult.newRng,
    startTime,
    stats: createStats(mode.startLevel),
    time: startTime,
  };
}
