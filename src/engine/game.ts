import { debugLog } from "../utils/debug";
import { type GameTime, createGameTime, isGameTime } from "../types/timestamp";

import { type FinalOutcome, type GameAdmin, type GameModifier, type ModifierPoint } from "./admin";
import { type ButtonState } from "./buttons";
import { type EngineConfigInput, MAX_PREVIEW_COUNT, createEngineConfig } from "./config";
import { ALL_PIECES, type Board, type PieceId, copyBoardCells } from "./core/types";
import { ConfigurationError, InvalidTimestampError } from "./errors";
import { type Feedback } from "./events";
import { type Gamemode, MAX_LEVEL, createGamemode } from "./gamemode";
import { updateLockDelay } from "./physics/lock-delay";
import { type GameState, selectGameState } from "./selectors";
import { applyButtonChange } from "./step/apply-input";
import { peek, pop } from "./step/event-queue";
import { handleEvent } from "./step/handle-event";
import { limitDeadline, resolveOutcome } from "./step/resolve-outcome";
import { type EngineState, isFinished, mkInitialState } from "./types";
import { minTime } from "./utils/time";

export type GameOptions = {
  readonly config?: EngineConfigInput;
  readonly modifiers?: ReadonlyArray<GameModifier>;
};

/**
 * One game. `update` is the only way time moves forward; `state` is the
 * only way to look inside. Not safe to share across concurrent callers.
 */
export class Game {
  private s: EngineState;
  private readonly modifiers: ReadonlyArray<GameModifier>;
  private readonly admin: GameAdmin;
  private outbox: Array<Feedback> = [];
  // Latest accepted update time; the game clock can stop earlier when the game ends
  private lastUpdateTime: GameTime;

  constructor(gamemode: Gamemode, startTime: number, options: GameOptions = {}) {
    if (!isGameTime(startTime)) {
      throw new ConfigurationError("startTime", "must be a finite, non-negative number");
    }
    const mode = createGamemode(gamemode);
    const cfg = createEngineConfig(options.config);
    this.s = mkInitialState(cfg, mode, createGameTime(startTime));
    this.lastUpdateTime = this.s.time;
    this.modifiers = options.modifiers ?? [];
    this.admin = this.createAdmin();
    this.notify({ kind: "Start" });
  }

  /**
   * Simulate up to `time`, applying `buttons` (if given) at `time`.
   * Returns the feedback produced, in order. A finished game returns [].
   * Throws InvalidTimestampError, leaving the game untouched, when `time`
   * is earlier than the previous call's.
   */
  update(buttons: ButtonState | null, time: number): ReadonlyArray<Feedback> {
    if (!isGameTime(time) || time < this.lastUpdateTime) {
      debugLog("input", "rejected update time", { previous: this.lastUpdateTime, time });
      throw new InvalidTimestampError(time, this.lastUpdateTime);
    }
    const now = createGameTime(time);
    this.lastUpdateTime = now;
    if (isFinished(this.s)) return this.flush();

    const deadline = limitDeadline(this.s);
    const horizon: GameTime = deadline === null ? now : minTime(deadline, now);
    let pending = buttons;

    for (;;) {
      const next = peek(this.s.events);
      if (next !== undefined && next.time <= horizon) {
        this.s = { ...this.s, events: pop(this.s.events), time: next.time };
        this.notify({ event: next.event.kind, kind: "BeforeEvent" });
        if (isFinished(this.s)) break;

        const result = handleEvent(this.s, next.event);
        this.s = result.state;
        this.outbox.push(...result.feedback);

        this.notify({ event: next.event.kind, kind: "AfterEvent" });
        this.s = resolveOutcome(this.s);
        if (isFinished(this.s)) break;
        continue;
      }

      this.s = resolveOutcome({ ...this.s, time: horizon });
      if (isFinished(this.s) || pending === null) break;

      this.notify({ buttons: pending, kind: "BeforeButtonChange" });
      if (isFinished(this.s)) break;
      this.s = applyButtonChange(this.s, pending);
      this.notify({ buttons: pending, kind: "AfterButtonChange" });
      pending = null;
    }

    return this.flush();
  }

  state(): GameState {
    return selectGameState(this.s);
  }

  // Give up: the game ends as lost
  forfeit(): void {
    if (isFinished(this.s)) return;
    this.finish({ reason: "Forfeit", status: "Lost" });
  }

  private flush(): ReadonlyArray<Feedback> {
    const out = this.outbox;
    this.outbox = [];
    return out;
  }

  private finish(outcome: FinalOutcome): void {
    debugLog("outcome", `game ended: ${outcome.status}`, { outcome, time: this.s.time });
    this.s = { ...this.s, outcome };
  }

  private notify(point: ModifierPoint): void {
    for (const modifier of this.modifiers) {
      modifier.apply(point, this.admin);
    }
  }

  private createAdmin(): GameAdmin {
    return {
      end: (outcome: FinalOutcome) => {
        if (!isFinished(this.s)) this.finish(outcome);
      },
      message: (text: string) => {
        this.outbox.push({ kind: "Message", text, time: this.s.time });
      },
      setBoard: (board: Board) => {
        this.s = updateLockDelay(
          { ...this.s, board: { ...board, cells: copyBoardCells(board.cells) } },
          false,
        );
      },
      setLevel: (level: number) => {
        if (!Number.isInteger(level) || level < 1 || level > MAX_LEVEL) {
          throw new ConfigurationError(
            "level",
            `must be an integer from 1 to ${String(MAX_LEVEL)}`,
          );
        }
        this.s = { ...this.s, stats: { ...this.s.stats, level } };
      },
      setPreviewCount: (count: number) => {
        if (!Number.isInteger(count) || count < 0 || count > MAX_PREVIEW_COUNT) {
          throw new ConfigurationError(
            "previewCount",
            `must be an integer from 0 to ${String(MAX_PREVIEW_COUNT)}`,
          );
        }
        this.s = { ...this.s, cfg: { ...this.s.cfg, previewCount: count } };
      },
      setUpcoming: (pieces: ReadonlyArray<PieceId>) => {
        if (!pieces.every((p) => ALL_PIECES.includes(p))) {
          throw new ConfigurationError("upcoming", "contains an unknown piece");
        }
        this.s = { ...this.s, queue: [...pieces] };
      },
      view: () => selectGameState(this.s),
    };
  }
}
