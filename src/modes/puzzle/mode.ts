import { type GameAdmin, type GameModifier, type ModifierPoint } from "../../engine/admin";
import { boardFromRows, isBoardEmpty } from "../../engine/core/board";
import { ConfigurationError } from "../../engine/errors";
import { MAX_PREVIEW_COUNT } from "../../engine/config";
import { Game, type GameOptions } from "../../engine/game";
import { createGamemode } from "../../engine/gamemode";
import { totalPiecesPlaced } from "../../engine/scoring/stats";
import { debugLog } from "../../utils/debug";

import { type Puzzle, loadPuzzles } from "./loader";
import { type StageContext, StageMachineService } from "./machine";

export const MAX_STAGE_ATTEMPTS = 4;
// Every stage plays at this speed level, whatever its number
export const PUZZLE_SPEED_LEVEL = 3;

export type PuzzleModeOptions = Readonly<{
  puzzles?: ReadonlyArray<Puzzle>;
  maxAttempts?: number;
}>;

/**
 * Deals a fixed board and piece list per stage. Once every piece of a stage
 * is placed the board must be empty; otherwise the stage is retried, up to
 * `maxAttempts` times, before the game is lost. The preview shows the stage
 * pieces still to come and nothing past them.
 */
export class PuzzleMode implements GameModifier {
  readonly name = "Puzzle";
  private readonly puzzles: ReadonlyArray<Puzzle>;
  private readonly stages: StageMachineService;
  private pieceLimit = 0;

  constructor(options: PuzzleModeOptions = {}) {
    const maxAttempts = options.maxAttempts ?? MAX_STAGE_ATTEMPTS;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new ConfigurationError("maxAttempts", "must be a positive integer");
    }
    this.puzzles = options.puzzles ?? loadPuzzles();
    if (this.puzzles.length === 0) {
      throw new ConfigurationError("puzzles", "must be a non-empty list");
    }
    this.stages = new StageMachineService(this.puzzles.length, maxAttempts);
  }

  apply(point: ModifierPoint, admin: GameAdmin): void {
    if (point.kind === "Start") {
      admin.setLevel(PUZZLE_SPEED_LEVEL);
      this.loadStage(admin, this.stages.getState().context);
      return;
    }
    if (point.kind !== "BeforeEvent" || point.event !== "Spawn") return;

    const view = admin.view();
    if (totalPiecesPlaced(view.stats) < this.pieceLimit) {
      this.showRemaining(admin);
      return;
    }

    const cleared = isBoardEmpty(view.board);
    const { context, state } = this.stages.finishStage(cleared);
    debugLog("puzzle", `stage finished: ${state}`, { cleared, ...context });

    switch (state) {
      case "won":
        admin.message("ALL STAGES CLEARED");
        admin.end({ status: "Won" });
        return;
      case "lost":
        admin.end({ reason: "ModeLimit", status: "Lost" });
        return;
      case "playing":
        this.loadStage(admin, context);
        this.showRemaining(admin);
        return;
    }
  }

  // Stage number and attempt, 1-based
  currentStage(): StageContext {
    return this.stages.getState().context;
  }

  // Called just before a spawn: the piece about to spawn leaves the preview
  private showRemaining(admin: GameAdmin): void {
    const placed = totalPiecesPlaced(admin.view().stats);
    const remaining = Math.max(0, this.pieceLimit - placed - 1);
    admin.setPreviewCount(Math.min(remaining, MAX_PREVIEW_COUNT));
  }

  private loadStage(admin: GameAdmin, ctx: StageContext): void {
    const puzzle = this.puzzles[ctx.stage - 1];
    if (puzzle === undefined) {
      throw new ConfigurationError("puzzles", `no stage ${String(ctx.stage)}`);
    }
    const title = puzzle.name.toUpperCase();
    admin.message(
      ctx.attempt === 1
        ? `Stage ${String(ctx.stage)}: ${title}`
        : `${String(ctx.attempt)}. TRY (${title})`,
    );
    admin.setBoard(boardFromRows(puzzle.rows));
    admin.setUpcoming(puzzle.pieces);
    this.pieceLimit = totalPiecesPlaced(admin.view().stats) + puzzle.pieces.length;
  }
}

/**
 * A game running the puzzle stages. No line or time limit: the stages
 * decide the outcome.
 */
export function createPuzzleGame(
  startTime = 0,
  options: GameOptions & PuzzleModeOptions = {},
): Game {
  const mode = new PuzzleMode({
    maxAttempts: options.maxAttempts,
    puzzles: options.puzzles,
  });
  return new Game(
    createGamemode({ incrementLevel: false, limit: null, name: "Puzzle" }),
    startTime,
    { config: options.config, modifiers: [mode, ...(options.modifiers ?? [])] },
  );
}
