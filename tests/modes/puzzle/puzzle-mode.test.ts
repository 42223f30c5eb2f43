import { describe, test, expect } from "@jest/globals";

import { NO_BUTTONS } from "@/engine/buttons";
import { ConfigurationError } from "@/engine/errors";
import { type Feedback } from "@/engine/events";
import { Game } from "@/engine/game";
import { createGamemode } from "@/engine/gamemode";
import {
  PUZZLE_SPEED_LEVEL,
  type Puzzle,
  PuzzleMode,
  createPuzzleGame,
  loadPuzzles,
} from "@/modes";
import { StageMachineService } from "@/modes/puzzle/machine";

import { createTestPiece, press } from "../../test-helpers";

// An O dropped into the gap clears both rows
const clean: Puzzle = { name: "Gap", pieces: ["O"], rows: ["####  ####", "####  ####"] };
// An O dropped into the gap clears one row and leaves half of itself behind
const messy: Puzzle = { name: "Half", pieces: ["O"], rows: ["####  ####"] };

function puzzleGamemode() {
  return createGamemode({ incrementLevel: false, limit: null, name: "Puzzle" });
}

function dropOnce(game: Game, at: number): void {
  game.update(press("HardDrop"), at);
  game.update(NO_BUTTONS, at + 1);
}

describe("@/modes/puzzle/loader — stage data", () => {
  test("Bundled stages load and validate", () => {
    const puzzles = loadPuzzles();
    expect(puzzles).toHaveLength(24);
    expect(puzzles[0]?.name).toBe("I-spin");
    expect(puzzles[0]?.pieces).toEqual(["I", "I"]);
  });

  test("Malformed stages are rejected with the offending field", () => {
    expect(() => loadPuzzles([])).toThrow(ConfigurationError);
    expect(() => loadPuzzles([{ name: "x", pieces: ["O"], rows: ["short"] }])).toThrow(
      "puzzles[0].rows: every row must be 10 cells wide",
    );
    expect(() => loadPuzzles([{ name: "x", pieces: ["Q"], rows: ["#         "] }])).toThrow(
      "puzzles[0].pieces: must be a non-empty list of piece letters",
    );
  });
});

describe("@/modes/puzzle/machine — stage progression", () => {
  test("Retries, advances and wins", () => {
    const stages = new StageMachineService(2, 2);
    expect(stages.getState()).toEqual({
      context: { attempt: 1, maxAttempts: 2, stage: 1, stageCount: 2 },
      state: "playing",
    });

    expect(stages.finishStage(false)).toMatchObject({
      context: { attempt: 2, stage: 1 },
      state: "playing",
    });
    expect(stages.finishStage(true)).toMatchObject({
      context: { attempt: 1, stage: 2 },
      state: "playing",
    });
    expect(stages.finishStage(true).state).toBe("won");
  });

  test("Running out of attempts loses", () => {
    const stages = new StageMachineService(3, 1);
    expect(stages.finishStage(false).state).toBe("lost");
  });
});

describe("@/modes/puzzle/mode — a running puzzle game", () => {
  test("Clearing the only stage wins", () => {
    const game = createPuzzleGame(0, { puzzles: [clean] });

    expect(game.update(null, 0)).toEqual([{ kind: "Message", text: "Stage 1: GAP", time: 0 }]);
    expect(game.state().nextPieces).toEqual([]);
    expect(game.state().activePiece?.id).toBe("O");

    dropOnce(game, 10);
    expect(game.update(null, 1000)).toEqual([
      { kind: "Message", text: "ALL STAGES CLEARED", time: expect.closeTo(260.1, 9) },
    ]);
    expect(game.state().outcome).toEqual({ status: "Won" });
  });

  test("A failed stage is retried, then lost", () => {
    const game = createPuzzleGame(0, { maxAttempts: 2, puzzles: [messy] });
    game.update(null, 0);

    dropOnce(game, 10);
    expect(game.update(null, 1000)).toEqual([
      { kind: "Message", text: "2. TRY (HALF)", time: expect.closeTo(260.1, 9) },
    ]);
    expect(game.state().board.cells.filter((v) => v !== 0)).toHaveLength(8);
    expect(game.state().outcome).toEqual({ status: "Ongoing" });

    dropOnce(game, 1000);
    game.update(null, 2000);
    expect(game.state().outcome).toEqual({ reason: "ModeLimit", status: "Lost" });
  });

  test("Stages advance in order at a fixed speed level", () => {
    const mode = new PuzzleMode({ puzzles: [clean, messy] });
    const game = new Game(puzzleGamemode(), 0, { modifiers: [mode] });
    game.update(null, 0);
    expect(game.state().stats.level).toBe(PUZZLE_SPEED_LEVEL);

    dropOnce(game, 10);
    expect(game.update(null, 1000)).toEqual([
      { kind: "Message", text: "Stage 2: HALF", time: expect.closeTo(260.1, 9) },
    ]);
    expect(mode.currentStage()).toEqual({ attempt: 1, maxAttempts: 4, stage: 2, stageCount: 2 });
    expect(game.state().stats.level).toBe(PUZZLE_SPEED_LEVEL);
  });

  test("Late stages keep ordinary gravity", () => {
    const mode = new PuzzleMode({ puzzles: Array.from({ length: 21 }, () => clean) });
    const game = new Game(puzzleGamemode(), 0, { modifiers: [mode] });
    game.update(null, 0);

    let feedback: ReadonlyArray<Feedback> = [];
    for (let t = 10; t < 20_010; t += 1000) {
      dropOnce(game, t);
      feedback = game.update(null, t + 1000);
    }

    expect(mode.currentStage().stage).toBe(21);
    expect(feedback).toEqual([
      { kind: "Message", text: "Stage 21: GAP", time: expect.closeTo(19_260.1, 6) },
    ]);
    // spawned at 19260.1, one row at once and one more 617.796 ms later
    expect(game.state().activePiece).toEqual(createTestPiece("O", 4, 18));
  });

  test("The preview shows the rest of the stage and nothing past it", () => {
    const three: Puzzle = { name: "Three", pieces: ["T", "S", "Z"], rows: ["#         "] };
    const game = createPuzzleGame(0, { puzzles: [three] });

    game.update(null, 0);
    expect(game.state().activePiece?.id).toBe("T");
    expect(game.state().nextPieces).toEqual(["S", "Z"]);

    dropOnce(game, 10);
    game.update(null, 100);
    expect(game.state().activePiece?.id).toBe("S");
    expect(game.state().nextPieces).toEqual(["Z"]);

    dropOnce(game, 100);
    game.update(null, 200);
    expect(game.state().activePiece?.id).toBe("Z");
    expect(game.state().nextPieces).toEqual([]);
  });

  test("Attempts must be a positive integer", () => {
    expect(() => createPuzzleGame(0, { maxAttempts: 0 })).toThrow(
      "maxAttempts: must be a positive integer",
    );
  });
});
