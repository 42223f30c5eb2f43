import { describe, test, expect } from "@jest/globals";

import { type GameModifier } from "@/engine/admin";
import { NO_BUTTONS } from "@/engine/buttons";
import { boardFromRows } from "@/engine/core/board";
import { ConfigurationError, InvalidTimestampError } from "@/engine/errors";
import { type Feedback } from "@/engine/events";
import { Game } from "@/engine/game";
import { createGamemode } from "@/engine/gamemode";
import { sprint, zen } from "@/modes";

import {
  createSequenceGame,
  createTestPiece,
  endlessMode,
  kinds,
  press,
  startingBoard,
} from "../test-helpers";

describe("@/engine/game — construction", () => {
  test("Rejects a negative start time", () => {
    expect(() => new Game(endlessMode(), -1)).toThrow(ConfigurationError);
  });

  test("Rejects a bad gamemode or config before anything runs", () => {
    expect(() => new Game(endlessMode(), 0, { config: { previewCount: 99 } })).toThrow(
      "previewCount: must be an integer from 0 to 16",
    );
  });

  test("The first piece spawns and drops one row at the start time", () => {
    const game = createSequenceGame(["O", "T"]);
    expect(game.update(null, 0)).toEqual([]);

    const state = game.state();
    expect(state.activePiece).toEqual(createTestPiece("O", 4, 19));
    expect(state.ghostPiece).toEqual(createTestPiece("O", 4, 0));
    expect(state.nextPieces).toEqual(["T"]);
    expect(state.lockState).toEqual({
      groundTimeMs: 0,
      liftoffAt: null,
      lowestRow: 20,
      tag: "Airborne",
    });
  });
});

describe("@/engine/game — time", () => {
  test("An earlier update time throws and leaves the game untouched", () => {
    const game = createSequenceGame(["O"]);
    game.update(null, 2500);
    const before = game.state();

    expect(() => game.update(press("HardDrop"), 2000)).toThrow(InvalidTimestampError);
    expect(() => game.update(null, Number.NaN)).toThrow(InvalidTimestampError);
    expect(game.state()).toEqual(before);
    expect(game.state().activePiece).toEqual(createTestPiece("O", 4, 17));
  });

  test("After the game ends mid-update, earlier times are still rejected", () => {
    const rows = ["    ##    ", ...Array.from({ length: 20 }, () => "          ")];
    const game = createSequenceGame(["O"], { modifiers: [startingBoard(boardFromRows(rows))] });

    game.update(null, 5000);
    expect(game.state().outcome).toEqual({ reason: "BlockOut", status: "Lost" });
    expect(game.state().time).toBe(0);

    expect(() => game.update(null, 4000)).toThrow(InvalidTimestampError);
    expect(game.update(null, 5000)).toEqual([]);
    game.update(null, 6000);
    expect(() => game.update(null, 5500)).toThrow(InvalidTimestampError);
  });

  test("Gravity moves one row per second at level 1", () => {
    const game = createSequenceGame(["O"]);
    game.update(null, 999);
    expect(game.state().activePiece?.y).toBe(19);
    game.update(null, 1000);
    expect(game.state().activePiece?.y).toBe(18);
    expect(game.state().elapsedMs).toBe(1000);
  });

  test("The same inputs give the same game whatever the update cadence", () => {
    const script: Array<[number, ReturnType<typeof press>]> = [
      [100, press("MoveLeft")],
      [400, NO_BUTTONS],
      [600, press("RotateRight")],
      [700, press("HardDrop")],
      [800, NO_BUTTONS],
      [1500, press("MoveRight")],
      [2100, press("MoveRight", "SoftDrop")],
      [2600, press("SonicDrop")],
      [3000, NO_BUTTONS],
      [4000, press("Rotate180")],
      [4100, press("HardDrop")],
      [4200, NO_BUTTONS],
    ];

    const sparse = new Game(zen(), 0, { config: { seed: "cadence" } });
    const dense = new Game(zen(), 0, { config: { seed: "cadence" } });
    const sparseFeedback: Array<Feedback> = [];
    const denseFeedback: Array<Feedback> = [];

    for (const [time, buttons] of script) {
      sparseFeedback.push(...sparse.update(buttons, time));
    }
    sparseFeedback.push(...sparse.update(null, 9000));

    let next = 0;
    for (let time = 0; time <= 9000; time += 17) {
      const entry = script[next];
      if (entry !== undefined && entry[0] <= time) {
        denseFeedback.push(...dense.update(null, entry[0]));
        denseFeedback.push(...dense.update(entry[1], entry[0]));
        next++;
      }
      denseFeedback.push(...dense.update(null, time));
    }
    denseFeedback.push(...dense.update(null, 9000));

    expect(denseFeedback).toEqual(sparseFeedback);
    expect(dense.state()).toEqual(sparse.state());
    // hard drop at 700, sonic drop then lock delay at 3100, hard drop at 4100
    expect(kinds(sparseFeedback).filter((k) => k === "PieceLockedDown")).toHaveLength(3);
  });
});

describe("@/engine/game — lock down", () => {
  test("A resting piece locks after the lock delay", () => {
    const game = createSequenceGame(["O"]);

    // reaches row 0 at 19 s, locks 500 ms later
    game.update(null, 19000);
    expect(game.state().lockState).toMatchObject({ deadline: 19500, tag: "Grounded" });
    expect(game.update(null, 19499)).toEqual([]);
    expect(game.update(null, 19500)).toEqual([
      { kind: "PieceLockedDown", piece: createTestPiece("O", 4, 0), time: 19500 },
    ]);
    expect(game.state().activePiece).toBeNull();

    // next piece appears 50 ms later and drops a row immediately
    game.update(null, 19550);
    expect(game.state().activePiece).toEqual(createTestPiece("O", 4, 19));
    expect(game.state().stats.piecesPlaced.O).toBe(1);
  });

  test("Hard drop moves to the floor and locks after the hard-drop delay", () => {
    const game = createSequenceGame(["O"]);
    game.update(null, 0);

    expect(game.update(press("HardDrop"), 0)).toEqual([
      {
        from: createTestPiece("O", 4, 19),
        kind: "HardDropped",
        time: 0,
        to: createTestPiece("O", 4, 0),
      },
    ]);
    expect(game.state().lockState).toEqual({ deadline: 0.1, tag: "Locked" });
    expect(kinds(game.update(NO_BUTTONS, 1))).toEqual(["PieceLockedDown"]);
  });

  test("Taps on the ground cannot delay locking past the ground-time cap", () => {
    const game = createSequenceGame(["O"]);
    game.update(press("SonicDrop"), 0);
    expect(game.state().activePiece).toEqual(createTestPiece("O", 4, 0));

    for (let k = 1; k <= 7; k++) {
      game.update(press(k % 2 === 1 ? "MoveLeft" : "MoveRight"), 300 * k);
      game.update(NO_BUTTONS, 300 * k + 100);
    }
    // the last tap at 2100 would otherwise hold the piece until 2600
    expect(game.state().lockState).toMatchObject({ deadline: 2250 });
    expect(game.update(null, 2249)).toEqual([]);
    expect(game.update(null, 2250)).toEqual([
      { kind: "PieceLockedDown", piece: createTestPiece("O", 3, 0), time: 2250 },
    ]);
  });

  test("Holding a direction slides after DAS, then every ARR", () => {
    const game = createSequenceGame(["O"]);
    game.update(press("MoveRight"), 0);
    expect(game.state().activePiece?.x).toBe(5);

    game.update(null, 166);
    expect(game.state().activePiece?.x).toBe(5);
    game.update(null, 167);
    expect(game.state().activePiece?.x).toBe(6);
    game.update(null, 200);
    expect(game.state().activePiece?.x).toBe(7);
    game.update(null, 233);
    expect(game.state().activePiece?.x).toBe(8);
    game.update(null, 1000);
    expect(game.state().activePiece?.x).toBe(8);
  });
});

describe("@/engine/game — line clears and scoring", () => {
  test("A perfect double with a hard-dropped O", () => {
    const board = boardFromRows(["####  ####", "####  ####"]);
    const game = createSequenceGame(["O"], { modifiers: [startingBoard(board)] });

    game.update(press("HardDrop"), 0);
    const feedback = game.update(NO_BUTTONS, 1);

    expect(feedback).toEqual([
      { kind: "PieceLockedDown", piece: createTestPiece("O", 4, 0), time: 0.1 },
      {
        clear: { backToBack: 1, combo: 1, lines: 2, perfectClear: true, spin: false },
        kind: "LinesCleared",
        rows: [0, 1],
        time: 0.1,
      },
      { bonus: 640, descriptor: "Perfect Double", kind: "Accolade", pieceId: "O", time: 0.1 },
    ]);
    expect(game.state().stats.score).toBe(640);
    expect(game.state().stats.linesCleared).toBe(0);

    game.update(null, 250);
    expect(game.state().stats.linesCleared).toBe(2);
    expect(game.state().board.cells.every((v) => v === 0)).toBe(true);
  });

  test("A line limit ends the game as declared", () => {
    const board = boardFromRows(["####  ####", "####  ####"]);
    const mode = createGamemode({
      limit: { outcome: "Won", stat: "lines", threshold: 2 },
      name: "Two Lines",
    });
    const game = createSequenceGame(["O"], { mode, modifiers: [startingBoard(board)] });

    game.update(press("HardDrop"), 0);
    game.update(NO_BUTTONS, 1);
    expect(game.state().finished).toBe(false);
    expect(game.update(null, 300)).toEqual([]);

    const state = game.state();
    expect(state.outcome).toEqual({ status: "Won" });
    expect(state.finished).toBe(true);
    expect(state.time).toBeCloseTo(200.1, 9);
    expect(game.update(press("HardDrop"), 400)).toEqual([]);
  });
});

describe("@/engine/game — 40-line sprint", () => {
  // Puts two rows with a 2-wide gap back before every spawn, so each O clears two lines
  const twoRowGap: GameModifier = {
    apply(point, admin) {
      if (point.kind === "BeforeEvent" && point.event === "Spawn") {
        admin.setBoard(boardFromRows(["####  ####", "####  ####"]));
      }
    },
    name: "two-row-gap",
  };

  test("Won when the fortieth line clears, not before", () => {
    const game = createSequenceGame(["O"], { mode: sprint(), modifiers: [twoRowGap] });
    game.update(null, 0);

    let t = 10;
    for (let k = 0; k < 19; k++, t += 500) {
      game.update(press("HardDrop"), t);
      game.update(NO_BUTTONS, t + 1);
      game.update(null, t + 500);
    }
    expect(game.state().stats.linesCleared).toBe(38);
    expect(game.state().outcome).toEqual({ status: "Ongoing" });

    game.update(press("HardDrop"), t);
    game.update(NO_BUTTONS, t + 200);
    expect(game.state().finished).toBe(false);
    expect(game.state().stats.linesCleared).toBe(38);

    game.update(null, t + 201);
    const state = game.state();
    expect(state.finished).toBe(true);
    expect(state.outcome).toEqual({ status: "Won" });
    expect(state.stats.linesCleared).toBe(40);
    expect(state.time).toBeCloseTo(t + 200.1, 6);
  });
});

describe("@/engine/game — game over", () => {
  test("Block out when the spawn cells are taken", () => {
    const rows = ["    ##    ", ...Array.from({ length: 20 }, () => "          ")];
    const game = createSequenceGame(["O"], { modifiers: [startingBoard(boardFromRows(rows))] });

    game.update(null, 0);
    expect(game.state().outcome).toEqual({ reason: "BlockOut", status: "Lost" });
    expect(game.state().activePiece).toBeNull();
  });

  test("Lock out when a piece locks entirely above the skyline", () => {
    const rows = Array.from({ length: 20 }, () => "    ##    ");
    const game = createSequenceGame(["O"], { modifiers: [startingBoard(boardFromRows(rows))] });

    game.update(null, 0);
    expect(game.state().activePiece).toEqual(createTestPiece("O", 4, 20));
    expect(game.update(null, 500)).toEqual([
      { kind: "PieceLockedDown", piece: createTestPiece("O", 4, 20), time: 500 },
    ]);
    expect(game.state().outcome).toEqual({ reason: "LockOut", status: "Lost" });
  });

  test("A time limit stops the clock at the limit", () => {
    const mode = createGamemode({
      limit: { outcome: "Won", stat: "time", threshold: 5000 },
      name: "Short",
    });
    const game = new Game(mode, 1000, { config: { seed: "clock" } });

    game.update(null, 5999);
    expect(game.state().finished).toBe(false);
    game.update(null, 60000);
    expect(game.state().time).toBe(6000);
    expect(game.state().elapsedMs).toBe(5000);
    expect(game.state().outcome).toEqual({ status: "Won" });
  });

  test("Forfeit ends the game as lost; later updates do nothing", () => {
    const game = createSequenceGame(["T"]);
    game.update(null, 100);
    game.forfeit();

    expect(game.state().outcome).toEqual({ reason: "Forfeit", status: "Lost" });
    expect(game.update(press("HardDrop"), 200)).toEqual([]);
    expect(game.state().time).toBe(100);
  });
});
