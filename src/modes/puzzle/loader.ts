import { ALL_PIECES, BOARD_HEIGHT, BOARD_WIDTH, type PieceId } from "../../engine/core/types";
import { ConfigurationError } from "../../engine/errors";

import bundled from "./puzzles.json";

/**
 * One puzzle stage. `rows` run top to bottom, `#` (or any non-piece letter)
 * is a filled cell and a space is empty. `pieces` are dealt in order.
 */
export type Puzzle = Readonly<{
  name: string;
  rows: ReadonlyArray<string>;
  pieces: ReadonlyArray<PieceId>;
}>;

function isPieceId(value: unknown): value is PieceId {
  return ALL_PIECES.some((id) => id === value);
}

function isStringArray(value: unknown): value is ReadonlyArray<string> {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function parsePuzzle(value: unknown, index: number): Puzzle {
  const field = `puzzles[${String(index)}]`;
  if (typeof value !== "object" || value === null) {
    throw new ConfigurationError(field, "must be an object");
  }
  const name: unknown = Reflect.get(value, "name");
  const rows: unknown = Reflect.get(value, "rows");
  const pieces: unknown = Reflect.get(value, "pieces");

  if (typeof name !== "string" || name.length === 0) {
    throw new ConfigurationError(`${field}.name`, "must be a non-empty string");
  }
  if (!isStringArray(rows) || rows.length === 0 || rows.length > BOARD_HEIGHT) {
    throw new ConfigurationError(`${field}.rows`, `must hold 1 to ${String(BOARD_HEIGHT)} rows`);
  }
  if (rows.some((row) => row.length !== BOARD_WIDTH)) {
    throw new ConfigurationError(
      `${field}.rows`,
      `every row must be ${String(BOARD_WIDTH)} cells wide`,
    );
  }
  if (!Array.isArray(pieces) || pieces.length === 0 || !pieces.every(isPieceId)) {
    throw new ConfigurationError(`${field}.pieces`, "must be a non-empty list of piece letters");
  }
  return { name, pieces: [...pieces], rows };
}

/**
 * Validate a list of puzzles. Defaults to the bundled stage list.
 */
export function loadPuzzles(source: unknown = bundled): ReadonlyArray<Puzzle> {
  if (!Array.isArray(source) || source.length === 0) {
    throw new ConfigurationError("puzzles", "must be a non-empty list");
  }
  return source.map((p: unknown, i) => parsePuzzle(p, i));
}
