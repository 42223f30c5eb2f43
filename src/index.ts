export * from "./engine";
export {
  type GamemodeRegistry,
  MAX_STAGE_ATTEMPTS,
  PuzzleMode,
  type PuzzleModeOptions,
  type Puzzle,
  createPuzzleGame,
  gamemodeRegistry,
  loadPuzzles,
  marathon,
  master,
  sprint,
  ultra,
  zen,
} from "./modes";
export { DEBUG_ENV_VAR, isDebugEnabled } from "./utils/debug";
