export { type Puzzle, loadPuzzles } from "./loader";
export { type StageContext, type StageState, StageMachineService } from "./machine";
export {
  MAX_STAGE_ATTEMPTS,
  PUZZLE_SPEED_LEVEL,
  PuzzleMode,
  type PuzzleModeOptions,
  createPuzzleGame,
} from "./mode";
