export { Game, type GameOptions } from "./game";
export type { GameAdmin, GameModifier, ModifierPoint, FinalOutcome } from "./admin";
export {
  type Button,
  type ButtonState,
  ALL_BUTTONS,
  NO_BUTTONS,
  buttonState,
  pressedButtons,
} from "./buttons";
export {
  type EngineConfig,
  type EngineConfigInput,
  DEFAULT_ENGINE_CONFIG,
  createEngineConfig,
} from "./config";
export { boardFromRows, createEmptyBoard, getCell, isBoardEmpty } from "./core/board";
export { PIECES, pieceCells } from "./core/pieces";
export { type GeneratorChoice, createGenerator } from "./core/rng";
export { type RotationSystem, tryRotate } from "./core/rotation";
export {
  type ActivePiece,
  type Board,
  type PieceId,
  type Rot,
  ALL_PIECES,
  BOARD_HEIGHT,
  BOARD_WIDTH,
  SKYLINE,
} from "./core/types";
export { ConfigurationError, EngineError, InvalidTimestampError } from "./errors";
export type { ClearContext, Feedback, FeedbackKind } from "./events";
export { type Gamemode, type ModeLimit, type StatKind, createGamemode } from "./gamemode";
export type { LockDelayState } from "./physics/lock-delay.machine";
export { type SpeedCurve, STANDARD_SPEED_CURVE } from "./physics/speed-curve";
export { computeScoreBonus } from "./scoring/score";
export type { GameStats } from "./scoring/stats";
export type { GameState } from "./selectors";
export type { GameOutcome, LossReason } from "./types";
