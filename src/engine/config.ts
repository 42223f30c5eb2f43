import {
  type DurationMs,
  createDurationMs,
  durationMsAsNumber,
} from "../types/brands";

import { type GeneratorChoice } from "./core/rng";
import { type RotationSystem, ROTATION_SYSTEMS } from "./core/rotation";
import { ALL_PIECES } from "./core/types";
import { ConfigurationError } from "./errors";
import { STANDARD_SPEED_CURVE, type SpeedCurve } from "./physics/speed-curve";

export const MAX_PREVIEW_COUNT = 16;

export type EngineConfig = Readonly<{
  rotationSystem: RotationSystem;
  generator: GeneratorChoice;
  seed: string;
  previewCount: number;
  dasMs: DurationMs;
  arrMs: DurationMs;
  softDropFactor: number;
  hardDropDelayMs: DurationMs;
  groundTimeMaxMs: DurationMs;
  lineClearDelayMs: DurationMs;
  appearanceDelayMs: DurationMs;
  noSoftDropLock: boolean;
  speedCurve: SpeedCurve;
}>;

// Caller-facing form: plain numbers, everything optional
export type EngineConfigInput = Partial<{
  rotationSystem: RotationSystem;
  generator: GeneratorChoice;
  seed: string;
  previewCount: number;
  dasMs: number;
  arrMs: number;
  softDropFactor: number;
  hardDropDelayMs: number;
  groundTimeMaxMs: number;
  lineClearDelayMs: number;
  appearanceDelayMs: number;
  noSoftDropLock: boolean;
  speedCurve: SpeedCurve;
}>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  appearanceDelayMs: createDurationMs(50),
  arrMs: createDurationMs(33),
  dasMs: createDurationMs(167),
  generator: { kind: "recency" },
  groundTimeMaxMs: createDurationMs(2250),
  hardDropDelayMs: createDurationMs(0.1),
  lineClearDelayMs: createDurationMs(200),
  noSoftDropLock: false,
  previewCount: 1,
  rotationSystem: "ocular",
  seed: "default",
  softDropFactor: 15,
  speedCurve: STANDARD_SPEED_CURVE,
};

function isFiniteNumber(n: unknown): n is number {
  return typeof n === "number" && Number.isFinite(n);
}

function duration(field: string, value: number | undefined, fallback: DurationMs): DurationMs {
  if (value === undefined) return fallback;
  if (!isFiniteNumber(value) || value < 0) {
    throw new ConfigurationError(field, "must be a finite, non-negative number of milliseconds");
  }
  return createDurationMs(value);
}

function validateGenerator(choice: GeneratorChoice): GeneratorChoice {
  switch (choice.kind) {
    case "uniform":
    case "recency":
      return choice;
    case "bag": {
      const m = choice.multiplicity ?? 1;
      if (!Number.isInteger(m) || m < 1) {
        throw new ConfigurationError("generator.multiplicity", "must be a positive integer");
      }
      return choice;
    }
    case "sequence":
      if (choice.pieces.length === 0) {
        throw new ConfigurationError("generator.pieces", "must not be empty");
      }
      if (!choice.pieces.every((p) => ALL_PIECES.includes(p))) {
        throw new ConfigurationError("generator.pieces", "contains an unknown piece");
      }
      return choice;
  }
}

/**
 * Merge caller overrides into the defaults and validate the result.
 * Throws ConfigurationError naming the first offending field.
 */
export function createEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  const d = DEFAULT_ENGINE_CONFIG;

  const previewCount = input.previewCount ?? d.previewCount;
  if (!Number.isInteger(previewCount) || previewCount < 0 || previewCount > MAX_PREVIEW_COUNT) {
    throw new ConfigurationError(
      "previewCount",
      `must be an integer from 0 to ${String(MAX_PREVIEW_COUNT)}`,
    );
  }

  const softDropFactor = input.softDropFactor ?? d.softDropFactor;
  if (!isFiniteNumber(softDropFactor) || softDropFactor <= 0) {
    throw new ConfigurationError("softDropFactor", "must be a positive number");
  }

  const rotationSystem = input.rotationSystem ?? d.rotationSystem;
  if (!ROTATION_SYSTEMS.includes(rotationSystem)) {
    throw new ConfigurationError("rotationSystem", `unknown system "${String(rotationSystem)}"`);
  }

  const seed = input.seed ?? d.seed;
  if (seed.length === 0) {
    throw new ConfigurationError("seed", "must be a non-empty string");
  }

  const groundTimeMaxMs = duration("groundTimeMaxMs", input.groundTimeMaxMs, d.groundTimeMaxMs);
  if (durationMsAsNumber(groundTimeMaxMs) <= 0) {
    throw new ConfigurationError("groundTimeMaxMs", "must be greater than zero");
  }

  return {
    appearanceDelayMs: duration("appearanceDelayMs", input.appearanceDelayMs, d.appearanceDelayMs),
    arrMs: duration("arrMs", input.arrMs, d.arrMs),
    dasMs: duration("dasMs", input.dasMs, d.dasMs),
    generator: validateGenerator(input.generator ?? d.generator),
    groundTimeMaxMs,
    hardDropDelayMs: duration("hardDropDelayMs", input.hardDropDelayMs, d.hardDropDelayMs),
    lineClearDelayMs: duration("lineClearDelayMs", input.lineClearDelayMs, d.lineClearDelayMs),
    noSoftDropLock: input.noSoftDropLock ?? d.noSoftDropLock,
    previewCount,
    rotationSystem,
    seed,
    softDropFactor,
    speedCurve: input.speedCurve ?? d.speedCurve,
  };
}
