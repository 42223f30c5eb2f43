// Errors surfaced to callers of the engine.
// Game-ending outcomes (block out, lock out, mode limits) are not errors;
// they live in GameState.outcome.

export class EngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Invalid gamemode or engine configuration. Thrown before a game exists.
 */
export class ConfigurationError extends EngineError {
  constructor(
    readonly field: string,
    message: string,
  ) {
    super(`${field}: ${message}`);
  }
}

/**
 * `update` was called with a time that is malformed or earlier than the previous call.
 * The game is left untouched, so the caller may retry with a valid time.
 */
export class InvalidTimestampError extends EngineError {
  constructor(
    readonly received: number,
    readonly previous: number,
  ) {
    super(
      `update time ${String(received)} is invalid or precedes ` +
        `the previous update time ${String(previous)}`,
    );
  }
}
