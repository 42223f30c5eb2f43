import { type GameTime } from "../../types/timestamp";
import { addDuration, elapsedMs } from "../utils/time";

// Lock-down bookkeeping for the active piece.
// groundTimeMs counts closed grounded episodes; the open episode runs from groundContactStart.
export type LockDelayState =
  | {
      readonly tag: "Airborne";
      readonly lowestRow: number;
      readonly groundTimeMs: number;
      readonly liftoffAt: GameTime | null;
    }
  | {
      readonly tag: "Grounded";
      readonly lowestRow: number;
      readonly groundTimeMs: number;
      readonly groundContactStart: GameTime;
      readonly deadline: GameTime;
    }
  | { readonly tag: "Locked"; readonly deadline: GameTime };

export type LockDelayParams = {
  readonly lockDelayMs: number;
  readonly groundTimeMaxMs: number;
  readonly continuityWindowMs: number;
};

export function Airborne(
  lowestRow: number,
  groundTimeMs = 0,
  liftoffAt: GameTime | null = null,
): LockDelayState {
  return { groundTimeMs, liftoffAt, lowestRow, tag: "Airborne" };
}

export function Grounded(fields: {
  lowestRow: number;
  groundTimeMs: number;
  groundContactStart: GameTime;
  deadline: GameTime;
}): LockDelayState {
  return { ...fields, tag: "Grounded" };
}

export function Locked(deadline: GameTime): LockDelayState {
  return { deadline, tag: "Locked" };
}

// Fresh state for a piece that just spawned on `row`
export function spawnLockDelay(row: number): LockDelayState {
  return Airborne(row);
}

// Total ground time of the placement so far
export function accumulatedGroundTime(ld: LockDelayState, now: GameTime): number {
  switch (ld.tag) {
    case "Airborne":
      return ld.groundTimeMs;
    case "Grounded":
      return ld.groundTimeMs + elapsedMs(now, ld.groundContactStart);
    case "Locked":
      return 0;
  }
}

// Lock delay from now, shortened so total ground time never passes the cap
function nextDeadline(
  now: GameTime,
  accumulatedMs: number,
  params: LockDelayParams,
): GameTime {
  const remaining = Math.max(0, params.groundTimeMaxMs - accumulatedMs);
  return addDuration(now, Math.min(params.lockDelayMs, remaining));
}

export type LockDelayStep = {
  readonly ld: LockDelayState;
  // "schedule": a Lock is due at ld.deadline; "cancel": any pending Lock is void
  readonly lock: "schedule" | "cancel" | "keep";
};

/**
 * Advance the lock-down machine after the active piece changed or was re-checked.
 *
 * - touching down starts a grounded episode; a lower row than ever before resets ground time
 * - touching down again within the continuity window counts the airborne gap as ground time
 * - a successful move or rotate while grounded resets the deadline
 * - lifting off closes the episode and voids the pending lock
 */
export function stepLockDelay(input: {
  readonly ld: LockDelayState;
  readonly grounded: boolean;
  readonly row: number;
  readonly repositioned: boolean;
  readonly now: GameTime;
  readonly params: LockDelayParams;
}): LockDelayStep {
  const { grounded, ld, now, params, repositioned, row } = input;

  if (ld.tag === "Locked") return { ld, lock: "keep" };

  if (!grounded) {
    if (ld.tag === "Grounded") {
      return {
        ld: Airborne(
          ld.lowestRow,
          ld.groundTimeMs + elapsedMs(now, ld.groundContactStart),
          now,
        ),
        lock: "cancel",
      };
    }
    return { ld, lock: "keep" };
  }

  if (ld.tag === "Airborne") {
    let groundTimeMs = ld.groundTimeMs;
    let lowestRow = ld.lowestRow;
    if (row < ld.lowestRow) {
      groundTimeMs = 0;
      lowestRow = row;
    } else if (
      ld.liftoffAt !== null &&
      elapsedMs(now, ld.liftoffAt) <= params.continuityWindowMs
    ) {
      groundTimeMs += elapsedMs(now, ld.liftoffAt);
    }
    return {
      ld: Grounded({
        deadline: nextDeadline(now, groundTimeMs, params),
        groundContactStart: now,
        groundTimeMs,
        lowestRow,
      }),
      lock: "schedule",
    };
  }

  if (row < ld.lowestRow) {
    return {
      ld: Grounded({
        deadline: nextDeadline(now, 0, params),
        groundContactStart: now,
        groundTimeMs: 0,
        lowestRow: row,
      }),
      lock: "schedule",
    };
  }

  if (repositioned) {
    return {
      ld: { ...ld, deadline: nextDeadline(now, accumulatedGroundTime(ld, now), params) },
      lock: "schedule",
    };
  }

  return { ld, lock: "keep" };
}
