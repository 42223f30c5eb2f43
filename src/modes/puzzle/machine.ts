/*
 * Puzzle stage progression as a robot3 machine.
 *
 * playing → playing (stage cleared, more stages left; or failed with tries left)
 * playing → won     (last stage cleared)
 * playing → lost    (failed on the final attempt)
 *
 * Context is immutable: reducers return a new object, the service wrapper
 * only reads it back.
 */

import {
  createMachine,
  guard,
  interpret,
  reduce,
  state,
  transition,
} from "robot3";

import type { Machine, MachineState, MachineStates, Service } from "robot3";

export type StageState = "playing" | "won" | "lost";

export type StageContext = {
  stage: number; // 1-based
  attempt: number; // 1-based
  stageCount: number;
  maxAttempts: number;
};

export type StageEvent = { type: "STAGE_FINISHED"; cleared: boolean };

type StageEventType = StageEvent["type"];

const isLastStageCleared = (ctx: StageContext, event: StageEvent): boolean =>
  event.cleared && ctx.stage >= ctx.stageCount;

const isStageCleared = (_ctx: StageContext, event: StageEvent): boolean =>
  event.cleared;

const isOutOfAttempts = (ctx: StageContext, event: StageEvent): boolean =>
  !event.cleared && ctx.attempt >= ctx.maxAttempts;

const advanceStage = (ctx: StageContext): StageContext => ({
  ...ctx,
  attempt: 1,
  stage: ctx.stage + 1,
});

const retryStage = (ctx: StageContext): StageContext => ({
  ...ctx,
  attempt: ctx.attempt + 1,
});

// Transitions are tried in order; the first passing guard wins
const createPlayingState = (): MachineState<StageEventType> =>
  state(
    transition("STAGE_FINISHED", "won", guard(isLastStageCleared)),
    transition(
      "STAGE_FINISHED",
      "playing",
      guard(isStageCleared),
      reduce(advanceStage),
    ),
    transition("STAGE_FINISHED", "lost", guard(isOutOfAttempts)),
    transition("STAGE_FINISHED", "playing", reduce(retryStage)),
  );

type StageStatesObject = Record<StageState, MachineState<StageEventType>>;
export type StageMachine = Machine<StageStatesObject, StageContext, StageState>;

export const createStageMachine = (initialContext: StageContext): StageMachine => {
  const states = {
    lost: state(),
    playing: createPlayingState(),
    won: state(),
  } as const;

  // robot3 widens the event type to string; narrow it back at this boundary
  return createMachine(
    "playing" as const,
    states as unknown as MachineStates<StageStatesObject, StageEventType>,
    (_ctx: StageContext): StageContext => initialContext,
  ) as unknown as StageMachine;
};

type StageService = Service<StageMachine>;

/**
 * Thin wrapper over the robot3 service. All transition logic lives in the
 * machine above.
 */
export class StageMachineService {
  private service: StageService;
  private currentStateName: StageState = "playing";

  constructor(stageCount: number, maxAttempts: number) {
    const machine = createStageMachine({
      attempt: 1,
      maxAttempts,
      stage: 1,
      stageCount,
    });
    this.service = interpret(machine, (service) => {
      this.currentStateName = service.machine.state.name;
    });
  }

  finishStage(cleared: boolean): { state: StageState; context: StageContext } {
    this.service.send({ cleared, type: "STAGE_FINISHED" });
    return this.getState();
  }

  getState(): { state: StageState; context: StageContext } {
    return {
      context: { ...this.service.context },
      state: this.currentStateName,
    };
  }
}
