import { type Gamemode } from "../engine/gamemode";

import { marathon, master, sprint, ultra, zen } from "./presets";

export type GamemodeRegistry = {
  register(name: string, create: () => Gamemode): void;
  create(name: string): Gamemode | undefined;
  list(): Array<string>;
};

class DefaultGamemodeRegistry implements GamemodeRegistry {
  private modes = new Map<string, () => Gamemode>();

  register(name: string, create: () => Gamemode): void {
    this.modes.set(name, create);
  }

  create(name: string): Gamemode | undefined {
    return this.modes.get(name)?.();
  }

  list(): Array<string> {
    return Array.from(this.modes.keys());
  }
}

export const gamemodeRegistry = new DefaultGamemodeRegistry();

gamemodeRegistry.register("marathon", marathon);
gamemodeRegistry.register("sprint", () => sprint());
gamemodeRegistry.register("ultra", () => ultra());
gamemodeRegistry.register("master", master);
gamemodeRegistry.register("zen", () => zen());

export { marathon, master, sprint, ultra, zen } from "./presets";
export {
  MAX_STAGE_ATTEMPTS,
  PUZZLE_SPEED_LEVEL,
  PuzzleMode,
  type PuzzleModeOptions,
  type Puzzle,
  createPuzzleGame,
  loadPuzzles,
} from "./puzzle";
