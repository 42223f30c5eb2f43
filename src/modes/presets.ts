import { type Gamemode, createGamemode } from "../engine/gamemode";

// Survive to level 20
export function marathon(): Gamemode {
  return createGamemode({
    incrementLevel: true,
    limit: { outcome: "Won", stat: "level", threshold: 20 },
    name: "Marathon",
    startLevel: 1,
  });
}

// Clear 40 lines; level stays where it started
export function sprint(startLevel = 1): Gamemode {
  return createGamemode({
    incrementLevel: false,
    limit: { outcome: "Won", stat: "lines", threshold: 40 },
    name: "40-Lines",
    startLevel,
  });
}

// Play three minutes, score counts
export function ultra(startLevel = 1): Gamemode {
  return createGamemode({
    incrementLevel: false,
    limit: { outcome: "Won", stat: "time", threshold: 180_000 },
    name: "Time Trial",
    startLevel,
  });
}

// Instant gravity from the start, 300 lines to go
export function master(): Gamemode {
  return createGamemode({
    incrementLevel: true,
    limit: { outcome: "Won", stat: "lines", threshold: 300 },
    name: "Master",
    startLevel: 20,
  });
}

// No limit; the level stays where it started
export function zen(startLevel = 1): Gamemode {
  return createGamemode({
    incrementLevel: false,
    limit: null,
    name: "Endless",
    startLevel,
  });
}
