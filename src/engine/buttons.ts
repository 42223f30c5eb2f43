// Logical buttons a caller can hold. Keybindings are the caller's business.
export type Button =
  | "MoveLeft"
  | "MoveRight"
  | "RotateLeft"
  | "RotateRight"
  | "Rotate180"
  | "SoftDrop"
  | "SonicDrop"
  | "HardDrop";

export const ALL_BUTTONS: ReadonlyArray<Button> = [
  "MoveLeft",
  "MoveRight",
  "RotateLeft",
  "RotateRight",
  "Rotate180",
  "SoftDrop",
  "SonicDrop",
  "HardDrop",
];

export type ButtonState = Readonly<Record<Button, boolean>>;

export const NO_BUTTONS: ButtonState = {
  HardDrop: false,
  MoveLeft: false,
  MoveRight: false,
  Rotate180: false,
  RotateLeft: false,
  RotateRight: false,
  SoftDrop: false,
  SonicDrop: false,
};

export function buttonState(pressed: ReadonlyArray<Button> = []): ButtonState {
  const state: Record<Button, boolean> = { ...NO_BUTTONS };
  for (const b of pressed) state[b] = true;
  return state;
}

export function pressedButtons(state: ButtonState): Array<Button> {
  return ALL_BUTTONS.filter((b) => state[b]);
}

// Pressed in `next` but not in `prev`
export function newlyPressed(
  prev: ButtonState,
  next: ButtonState,
  button: Button,
): boolean {
  return !prev[button] && next[button];
}

// -1 when only MoveLeft is held, 1 when only MoveRight is held, else 0
export function heldDirection(state: ButtonState): -1 | 0 | 1 {
  if (state.MoveLeft === state.MoveRight) return 0;
  return state.MoveLeft ? -1 : 1;
}

// Net right turns requested by rotate buttons pressed in `next` but not in `prev`
export function requestedTurns(prev: ButtonState, next: ButtonState): number {
  let turns = 0;
  if (newlyPressed(prev, next, "RotateRight")) turns += 1;
  if (newlyPressed(prev, next, "Rotate180")) turns += 2;
  if (newlyPressed(prev, next, "RotateLeft")) turns -= 1;
  return turns;
}
