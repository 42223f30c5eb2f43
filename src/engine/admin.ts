import { type ButtonState } from "./buttons";
import { type Board, type PieceId } from "./core/types";
import { type GameState } from "./selectors";
import { type InternalEventKind } from "./step/event-queue";
import { type GameOutcome } from "./types";

// Points in the update loop where modifiers run
export type ModifierPoint =
  | { readonly kind: "Start" }
  | { readonly kind: "BeforeEvent"; readonly event: InternalEventKind }
  | { readonly kind: "AfterEvent"; readonly event: InternalEventKind }
  | { readonly kind: "BeforeButtonChange"; readonly buttons: ButtonState }
  | { readonly kind: "AfterButtonChange"; readonly buttons: ButtonState };

export type FinalOutcome = Exclude<GameOutcome, { status: "Ongoing" }>;

/**
 * The only way to change a running game besides `update`. Handed to the
 * modifiers given at construction; nothing else can reach it.
 */
export type GameAdmin = {
  view(): GameState;
  // Replace the board. Intended between pieces; an active piece is re-checked for ground contact.
  setBoard(board: Board): void;
  // Replace the preview queue; the generator resumes after these pieces.
  setUpcoming(pieces: ReadonlyArray<PieceId>): void;
  setPreviewCount(count: number): void;
  setLevel(level: number): void;
  // Emit a Message feedback entry at the current game time
  message(text: string): void;
  end(outcome: FinalOutcome): void;
};

export type GameModifier = {
  readonly name: string;
  apply(point: ModifierPoint, admin: GameAdmin): void;
};
