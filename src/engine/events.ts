import { type ActivePiece, type PieceId } from "./core/types";
import { type GameTime } from "../types/timestamp";

// What made a clear special: scoring inputs of a line clear
export type ClearContext = {
  readonly lines: number;
  readonly spin: boolean;
  readonly perfectClear: boolean;
  readonly combo: number;
  readonly backToBack: number;
};

// Feedback for the renderer, in emission order within one update
export type Feedback =
  | { kind: "PieceLockedDown"; piece: ActivePiece; time: GameTime }
  | {
      kind: "LinesCleared";
      rows: ReadonlyArray<number>;
      clear: ClearContext;
      time: GameTime;
    }
  | { kind: "HardDropped"; from: ActivePiece; to: ActivePiece; time: GameTime }
  | {
      kind: "Accolade";
      bonus: number;
      descriptor: string;
      pieceId: PieceId;
      time: GameTime;
    }
  | { kind: "Message"; text: string; time: GameTime };

export type FeedbackKind = Feedback["kind"];
