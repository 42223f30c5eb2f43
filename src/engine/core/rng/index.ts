import { type PieceId } from "../types";

import { createBagRng } from "./bag";
import { type PieceRandomGenerator } from "./interface";
import { createRecencyRng } from "./recency";
import { SequenceRng } from "./sequence";
import { createUniformRng } from "./uniform";

export type GeneratorChoice =
  | { readonly kind: "uniform" }
  | { readonly kind: "bag"; readonly multiplicity?: number }
  | { readonly kind: "recency" }
  | { readonly kind: "sequence"; readonly pieces: ReadonlyArray<PieceId> };

export function createGenerator(
  choice: GeneratorChoice,
  seed: string,
): PieceRandomGenerator {
  switch (choice.kind) {
    case "uniform":
      return createUniformRng(seed);
    case "bag":
      return createBagRng(seed, choice.multiplicity ?? 1);
    case "recency":
      return createRecencyRng(seed);
    case "sequence":
      return new SequenceRng(choice.pieces);
  }
}

export type { PieceRandomGenerator, GeneratorKind } from "./interface";
