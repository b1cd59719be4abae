import type { PairingCategory } from "./pairing.ts";

export type CompatibilityResultSource = "oracle" | "fallback" | "static";

export type CompatibilityResult = {
  score: number;
  category: PairingCategory;
  rationale: string;
  starter: string;
  source: CompatibilityResultSource;
};
