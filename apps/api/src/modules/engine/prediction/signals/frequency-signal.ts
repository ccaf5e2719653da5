import type { FrequencySnapshot } from "@digitbot/shared";

import { normalize, uniformVector, type ScoreVector } from "../vector-math";
import type { PredictionSignal } from "./signal";

/** Rarely seen digits score higher: `1 - p(d)` over the window, normalized. */
export function inverseFrequency(snapshot: FrequencySnapshot): ScoreVector {
  if (snapshot.total === 0) return uniformVector();
  return normalize(snapshot.counts.map((count) => 1 - count / snapshot.total));
}

export const frequencySignal: PredictionSignal = {
  name: "frequency",
  score: (context) => inverseFrequency(context.primary)
};
