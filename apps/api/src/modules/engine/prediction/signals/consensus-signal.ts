import type { FrequencySnapshot } from "@digitbot/shared";

import { mean, normalize, uniformVector, variance, type ScoreVector } from "../vector-math";
import { inverseFrequency } from "./frequency-signal";
import type { PredictionSignal } from "./signal";

/**
 * Mean per-digit variance of the inverse-frequency vectors across windows, in percentage points².
 * Zero when every window agrees.
 */
export function windowVariance(windows: readonly FrequencySnapshot[]): number {
  const populated = windows.filter((w) => w.total > 0);
  if (populated.length < 2) return 0;
  const vectors = populated.map((w) => inverseFrequency(w).map((v) => v * 100));
  const perDigit = Array.from({ length: 10 }, (_, digit) => variance(vectors.map((v) => v[digit])));
  return mean(perDigit);
}

export const consensusSignal: PredictionSignal = {
  name: "consensus",
  score: (context) => {
    const populated = context.windows.filter((w) => w.total > 0);
    if (populated.length === 0) return uniformVector();
    const vectors = populated.map(inverseFrequency);
    const averaged: ScoreVector = Array.from({ length: 10 }, (_, digit) => mean(vectors.map((v) => v[digit])));
    return normalize(averaged);
  }
};
