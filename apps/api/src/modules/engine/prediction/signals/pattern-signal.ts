import { normalize, uniformVector, type ScoreVector } from "../vector-math";
import type { PredictionSignal } from "./signal";

const NGRAM_LENGTHS = [2, 3] as const;

/**
 * Raw support per digit for continuing a pattern at the end of `digits`:
 * the trailing repeat streak (length >= 2), the trailing A-B-A-B alternation (length >= 4),
 * and every earlier occurrence of the trailing 2- and 3-gram (the digit that followed it).
 */
export function patternSupport(digits: readonly number[]): number[] {
  const support = new Array<number>(10).fill(0);
  const n = digits.length;
  if (n < 2) return support;

  const last = digits[n - 1];
  let repeat = 1;
  while (repeat < n && digits[n - 1 - repeat] === last) repeat += 1;
  if (repeat >= 2) support[last] += repeat;

  let alternation = 1;
  if (digits[n - 2] !== last) {
    alternation = 2;
    while (alternation < n && digits[n - 1 - alternation] === digits[n - 1 - alternation + 2]) alternation += 1;
  }
  if (alternation >= 4) support[digits[n - 2]] += alternation;

  for (const k of NGRAM_LENGTHS) {
    if (n <= k) continue;
    const suffix = digits.slice(n - k);
    for (let i = 0; i + k < n; i += 1) {
      let matched = true;
      for (let j = 0; j < k; j += 1) {
        if (digits[i + j] !== suffix[j]) {
          matched = false;
          break;
        }
      }
      if (matched) support[digits[i + k]] += 1;
    }
  }

  return support;
}

export const patternSignal: PredictionSignal = {
  name: "pattern",
  score: (context): ScoreVector => {
    const support = patternSupport(context.digits.slice(-context.settings.patternLookback));
    const peak = Math.max(...support);
    if (peak <= 0) return uniformVector();
    // a digit expected to continue a pattern is the worst barrier for a differs contract
    return context.direction === "matches" ? normalize(support) : normalize(support.map((s) => peak - s));
  }
};
