import { normalize, type ScoreVector } from "../vector-math";
import type { PredictionSignal } from "./signal";

export type MarketSession = "asian" | "european" | "american";

export const SESSION_DIGITS: Readonly<Record<MarketSession, readonly number[]>> = {
  asian: [0, 1, 8, 9],
  european: [2, 3, 4, 5],
  american: [6, 7, 8, 9]
};

/** UTC buckets: asian 00-08, european 08-16, american 16-24. */
export function sessionFor(date: Date): MarketSession {
  const hour = date.getUTCHours();
  if (hour < 8) return "asian";
  if (hour < 16) return "european";
  return "american";
}

export const sessionSignal: PredictionSignal = {
  name: "session",
  score: (context): ScoreVector => {
    const biased = new Set(SESSION_DIGITS[sessionFor(context.now)]);
    const strength = context.settings.sessionBiasStrength;
    const factor = context.direction === "matches" ? strength : 1 / strength;
    return normalize(Array.from({ length: 10 }, (_, digit) => (biased.has(digit) ? factor : 1)));
  }
};
