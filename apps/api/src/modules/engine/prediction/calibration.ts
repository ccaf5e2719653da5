import type { CalibrationSettings, TradeOutcome } from "@digitbot/shared";

/**
 * Bounded online update of a signal's weight multiplier after a realized trade.
 * Wins move it up and losses down, by `learningRate * (0.5 + confidence / 200)`,
 * so confident calls move it further. The result is clamped to the configured bounds.
 */
export function adjustMultiplier(
  prior: number,
  outcome: TradeOutcome,
  confidence: number,
  settings: CalibrationSettings
): number {
  const clampedConfidence = Math.max(0, Math.min(100, confidence));
  const step = settings.learningRate * (0.5 + clampedConfidence / 200);
  const next = outcome === "win" ? prior + step : prior - step;
  return Math.max(settings.minMultiplier, Math.min(settings.maxMultiplier, next));
}
