import type { EnsembleSettings, FrequencySnapshot, SignalName, TradeDirection } from "@digitbot/shared";

import type { ScoreVector } from "../vector-math";

export type SignalContext = {
  direction: TradeDirection;
  /** Recent digits, oldest first. */
  digits: readonly number[];
  primary: FrequencySnapshot;
  windows: readonly FrequencySnapshot[];
  now: Date;
  settings: EnsembleSettings;
};

/**
 * Scores how suitable each digit is as the contract barrier for `context.direction`.
 * Implementations return a normalized 10-entry vector.
 */
export type PredictionSignal = {
  readonly name: SignalName;
  score(context: SignalContext): ScoreVector;
};
