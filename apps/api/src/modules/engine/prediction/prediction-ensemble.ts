import type {
  EnsembleSettings,
  FrequencySnapshot,
  Prediction,
  PredictionVeto,
  SignalName,
  TradeDirection,
  TradeRecord
} from "@digitbot/shared";

import { adjustMultiplier } from "./calibration";
import { consensusSignal, windowVariance } from "./signals/consensus-signal";
import { frequencySignal } from "./signals/frequency-signal";
import { patternSignal } from "./signals/pattern-signal";
import { sessionSignal } from "./signals/session-signal";
import type { PredictionSignal, SignalContext } from "./signals/signal";
import { argMax, round, stdDev, type ScoreVector } from "./vector-math";

export const DEFAULT_SIGNALS: readonly PredictionSignal[] = [frequencySignal, patternSignal, sessionSignal, consensusSignal];

/** The reads the ensemble needs from the statistics engine. */
export type StatisticsReader = {
  readonly ticksSeen: number;
  snapshot(windowSize: number): FrequencySnapshot;
  snapshots(): FrequencySnapshot[];
  recentDigits(n?: number): number[];
  recentPrices(n?: number): number[];
};

export type PredictParams = {
  direction: TradeDirection;
  settings: EnsembleSettings;
  now?: Date;
};

export type SignalStats = {
  multiplier: number;
  led: number;
  wins: number;
  accuracy: number | null;
};

const RECENT_OUTCOMES = 20;

/** Standard deviation of consecutive price deltas. */
export function priceDeltaStdDev(prices: readonly number[]): number {
  if (prices.length < 3) return 0;
  const deltas: number[] = [];
  for (let i = 1; i < prices.length; i += 1) deltas.push(prices[i] - prices[i - 1]);
  return stdDev(deltas);
}

/**
 * Relative margin of the predicted digit over the outcome it competes with.
 * Matches contracts compete with the next best digit; a differs contract only loses when its
 * barrier shows, so it is measured against the digit scored least suitable (the one expected to appear).
 */
export function scoreMargin(scores: readonly number[], predicted: number, direction: TradeDirection): number {
  const top = scores[predicted];
  if (!(top > 0)) return 0;
  const others = scores.filter((_, digit) => digit !== predicted);
  const reference = direction === "matches" ? Math.max(...others) : Math.min(...scores);
  return Math.max(0, Math.min(1, (top - reference) / top));
}

export class PredictionEnsemble {
  private readonly multipliers = new Map<SignalName, number>();
  private readonly led = new Map<SignalName, { trades: number; wins: number }>();
  private readonly recentOutcomes: boolean[] = [];

  constructor(private readonly signals: readonly PredictionSignal[] = DEFAULT_SIGNALS) {
    this.resetCalibration();
  }

  predict(stats: StatisticsReader, params: PredictParams): Prediction {
    const { direction, settings } = params;
    const now = params.now ?? new Date();

    const context: SignalContext = {
      direction,
      digits: stats.recentDigits(settings.patternLookback),
      primary: stats.snapshot(settings.primaryWindow),
      windows: stats.snapshots(),
      now,
      settings
    };

    const weighted = this.signals.map((signal) => ({
      name: signal.name,
      weight: this.effectiveWeight(signal.name, settings),
      vector: signal.score(context)
    }));
    const weightSum = weighted.reduce((acc, s) => acc + s.weight, 0);

    const scores: ScoreVector = Array.from({ length: 10 }, (_, digit) =>
      weightSum > 0 ? weighted.reduce((acc, s) => acc + s.weight * s.vector[digit], 0) / weightSum : 0.1
    );
    const predictedDigit = argMax(scores);

    const componentScores: Partial<Record<SignalName, number>> = {};
    let leadSignal: SignalName | null = null;
    let leadContribution = 0;
    for (const s of weighted) {
      const contribution = weightSum > 0 ? (s.weight * s.vector[predictedDigit]) / weightSum : 0;
      componentScores[s.name] = round(contribution, 6);
      if (contribution > leadContribution) {
        leadContribution = contribution;
        leadSignal = s.name;
      }
    }

    const margin = scoreMargin(scores, predictedDigit, direction);
    const spread = windowVariance(context.windows);
    const priceVolatility = priceDeltaStdDev(stats.recentPrices(settings.volatilityLookback + 1));
    const favorable = priceVolatility <= settings.volatilityThreshold;

    const veto: { kind: PredictionVeto; reason: string } | null =
      stats.ticksSeen < settings.minTicks
        ? { kind: "InsufficientData", reason: `insufficient data (${stats.ticksSeen}/${settings.minTicks} ticks)` }
        : !favorable
          ? {
              kind: "VolatilityVeto",
              reason: `volatility veto (σ ${round(priceVolatility, 4)} > ${settings.volatilityThreshold})`
            }
          : null;

    const rawConfidence = 100 * margin - settings.varianceWeight * spread;
    const confidence = veto ? 0 : round(Math.max(0, Math.min(100, rawConfidence)), 2);

    return Object.freeze({
      predictedDigit,
      direction,
      confidence,
      scores: scores.map((s) => round(s, 6)),
      componentScores,
      leadSignal,
      margin: round(margin, 6),
      windowVariance: round(spread, 6),
      priceVolatility: round(priceVolatility, 6),
      favorable,
      ...(veto ? { veto: veto.kind, vetoReason: veto.reason } : {}),
      ticksSeen: stats.ticksSeen,
      createdAt: now.toISOString()
    });
  }

  /** Feeds a realized trade back into the lead signal's multiplier. */
  calibrate(record: TradeRecord, settings: EnsembleSettings): void {
    this.recentOutcomes.push(record.outcome === "win");
    if (this.recentOutcomes.length > RECENT_OUTCOMES) this.recentOutcomes.shift();

    if (!record.leadSignal) return;
    const prior = this.multipliers.get(record.leadSignal) ?? 1;
    this.multipliers.set(record.leadSignal, adjustMultiplier(prior, record.outcome, record.confidence, settings.calibration));

    const led = this.led.get(record.leadSignal) ?? { trades: 0, wins: 0 };
    this.led.set(record.leadSignal, {
      trades: led.trades + 1,
      wins: led.wins + (record.outcome === "win" ? 1 : 0)
    });
  }

  multiplier(name: SignalName): number {
    return this.multipliers.get(name) ?? 1;
  }

  signalStats(): Record<string, SignalStats> {
    const out: Record<string, SignalStats> = {};
    for (const signal of this.signals) {
      const led = this.led.get(signal.name) ?? { trades: 0, wins: 0 };
      out[signal.name] = {
        multiplier: round(this.multiplier(signal.name), 6),
        led: led.trades,
        wins: led.wins,
        accuracy: led.trades > 0 ? round((led.wins / led.trades) * 100, 2) : null
      };
    }
    return out;
  }

  recentHitRate(): number | null {
    if (this.recentOutcomes.length === 0) return null;
    const wins = this.recentOutcomes.filter(Boolean).length;
    return round((wins / this.recentOutcomes.length) * 100, 2);
  }

  resetCalibration(): void {
    this.multipliers.clear();
    this.led.clear();
    this.recentOutcomes.length = 0;
    for (const signal of this.signals) this.multipliers.set(signal.name, 1);
  }

  private effectiveWeight(name: SignalName, settings: EnsembleSettings): number {
    const base = settings.weights[name] ?? 1;
    return Math.max(0, base) * this.multiplier(name);
  }
}
