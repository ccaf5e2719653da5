import {
  defaultEngineSettings,
  defaultTradingConfig,
  type AccountState,
  type Prediction,
  type RiskSettings,
  type TradingConfig
} from "@digitbot/shared";
import { describe, expect, it } from "vitest";

import { RiskManager } from "./risk-manager";
import { floorToIncrement, kellyFraction } from "./stake-sizing";

function account(overrides: Partial<AccountState> = {}): AccountState {
  return { balance: 1000, realizedPnl: 0, tradesCount: 0, wins: 0, losses: 0, isTrading: true, ...overrides };
}

function config(overrides: Partial<TradingConfig> = {}): TradingConfig {
  return { ...defaultTradingConfig(), ...overrides };
}

function risk(overrides: Partial<RiskSettings> = {}): RiskSettings {
  return { ...defaultEngineSettings().risk, ...overrides };
}

function prediction(overrides: Partial<Prediction> = {}): Prediction {
  return {
    predictedDigit: 3,
    direction: "differs",
    confidence: 80,
    scores: new Array(10).fill(0.1),
    componentScores: {},
    leadSignal: "frequency",
    margin: 0.8,
    windowVariance: 0,
    priceVolatility: 0.5,
    favorable: true,
    ticksSeen: 100,
    createdAt: "2026-01-01T10:00:00.000Z",
    ...overrides
  };
}

const manager = new RiskManager();

describe("RiskManager gates", () => {
  it("skips when the session is not trading", () => {
    expect(
      manager.evaluate({ prediction: prediction(), account: account({ isTrading: false }), config: config(), risk: risk(), tickDigit: 1 })
    ).toEqual({ action: "skip", reason: "skipped: not trading" });
  });

  it("reports RiskLimitReached at either bound", () => {
    expect(
      manager.evaluate({ prediction: prediction(), account: account({ realizedPnl: -10 }), config: config(), risk: risk(), tickDigit: 1 })
    ).toEqual({ action: "skip", kind: "RiskLimitReached", reason: "stop loss reached (pnl -10.00 <= -10.00)" });
    expect(
      manager.evaluate({ prediction: prediction(), account: account({ realizedPnl: 20.5 }), config: config(), risk: risk(), tickDigit: 1 })
    ).toEqual({ action: "skip", kind: "RiskLimitReached", reason: "take profit reached (pnl 20.50 >= 20.00)" });
  });

  it("passes prediction vetoes through", () => {
    const vetoed = prediction({ confidence: 0, veto: "InsufficientData", vetoReason: "insufficient data (10/50 ticks)" });
    expect(manager.evaluate({ prediction: vetoed, account: account(), config: config(), risk: risk(), tickDigit: 1 })).toEqual({
      action: "skip",
      kind: "InsufficientData",
      reason: "skipped: insufficient data (10/50 ticks)"
    });
  });

  it("applies the confidence threshold", () => {
    expect(
      manager.evaluate({ prediction: prediction({ confidence: 54 }), account: account(), config: config(), risk: risk(), tickDigit: 1 })
    ).toEqual({ action: "skip", reason: "skipped: confidence 54% < 70%" });
  });

  it("trades the selected digit when prediction is off", () => {
    const cfg = config({ usePrediction: false, selectedNumber: 5 });
    expect(manager.evaluate({ prediction: null, account: account(), config: cfg, risk: risk(), tickDigit: 3 })).toEqual({
      action: "skip",
      reason: "skipped: digit 3 is not the selected 5"
    });
    expect(manager.evaluate({ prediction: null, account: account(), config: cfg, risk: risk(), tickDigit: 5 })).toEqual({
      action: "trade",
      contractType: "DIGITDIFF",
      direction: "differs",
      digit: 5,
      stake: 1,
      duration: 1,
      confidence: 0,
      reason: "differs 5 on selected digit, stake 1.00"
    });
  });
});

describe("RiskManager sizing", () => {
  const wideLimits = config({ stopLoss: 100_000, takeProfit: 100_000 });

  it("caps fractional Kelly at the max stake fraction", () => {
    const decision = manager.evaluate({ prediction: prediction(), account: account(), config: wideLimits, risk: risk(), tickDigit: 1 });
    expect(decision).toMatchObject({ action: "trade", contractType: "DIGITDIFF", digit: 3, stake: 150, duration: 1 });
  });

  it("sizes below the cap with lower confidence", () => {
    const decision = manager.evaluate({
      prediction: prediction({ confidence: 60 }),
      account: account(),
      config: { ...wideLimits, confidenceThreshold: 50 },
      risk: risk(),
      tickDigit: 1
    });
    expect(decision).toMatchObject({ action: "trade", stake: 89.47 });
  });

  it("rejects a stake below the broker minimum", () => {
    const decision = manager.evaluate({
      prediction: prediction({ confidence: 50 }),
      account: account(),
      config: { ...wideLimits, confidenceThreshold: 0 },
      risk: risk(),
      tickDigit: 1
    });
    expect(decision).toEqual({ action: "skip", kind: "StakeBelowMinimum", reason: "skipped: stake 0.00 below minimum 0.35" });
  });

  it("never stakes more than the balance", () => {
    const decision = manager.evaluate({
      prediction: prediction(),
      account: account({ balance: 0.5 }),
      config: { ...wideLimits, autoStakeSizing: false, stake: 1 },
      risk: risk(),
      tickDigit: 1
    });
    expect(decision).toMatchObject({ action: "trade", stake: 0.5 });
  });

  it("keeps auto stakes within balance * maxStakeFraction and above the minimum", () => {
    for (let confidence = 70; confidence <= 100; confidence += 1.5) {
      for (const balance of [3, 50, 1000, 25_000]) {
        const decision = manager.evaluate({
          prediction: prediction({ confidence }),
          account: account({ balance }),
          config: wideLimits,
          risk: risk({ sizingPolicy: "kelly" }),
          tickDigit: 1
        });
        if (decision.action === "trade") {
          expect(decision.stake).toBeLessThanOrEqual(balance * 0.15 + 1e-9);
          expect(decision.stake).toBeGreaterThanOrEqual(0.35);
        } else {
          expect(decision.kind).toBe("StakeBelowMinimum");
        }
      }
    }
  });
});

describe("stop-loss headroom", () => {
  const flat4 = config({ autoStakeSizing: false, stake: 4 });
  const input = { prediction: prediction(), account: account({ balance: 92, realizedPnl: -8 }), config: flat4, tickDigit: 1 };

  it("shrinks the stake to the remaining headroom", () => {
    expect(manager.evaluate({ ...input, risk: risk({ stopLossHeadroom: "cap" }) })).toMatchObject({ action: "trade", stake: 2 });
  });

  it("skips when configured to", () => {
    expect(manager.evaluate({ ...input, risk: risk({ stopLossHeadroom: "skip" }) })).toEqual({
      action: "skip",
      kind: "RiskLimitReached",
      reason: "skipped: stake 4.00 exceeds stop-loss headroom 2.00"
    });
  });

  it("lets the final trade overshoot when ignored", () => {
    expect(manager.evaluate({ ...input, risk: risk({ stopLossHeadroom: "ignore" }) })).toMatchObject({ action: "trade", stake: 4 });
  });
});

describe("stake sizing helpers", () => {
  it("computes the Kelly fraction for the payout ratio", () => {
    expect(kellyFraction(0.8, 0.95)).toBeCloseTo(0.8 - 0.2 / 0.95, 12);
    expect(kellyFraction(0.5, 0.95)).toBeLessThan(0);
  });

  it("floors to the increment", () => {
    expect(floorToIncrement(2.999, 0.01)).toBeCloseTo(2.99, 10);
    expect(floorToIncrement(-1, 0.01)).toBe(0);
  });
});
