import {
  contractTypeFor,
  type AccountState,
  type ContractType,
  type EngineErrorKind,
  type Prediction,
  type RiskSettings,
  type TradeDirection,
  type TradingConfig
} from "@digitbot/shared";

import { floorToIncrement, STAKE_SIZERS } from "./stake-sizing";

export type TradePlan = {
  action: "trade";
  contractType: ContractType;
  direction: TradeDirection;
  digit: number;
  stake: number;
  duration: number;
  confidence: number;
  reason: string;
};

export type SkipDecision = {
  action: "skip";
  kind?: EngineErrorKind;
  reason: string;
};

export type RiskDecision = TradePlan | SkipDecision;

export type RiskInput = {
  prediction: Prediction | null;
  account: AccountState;
  config: TradingConfig;
  risk: RiskSettings;
  /** Digit of the tick being evaluated. */
  tickDigit: number;
};

function money(value: number): string {
  return value.toFixed(2);
}

function roundStake(value: number): number {
  return Math.round(value * 100) / 100;
}

/** `RiskLimitReached` when session pnl has crossed the stop-loss or take-profit bound. */
export function limitBreach(account: AccountState, config: TradingConfig): SkipDecision | null {
  if (account.realizedPnl <= -config.stopLoss) {
    return {
      action: "skip",
      kind: "RiskLimitReached",
      reason: `stop loss reached (pnl ${money(account.realizedPnl)} <= -${money(config.stopLoss)})`
    };
  }
  if (account.realizedPnl >= config.takeProfit) {
    return {
      action: "skip",
      kind: "RiskLimitReached",
      reason: `take profit reached (pnl ${money(account.realizedPnl)} >= ${money(config.takeProfit)})`
    };
  }
  return null;
}

export class RiskManager {
  evaluate(input: RiskInput): RiskDecision {
    const { prediction, account, config, risk } = input;

    if (!account.isTrading) return { action: "skip", reason: "skipped: not trading" };

    const breach = limitBreach(account, config);
    if (breach) return breach;

    let digit: number;
    let confidence: number;
    if (config.usePrediction) {
      if (!prediction) return { action: "skip", kind: "InsufficientData", reason: "skipped: no prediction yet" };
      if (prediction.veto) {
        return { action: "skip", kind: prediction.veto, reason: `skipped: ${prediction.vetoReason ?? prediction.veto}` };
      }
      if (prediction.confidence < config.confidenceThreshold) {
        return {
          action: "skip",
          reason: `skipped: confidence ${Math.round(prediction.confidence)}% < ${config.confidenceThreshold}%`
        };
      }
      digit = prediction.predictedDigit;
      confidence = prediction.confidence;
    } else {
      if (input.tickDigit !== config.selectedNumber) {
        return { action: "skip", reason: `skipped: digit ${input.tickDigit} is not the selected ${config.selectedNumber}` };
      }
      digit = config.selectedNumber;
      confidence = prediction?.confidence ?? 0;
    }

    const sizer = config.usePrediction && config.autoStakeSizing ? STAKE_SIZERS[risk.sizingPolicy] : STAKE_SIZERS.flat;
    let stake = sizer({
      balance: account.balance,
      winProbability: confidence / 100,
      flatStake: config.stake,
      risk
    });
    stake = Math.min(stake, account.balance);

    const headroom = config.stopLoss + account.realizedPnl;
    if (stake > headroom) {
      if (risk.stopLossHeadroom === "cap") {
        stake = headroom;
      } else if (risk.stopLossHeadroom === "skip") {
        return {
          action: "skip",
          kind: "RiskLimitReached",
          reason: `skipped: stake ${money(stake)} exceeds stop-loss headroom ${money(headroom)}`
        };
      }
    }

    stake = roundStake(floorToIncrement(stake, risk.stakeIncrement));
    if (stake < risk.minStake) {
      return {
        action: "skip",
        kind: "StakeBelowMinimum",
        reason: `skipped: stake ${money(stake)} below minimum ${money(risk.minStake)}`
      };
    }

    return {
      action: "trade",
      contractType: contractTypeFor(config.strategy),
      direction: config.strategy,
      digit,
      stake,
      duration: config.duration,
      confidence,
      reason: config.usePrediction
        ? `${config.strategy} ${digit} at ${Math.round(confidence)}% confidence, stake ${money(stake)}`
        : `${config.strategy} ${digit} on selected digit, stake ${money(stake)}`
    };
  }
}
