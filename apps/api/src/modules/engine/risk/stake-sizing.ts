import type { RiskSettings, SizingPolicy } from "@digitbot/shared";

export type SizingInput = {
  balance: number;
  /** Estimated win probability, 0..1. */
  winProbability: number;
  flatStake: number;
  risk: RiskSettings;
};

export type StakeSizer = (input: SizingInput) => number;

/** Kelly fraction for a binary bet paying `payoutRatio` per unit staked: `p - (1 - p) / b`. */
export function kellyFraction(winProbability: number, payoutRatio: number): number {
  const p = Math.max(0, Math.min(1, winProbability));
  return p - (1 - p) / payoutRatio;
}

function kellyStake(input: SizingInput, multiplier: number): number {
  const fraction = kellyFraction(input.winProbability, input.risk.payoutRatio) * multiplier;
  return input.balance * Math.max(0, Math.min(input.risk.maxStakeFraction, fraction));
}

export const STAKE_SIZERS: Readonly<Record<SizingPolicy, StakeSizer>> = {
  kelly: (input) => kellyStake(input, 1),
  fractional_kelly: (input) => kellyStake(input, input.risk.kellyMultiplier),
  flat: (input) => input.flatStake
};

/** Rounds down to the broker's stake increment. */
export function floorToIncrement(value: number, increment: number): number {
  if (!(value > 0)) return 0;
  // the epsilon absorbs binary noise such as 2.9999999999999996 / 0.01
  return Math.floor(value / increment + 1e-9) * increment;
}
