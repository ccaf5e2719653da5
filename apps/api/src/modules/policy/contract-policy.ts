import type { ContractType } from "@digitbot/shared";

// Volatility indices that list DIGITMATCH / DIGITDIFF: R_10..R_100 and their 1-second variants.
const DIGIT_SYMBOL_PATTERNS = [/^R_(10|25|50|75|100)$/, /^1HZ(10|15|25|30|50|75|90|100|150|200|250|300)V$/];

export const MIN_DIGIT_DURATION = 1;
export const MAX_DIGIT_DURATION = 10;

export function offersDigitContracts(symbol: string): boolean {
  const normalized = symbol.trim().toUpperCase();
  return DIGIT_SYMBOL_PATTERNS.some((pattern) => pattern.test(normalized));
}

export function getContractPolicyBlockReason(params: {
  symbol: string;
  contractType: ContractType;
  digit: number;
  duration: number;
  stake?: number;
  minStake?: number;
}): string | null {
  if (!offersDigitContracts(params.symbol)) {
    return `Digit contracts are not offered on ${params.symbol}`;
  }

  if (!Number.isInteger(params.duration) || params.duration < MIN_DIGIT_DURATION || params.duration > MAX_DIGIT_DURATION) {
    return `Digit contracts last ${MIN_DIGIT_DURATION} to ${MAX_DIGIT_DURATION} ticks (got ${params.duration})`;
  }

  if (!Number.isInteger(params.digit) || params.digit < 0 || params.digit > 9) {
    return `Barrier must be a digit 0-9 (got ${params.digit})`;
  }

  if (params.stake !== undefined && params.minStake !== undefined && params.stake < params.minStake) {
    return `Stake ${params.stake.toFixed(2)} is below the minimum ${params.minStake.toFixed(2)}`;
  }

  return null;
}
