import { z } from "zod";

import { PredictionSchema, TradeRecordSchema } from "./market";
import { ContractTypeSchema, DigitSchema } from "./trading";

export const ENGINE_STATE_VERSION = 1 as const;

export const ControllerStateSchema = z.enum(["IDLE", "ARMED", "AWAITING_RESULT", "HALTED"]);
export type ControllerState = z.infer<typeof ControllerStateSchema>;

export const EngineErrorKindSchema = z.enum([
  "InsufficientData",
  "VolatilityVeto",
  "StakeBelowMinimum",
  "RiskLimitReached",
  "BrokerSubmissionFailed",
  "BrokerResultTimeout",
  "TradeInFlight"
]);
export type EngineErrorKind = z.infer<typeof EngineErrorKindSchema>;

export const DecisionKindSchema = z.enum(["ENGINE", "SKIP", "TRADE", "RESULT", "HALT", "ERROR", "CONFIG"]);
export type DecisionKind = z.infer<typeof DecisionKindSchema>;

export const DecisionSchema = z.object({
  id: z.string().min(1),
  ts: z.string().min(1),
  kind: DecisionKindSchema,
  summary: z.string().min(1),
  errorKind: EngineErrorKindSchema.optional(),
  details: z.record(z.unknown()).optional()
});
export type Decision = z.infer<typeof DecisionSchema>;

export const AccountStateSchema = z.object({
  balance: z.number(),
  realizedPnl: z.number(),
  tradesCount: z.number().int().nonnegative(),
  wins: z.number().int().nonnegative(),
  losses: z.number().int().nonnegative(),
  isTrading: z.boolean()
});
export type AccountState = z.infer<typeof AccountStateSchema>;

export const PendingTradeSchema = z.object({
  id: z.string().min(1),
  tradeId: z.string().min(1).optional(),
  contractType: ContractTypeSchema,
  digit: DigitSchema,
  stake: z.number().positive(),
  duration: z.number().int().positive(),
  confidence: z.number().min(0).max(100),
  submittedAt: z.string().min(1)
});
export type PendingTrade = z.infer<typeof PendingTradeSchema>;

export const UnreconciledTradeSchema = PendingTradeSchema.extend({
  errorKind: EngineErrorKindSchema,
  error: z.string().min(1),
  loggedAt: z.string().min(1)
});
export type UnreconciledTrade = z.infer<typeof UnreconciledTradeSchema>;

export const EngineStatusSchema = z.object({
  version: z.literal(ENGINE_STATE_VERSION),
  sessionStartedAt: z.string().min(1).optional(),
  updatedAt: z.string().min(1),
  state: ControllerStateSchema,
  stopRequested: z.boolean(),
  symbol: z.string().min(1),
  live: z.boolean(),
  account: AccountStateSchema,
  prediction: PredictionSchema.nullable(),
  lastDecision: z.string().min(1).optional(),
  lastErrorKind: EngineErrorKindSchema.optional(),
  pendingTrade: PendingTradeSchema.nullable(),
  ticksSeen: z.number().int().nonnegative(),
  decisions: z.array(DecisionSchema),
  recentTrades: z.array(TradeRecordSchema),
  unreconciled: z.array(UnreconciledTradeSchema)
});
export type EngineStatus = z.infer<typeof EngineStatusSchema>;

export function defaultAccountState(): AccountState {
  return {
    balance: 0,
    realizedPnl: 0,
    tradesCount: 0,
    wins: 0,
    losses: 0,
    isTrading: false
  };
}
