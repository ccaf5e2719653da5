import { z } from "zod";

import { ContractTypeSchema, DigitSchema, SignalNameSchema, TradeDirectionSchema } from "./trading";

const DigitVectorSchema = z.array(z.number()).length(10);

export const TickSchema = z.object({
  symbol: z.string().min(1),
  price: z.number().positive(),
  digit: DigitSchema,
  epoch: z.number().int().nonnegative(),
  timestamp: z.string().min(1)
});
export type Tick = z.infer<typeof TickSchema>;

export const FrequencySnapshotSchema = z.object({
  windowSize: z.number().int().positive(),
  total: z.number().int().nonnegative(),
  counts: DigitVectorSchema,
  percentages: DigitVectorSchema,
  mostFrequent: z.object({ digit: DigitSchema, count: z.number().int().nonnegative() }),
  leastFrequent: z.object({ digit: DigitSchema, count: z.number().int().nonnegative() })
});
export type FrequencySnapshot = z.infer<typeof FrequencySnapshotSchema>;

export const StreakMetricsSchema = z.object({
  ticksSinceSeen: z.array(z.number().int().nonnegative().nullable()).length(10),
  repeat: z.object({ digit: DigitSchema.nullable(), length: z.number().int().nonnegative() }),
  alternation: z.object({ digits: z.array(DigitSchema).max(2), length: z.number().int().nonnegative() })
});
export type StreakMetrics = z.infer<typeof StreakMetricsSchema>;

export const PredictionVetoSchema = z.enum(["InsufficientData", "VolatilityVeto"]);
export type PredictionVeto = z.infer<typeof PredictionVetoSchema>;

export const PredictionSchema = z.object({
  predictedDigit: DigitSchema,
  direction: TradeDirectionSchema,
  confidence: z.number().min(0).max(100),
  scores: DigitVectorSchema,
  componentScores: z.record(SignalNameSchema, z.number()),
  leadSignal: SignalNameSchema.nullable(),
  margin: z.number().min(0).max(1),
  windowVariance: z.number().nonnegative(),
  priceVolatility: z.number().nonnegative(),
  favorable: z.boolean(),
  veto: PredictionVetoSchema.optional(),
  vetoReason: z.string().optional(),
  ticksSeen: z.number().int().nonnegative(),
  createdAt: z.string().min(1)
});
export type Prediction = z.infer<typeof PredictionSchema>;

export const TradeOutcomeSchema = z.enum(["win", "loss"]);
export type TradeOutcome = z.infer<typeof TradeOutcomeSchema>;

export const TradeRecordSchema = z.object({
  id: z.string().min(1),
  tradeId: z.string().min(1),
  symbol: z.string().min(1),
  contractType: ContractTypeSchema,
  digitPredicted: DigitSchema,
  digitActual: DigitSchema.optional(),
  stake: z.number().positive(),
  outcome: TradeOutcomeSchema,
  pnlDelta: z.number(),
  confidence: z.number().min(0).max(100),
  leadSignal: SignalNameSchema.nullable(),
  timestamp: z.string().min(1)
});
export type TradeRecord = z.infer<typeof TradeRecordSchema>;
