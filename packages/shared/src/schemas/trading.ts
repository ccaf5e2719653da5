import { z } from "zod";

export const DIGITS = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9] as const;

export const DigitSchema = z.number().int().min(0).max(9);
export type Digit = z.infer<typeof DigitSchema>;

export const TradeDirectionSchema = z.enum(["matches", "differs"]);
export type TradeDirection = z.infer<typeof TradeDirectionSchema>;

export const ContractTypeSchema = z.enum(["DIGITMATCH", "DIGITDIFF"]);
export type ContractType = z.infer<typeof ContractTypeSchema>;

export function contractTypeFor(direction: TradeDirection): ContractType {
  return direction === "matches" ? "DIGITMATCH" : "DIGITDIFF";
}

export const TradingConfigSchema = z
  .object({
    stake: z.number().positive().max(50_000).default(1),
    duration: z.number().int().min(1).max(10).default(1),
    strategy: TradeDirectionSchema.default("differs"),
    selectedNumber: DigitSchema.default(5),
    stopLoss: z.number().positive().default(10),
    takeProfit: z.number().positive().default(20),
    confidenceThreshold: z.number().min(0).max(100).default(70),
    usePrediction: z.boolean().default(true),
    autoStakeSizing: z.boolean().default(true)
  })
  .strict();
export type TradingConfig = z.infer<typeof TradingConfigSchema>;

export const SignalNameSchema = z.enum(["frequency", "pattern", "session", "consensus"]);
export type SignalName = z.infer<typeof SignalNameSchema>;

export const SignalWeightsSchema = z.object({
  frequency: z.number().min(0).max(10).default(1),
  pattern: z.number().min(0).max(10).default(1),
  session: z.number().min(0).max(10).default(1),
  consensus: z.number().min(0).max(10).default(1)
});
export type SignalWeights = z.infer<typeof SignalWeightsSchema>;

export const CalibrationSettingsSchema = z
  .object({
    learningRate: z.number().positive().max(1).default(0.05),
    minMultiplier: z.number().positive().default(0.25),
    maxMultiplier: z.number().positive().default(3)
  })
  .refine((value) => value.minMultiplier <= 1 && value.maxMultiplier >= 1, {
    message: "Calibration bounds must contain 1"
  });
export type CalibrationSettings = z.infer<typeof CalibrationSettingsSchema>;

export const EnsembleSettingsSchema = z
  .object({
    windowSizes: z.array(z.number().int().min(2).max(1000)).min(1).max(8).default([10, 20, 50, 100]),
    primaryWindow: z.number().int().min(2).max(1000).default(50),
    minTicks: z.number().int().min(1).max(5000).default(50),
    patternLookback: z.number().int().min(4).max(200).default(20),
    volatilityLookback: z.number().int().min(2).max(500).default(20),
    volatilityThreshold: z.number().positive().default(2.5),
    varianceWeight: z.number().min(0).max(10).default(0.5),
    sessionBiasStrength: z.number().min(1).max(3).default(1.2),
    weights: SignalWeightsSchema.default({}),
    calibration: CalibrationSettingsSchema.default({})
  })
  .superRefine((value, ctx) => {
    if (!value.windowSizes.includes(value.primaryWindow)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "primaryWindow must be one of windowSizes",
        path: ["primaryWindow"]
      });
    }
    if (new Set(value.windowSizes).size !== value.windowSizes.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "windowSizes must be unique",
        path: ["windowSizes"]
      });
    }
  });
export type EnsembleSettings = z.infer<typeof EnsembleSettingsSchema>;

export const SizingPolicySchema = z.enum(["kelly", "fractional_kelly", "flat"]);
export type SizingPolicy = z.infer<typeof SizingPolicySchema>;

export const StopLossHeadroomSchema = z.enum(["cap", "skip", "ignore"]);
export type StopLossHeadroom = z.infer<typeof StopLossHeadroomSchema>;

export const RiskSettingsSchema = z.object({
  sizingPolicy: SizingPolicySchema.default("fractional_kelly"),
  kellyMultiplier: z.number().positive().max(1).default(0.5),
  payoutRatio: z.number().positive().max(100).default(0.95),
  maxStakeFraction: z.number().positive().max(1).default(0.15),
  minStake: z.number().positive().default(0.35),
  stakeIncrement: z.number().positive().default(0.01),
  stopLossHeadroom: StopLossHeadroomSchema.default("cap")
});
export type RiskSettings = z.infer<typeof RiskSettingsSchema>;

export const EngineSettingsSchema = z.object({
  ensemble: EnsembleSettingsSchema.default({}),
  risk: RiskSettingsSchema.default({})
});
export type EngineSettings = z.infer<typeof EngineSettingsSchema>;

export function defaultTradingConfig(): TradingConfig {
  return TradingConfigSchema.parse({});
}

export function defaultEngineSettings(): EngineSettings {
  return EngineSettingsSchema.parse({});
}
