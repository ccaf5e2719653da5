import { z } from "zod";

import { EngineSettingsSchema, TradingConfigSchema, type RiskSettings, type TradingConfig } from "./trading";

export const CONFIG_VERSION = 1 as const;

export const DEFAULT_DERIV_APP_ID = 1089;
export const DEFAULT_DERIV_WS_URL = "wss://ws.derivws.com/websockets/v3";

export const BasicSetupRequestSchema = z.object({
  derivApiToken: z.string().min(1).optional(),
  derivAppId: z.number().int().positive().default(DEFAULT_DERIV_APP_ID),
  symbol: z.string().min(1).default("R_100"),
  currency: z.string().min(3).max(5).default("USD"),
  risk: z.number().int().min(0).max(100),
  liveTrading: z.boolean()
});

export type BasicSetupRequest = z.infer<typeof BasicSetupRequestSchema>;

export const DerivCredentialsSchema = z.object({
  apiToken: z.string().min(1).optional(),
  appId: z.number().int().positive()
});
export type DerivCredentials = z.infer<typeof DerivCredentialsSchema>;

export const BasicSettingsSchema = z.object({
  deriv: DerivCredentialsSchema,
  symbol: z.string().min(1),
  currency: z.string().min(3).max(5),
  risk: z.number().int().min(0).max(100),
  liveTrading: z.boolean()
});
export type BasicSettings = z.infer<typeof BasicSettingsSchema>;

export const PaperPayoutsSchema = z.object({
  matches: z.number().positive().max(100).default(8),
  differs: z.number().positive().max(1).default(0.095)
});
export type PaperPayouts = z.infer<typeof PaperPayoutsSchema>;

export const AdvancedSettingsSchema = z.object({
  apiKey: z.string().min(16),
  apiHost: z.string().min(1),
  apiPort: z.number().int().min(1).max(65535),
  derivWsUrl: z.string().url().default(DEFAULT_DERIV_WS_URL),
  pipDecimals: z.number().int().min(0).max(6).default(2),
  tickHistorySize: z.number().int().min(100).max(5000).default(1000),
  submitTimeoutMs: z.number().int().min(1_000).max(120_000).default(15_000),
  resultTimeoutMs: z.number().int().min(1_000).max(600_000).default(60_000),
  persistTicks: z.boolean().default(true),
  paperStartingBalance: z.number().positive().default(1000),
  paperPayouts: PaperPayoutsSchema.default({}),
  followRiskProfile: z.boolean().default(true)
});
export type AdvancedSettings = z.infer<typeof AdvancedSettingsSchema>;

export const AppConfigSchema = z.object({
  version: z.literal(CONFIG_VERSION),
  createdAt: z.string().min(1),
  updatedAt: z.string().min(1),
  basic: BasicSettingsSchema,
  advanced: AdvancedSettingsSchema,
  trading: TradingConfigSchema,
  engine: EngineSettingsSchema
});
export type AppConfig = z.infer<typeof AppConfigSchema>;

function clampRisk(risk: number): number {
  if (!Number.isFinite(risk)) return 0;
  return Math.max(0, Math.min(100, risk));
}

function round(value: number, decimals: number): number {
  const pow = 10 ** decimals;
  return Math.round(value * pow) / pow;
}

export type RiskProfile = Pick<TradingConfig, "confidenceThreshold"> &
  Pick<RiskSettings, "maxStakeFraction" | "kellyMultiplier">;

export function deriveRiskProfile(risk: number): RiskProfile {
  const r = clampRisk(risk);
  const t = r / 100;

  return {
    confidenceThreshold: round(85 - t * 25, 1), // 85 -> 60
    maxStakeFraction: round(0.02 + t * 0.13, 4), // 2% -> 15%
    kellyMultiplier: round(0.25 + t * 0.75, 4) // quarter -> full Kelly
  };
}

/** Applies the risk profile onto the trading config and risk settings of a config. */
export function applyRiskProfile(config: AppConfig): AppConfig {
  const profile = deriveRiskProfile(config.basic.risk);
  return {
    ...config,
    trading: { ...config.trading, confidenceThreshold: profile.confidenceThreshold },
    engine: {
      ...config.engine,
      risk: {
        ...config.engine.risk,
        maxStakeFraction: profile.maxStakeFraction,
        kellyMultiplier: profile.kellyMultiplier
      }
    }
  };
}
