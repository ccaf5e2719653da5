import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";

import { BadRequestException, Injectable } from "@nestjs/common";
import type { AdvancedSettings, AppConfig, BasicSetupRequest, EngineSettings, TradingConfig } from "@digitbot/shared";
import {
  AppConfigSchema,
  applyRiskProfile,
  CONFIG_VERSION,
  DEFAULT_DERIV_APP_ID,
  defaultEngineSettings,
  defaultTradingConfig,
  deriveRiskProfile
} from "@digitbot/shared";

type Writeable<T> = { -readonly [K in keyof T]: T[K] };

function atomicWriteFile(filePath: string, data: string): void {
  const tmpPath = `${filePath}.tmp`;
  fs.writeFileSync(tmpPath, data, { encoding: "utf-8" });
  fs.renameSync(tmpPath, filePath);
}

function envAppId(): number {
  const parsed = Number.parseInt(process.env.DERIV_APP_ID ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : DEFAULT_DERIV_APP_ID;
}

/** True when the trading/engine values no longer match what the risk slider derives. */
function divergesFromProfile(config: AppConfig): boolean {
  const profile = deriveRiskProfile(config.basic.risk);
  return (
    config.trading.confidenceThreshold !== profile.confidenceThreshold ||
    config.engine.risk.maxStakeFraction !== profile.maxStakeFraction ||
    config.engine.risk.kellyMultiplier !== profile.kellyMultiplier
  );
}

export type AdvancedPatch = Partial<Omit<AdvancedSettings, "apiKey">>;

@Injectable()
export class ConfigService {
  private cachedConfig: AppConfig | null = null;
  private cachedMtimeMs: number | null = null;

  get dataDir(): string {
    return process.env.DATA_DIR ?? path.resolve(process.cwd(), "../../data");
  }

  private get configPath(): string {
    return path.join(this.dataDir, "config.json");
  }

  isInitialized(): boolean {
    return fs.existsSync(this.configPath);
  }

  migrateOnStartup(): { migrated: boolean; reason: "not_initialized" | "up_to_date" | "normalized" } {
    if (!fs.existsSync(this.configPath)) {
      this.cachedConfig = null;
      this.cachedMtimeMs = null;
      return { migrated: false, reason: "not_initialized" };
    }

    const raw = fs.readFileSync(this.configPath, "utf-8");
    const parsed = AppConfigSchema.parse(JSON.parse(raw));
    const normalized = parsed.advanced.followRiskProfile ? AppConfigSchema.parse(applyRiskProfile(parsed)) : parsed;

    const nextJson = JSON.stringify(normalized, null, 2);
    if (raw.trim() === nextJson.trim()) {
      const stat = fs.statSync(this.configPath);
      this.cachedConfig = normalized;
      this.cachedMtimeMs = stat.mtimeMs;
      return { migrated: false, reason: "up_to_date" };
    }

    atomicWriteFile(this.configPath, nextJson);
    const stat = fs.statSync(this.configPath);
    this.cachedConfig = normalized;
    this.cachedMtimeMs = stat.mtimeMs;
    return { migrated: true, reason: "normalized" };
  }

  load(): AppConfig | null {
    if (!fs.existsSync(this.configPath)) {
      this.cachedConfig = null;
      this.cachedMtimeMs = null;
      return null;
    }

    const stat = fs.statSync(this.configPath);
    if (this.cachedConfig && this.cachedMtimeMs === stat.mtimeMs) {
      return this.cachedConfig;
    }

    const raw = fs.readFileSync(this.configPath, "utf-8");
    const parsed = AppConfigSchema.parse(JSON.parse(raw));
    this.cachedConfig = parsed;
    this.cachedMtimeMs = stat.mtimeMs;
    return parsed;
  }

  /** Like `load()` but throws the HTTP error used across the API when setup has not run. */
  require(): AppConfig {
    const current = this.load();
    if (!current) {
      throw new BadRequestException("Bot is not initialized.");
    }
    return current;
  }

  save(config: AppConfig): void {
    fs.mkdirSync(this.dataDir, { recursive: true });
    atomicWriteFile(this.configPath, JSON.stringify(config, null, 2));
    this.cachedConfig = config;
    this.cachedMtimeMs = fs.statSync(this.configPath).mtimeMs;
  }

  createInitialConfig(request: BasicSetupRequest): AppConfig {
    const now = new Date().toISOString();
    const apiKey = crypto.randomBytes(32).toString("hex");
    const apiToken = request.derivApiToken ?? process.env.DERIV_API_TOKEN;

    const config: Writeable<AppConfig> = {
      version: CONFIG_VERSION,
      createdAt: now,
      updatedAt: now,
      basic: {
        deriv: {
          ...(apiToken ? { apiToken } : {}),
          appId: process.env.DERIV_APP_ID ? envAppId() : request.derivAppId
        },
        symbol: request.symbol,
        currency: request.currency,
        risk: request.risk,
        liveTrading: request.liveTrading
      },
      advanced: {
        apiKey,
        apiHost: process.env.API_HOST ?? "0.0.0.0",
        apiPort: Number.parseInt(process.env.PORT ?? "8148", 10),
        derivWsUrl: "wss://ws.derivws.com/websockets/v3",
        pipDecimals: 2,
        tickHistorySize: 1000,
        submitTimeoutMs: 15_000,
        resultTimeoutMs: 60_000,
        persistTicks: true,
        paperStartingBalance: 1000,
        paperPayouts: { matches: 8, differs: 0.095 },
        followRiskProfile: true
      },
      trading: defaultTradingConfig(),
      engine: defaultEngineSettings()
    };

    return AppConfigSchema.parse(applyRiskProfile(config));
  }

  updateBasic(patch: { symbol?: string; currency?: string; risk?: number; liveTrading?: boolean }): AppConfig {
    const current = this.require();

    const symbol = patch.symbol?.trim();
    const nextBasic = {
      ...current.basic,
      ...patch,
      ...(symbol ? { symbol } : { symbol: current.basic.symbol })
    };

    if (nextBasic.liveTrading && !nextBasic.deriv.apiToken) {
      throw new BadRequestException("A Deriv API token is required when liveTrading=true.");
    }

    const merged: AppConfig = { ...current, updatedAt: new Date().toISOString(), basic: nextBasic };
    const next = AppConfigSchema.parse(current.advanced.followRiskProfile ? applyRiskProfile(merged) : merged);

    this.save(next);
    return next;
  }

  updateAdvanced(patch: AdvancedPatch): AppConfig {
    const current = this.require();

    const apiHost = patch.apiHost?.trim();
    const derivWsUrl = (() => {
      if (patch.derivWsUrl === undefined) return undefined;
      const trimmed = patch.derivWsUrl.trim();
      try {
        const u = new URL(trimmed);
        if (u.protocol !== "ws:" && u.protocol !== "wss:") {
          throw new Error("Only ws/wss URLs are allowed.");
        }
      } catch (e) {
        throw new BadRequestException(`Invalid derivWsUrl: ${e instanceof Error ? e.message : String(e)}`);
      }
      return trimmed;
    })();

    const nextAdvanced = {
      ...current.advanced,
      ...patch,
      ...(apiHost ? { apiHost } : { apiHost: current.advanced.apiHost }),
      ...(derivWsUrl ? { derivWsUrl } : {})
    };

    const merged: AppConfig = { ...current, updatedAt: new Date().toISOString(), advanced: nextAdvanced };
    const next = AppConfigSchema.parse(nextAdvanced.followRiskProfile ? applyRiskProfile(merged) : merged);

    this.save(next);
    return next;
  }

  /**
   * Replaces the trading config wholesale. An explicit threshold that differs from the risk profile
   * turns `followRiskProfile` off so the next startup does not overwrite it.
   */
  updateTrading(trading: TradingConfig): AppConfig {
    return this.replaceOperatorSettings({ trading });
  }

  updateEngine(engine: EngineSettings): AppConfig {
    return this.replaceOperatorSettings({ engine });
  }

  updateDerivCredentials(patch: { apiToken?: string; appId?: number }): AppConfig {
    const current = this.require();

    const apiToken = patch.apiToken === undefined ? current.basic.deriv.apiToken : patch.apiToken.trim() || undefined;
    const next = AppConfigSchema.parse({
      ...current,
      updatedAt: new Date().toISOString(),
      basic: {
        ...current.basic,
        deriv: {
          apiToken,
          appId: patch.appId ?? current.basic.deriv.appId
        },
        liveTrading: apiToken ? current.basic.liveTrading : false
      }
    });

    this.save(next);
    return next;
  }

  rotateApiKey(): AppConfig {
    const current = this.require();

    const apiKey = crypto.randomBytes(32).toString("hex");
    const next = AppConfigSchema.parse({
      ...current,
      updatedAt: new Date().toISOString(),
      advanced: {
        ...current.advanced,
        apiKey
      }
    });

    this.save(next);
    return next;
  }

  importConfig(config: AppConfig): AppConfig {
    const parsed = AppConfigSchema.parse({
      ...config,
      version: CONFIG_VERSION,
      updatedAt: new Date().toISOString()
    });
    const next = parsed.advanced.followRiskProfile ? AppConfigSchema.parse(applyRiskProfile(parsed)) : parsed;
    this.save(next);
    return next;
  }

  private replaceOperatorSettings(patch: { trading?: TradingConfig; engine?: EngineSettings }): AppConfig {
    const current = this.require();

    const merged: AppConfig = {
      ...current,
      ...patch,
      updatedAt: new Date().toISOString()
    };
    const followRiskProfile = current.advanced.followRiskProfile && !divergesFromProfile(merged);
    const next = AppConfigSchema.parse({
      ...merged,
      advanced: { ...merged.advanced, followRiskProfile }
    });

    this.save(next);
    return next;
  }
}
