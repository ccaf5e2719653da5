import { BadRequestException, Body, Controller, Get, Post, Put } from "@nestjs/common";
import { z } from "zod";
import type { AppConfig } from "@digitbot/shared";
import { AdvancedSettingsSchema, AppConfigSchema } from "@digitbot/shared";

import { parseBody } from "../http/parse-body";
import { ConfigService } from "./config.service";

// partial() short-circuits undefined before the defaults, so absent keys keep their stored value
const AdvancedUpdateSchema = AdvancedSettingsSchema.omit({ apiKey: true }).partial().strict();

const BasicUpdateSchema = z
  .object({
    symbol: z.string().min(1).optional(),
    currency: z.string().min(3).max(5).optional(),
    risk: z.number().int().min(0).max(100).optional(),
    liveTrading: z.boolean().optional()
  })
  .strict();

const DerivCredentialsUpdateSchema = z.object({
  apiToken: z.string().optional(),
  appId: z.number().int().positive().optional()
});

export type PublicConfig = {
  initialized: boolean;
  basic?: {
    symbol: string;
    currency: string;
    risk: number;
    liveTrading: boolean;
  };
  integrations?: { derivConfigured: boolean; derivAppId: number };
  advanced?: Omit<AppConfig["advanced"], "apiKey"> & { apiKeyHint: string };
  trading?: AppConfig["trading"];
  engine?: AppConfig["engine"];
};

@Controller("config")
export class ConfigController {
  constructor(private readonly configService: ConfigService) {}

  @Get("public")
  getPublic(): PublicConfig {
    const config = this.configService.load();
    if (!config) {
      return { initialized: false };
    }

    const { apiKey, ...advanced } = config.advanced;
    return {
      initialized: true,
      basic: {
        symbol: config.basic.symbol,
        currency: config.basic.currency,
        risk: config.basic.risk,
        liveTrading: config.basic.liveTrading
      },
      integrations: {
        derivConfigured: Boolean(config.basic.deriv.apiToken),
        derivAppId: config.basic.deriv.appId
      },
      advanced: { ...advanced, apiKeyHint: apiKey.slice(-6) },
      trading: config.trading,
      engine: config.engine
    };
  }

  @Put("basic")
  updateBasic(@Body() body: unknown): { ok: true } {
    const patch = parseBody(BasicUpdateSchema, body);
    this.configService.updateBasic(patch);
    return { ok: true };
  }

  @Put("advanced")
  updateAdvanced(@Body() body: unknown): { ok: true } {
    const patch = parseBody(AdvancedUpdateSchema, body);
    this.configService.updateAdvanced(patch);
    return { ok: true };
  }

  @Put("deriv-credentials")
  updateDerivCredentials(@Body() body: unknown): { ok: true } {
    const patch = parseBody(DerivCredentialsUpdateSchema, body);
    this.configService.updateDerivCredentials(patch);
    return { ok: true };
  }

  @Get("export")
  exportConfig(): AppConfig {
    const config = this.configService.load();
    if (!config) {
      throw new BadRequestException("Bot is not initialized.");
    }
    return config;
  }

  @Put("import")
  importConfig(@Body() body: unknown): { ok: true } {
    const config = parseBody(AppConfigSchema, body);
    this.configService.importConfig(config);
    return { ok: true };
  }

  @Post("rotate-api-key")
  rotateApiKey(): { apiKey: string } {
    const next = this.configService.rotateApiKey();
    return { apiKey: next.advanced.apiKey };
  }
}
