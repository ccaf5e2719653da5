import { Body, Controller, Get, Post, Put, Query } from "@nestjs/common";
import {
  EngineSettingsSchema,
  TradingConfigSchema,
  type Decision,
  type EngineSettings,
  type EngineStatus,
  type TradeRecord,
  type TradingConfig
} from "@digitbot/shared";
import { z } from "zod";

import type { SignalStats } from "../engine/prediction/prediction-ensemble";
import { parseBody } from "../http/parse-body";
import { TradingControllerService, type EngineAnalysis, type StopResult } from "./trading-controller.service";

const TradesQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50)
});

@Controller("trading")
export class TradingController {
  constructor(private readonly trading: TradingControllerService) {}

  @Get("status")
  getStatus(): EngineStatus {
    return this.trading.getStatus();
  }

  @Put("config")
  configure(@Body() body: unknown): TradingConfig {
    return this.trading.configure(parseBody(TradingConfigSchema, body));
  }

  @Put("engine")
  updateEngine(@Body() body: unknown): EngineSettings {
    return this.trading.updateEngine(parseBody(EngineSettingsSchema, body));
  }

  @Post("start")
  async start(): Promise<EngineStatus> {
    return await this.trading.start();
  }

  @Post("stop")
  stop(): StopResult {
    return this.trading.stop();
  }

  @Get("analysis")
  getAnalysis(): EngineAnalysis {
    return this.trading.getAnalysis();
  }

  @Get("trades")
  getTrades(@Query() query: unknown): TradeRecord[] {
    const { limit } = parseBody(TradesQuerySchema, query);
    return this.trading.getTrades(limit);
  }

  @Get("decisions")
  getDecisions(): Decision[] {
    return this.trading.getDecisions();
  }

  @Post("calibration/reset")
  resetCalibration(): Record<string, SignalStats> {
    return this.trading.resetCalibration();
  }
}
