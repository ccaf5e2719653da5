import { Injectable } from "@nestjs/common";

import { ConfigService } from "../config/config.service";
import type { TradeBroker, TradeRequest, TradeResult, TradeSubmission } from "../trading/collaborators";
import { DerivTradingService } from "./deriv-trading.service";
import { PaperBrokerService } from "./paper-broker.service";

export type BrokerMode = "live" | "paper";

/**
 * Routes each call to the live Deriv broker when live trading is on and a token is configured,
 * otherwise to the paper broker. Results are always fetched from the broker that took the trade.
 */
@Injectable()
export class TradeBrokerRouter implements TradeBroker {
  private readonly owners = new Map<string, TradeBroker>();

  constructor(
    private readonly configService: ConfigService,
    private readonly live: DerivTradingService,
    private readonly paper: PaperBrokerService
  ) {}

  get mode(): BrokerMode {
    return this.isLive() ? "live" : "paper";
  }

  isLive(): boolean {
    const config = this.configService.load();
    return Boolean(config?.basic.liveTrading && config.basic.deriv.apiToken);
  }

  async submitTrade(request: TradeRequest): Promise<TradeSubmission> {
    const broker = this.current();
    const submission = await broker.submitTrade(request);
    this.owners.set(submission.tradeId, broker);
    return submission;
  }

  async waitForResult(tradeId: string): Promise<TradeResult> {
    const broker = this.owners.get(tradeId) ?? this.current();
    try {
      return await broker.waitForResult(tradeId);
    } finally {
      this.owners.delete(tradeId);
    }
  }

  async getBalance(): Promise<number> {
    return await this.current().getBalance();
  }

  private current(): TradeBroker {
    return this.isLive() ? this.live : this.paper;
  }
}
