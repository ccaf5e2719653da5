import { Inject, Injectable, type OnModuleDestroy } from "@nestjs/common";
import type { PaperPayouts, Tick } from "@digitbot/shared";

import { ConfigService } from "../config/config.service";
import { TickIngestor, type RawTick } from "../engine/ticks/tick-ingestor";
import { APP_LOGGER, type AppLogger } from "../logging/pino-logger";
import {
  TICK_SOURCE,
  type TickSource,
  type TickSubscription,
  type TradeBroker,
  type TradeRequest,
  type TradeResult,
  type TradeSubmission
} from "../trading/collaborators";

const DEFAULT_BALANCE = 1000;
const DEFAULT_PAYOUTS: PaperPayouts = { matches: 8, differs: 0.095 };

type OpenContract = {
  request: TradeRequest;
  ticksRemaining: number;
  settle(result: TradeResult): void;
};

function roundMoney(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Profit-or-loss of a finished digit contract at the given payouts (profit per unit staked). */
export function settleDigitContract(request: TradeRequest, exitDigit: number, payouts: PaperPayouts): TradeResult {
  const won = request.contractType === "DIGITMATCH" ? exitDigit === request.digit : exitDigit !== request.digit;
  const ratio = request.contractType === "DIGITMATCH" ? payouts.matches : payouts.differs;
  return {
    outcome: won ? "win" : "loss",
    pnlDelta: won ? roundMoney(request.stake * ratio) : -request.stake,
    exitDigit
  };
}

/**
 * Simulated broker that settles contracts against the live tick stream: a contract of N ticks
 * settles on the Nth tick of its symbol after purchase.
 */
@Injectable()
export class PaperBrokerService implements TradeBroker, OnModuleDestroy {
  private readonly logger: AppLogger;
  private balance: number | null = null;
  private seq = 0;
  private readonly open = new Map<string, OpenContract>();
  private readonly results = new Map<string, Promise<TradeResult>>();
  private readonly feeds = new Map<string, TickSubscription>();

  constructor(
    private readonly configService: ConfigService,
    @Inject(TICK_SOURCE) private readonly tickSource: TickSource,
    @Inject(APP_LOGGER) logger: AppLogger
  ) {
    this.logger = logger.child({ module: "paper-broker" });
  }

  get openContracts(): number {
    return this.open.size;
  }

  async getBalance(): Promise<number> {
    return this.currentBalance();
  }

  async submitTrade(request: TradeRequest): Promise<TradeSubmission> {
    const balance = this.currentBalance();
    if (request.stake > balance) {
      throw new Error(`Paper balance ${balance.toFixed(2)} is below stake ${request.stake.toFixed(2)}`);
    }

    await this.ensureFeed(request.symbol);

    this.seq += 1;
    const tradeId = `paper-${this.seq}`;
    this.balance = roundMoney(balance - request.stake);

    const result = new Promise<TradeResult>((resolve) => {
      this.open.set(tradeId, { request, ticksRemaining: request.duration, settle: resolve });
    });
    this.results.set(tradeId, result);

    this.logger.info({ msg: "Paper contract opened", tradeId, contractType: request.contractType, barrier: request.digit, stake: request.stake });
    return { tradeId };
  }

  async waitForResult(tradeId: string): Promise<TradeResult> {
    const result = this.results.get(tradeId);
    if (!result) {
      throw new Error(`Unknown paper trade ${tradeId}`);
    }
    try {
      return await result;
    } finally {
      this.results.delete(tradeId);
    }
  }

  /** Advances every open contract on the tick's symbol, settling those that reach their exit tick. */
  settleOn(tick: Tick): void {
    for (const [tradeId, contract] of this.open) {
      if (contract.request.symbol !== tick.symbol) continue;
      contract.ticksRemaining -= 1;
      if (contract.ticksRemaining > 0) continue;

      this.open.delete(tradeId);
      const result = settleDigitContract(contract.request, tick.digit, this.payouts());
      if (result.outcome === "win") {
        this.balance = roundMoney(this.currentBalance() + contract.request.stake + result.pnlDelta);
      }
      this.logger.info({ msg: "Paper contract settled", tradeId, exitDigit: tick.digit, outcome: result.outcome, pnlDelta: result.pnlDelta });
      contract.settle(result);
    }
  }

  reset(): void {
    this.balance = null;
  }

  onModuleDestroy(): void {
    for (const feed of this.feeds.values()) feed.unsubscribe();
    this.feeds.clear();
  }

  private async ensureFeed(symbol: string): Promise<void> {
    if (this.feeds.has(symbol)) return;
    const subscription = await this.tickSource.subscribe(symbol, (raw) => this.onRawTick(raw));
    if (this.feeds.has(symbol)) {
      subscription.unsubscribe();
      return;
    }
    this.feeds.set(symbol, subscription);
  }

  private onRawTick(raw: RawTick): void {
    const pipDecimals = this.configService.load()?.advanced.pipDecimals ?? 2;
    const result = new TickIngestor({ symbol: raw.symbol, pipDecimals }).normalize(raw);
    if (!result.ok) {
      this.logger.debug({ msg: "Paper broker ignored tick", reason: result.reason });
      return;
    }
    this.settleOn(result.tick);
  }

  private currentBalance(): number {
    if (this.balance === null) {
      this.balance = this.configService.load()?.advanced.paperStartingBalance ?? DEFAULT_BALANCE;
    }
    return this.balance;
  }

  private payouts(): PaperPayouts {
    return this.configService.load()?.advanced.paperPayouts ?? DEFAULT_PAYOUTS;
  }
}
