import { BadRequestException } from "@nestjs/common";
import {
  AdvancedSettingsSchema,
  defaultEngineSettings,
  defaultTradingConfig,
  type AppConfig,
  type EngineSettings,
  type RiskSettings,
  type Tick,
  type TradeRecord,
  type TradingConfig,
  type UnreconciledTrade
} from "@digitbot/shared";
import { afterEach, describe, expect, it, vi } from "vitest";

import type { ConfigService } from "../config/config.service";
import { TradeInFlightError } from "../engine/engine-errors";
import type { TradePlan } from "../engine/risk/risk-manager";
import type { RawTick } from "../engine/ticks/tick-ingestor";
import { createNullLogger } from "../logging/pino-logger";
import type { HistorySink, TickListener, TickSource, TickSubscription, TradeBroker, TradeRequest, TradeResult } from "./collaborators";
import { TradingControllerService } from "./trading-controller.service";

// 2026-01-01T10:00:00Z, inside the european session
const EUROPEAN_EPOCH = 1_767_261_600;

function appConfig(trading: Partial<TradingConfig> = {}, risk: Partial<RiskSettings> = {}): AppConfig {
  const engine = defaultEngineSettings();
  return {
    version: 1,
    createdAt: "2026-01-01T00:00:00.000Z",
    updatedAt: "2026-01-01T00:00:00.000Z",
    basic: { deriv: { appId: 1089 }, symbol: "R_100", currency: "USD", risk: 50, liveTrading: false },
    advanced: AdvancedSettingsSchema.parse({
      apiKey: "test-secret-api-key",
      apiHost: "127.0.0.1",
      apiPort: 8148,
      submitTimeoutMs: 1_000,
      resultTimeoutMs: 1_000
    }),
    trading: { ...defaultTradingConfig(), ...trading },
    engine: { ...engine, risk: { ...engine.risk, ...risk } }
  };
}

class FakeConfigService {
  constructor(public config: AppConfig) {}

  load(): AppConfig {
    return this.config;
  }

  require(): AppConfig {
    return this.config;
  }

  updateTrading(trading: TradingConfig): AppConfig {
    this.config = { ...this.config, trading };
    return this.config;
  }

  updateEngine(engine: EngineSettings): AppConfig {
    this.config = { ...this.config, engine };
    return this.config;
  }
}

class FakeTickSource implements TickSource {
  readonly listeners = new Map<string, TickListener>();
  unsubscribed = 0;

  async subscribe(symbol: string, listener: TickListener): Promise<TickSubscription> {
    this.listeners.set(symbol, listener);
    return {
      unsubscribe: () => {
        this.listeners.delete(symbol);
        this.unsubscribed += 1;
      }
    };
  }

  emit(raw: RawTick): void {
    this.listeners.get(raw.symbol)?.(raw);
  }
}

class FakeBroker implements TradeBroker {
  readonly submitted: TradeRequest[] = [];
  balance = 100;
  submitError: Error | null = null;
  settle: (request: TradeRequest) => Promise<TradeResult> = () => new Promise<TradeResult>(() => undefined);
  private readonly requests = new Map<string, TradeRequest>();

  async submitTrade(request: TradeRequest): Promise<{ tradeId: string }> {
    if (this.submitError) throw this.submitError;
    this.submitted.push(request);
    const tradeId = `c-${this.submitted.length}`;
    this.requests.set(tradeId, request);
    return { tradeId };
  }

  async waitForResult(tradeId: string): Promise<TradeResult> {
    const request = this.requests.get(tradeId);
    if (!request) throw new Error(`unknown trade ${tradeId}`);
    return await this.settle(request);
  }

  async getBalance(): Promise<number> {
    return this.balance;
  }
}

class MemorySink implements HistorySink {
  readonly ticks: Tick[] = [];
  readonly trades: TradeRecord[] = [];
  readonly unreconciled: UnreconciledTrade[] = [];

  appendTick(tick: Tick): void {
    this.ticks.push(tick);
  }

  appendTrade(record: TradeRecord): void {
    this.trades.push(record);
  }

  appendUnreconciled(entry: UnreconciledTrade): void {
    this.unreconciled.push(entry);
  }

  async readTicks(limit: number): Promise<Tick[]> {
    return this.ticks.slice(-limit);
  }
}

function rawTick(digit: number, i: number, symbol = "R_100"): RawTick {
  return { symbol, quote: 1000 + digit / 100, epoch: EUROPEAN_EPOCH + i };
}

function losing(request: TradeRequest): Promise<TradeResult> {
  return Promise.resolve({ outcome: "loss", pnlDelta: -request.stake, exitDigit: request.digit });
}

const plan: TradePlan = {
  action: "trade",
  contractType: "DIGITDIFF",
  direction: "differs",
  digit: 4,
  stake: 1,
  duration: 1,
  confidence: 80,
  reason: "differs 4 at 80% confidence, stake 1.00"
};

function setup(config: AppConfig = appConfig()) {
  const configService = new FakeConfigService(config);
  const source = new FakeTickSource();
  const broker = new FakeBroker();
  const sink = new MemorySink();
  const controller = new TradingControllerService(
    configService as unknown as ConfigService,
    source,
    broker,
    sink,
    createNullLogger()
  );
  return { configService, source, broker, sink, controller };
}

describe("TradingControllerService", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("arms on start with a fresh session and the broker balance", async () => {
    const { controller, source, broker } = setup();
    broker.balance = 250.5;

    const status = await controller.start();

    expect(status.state).toBe("ARMED");
    expect(status.account).toEqual({ balance: 250.5, realizedPnl: 0, tradesCount: 0, wins: 0, losses: 0, isTrading: true });
    expect(source.listeners.has("R_100")).toBe(true);
    expect((await controller.start()).state).toBe("ARMED");
    expect(status.decisions[0].summary).toBe("Session started on R_100 (balance 250.50 USD)");
  });

  it("trades exactly once against a digit that dominates 60 ticks", async () => {
    vi.useFakeTimers();
    const { controller, source, broker } = setup();
    await controller.start();

    for (let i = 0; i < 60; i += 1) source.emit(rawTick(7, i));
    await vi.advanceTimersByTimeAsync(1);

    expect(broker.submitted).toHaveLength(1);
    expect(broker.submitted[0]).toEqual({
      contractType: "DIGITDIFF",
      digit: 0,
      stake: 10,
      duration: 1,
      symbol: "R_100",
      currency: "USD"
    });

    const status = controller.getStatus();
    expect(status.state).toBe("AWAITING_RESULT");
    expect(status.ticksSeen).toBe(60);
    expect(status.prediction?.predictedDigit).not.toBe(7);
    expect(status.prediction?.confidence).toBe(75.68);
    expect(status.pendingTrade?.tradeId).toBe("c-1");
  });

  it("halts after the third loss when the stop loss is reached", async () => {
    const { controller, source, broker } = setup(
      appConfig({ usePrediction: false, autoStakeSizing: false, selectedNumber: 3, stake: 4, stopLoss: 10, takeProfit: 20 })
    );
    broker.settle = losing;
    await controller.start();

    for (let i = 0; i < 4; i += 1) {
      source.emit(rawTick(3, i));
      await controller.settled();
    }

    expect(broker.submitted.map((r) => r.stake)).toEqual([4, 4, 2]);
    const status = controller.getStatus();
    expect(status.state).toBe("HALTED");
    expect(status.lastErrorKind).toBe("RiskLimitReached");
    expect(status.lastDecision).toBe("stop loss reached (pnl -10.00 <= -10.00)");
    expect(status.account).toEqual({ balance: 90, realizedPnl: -10, tradesCount: 3, wins: 0, losses: 3, isTrading: false });
    expect(status.decisions[0].kind).toBe("HALT");
  });

  it("keeps counting ticks while halted and clears the halt on the next start", async () => {
    const { controller, source, broker } = setup(
      appConfig({ usePrediction: false, autoStakeSizing: false, selectedNumber: 3, stake: 4, stopLoss: 10, takeProfit: 20 })
    );
    broker.settle = losing;
    await controller.start();
    for (let i = 0; i < 3; i += 1) {
      source.emit(rawTick(3, i));
      await controller.settled();
    }
    expect(controller.getStatus().state).toBe("HALTED");

    source.emit(rawTick(3, 3));
    source.emit(rawTick(3, 4));
    await controller.settled();
    expect(broker.submitted).toHaveLength(3);
    expect(controller.getStatus().ticksSeen).toBe(5);

    const status = await controller.start();
    expect(status.state).toBe("ARMED");
    expect(status.lastErrorKind).toBeUndefined();
    expect(status.account).toEqual({ balance: 100, realizedPnl: 0, tradesCount: 0, wins: 0, losses: 0, isTrading: true });

    source.emit(rawTick(3, 5));
    await controller.settled();
    expect(broker.submitted.map((r) => r.stake)).toEqual([4, 4, 2, 4]);
  });

  it("trades on the symbol whose ticks were evaluated when the configured symbol changes", async () => {
    const config = appConfig({ usePrediction: false, autoStakeSizing: false, selectedNumber: 3 });
    const { controller, source, broker, sink, configService } = setup(config);
    broker.settle = losing;
    await controller.start();

    configService.config = { ...config, basic: { ...config.basic, symbol: "R_50" } };
    source.emit(rawTick(3, 0));
    await controller.settled();

    expect(broker.submitted.map((r) => r.symbol)).toEqual(["R_100"]);
    expect(sink.trades[0].symbol).toBe("R_100");
  });

  it("hands out copies of the current prediction", async () => {
    const { controller, source } = setup(appConfig({ usePrediction: false, autoStakeSizing: false, selectedNumber: 3 }));
    await controller.start();
    source.emit(rawTick(5, 0));

    const first = controller.getStatus().prediction;
    expect(first).not.toBeNull();
    if (!first) return;
    const scores = [...first.scores];
    const componentScores = { ...first.componentScores };
    first.scores[0] = -1;
    first.componentScores.frequency = -1;

    expect(controller.getStatus().prediction?.scores).toEqual(scores);
    expect(controller.getStatus().prediction?.componentScores).toEqual(componentScores);
    expect(controller.getAnalysis().prediction?.scores).toEqual(scores);
  });

  it("lets the final stake overshoot the stop loss when headroom is ignored", async () => {
    const { controller, source, broker } = setup(
      appConfig(
        { usePrediction: false, autoStakeSizing: false, selectedNumber: 3, stake: 4, stopLoss: 10, takeProfit: 20 },
        { stopLossHeadroom: "ignore" }
      )
    );
    broker.settle = losing;
    await controller.start();

    for (let i = 0; i < 3; i += 1) {
      source.emit(rawTick(3, i));
      await controller.settled();
    }

    expect(broker.submitted.map((r) => r.stake)).toEqual([4, 4, 4]);
    expect(controller.getStatus().state).toBe("HALTED");
    expect(controller.getStatus().lastDecision).toBe("stop loss reached (pnl -12.00 <= -10.00)");
  });

  it("rejects a second trade while one is outstanding", async () => {
    const { controller, broker, sink } = setup();
    let settle: (result: TradeResult) => void = () => undefined;
    broker.settle = () =>
      new Promise<TradeResult>((resolve) => {
        settle = resolve;
      });
    await controller.start();

    const first = controller.placeTrade(plan);
    await expect(controller.placeTrade(plan)).rejects.toBeInstanceOf(TradeInFlightError);
    expect(broker.submitted).toHaveLength(1);

    await vi.waitFor(() => expect(controller.getStatus().pendingTrade?.tradeId).toBe("c-1"));
    settle({ outcome: "win", pnlDelta: 0.9, exitDigit: 2 });
    const record = await first;

    expect(record).toMatchObject({ tradeId: "c-1", outcome: "win", pnlDelta: 0.9, digitPredicted: 4, digitActual: 2, leadSignal: null });
    expect(sink.trades).toHaveLength(1);
    const status = controller.getStatus();
    expect(status.state).toBe("ARMED");
    expect(status.account.balance).toBe(100.9);
    expect(status.lastDecision).toBe("win on DIGITDIFF 4: +0.90, session +0.90");
  });

  it("logs a failed submission as unreconciled and re-arms", async () => {
    const { controller, broker, sink } = setup();
    broker.submitError = new Error("InsufficientBalance: not enough funds");
    await controller.start();

    await expect(controller.placeTrade(plan)).resolves.toBeNull();

    const status = controller.getStatus();
    expect(status.state).toBe("ARMED");
    expect(status.account.balance).toBe(100);
    expect(status.account.tradesCount).toBe(0);
    expect(status.lastErrorKind).toBe("BrokerSubmissionFailed");
    expect(status.unreconciled[0]).toMatchObject({ errorKind: "BrokerSubmissionFailed", error: "InsufficientBalance: not enough funds", digit: 4 });
    expect(sink.unreconciled).toHaveLength(1);
  });

  it("logs a submission timeout as unreconciled without touching the account", async () => {
    vi.useFakeTimers();
    const { controller, broker, sink } = setup();
    broker.submitTrade = () => new Promise<{ tradeId: string }>(() => undefined);
    await controller.start();

    const outcome = controller.placeTrade(plan);
    await vi.advanceTimersByTimeAsync(1_000);

    await expect(outcome).resolves.toBeNull();
    const status = controller.getStatus();
    expect(status.state).toBe("ARMED");
    expect(status.pendingTrade).toBeNull();
    expect(status.lastErrorKind).toBe("BrokerSubmissionFailed");
    expect(status.account).toEqual({ balance: 100, realizedPnl: 0, tradesCount: 0, wins: 0, losses: 0, isTrading: true });
    expect(status.unreconciled[0]).toMatchObject({
      errorKind: "BrokerSubmissionFailed",
      error: "Trade submission timed out after 1000ms",
      digit: 4
    });
    expect(status.unreconciled[0].tradeId).toBeUndefined();
    expect(sink.unreconciled).toHaveLength(1);
  });

  it("logs a result timeout as unreconciled and re-arms", async () => {
    vi.useFakeTimers();
    const { controller, sink } = setup();
    await controller.start();

    const outcome = controller.placeTrade(plan);
    await vi.advanceTimersByTimeAsync(1_000);

    await expect(outcome).resolves.toBeNull();
    const status = controller.getStatus();
    expect(status.state).toBe("ARMED");
    expect(status.pendingTrade).toBeNull();
    expect(status.unreconciled[0]).toMatchObject({
      tradeId: "c-1",
      errorKind: "BrokerResultTimeout",
      error: "No result for trade c-1 within 1000ms"
    });
    expect(sink.unreconciled[0].tradeId).toBe("c-1");
  });

  it("queues a stop until the outstanding trade resolves", async () => {
    const { controller, broker, source } = setup();
    let settle: (result: TradeResult) => void = () => undefined;
    broker.settle = () =>
      new Promise<TradeResult>((resolve) => {
        settle = resolve;
      });
    await controller.start();

    const trade = controller.placeTrade(plan);
    expect(controller.stop()).toEqual({ state: "AWAITING_RESULT", queued: true });
    expect(source.listeners.has("R_100")).toBe(true);

    await vi.waitFor(() => expect(controller.getStatus().pendingTrade?.tradeId).toBe("c-1"));
    settle({ outcome: "loss", pnlDelta: -1, exitDigit: 4 });
    await trade;

    const status = controller.getStatus();
    expect(status.state).toBe("IDLE");
    expect(status.stopRequested).toBe(false);
    expect(status.account.realizedPnl).toBe(-1);
    expect(source.unsubscribed).toBe(1);
  });

  it("lets a start cancel a queued stop", async () => {
    const { controller, broker, source } = setup();
    let settle: (result: TradeResult) => void = () => undefined;
    broker.settle = () =>
      new Promise<TradeResult>((resolve) => {
        settle = resolve;
      });
    await controller.start();

    const trade = controller.placeTrade(plan);
    controller.stop();
    const restarted = await controller.start();
    expect(restarted.state).toBe("AWAITING_RESULT");
    expect(restarted.stopRequested).toBe(false);
    expect(restarted.decisions[0].summary).toBe("Queued stop cancelled by start");

    await vi.waitFor(() => expect(controller.getStatus().pendingTrade?.tradeId).toBe("c-1"));
    settle({ outcome: "win", pnlDelta: 0.9, exitDigit: 2 });
    await trade;

    expect(controller.getStatus().state).toBe("ARMED");
    expect(source.listeners.has("R_100")).toBe(true);
    expect(source.unsubscribed).toBe(0);
  });

  it("cancels a start when stop arrives while the balance is loading", async () => {
    const { controller, broker, source } = setup(appConfig({ usePrediction: false, autoStakeSizing: false, selectedNumber: 3 }));
    let release: (balance: number) => void = () => undefined;
    broker.getBalance = () =>
      new Promise<number>((resolve) => {
        release = resolve;
      });

    const starting = controller.start();
    expect(controller.stop()).toEqual({ state: "IDLE", queued: false });
    release(100);
    const status = await starting;

    expect(status.state).toBe("IDLE");
    expect(status.account.isTrading).toBe(false);
    expect(status.decisions[0].summary).toBe("Start cancelled by stop");
    expect(source.listeners.size).toBe(0);
    source.emit(rawTick(3, 0));
    expect(broker.submitted).toHaveLength(0);
  });

  it("cancels a start when stop arrives while subscribing", async () => {
    const { controller, broker, source } = setup(appConfig({ usePrediction: false, autoStakeSizing: false, selectedNumber: 3 }));
    const subscribe = source.subscribe.bind(source);
    let subscribing = false;
    let release: () => void = () => undefined;
    source.subscribe = async (symbol: string, listener: TickListener) => {
      subscribing = true;
      await new Promise<void>((resolve) => {
        release = resolve;
      });
      return await subscribe(symbol, listener);
    };

    const starting = controller.start();
    await vi.waitFor(() => expect(subscribing).toBe(true));
    controller.stop();
    release();
    const status = await starting;

    expect(status.state).toBe("IDLE");
    expect(source.unsubscribed).toBe(1);
    expect(source.listeners.size).toBe(0);
    expect(broker.submitted).toHaveLength(0);
  });

  it("stops immediately when nothing is outstanding", async () => {
    const { controller, source } = setup();
    await controller.start();

    expect(controller.stop()).toEqual({ state: "IDLE", queued: false });
    expect(source.listeners.size).toBe(0);
    expect(controller.getStatus().account.isTrading).toBe(false);
  });

  it("keeps trading when tick persistence fails", async () => {
    const { controller, source, broker, sink } = setup(appConfig({ usePrediction: false, autoStakeSizing: false, selectedNumber: 3 }));
    sink.appendTick = () => {
      throw new Error("disk full");
    };
    await controller.start();

    source.emit(rawTick(3, 0));

    expect(broker.submitted).toHaveLength(1);
    expect(controller.getStatus().ticksSeen).toBe(1);
  });

  it("validates and persists trading config updates", () => {
    const { controller, configService } = setup();

    expect(() => controller.configure({ ...defaultTradingConfig(), stake: 0.2 })).toThrow(BadRequestException);
    expect(() => controller.configure({ ...defaultTradingConfig(), stake: 0.2 })).toThrow("Stake 0.20 is below the minimum 0.35");

    const trading = controller.configure({ ...defaultTradingConfig(), stake: 2, strategy: "matches" });
    expect(trading.stake).toBe(2);
    expect(configService.config.trading.strategy).toBe("matches");
    expect(controller.getDecisions()[0].summary).toBe("Trading config updated (matches, threshold 70%, stake 2.00)");
  });

  it("reconfigures frequency windows from engine updates", () => {
    const { controller } = setup();
    const engine = defaultEngineSettings();

    controller.updateEngine({ ...engine, ensemble: { ...engine.ensemble, windowSizes: [25, 50], primaryWindow: 50 } });

    expect(controller.getAnalysis().windows.map((w) => w.windowSize)).toEqual([25, 50]);
  });

  it("warms statistics up from stored ticks of the configured symbol", async () => {
    const { controller, sink } = setup();
    sink.ticks.push(
      { symbol: "R_100", price: 1000.01, digit: 1, epoch: EUROPEAN_EPOCH, timestamp: "2026-01-01T10:00:00.000Z" },
      { symbol: "R_50", price: 500.02, digit: 2, epoch: EUROPEAN_EPOCH + 1, timestamp: "2026-01-01T10:00:01.000Z" },
      { symbol: "R_100", price: 1000.03, digit: 3, epoch: EUROPEAN_EPOCH + 2, timestamp: "2026-01-01T10:00:02.000Z" }
    );

    await controller.onModuleInit();

    const analysis = controller.getAnalysis();
    expect(analysis.ticksSeen).toBe(2);
    expect(analysis.lastTick?.digit).toBe(3);
    expect(analysis.signals.frequency).toEqual({ multiplier: 1, led: 0, wins: 0, accuracy: null });
  });
});
