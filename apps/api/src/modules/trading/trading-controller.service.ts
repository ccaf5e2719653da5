import crypto from "node:crypto";

import { BadRequestException, Inject, Injectable, type OnModuleDestroy, type OnModuleInit } from "@nestjs/common";
import {
  ENGINE_STATE_VERSION,
  EngineSettingsSchema,
  TradingConfigSchema,
  contractTypeFor,
  defaultAccountState,
  defaultEngineSettings,
  type AccountState,
  type AppConfig,
  type ControllerState,
  type Decision,
  type EngineErrorKind,
  type EngineSettings,
  type EngineStatus,
  type FrequencySnapshot,
  type PendingTrade,
  type Prediction,
  type SignalName,
  type StreakMetrics,
  type Tick,
  type TradeRecord,
  type TradingConfig,
  type UnreconciledTrade
} from "@digitbot/shared";

import { ConfigService } from "../config/config.service";
import {
  BrokerSubmissionFailedError,
  BrokerResultTimeoutError,
  EngineError,
  TradeInFlightError,
  errorMessage,
  withTimeout
} from "../engine/engine-errors";
import { PredictionEnsemble, type SignalStats } from "../engine/prediction/prediction-ensemble";
import { RiskManager, limitBreach, type SkipDecision, type TradePlan } from "../engine/risk/risk-manager";
import { StatisticsEngine } from "../engine/statistics/statistics-engine";
import { TickIngestor, type RawTick } from "../engine/ticks/tick-ingestor";
import { APP_LOGGER, type AppLogger } from "../logging/pino-logger";
import { getContractPolicyBlockReason } from "../policy/contract-policy";
import {
  HISTORY_SINK,
  TICK_SOURCE,
  TRADE_BROKER,
  type HistorySink,
  type TickSource,
  type TickSubscription,
  type TradeBroker,
  type TradeRequest,
  type TradeResult,
  type TradeSubmission
} from "./collaborators";

const MAX_DECISIONS = 200;
const MAX_TRADES = 500;
const MAX_UNRECONCILED = 100;
const STATUS_TRADES = 20;
const DEFAULT_HISTORY_SIZE = 1000;

type TradeContext = {
  config: AppConfig;
  symbol: string;
  leadSignal: SignalName | null;
};

type Session = {
  state: ControllerState;
  stopRequested: boolean;
  sessionStartedAt?: string;
  account: AccountState;
  prediction: Prediction | null;
  lastDecision?: string;
  lastErrorKind?: EngineErrorKind;
  pendingTrade: PendingTrade | null;
};

export type EngineAnalysis = {
  symbol: string | null;
  ticksSeen: number;
  lastTick: Tick | null;
  windows: FrequencySnapshot[];
  streaks: StreakMetrics;
  prediction: Prediction | null;
  signals: Record<string, SignalStats>;
  recentHitRate: number | null;
};

export type StopResult = {
  state: ControllerState;
  queued: boolean;
};

function roundMoney(value: number): number {
  return Math.round(value * 100) / 100;
}

function signedMoney(value: number): string {
  return `${value >= 0 ? "+" : ""}${value.toFixed(2)}`;
}

function copyPrediction(prediction: Prediction | null): Prediction | null {
  if (!prediction) return null;
  return { ...prediction, scores: [...prediction.scores], componentScores: { ...prediction.componentScores } };
}

function sameWindows(current: readonly number[], wanted: readonly number[]): boolean {
  const sorted = [...new Set(wanted)].sort((a, b) => a - b);
  return sorted.length === current.length && sorted.every((size, i) => size === current[i]);
}

/**
 * Owns the session aggregate (account, prediction, pending trade) and drives ticks through
 * statistics, prediction and risk into at most one outstanding trade.
 */
@Injectable()
export class TradingControllerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger: AppLogger;
  private readonly ensemble = new PredictionEnsemble();
  private readonly risk = new RiskManager();
  private statistics: StatisticsEngine;
  private ingestor: TickIngestor | null = null;
  private subscription: TickSubscription | null = null;
  private starting: Promise<EngineStatus> | null = null;
  private cancelStart = false;
  private inFlight: Promise<TradeRecord | null> | null = null;

  private session: Session = {
    state: "IDLE",
    stopRequested: false,
    account: defaultAccountState(),
    prediction: null,
    pendingTrade: null
  };
  private updatedAt = new Date().toISOString();
  private lastSkipReason: string | null = null;
  private decisions: Decision[] = [];
  private trades: TradeRecord[] = [];
  private unreconciled: UnreconciledTrade[] = [];

  constructor(
    private readonly configService: ConfigService,
    @Inject(TICK_SOURCE) private readonly tickSource: TickSource,
    @Inject(TRADE_BROKER) private readonly broker: TradeBroker,
    @Inject(HISTORY_SINK) private readonly history: HistorySink,
    @Inject(APP_LOGGER) logger: AppLogger
  ) {
    this.logger = logger.child({ module: "trading" });
    this.statistics = this.createStatistics(this.configService.load());
  }

  async onModuleInit(): Promise<void> {
    const config = this.configService.load();
    if (!config) return;

    try {
      const stored = await this.history.readTicks(config.advanced.tickHistorySize);
      const ticks = stored.filter((tick) => tick.symbol === config.basic.symbol);
      this.statistics.warmUp(ticks);
      this.logger.info({ msg: "Statistics warmed up from history", symbol: config.basic.symbol, ticks: ticks.length });
    } catch (err) {
      this.logger.warn({ msg: "Tick history warm-up failed", err: errorMessage(err) });
    }
  }

  async onModuleDestroy(): Promise<void> {
    this.unsubscribe();
    await this.settled();
  }

  async start(): Promise<EngineStatus> {
    if (this.session.state === "AWAITING_RESULT" && this.session.stopRequested) {
      this.session.stopRequested = false;
      this.addDecision("ENGINE", "Queued stop cancelled by start");
    }
    if (this.session.state === "ARMED" || this.session.state === "AWAITING_RESULT") {
      return this.getStatus();
    }
    if (!this.starting) {
      this.cancelStart = false;
      this.starting = this.startSession().finally(() => {
        this.starting = null;
        this.cancelStart = false;
      });
    }
    return await this.starting;
  }

  /** Stops immediately, or once the outstanding trade resolves. */
  stop(): StopResult {
    if (this.session.pendingTrade) {
      if (!this.session.stopRequested) {
        this.session.stopRequested = true;
        this.addDecision("ENGINE", `Stop queued until trade ${this.session.pendingTrade.id} resolves`);
      }
      return { state: this.session.state, queued: true };
    }

    if (this.starting) {
      if (!this.cancelStart) {
        this.cancelStart = true;
        this.addDecision("ENGINE", "Stop requested while the session is starting");
      }
      return { state: "IDLE", queued: false };
    }

    if (this.session.state !== "IDLE") {
      this.finishStop("Stop requested");
    }
    return { state: this.session.state, queued: false };
  }

  configure(input: TradingConfig): TradingConfig {
    const trading = TradingConfigSchema.parse(input);
    const current = this.configService.require();

    const blockReason = getContractPolicyBlockReason({
      symbol: current.basic.symbol,
      contractType: contractTypeFor(trading.strategy),
      digit: trading.selectedNumber,
      duration: trading.duration,
      stake: trading.stake,
      minStake: current.engine.risk.minStake
    });
    if (blockReason) {
      throw new BadRequestException(blockReason);
    }

    const next = this.configService.updateTrading(trading);
    this.addDecision(
      "CONFIG",
      `Trading config updated (${next.trading.strategy}, threshold ${next.trading.confidenceThreshold}%, stake ${next.trading.stake.toFixed(2)})`
    );
    return next.trading;
  }

  updateEngine(input: EngineSettings): EngineSettings {
    const engine = EngineSettingsSchema.parse(input);
    const next = this.configService.updateEngine(engine);
    this.syncWindows(next.engine);
    this.addDecision("CONFIG", `Engine settings updated (windows ${next.engine.ensemble.windowSizes.join("/")})`);
    return next.engine;
  }

  handleTick(raw: RawTick): void {
    if (!this.ingestor) {
      this.logger.debug({ msg: "Tick received before a session was started", symbol: raw.symbol });
      return;
    }

    const normalized = this.ingestor.normalize(raw);
    if (!normalized.ok) {
      this.logger.debug({ msg: "Tick ignored", reason: normalized.reason });
      return;
    }

    const tick = normalized.tick;
    this.statistics.ingest(tick);

    const config = this.configService.load();
    if (config?.advanced.persistTicks ?? true) {
      this.persist("tick", () => this.history.appendTick(tick));
    }
    if (!config || this.session.state !== "ARMED") return;

    this.evaluate(tick, config);
  }

  /** Submits a trade and tracks it to its result. At most one trade is outstanding. */
  async placeTrade(plan: TradePlan): Promise<TradeRecord | null> {
    if (this.session.pendingTrade) {
      throw new TradeInFlightError(this.session.pendingTrade.id);
    }
    const config = this.configService.require();

    const pending: PendingTrade = {
      id: crypto.randomUUID(),
      contractType: plan.contractType,
      digit: plan.digit,
      stake: plan.stake,
      duration: plan.duration,
      confidence: plan.confidence,
      submittedAt: new Date().toISOString()
    };
    const context: TradeContext = {
      config,
      symbol: this.ingestor?.symbol ?? config.basic.symbol,
      leadSignal: config.trading.usePrediction ? (this.session.prediction?.leadSignal ?? null) : null
    };

    this.session.pendingTrade = pending;
    this.session.state = "AWAITING_RESULT";
    this.session.lastDecision = plan.reason;
    this.lastSkipReason = null;
    this.addDecision("TRADE", plan.reason, undefined, { digit: plan.digit, stake: plan.stake, contractType: plan.contractType });
    this.logger.info({ msg: "Trade planned", id: pending.id, contractType: plan.contractType, barrier: plan.digit, stake: plan.stake });

    const lifecycle = this.runLifecycle(pending, context);
    this.inFlight = lifecycle;
    return await lifecycle;
  }

  /** Resolves once the outstanding trade lifecycle, if any, has finished. */
  async settled(): Promise<void> {
    while (this.inFlight) {
      await this.inFlight;
    }
  }

  getStatus(): EngineStatus {
    const config = this.configService.load();
    return {
      version: ENGINE_STATE_VERSION,
      ...(this.session.sessionStartedAt ? { sessionStartedAt: this.session.sessionStartedAt } : {}),
      updatedAt: this.updatedAt,
      state: this.session.state,
      stopRequested: this.session.stopRequested,
      symbol: this.ingestor?.symbol ?? config?.basic.symbol ?? "R_100",
      live: this.broker.isLive?.() ?? false,
      account: { ...this.session.account },
      prediction: copyPrediction(this.session.prediction),
      ...(this.session.lastDecision ? { lastDecision: this.session.lastDecision } : {}),
      ...(this.session.lastErrorKind ? { lastErrorKind: this.session.lastErrorKind } : {}),
      pendingTrade: this.session.pendingTrade ? { ...this.session.pendingTrade } : null,
      ticksSeen: this.statistics.ticksSeen,
      decisions: [...this.decisions],
      recentTrades: this.trades.slice(0, STATUS_TRADES),
      unreconciled: [...this.unreconciled]
    };
  }

  getDecisions(): Decision[] {
    return [...this.decisions];
  }

  getTrades(limit = 100): TradeRecord[] {
    return this.trades.slice(0, Math.max(0, limit));
  }

  getAnalysis(): EngineAnalysis {
    const lastTick = this.statistics.lastTick;
    return {
      symbol: this.ingestor?.symbol ?? null,
      ticksSeen: this.statistics.ticksSeen,
      lastTick: lastTick ?? null,
      windows: this.statistics.snapshots(),
      streaks: this.statistics.streaks(),
      prediction: copyPrediction(this.session.prediction),
      signals: this.ensemble.signalStats(),
      recentHitRate: this.ensemble.recentHitRate()
    };
  }

  resetCalibration(): Record<string, SignalStats> {
    this.ensemble.resetCalibration();
    this.addDecision("ENGINE", "Calibration reset");
    return this.ensemble.signalStats();
  }

  private async startSession(): Promise<EngineStatus> {
    const config = this.configService.require();
    const { symbol, currency } = config.basic;

    const blockReason = getContractPolicyBlockReason({
      symbol,
      contractType: contractTypeFor(config.trading.strategy),
      digit: config.trading.selectedNumber,
      duration: config.trading.duration
    });
    if (blockReason) {
      throw new BadRequestException(blockReason);
    }

    const balance = await this.broker.getBalance();
    if (this.cancelStart) {
      return this.abandonStart();
    }

    if (this.ingestor?.symbol !== symbol) {
      this.unsubscribe();
      if (this.statistics.lastTick && this.statistics.lastTick.symbol !== symbol) {
        this.statistics = this.createStatistics(config);
      }
      this.ingestor = new TickIngestor({ symbol, pipDecimals: config.advanced.pipDecimals });
    }
    if (!this.subscription) {
      this.subscription = await this.tickSource.subscribe(symbol, (raw) => this.handleTick(raw));
      if (this.cancelStart) {
        return this.abandonStart();
      }
    }

    this.session = {
      state: "ARMED",
      stopRequested: false,
      sessionStartedAt: new Date().toISOString(),
      account: { ...defaultAccountState(), balance: roundMoney(balance), isTrading: true },
      prediction: this.session.prediction,
      pendingTrade: null
    };
    this.lastSkipReason = null;
    this.addDecision("ENGINE", `Session started on ${symbol} (balance ${balance.toFixed(2)} ${currency})`);
    this.logger.info({ msg: "Trading session started", symbol, balance, live: this.broker.isLive?.() ?? false });
    return this.getStatus();
  }

  private abandonStart(): EngineStatus {
    this.unsubscribe();
    this.session = { ...this.session, state: "IDLE", stopRequested: false, account: { ...this.session.account, isTrading: false } };
    this.session.lastDecision = "Start cancelled by stop";
    this.addDecision("ENGINE", "Start cancelled by stop");
    this.logger.info({ msg: "Trading session start cancelled" });
    return this.getStatus();
  }

  private evaluate(tick: Tick, config: AppConfig): void {
    this.syncWindows(config.engine);

    const prediction = this.ensemble.predict(this.statistics, {
      direction: config.trading.strategy,
      settings: config.engine.ensemble,
      now: new Date(tick.timestamp)
    });
    this.session.prediction = prediction;

    const decision = this.risk.evaluate({
      prediction,
      account: this.session.account,
      config: config.trading,
      risk: config.engine.risk,
      tickDigit: tick.digit
    });

    if (decision.action === "skip") {
      if (decision.kind === "RiskLimitReached") {
        this.halt(decision.reason);
      } else {
        this.noteSkip(decision);
      }
      return;
    }

    void this.placeTrade(decision).catch((err: unknown) => {
      this.logger.error({ msg: "Trade could not be placed", err: errorMessage(err) });
    });
  }

  private async runLifecycle(pending: PendingTrade, context: TradeContext): Promise<TradeRecord | null> {
    try {
      const settled = await this.settleWithBroker(pending, context);
      if (!settled) return null;
      return this.applyResult({ ...pending, tradeId: settled.tradeId }, settled.result, context);
    } finally {
      this.session.pendingTrade = null;
      this.inFlight = null;
      if (this.session.stopRequested) {
        this.finishStop("Queued stop completed");
      } else if (this.session.state === "AWAITING_RESULT") {
        this.session.state = "ARMED";
        this.touch();
      }
    }
  }

  private async settleWithBroker(pending: PendingTrade, { config, symbol }: TradeContext): Promise<{ tradeId: string; result: TradeResult } | null> {
    const request: TradeRequest = {
      contractType: pending.contractType,
      digit: pending.digit,
      stake: pending.stake,
      duration: pending.duration,
      symbol,
      currency: config.basic.currency
    };

    let tradeId: string | undefined;
    try {
      tradeId = (await this.submit(request, config.advanced.submitTimeoutMs)).tradeId;
      if (this.session.pendingTrade?.id === pending.id) {
        this.session.pendingTrade = { ...this.session.pendingTrade, tradeId };
      }
      const result = await this.awaitResult(tradeId, config.advanced.resultTimeoutMs);
      return { tradeId, result };
    } catch (err) {
      this.recordFailure(tradeId ? { ...pending, tradeId } : pending, err);
      return null;
    }
  }

  private async submit(request: TradeRequest, timeoutMs: number): Promise<TradeSubmission> {
    try {
      return await withTimeout(
        this.broker.submitTrade(request),
        timeoutMs,
        () => new BrokerSubmissionFailedError(`Trade submission timed out after ${timeoutMs}ms`),
        {
          onLateResult: (submission) =>
            this.logger.warn({ msg: "Submission confirmed after timeout, left unreconciled", tradeId: submission.tradeId }),
          onLateRejection: (err) => this.logger.warn({ msg: "Submission failed after timeout", err: errorMessage(err) })
        }
      );
    } catch (err) {
      if (err instanceof EngineError) throw err;
      throw new BrokerSubmissionFailedError(errorMessage(err));
    }
  }

  private async awaitResult(tradeId: string, timeoutMs: number): Promise<TradeResult> {
    try {
      return await withTimeout(this.broker.waitForResult(tradeId), timeoutMs, () => new BrokerResultTimeoutError(tradeId, timeoutMs), {
        onLateResult: (result) =>
          this.logger.warn({ msg: "Late trade result ignored", tradeId, outcome: result.outcome, pnlDelta: result.pnlDelta }),
        onLateRejection: (err) => this.logger.warn({ msg: "Trade result failed after timeout", tradeId, err: errorMessage(err) })
      });
    } catch (err) {
      if (err instanceof EngineError) throw err;
      throw new EngineError("BrokerResultTimeout", `Result for trade ${tradeId} unavailable: ${errorMessage(err)}`);
    }
  }

  private applyResult(pending: PendingTrade & { tradeId: string }, result: TradeResult, { config, symbol, leadSignal }: TradeContext): TradeRecord {
    const pnlDelta = roundMoney(result.pnlDelta);
    const won = result.outcome === "win";
    const account = this.session.account;
    this.session.account = {
      ...account,
      balance: roundMoney(account.balance + pnlDelta),
      realizedPnl: roundMoney(account.realizedPnl + pnlDelta),
      tradesCount: account.tradesCount + 1,
      wins: account.wins + (won ? 1 : 0),
      losses: account.losses + (won ? 0 : 1)
    };

    const record: TradeRecord = {
      id: pending.id,
      tradeId: pending.tradeId,
      symbol,
      contractType: pending.contractType,
      digitPredicted: pending.digit,
      ...(result.exitDigit === undefined ? {} : { digitActual: result.exitDigit }),
      stake: pending.stake,
      outcome: result.outcome,
      pnlDelta,
      confidence: pending.confidence,
      leadSignal,
      timestamp: new Date().toISOString()
    };
    this.trades = [record, ...this.trades].slice(0, MAX_TRADES);
    this.persist("trade", () => this.history.appendTrade(record));

    const latest = this.configService.load() ?? config;
    this.ensemble.calibrate(record, latest.engine.ensemble);

    const summary = `${result.outcome} on ${pending.contractType} ${pending.digit}: ${signedMoney(pnlDelta)}, session ${signedMoney(this.session.account.realizedPnl)}`;
    this.session.lastDecision = summary;
    this.session.lastErrorKind = undefined;
    this.addDecision("RESULT", summary, undefined, { tradeId: pending.tradeId, exitDigit: result.exitDigit ?? null });
    this.logger.info({ msg: "Trade settled", tradeId: pending.tradeId, outcome: result.outcome, pnlDelta, realizedPnl: this.session.account.realizedPnl });

    const breach = limitBreach(this.session.account, latest.trading);
    if (breach) {
      this.halt(breach.reason);
    }
    return record;
  }

  private recordFailure(pending: PendingTrade, err: unknown): void {
    const kind: EngineErrorKind = err instanceof EngineError ? err.kind : "BrokerSubmissionFailed";
    const message = errorMessage(err) || kind;
    const entry: UnreconciledTrade = {
      ...pending,
      errorKind: kind,
      error: message,
      loggedAt: new Date().toISOString()
    };

    this.unreconciled = [entry, ...this.unreconciled].slice(0, MAX_UNRECONCILED);
    this.persist("unreconciled trade", () => this.history.appendUnreconciled(entry));
    this.session.lastErrorKind = kind;
    this.session.lastDecision = `${kind}: ${message}`;
    this.addDecision("ERROR", `${kind}: ${message}`, kind, { id: pending.id, tradeId: pending.tradeId ?? null });
    this.logger.error({ msg: "Trade left unreconciled", id: pending.id, tradeId: pending.tradeId, kind, err: message });
  }

  private halt(reason: string): void {
    this.session.state = "HALTED";
    this.session.account = { ...this.session.account, isTrading: false };
    this.session.lastDecision = reason;
    this.session.lastErrorKind = "RiskLimitReached";
    this.addDecision("HALT", reason, "RiskLimitReached");
    this.logger.warn({ msg: "Trading halted", reason, realizedPnl: this.session.account.realizedPnl });
  }

  private finishStop(summary: string): void {
    this.unsubscribe();
    this.session.state = "IDLE";
    this.session.stopRequested = false;
    this.session.account = { ...this.session.account, isTrading: false };
    this.session.lastDecision = summary;
    this.addDecision("ENGINE", summary);
    this.logger.info({ msg: "Trading stopped", realizedPnl: this.session.account.realizedPnl });
  }

  private noteSkip(decision: SkipDecision): void {
    this.session.lastDecision = decision.reason;
    this.session.lastErrorKind = decision.kind;
    this.touch();
    if (decision.reason === this.lastSkipReason) return;
    this.lastSkipReason = decision.reason;
    this.addDecision("SKIP", decision.reason, decision.kind);
  }

  private addDecision(kind: Decision["kind"], summary: string, errorKind?: EngineErrorKind, details?: Record<string, unknown>): void {
    const decision: Decision = {
      id: crypto.randomUUID(),
      ts: new Date().toISOString(),
      kind,
      summary,
      ...(errorKind ? { errorKind } : {}),
      ...(details ? { details } : {})
    };
    this.decisions = [decision, ...this.decisions].slice(0, MAX_DECISIONS);
    this.touch();
  }

  private touch(): void {
    this.updatedAt = new Date().toISOString();
  }

  private syncWindows(engine: EngineSettings): void {
    if (sameWindows(this.statistics.windowSizes, engine.ensemble.windowSizes)) return;
    this.statistics.reconfigure(engine.ensemble.windowSizes);
    this.logger.info({ msg: "Frequency windows reconfigured", windowSizes: this.statistics.windowSizes });
  }

  private createStatistics(config: AppConfig | null): StatisticsEngine {
    const engine = config?.engine ?? defaultEngineSettings();
    return new StatisticsEngine({
      windowSizes: engine.ensemble.windowSizes,
      historySize: config?.advanced.tickHistorySize ?? DEFAULT_HISTORY_SIZE
    });
  }

  private persist(what: string, write: () => void): void {
    try {
      write();
    } catch (err) {
      this.logger.warn({ msg: `Failed to persist ${what}`, err: errorMessage(err) });
    }
  }

  private unsubscribe(): void {
    this.subscription?.unsubscribe();
    this.subscription = null;
  }
}
