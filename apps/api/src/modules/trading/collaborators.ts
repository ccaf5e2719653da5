import type { ContractType, Tick, TradeOutcome, TradeRecord, UnreconciledTrade } from "@digitbot/shared";

import type { RawTick } from "../engine/ticks/tick-ingestor";

export const TICK_SOURCE = Symbol("TICK_SOURCE");
export const TRADE_BROKER = Symbol("TRADE_BROKER");
export const HISTORY_SINK = Symbol("HISTORY_SINK");

export type TickListener = (tick: RawTick) => void;

export type TickSubscription = {
  unsubscribe(): void;
};

export type TickSource = {
  subscribe(symbol: string, listener: TickListener): Promise<TickSubscription>;
};

export type TradeRequest = {
  contractType: ContractType;
  digit: number;
  stake: number;
  /** Contract length in ticks. */
  duration: number;
  symbol: string;
  currency: string;
};

export type TradeSubmission = {
  tradeId: string;
};

export type TradeResult = {
  outcome: TradeOutcome;
  /** Realized profit (positive) or lost stake (negative). */
  pnlDelta: number;
  exitDigit?: number;
};

export type TradeBroker = {
  submitTrade(request: TradeRequest): Promise<TradeSubmission>;
  waitForResult(tradeId: string): Promise<TradeResult>;
  getBalance(): Promise<number>;
  /** Whether the next submission goes to a real broker account rather than the simulator. */
  isLive?(): boolean;
};

/** Append-only persistence. Implementations never throw into the caller. */
export type HistorySink = {
  appendTick(tick: Tick): void;
  appendTrade(record: TradeRecord): void;
  appendUnreconciled(entry: UnreconciledTrade): void;
  readTicks(limit: number): Promise<Tick[]>;
};
