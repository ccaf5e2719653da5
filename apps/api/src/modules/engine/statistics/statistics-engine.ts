import type { FrequencySnapshot, StreakMetrics, Tick } from "@digitbot/shared";

import { FrequencyWindow } from "./frequency-window";
import { RingBuffer } from "./ring-buffer";

export type StatisticsEngineOptions = {
  windowSizes: readonly number[];
  historySize: number;
};

export class StatisticsEngine {
  private windows = new Map<number, FrequencyWindow>();
  private readonly history: RingBuffer<Tick>;
  private readonly lastSeenAt = new Array<number | null>(10).fill(null);
  private seen = 0;
  private repeatLength = 0;
  private alternationLength = 0;
  private prevDigit: number | null = null;
  private prevPrevDigit: number | null = null;

  constructor(options: StatisticsEngineOptions) {
    const largestWindow = Math.max(...options.windowSizes);
    this.history = new RingBuffer<Tick>(Math.max(options.historySize, largestWindow));
    this.windows = this.buildWindows(options.windowSizes);
  }

  get ticksSeen(): number {
    return this.seen;
  }

  get windowSizes(): number[] {
    return [...this.windows.keys()];
  }

  get lastTick(): Tick | undefined {
    return this.history.last();
  }

  ingest(tick: Tick): void {
    const digit = tick.digit;
    this.history.push(tick);
    for (const window of this.windows.values()) {
      window.push(digit);
    }

    this.repeatLength = digit === this.prevDigit ? this.repeatLength + 1 : 1;
    if (this.prevDigit === null || digit === this.prevDigit) {
      this.alternationLength = 1;
    } else if (digit === this.prevPrevDigit && this.alternationLength >= 2) {
      this.alternationLength += 1;
    } else {
      this.alternationLength = 2;
    }

    this.lastSeenAt[digit] = this.seen;
    this.seen += 1;
    this.prevPrevDigit = this.prevDigit;
    this.prevDigit = digit;
  }

  warmUp(ticks: readonly Tick[]): void {
    for (const tick of ticks) {
      this.ingest(tick);
    }
  }

  snapshot(windowSize: number): FrequencySnapshot {
    const window = this.windows.get(windowSize);
    if (!window) {
      throw new Error(`No frequency window of size ${windowSize} (configured: ${this.windowSizes.join(", ")})`);
    }
    return window.snapshot();
  }

  snapshots(): FrequencySnapshot[] {
    return [...this.windows.values()].map((w) => w.snapshot());
  }

  streaks(): StreakMetrics {
    const latest = this.seen - 1;
    const alternationDigits =
      this.alternationLength >= 2 && this.prevPrevDigit !== null && this.prevDigit !== null
        ? [this.prevPrevDigit, this.prevDigit]
        : this.prevDigit === null
          ? []
          : [this.prevDigit];

    return {
      ticksSinceSeen: this.lastSeenAt.map((at) => (at === null ? null : latest - at)),
      repeat: { digit: this.prevDigit, length: this.repeatLength },
      alternation: { digits: alternationDigits, length: this.alternationLength }
    };
  }

  recentTicks(n?: number): Tick[] {
    return this.history.tail(n);
  }

  recentDigits(n?: number): number[] {
    return this.history.tail(n).map((t) => t.digit);
  }

  recentPrices(n?: number): number[] {
    return this.history.tail(n).map((t) => t.price);
  }

  /** Swaps the window set, replaying retained history into the new windows. */
  reconfigure(windowSizes: readonly number[]): void {
    const next = this.buildWindows(windowSizes);
    const digits = this.recentDigits();
    for (const window of next.values()) {
      for (const digit of digits) window.push(digit);
    }
    this.windows = next;
  }

  private buildWindows(windowSizes: readonly number[]): Map<number, FrequencyWindow> {
    if (windowSizes.length === 0) {
      throw new Error("At least one frequency window is required");
    }
    const sorted = [...new Set(windowSizes)].sort((a, b) => a - b);
    return new Map(sorted.map((size) => [size, new FrequencyWindow(size)]));
  }
}
