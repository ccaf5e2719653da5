import type { FrequencySnapshot } from "@digitbot/shared";

import { RingBuffer } from "./ring-buffer";

function round(value: number, decimals: number): number {
  const pow = 10 ** decimals;
  return Math.round(value * pow) / pow;
}

/**
 * Digit counts over the last `windowSize` digits.
 * Invariant: sum(counts) === total === min(windowSize, digits seen).
 */
export class FrequencyWindow {
  private readonly digits: RingBuffer<number>;
  private readonly counts = new Array<number>(10).fill(0);

  constructor(readonly windowSize: number) {
    this.digits = new RingBuffer<number>(windowSize);
  }

  get total(): number {
    return this.digits.size;
  }

  push(digit: number): void {
    const evicted = this.digits.push(digit);
    this.counts[digit] += 1;
    if (evicted !== undefined) {
      this.counts[evicted] -= 1;
    }
  }

  count(digit: number): number {
    return this.counts[digit] ?? 0;
  }

  snapshot(): FrequencySnapshot {
    const counts = [...this.counts];
    const total = this.total;
    const percentages = counts.map((c) => (total > 0 ? round((c / total) * 100, 4) : 0));

    let most = 0;
    let least = 0;
    for (let d = 1; d < 10; d += 1) {
      if (counts[d] > counts[most]) most = d;
      if (counts[d] < counts[least]) least = d;
    }

    return {
      windowSize: this.windowSize,
      total,
      counts,
      percentages,
      mostFrequent: { digit: most, count: counts[most] },
      leastFrequent: { digit: least, count: counts[least] }
    };
  }

  clear(): void {
    this.digits.clear();
    this.counts.fill(0);
  }
}
