import type { Tick } from "@digitbot/shared";

/** A tick as it arrives from the feed, before normalization. */
export type RawTick = {
  symbol: string;
  quote?: number | string;
  price?: number | string;
  epoch?: number;
  timestamp?: string;
  pip_size?: number;
};

export type TickIngestorOptions = {
  symbol: string;
  pipDecimals: number;
};

export type IngestResult = { ok: true; tick: Tick } | { ok: false; reason: string };

function toNumber(value: number | string | undefined): number {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim()) return Number.parseFloat(value);
  return Number.NaN;
}

/**
 * Last digit of the price rendered at the feed's pip size. Feeds drop trailing zeros
 * (`1234.5` for `1234.50`), so the digit is taken from the fixed-point rendering.
 */
export function lastDigit(price: number, pipDecimals: number): number {
  const rendered = price.toFixed(pipDecimals);
  const digit = Number.parseInt(rendered.charAt(rendered.length - 1), 10);
  return Number.isNaN(digit) ? 0 : digit;
}

export class TickIngestor {
  constructor(private readonly options: TickIngestorOptions) {}

  get symbol(): string {
    return this.options.symbol;
  }

  normalize(raw: RawTick): IngestResult {
    if (raw.symbol !== this.options.symbol) {
      return { ok: false, reason: `Tick for ${raw.symbol} ignored (subscribed to ${this.options.symbol})` };
    }

    const price = toNumber(raw.quote ?? raw.price);
    if (!Number.isFinite(price) || price <= 0) {
      return { ok: false, reason: `Invalid price ${String(raw.quote ?? raw.price)}` };
    }

    const epochMs = (() => {
      if (typeof raw.epoch === "number" && Number.isFinite(raw.epoch)) return raw.epoch * 1000;
      if (raw.timestamp) return Date.parse(raw.timestamp);
      return Number.NaN;
    })();
    if (!Number.isFinite(epochMs)) {
      return { ok: false, reason: "Missing tick timestamp" };
    }

    const pipDecimals =
      typeof raw.pip_size === "number" && Number.isInteger(raw.pip_size) && raw.pip_size >= 0 ? raw.pip_size : this.options.pipDecimals;

    const tick: Tick = Object.freeze({
      symbol: raw.symbol,
      price,
      digit: lastDigit(price, pipDecimals),
      epoch: Math.floor(epochMs / 1000),
      timestamp: new Date(epochMs).toISOString()
    });
    return { ok: true, tick };
  }
}
