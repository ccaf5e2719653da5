import { describe, expect, it, vi } from "vitest";

import type { RawTick } from "../engine/ticks/tick-ingestor";
import { createNullLogger } from "../logging/pino-logger";
import type { DerivClient } from "./deriv-client";
import type { DerivConnectionService } from "./deriv-connection.service";
import type { DerivEnvelope } from "./deriv-messages";
import { DerivMarketDataService } from "./deriv-market-data.service";

function setup() {
  const handlers: Array<(message: DerivEnvelope) => void> = [];
  const close = vi.fn(async () => {});
  const subscribe = vi.fn(async (_payload: Record<string, unknown>, onMessage: (message: DerivEnvelope) => void) => {
    handlers.push(onMessage);
    return { id: handlers.length, close };
  });
  const client = { subscribe };
  const connection = { getClient: async () => client as unknown as DerivClient };
  const service = new DerivMarketDataService(connection as unknown as DerivConnectionService, createNullLogger());
  const emit = (message: DerivEnvelope) => handlers.forEach((h) => h(message));
  return { service, subscribe, close, emit };
}

describe("DerivMarketDataService", () => {
  it("shares one stream per symbol and maps ticks", async () => {
    const { service, subscribe, emit } = setup();
    const first: RawTick[] = [];
    const second: RawTick[] = [];

    await service.subscribe("R_100", (tick) => first.push(tick));
    await service.subscribe("R_100", (tick) => second.push(tick));
    expect(subscribe).toHaveBeenCalledTimes(1);
    expect(subscribe.mock.calls[0]?.[0]).toEqual({ ticks: "R_100" });

    emit({ msg_type: "tick", tick: { symbol: "R_100", quote: 1234.5, epoch: 1_700_000_000, pip_size: 2 } });
    emit({ msg_type: "tick", tick: { symbol: "R_100" } });

    const expected: RawTick = { symbol: "R_100", quote: 1234.5, epoch: 1_700_000_000, pip_size: 2 };
    expect(first).toEqual([expected]);
    expect(second).toEqual([expected]);
  });

  it("closes the stream when the last listener leaves", async () => {
    const { service, close } = setup();
    const a = await service.subscribe("R_50", () => undefined);
    const b = await service.subscribe("R_50", () => undefined);

    a.unsubscribe();
    a.unsubscribe();
    await Promise.resolve();
    expect(close).not.toHaveBeenCalled();

    b.unsubscribe();
    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(close).toHaveBeenCalledTimes(1);
    expect(service.subscribedSymbols).toEqual([]);
  });

  it("keeps other listeners fed when one throws", async () => {
    const { service, emit } = setup();
    const received: number[] = [];
    await service.subscribe("R_100", () => {
      throw new Error("boom");
    });
    await service.subscribe("R_100", (tick) => received.push(tick.epoch ?? -1));

    emit({ msg_type: "tick", tick: { symbol: "R_100", quote: 10, epoch: 7 } });
    expect(received).toEqual([7]);
  });
});
