import { Inject, Injectable } from "@nestjs/common";

import { errorMessage } from "../engine/engine-errors";
import { APP_LOGGER, type AppLogger } from "../logging/pino-logger";
import type { TickListener, TickSource, TickSubscription } from "../trading/collaborators";
import type { DerivStream } from "./deriv-client";
import { DerivConnectionService } from "./deriv-connection.service";
import { DerivTickSchema } from "./deriv-messages";

type Feed = {
  listeners: Set<TickListener>;
  stream: Promise<DerivStream>;
};

/**
 * Tick source over the Deriv `ticks` stream. One stream per symbol is shared by every listener,
 * since Deriv refuses a second subscription to the same symbol on one connection.
 */
@Injectable()
export class DerivMarketDataService implements TickSource {
  private readonly logger: AppLogger;
  private readonly feeds = new Map<string, Feed>();

  constructor(
    private readonly connection: DerivConnectionService,
    @Inject(APP_LOGGER) logger: AppLogger
  ) {
    this.logger = logger.child({ module: "market-data" });
  }

  get subscribedSymbols(): string[] {
    return [...this.feeds.keys()];
  }

  async subscribe(symbol: string, listener: TickListener): Promise<TickSubscription> {
    let feed = this.feeds.get(symbol);
    if (!feed) {
      const listeners = new Set<TickListener>();
      feed = { listeners, stream: this.openStream(symbol, listeners) };
      this.feeds.set(symbol, feed);
    }
    const current = feed;
    current.listeners.add(listener);

    try {
      await current.stream;
    } catch (err) {
      current.listeners.delete(listener);
      if (this.feeds.get(symbol) === current) this.feeds.delete(symbol);
      throw err;
    }

    let active = true;
    return {
      unsubscribe: () => {
        if (!active) return;
        active = false;
        current.listeners.delete(listener);
        if (current.listeners.size > 0 || this.feeds.get(symbol) !== current) return;
        this.feeds.delete(symbol);
        current.stream
          .then((stream) => stream.close())
          .catch((err: unknown) => this.logger.debug({ msg: "Tick stream close failed", symbol, err: errorMessage(err) }));
      }
    };
  }

  private async openStream(symbol: string, listeners: Set<TickListener>): Promise<DerivStream> {
    const client = await this.connection.getClient();
    const stream = await client.subscribe({ ticks: symbol }, (message) => {
      const parsed = DerivTickSchema.safeParse(message);
      if (!parsed.success) return;
      const { tick } = parsed.data;
      for (const listener of listeners) {
        try {
          listener({ symbol: tick.symbol, quote: tick.quote, epoch: tick.epoch, pip_size: tick.pip_size });
        } catch (err) {
          this.logger.error({ msg: "Tick listener failed", symbol, err: errorMessage(err) });
        }
      }
    });
    this.logger.info({ msg: "Subscribed to ticks", symbol });
    return stream;
  }
}
