import { Inject, Injectable, type OnModuleDestroy } from "@nestjs/common";
import { DEFAULT_DERIV_APP_ID, DEFAULT_DERIV_WS_URL } from "@digitbot/shared";

import { ConfigService } from "../config/config.service";
import { APP_LOGGER, type AppLogger } from "../logging/pino-logger";
import { DerivClient } from "./deriv-client";

/** Owns the process-wide Deriv connection; rebuilt when the endpoint, app id or token changes. */
@Injectable()
export class DerivConnectionService implements OnModuleDestroy {
  private client: DerivClient | null = null;
  private fingerprint: string | null = null;

  constructor(
    private readonly configService: ConfigService,
    @Inject(APP_LOGGER) private readonly logger: AppLogger
  ) {}

  async getClient(): Promise<DerivClient> {
    const config = this.configService.load();
    const url = config?.advanced.derivWsUrl ?? DEFAULT_DERIV_WS_URL;
    const appId = config?.basic.deriv.appId ?? DEFAULT_DERIV_APP_ID;
    const apiToken = config?.basic.deriv.apiToken;
    const fingerprint = `${url}|${appId}|${apiToken ?? ""}`;

    if (!this.client || this.fingerprint !== fingerprint) {
      if (this.client) {
        this.logger.warn({ msg: "Deriv connection settings changed; open streams must be re-subscribed", url, appId });
        this.client.close();
      }
      this.client = new DerivClient({ url, appId, apiToken, logger: this.logger });
      this.fingerprint = fingerprint;
    }

    await this.client.connect();
    return this.client;
  }

  onModuleDestroy(): void {
    this.client?.close();
    this.client = null;
    this.fingerprint = null;
  }
}
