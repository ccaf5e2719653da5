import { Injectable } from "@nestjs/common";

import { ConfigService } from "../config/config.service";
import { errorMessage } from "../engine/engine-errors";
import { DerivConnectionService } from "./deriv-connection.service";

export type DerivStatus = {
  checkedAt: string;
  url: string;
  configured: boolean;
  reachable: boolean;
  authenticated: boolean;
  account?: { loginid: string; currency: string; virtual: boolean; balance: number };
  error?: string;
};

const CACHE_MS = 30_000;

@Injectable()
export class DerivStatusService {
  private cached: DerivStatus | null = null;
  private cachedAtMs = 0;

  constructor(
    private readonly configService: ConfigService,
    private readonly connection: DerivConnectionService
  ) {}

  async getStatus(): Promise<DerivStatus> {
    const now = Date.now();
    if (this.cached && now - this.cachedAtMs < CACHE_MS) {
      return this.cached;
    }

    const config = this.configService.load();
    const status: DerivStatus = {
      checkedAt: new Date(now).toISOString(),
      url: config?.advanced.derivWsUrl ?? "",
      configured: Boolean(config?.basic.deriv.apiToken),
      reachable: false,
      authenticated: false
    };

    if (!config) {
      status.error = "Bot is not initialized.";
      return this.remember(status, now);
    }

    try {
      const client = await this.connection.getClient();
      await client.request({ ping: 1 });
      status.reachable = true;

      const account = client.authorizedAccount;
      if (account) {
        status.authenticated = true;
        status.account = {
          loginid: account.loginid,
          currency: account.currency,
          virtual: account.is_virtual,
          balance: account.balance
        };
      } else if (!status.configured) {
        status.error = "No Deriv API token; trading runs on the paper broker.";
      }
    } catch (err) {
      status.error = errorMessage(err);
    }

    return this.remember(status, now);
  }

  private remember(status: DerivStatus, now: number): DerivStatus {
    this.cached = status;
    this.cachedAtMs = now;
    return status;
  }
}
