import { Inject, Injectable } from "@nestjs/common";

import { errorMessage } from "../engine/engine-errors";
import { APP_LOGGER, type AppLogger } from "../logging/pino-logger";
import type { TradeBroker, TradeRequest, TradeResult, TradeSubmission } from "../trading/collaborators";
import type { DerivClient, DerivStream } from "./deriv-client";
import { DerivConnectionService } from "./deriv-connection.service";
import { DerivBalanceSchema, DerivBuySchema, DerivOpenContractSchema, type DerivOpenContract } from "./deriv-messages";

export function allowRealAccountTrading(): boolean {
  return String(process.env.ALLOW_REAL_ACCOUNT_TRADING ?? "false").toLowerCase() === "true";
}

/** Result of a finished contract, or null while it is still open. */
export function settledResult(contract: DerivOpenContract): TradeResult | null {
  const sold = contract.is_sold === 1 || contract.is_sold === true;
  const status = contract.status ?? "";
  if (!sold && status !== "won" && status !== "lost") return null;

  const profit = contract.profit ?? 0;
  const won = status === "won" || (status !== "lost" && profit > 0);
  const exitText = contract.exit_tick_display_value ?? "";
  const exitDigit = Number.parseInt(exitText.charAt(exitText.length - 1), 10);

  return {
    outcome: won ? "win" : "loss",
    pnlDelta: profit,
    ...(Number.isInteger(exitDigit) ? { exitDigit } : {})
  };
}

/** Live broker: `buy` digit contracts and follow them with `proposal_open_contract`. */
@Injectable()
export class DerivTradingService implements TradeBroker {
  private readonly logger: AppLogger;

  constructor(
    private readonly connection: DerivConnectionService,
    @Inject(APP_LOGGER) logger: AppLogger
  ) {
    this.logger = logger.child({ module: "deriv-trading" });
  }

  async submitTrade(request: TradeRequest): Promise<TradeSubmission> {
    const client = await this.connection.getClient();
    this.assertTradableAccount(client);

    const response = await client.request({
      buy: 1,
      price: request.stake,
      parameters: {
        amount: request.stake,
        basis: "stake",
        contract_type: request.contractType,
        currency: request.currency,
        duration: request.duration,
        duration_unit: "t",
        symbol: request.symbol,
        barrier: String(request.digit)
      }
    });

    const parsed = DerivBuySchema.safeParse(response);
    if (!parsed.success) {
      throw new Error("Unexpected buy response from Deriv");
    }
    this.logger.info({
      msg: "Contract bought",
      contractId: parsed.data.buy.contract_id,
      contractType: request.contractType,
      barrier: request.digit,
      stake: request.stake
    });
    return { tradeId: String(parsed.data.buy.contract_id) };
  }

  async waitForResult(tradeId: string): Promise<TradeResult> {
    const contractId = Number.parseInt(tradeId, 10);
    if (!Number.isInteger(contractId)) {
      throw new Error(`Invalid Deriv contract id ${tradeId}`);
    }
    const client = await this.connection.getClient();

    return await new Promise<TradeResult>((resolve, reject) => {
      let stream: DerivStream | null = null;
      let done = false;

      const closeStream = (s: DerivStream) => {
        s.close().catch((err: unknown) => this.logger.debug({ msg: "Contract stream close failed", tradeId, err: errorMessage(err) }));
      };

      client
        .subscribe({ proposal_open_contract: 1, contract_id: contractId }, (message) => {
          if (done) return;
          const parsed = DerivOpenContractSchema.safeParse(message);
          if (!parsed.success) return;
          const result = settledResult(parsed.data.proposal_open_contract);
          if (!result) return;
          done = true;
          resolve(result);
          if (stream) closeStream(stream);
        })
        .then(
          (s) => {
            stream = s;
            if (done) closeStream(s);
          },
          (err: unknown) => {
            if (done) return;
            done = true;
            reject(err instanceof Error ? err : new Error(String(err)));
          }
        );
    });
  }

  async getBalance(): Promise<number> {
    const client = await this.connection.getClient();
    const parsed = DerivBalanceSchema.safeParse(await client.request({ balance: 1 }));
    if (!parsed.success) {
      throw new Error("Unexpected balance response from Deriv");
    }
    return parsed.data.balance.balance;
  }

  private assertTradableAccount(client: DerivClient): void {
    const account = client.authorizedAccount;
    if (!account) {
      throw new Error("Deriv account is not authorized (missing API token).");
    }
    if (!account.is_virtual && !allowRealAccountTrading()) {
      throw new Error(`Refusing to trade on real account ${account.loginid}; set ALLOW_REAL_ACCOUNT_TRADING=true to allow it.`);
    }
  }
}
