import { Controller, Get } from "@nestjs/common";

import type { DerivStatus } from "./deriv-status.service";
import { DerivStatusService } from "./deriv-status.service";
import { allowRealAccountTrading } from "./deriv-trading.service";
import { PaperBrokerService } from "./paper-broker.service";
import { TradeBrokerRouter, type BrokerMode } from "./trade-broker.router";

@Controller("integrations")
export class IntegrationsController {
  constructor(
    private readonly derivStatus: DerivStatusService,
    private readonly router: TradeBrokerRouter,
    private readonly paper: PaperBrokerService
  ) {}

  @Get("status")
  async getStatus(): Promise<{
    deriv: DerivStatus;
    broker: { mode: BrokerMode; realAccountTradingAllowed: boolean; paperBalance: number; paperOpenContracts: number };
  }> {
    const deriv = await this.derivStatus.getStatus();

    return {
      deriv,
      broker: {
        mode: this.router.mode,
        realAccountTradingAllowed: allowRealAccountTrading(),
        paperBalance: await this.paper.getBalance(),
        paperOpenContracts: this.paper.openContracts
      }
    };
  }

  @Get("deriv/status")
  async getDerivStatus(): Promise<DerivStatus> {
    return await this.derivStatus.getStatus();
  }
}
