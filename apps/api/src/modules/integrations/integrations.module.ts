import { Module } from "@nestjs/common";

import { ConfigModule } from "../config/config.module";
import { TICK_SOURCE, TRADE_BROKER } from "../trading/collaborators";
import { DerivConnectionService } from "./deriv-connection.service";
import { DerivMarketDataService } from "./deriv-market-data.service";
import { DerivStatusService } from "./deriv-status.service";
import { DerivTradingService } from "./deriv-trading.service";
import { IntegrationsController } from "./integrations.controller";
import { PaperBrokerService } from "./paper-broker.service";
import { TradeBrokerRouter } from "./trade-broker.router";

@Module({
  imports: [ConfigModule],
  controllers: [IntegrationsController],
  providers: [
    DerivConnectionService,
    DerivMarketDataService,
    DerivTradingService,
    DerivStatusService,
    PaperBrokerService,
    TradeBrokerRouter,
    { provide: TICK_SOURCE, useExisting: DerivMarketDataService },
    { provide: TRADE_BROKER, useExisting: TradeBrokerRouter }
  ],
  exports: [TICK_SOURCE, TRADE_BROKER, PaperBrokerService]
})
export class IntegrationsModule {}
