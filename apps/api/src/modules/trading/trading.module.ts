import { Module } from "@nestjs/common";
import { APP_GUARD } from "@nestjs/core";

import { ConfigModule } from "../config/config.module";
import { HistoryModule } from "../history/history.module";
import { IntegrationsModule } from "../integrations/integrations.module";
import { ApiKeyGuard } from "../security/api-key.guard";
import { TradingController } from "./trading.controller";
import { TradingControllerService } from "./trading-controller.service";

@Module({
  imports: [ConfigModule, IntegrationsModule, HistoryModule],
  controllers: [TradingController],
  providers: [
    TradingControllerService,
    {
      provide: APP_GUARD,
      useClass: ApiKeyGuard
    }
  ],
  exports: [TradingControllerService]
})
export class TradingModule {}
