import { Module } from "@nestjs/common";

import { ConfigPublicModule } from "./config/config.public.module";
import { HealthModule } from "./health/health.module";
import { HistoryModule } from "./history/history.module";
import { IntegrationsModule } from "./integrations/integrations.module";
import { LoggingModule } from "./logging/logging.module";
import { SetupModule } from "./setup/setup.module";
import { TradingModule } from "./trading/trading.module";

@Module({
  imports: [LoggingModule, HealthModule, SetupModule, ConfigPublicModule, IntegrationsModule, HistoryModule, TradingModule]
})
export class AppModule {}
