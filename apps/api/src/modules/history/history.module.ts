import { Module } from "@nestjs/common";

import { HISTORY_SINK } from "../trading/collaborators";
import { HistoryController } from "./history.controller";
import { HistoryStoreService } from "./history-store.service";

@Module({
  controllers: [HistoryController],
  providers: [HistoryStoreService, { provide: HISTORY_SINK, useExisting: HistoryStoreService }],
  exports: [HistoryStoreService, HISTORY_SINK]
})
export class HistoryModule {}
