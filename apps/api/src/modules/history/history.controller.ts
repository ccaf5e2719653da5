import { Controller, Get, Query } from "@nestjs/common";
import type { Tick, TradeRecord, UnreconciledTrade } from "@digitbot/shared";
import { z } from "zod";

import { parseBody } from "../http/parse-body";
import { HistoryStoreService } from "./history-store.service";

const HistoryQuerySchema = z.object({
  kind: z.enum(["ticks", "trades", "unreconciled"]).default("trades"),
  limit: z.coerce.number().int().min(1).max(5000).default(100)
});

export type HistoryResponse =
  | { kind: "ticks"; items: Tick[] }
  | { kind: "trades"; items: TradeRecord[] }
  | { kind: "unreconciled"; items: UnreconciledTrade[] };

@Controller("history")
export class HistoryController {
  constructor(private readonly history: HistoryStoreService) {}

  @Get()
  async getHistory(@Query() query: unknown): Promise<HistoryResponse> {
    const { kind, limit } = parseBody(HistoryQuerySchema, query);
    switch (kind) {
      case "ticks":
        return { kind, items: await this.history.readTicks(limit) };
      case "unreconciled":
        return { kind, items: await this.history.readUnreconciled(limit) };
      case "trades":
        return { kind, items: await this.history.readTrades(limit) };
    }
  }
}
