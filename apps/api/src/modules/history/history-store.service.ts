import fs from "node:fs";
import type { FileHandle } from "node:fs/promises";
import path from "node:path";

import { Inject, Injectable } from "@nestjs/common";
import type { Tick, TradeRecord, UnreconciledTrade } from "@digitbot/shared";
import { TickSchema, TradeRecordSchema, UnreconciledTradeSchema } from "@digitbot/shared";
import type { z } from "zod";

import { errorMessage } from "../engine/engine-errors";
import { APP_LOGGER, type AppLogger } from "../logging/pino-logger";
import type { HistorySink } from "../trading/collaborators";

export const HISTORY_FILES = {
  ticks: "ticks.jsonl",
  trades: "trades.jsonl",
  unreconciled: "unreconciled.jsonl"
} as const;

export type HistoryKind = keyof typeof HISTORY_FILES;

const CHUNK_BYTES = 64 * 1024;

/** Last `limit` non-empty lines of a file, reading backwards in chunks. */
async function readTailLines(filePath: string, limit: number): Promise<string[]> {
  let handle: FileHandle;
  try {
    handle = await fs.promises.open(filePath, "r");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
    throw err;
  }

  try {
    const { size } = await handle.stat();
    let position = size;
    let buffered = Buffer.alloc(0);
    let lines: string[] = [];
    while (position > 0) {
      const length = Math.min(CHUNK_BYTES, position);
      position -= length;
      const chunk = Buffer.alloc(length);
      await handle.read(chunk, 0, length, position);
      buffered = Buffer.concat([chunk, buffered]);
      lines = buffered.toString("utf-8").split("\n").filter((line) => line.trim().length > 0);
      // the first line may be cut mid-record until we reach the start of the file
      if (lines.length > limit) break;
    }
    return lines.slice(-limit);
  } finally {
    await handle.close();
  }
}

/**
 * Append-only JSON-lines history under `DATA_DIR/history`. Writes are serialized on one chain and
 * never reject into the caller; failures are logged.
 */
@Injectable()
export class HistoryStoreService implements HistorySink {
  private readonly logger: AppLogger;
  private chain: Promise<void> = Promise.resolve();
  private failedWrites = 0;

  constructor(@Inject(APP_LOGGER) logger: AppLogger) {
    this.logger = logger.child({ module: "history" });
  }

  get dir(): string {
    const dataDir = process.env.DATA_DIR ?? path.resolve(process.cwd(), "../../data");
    return path.join(dataDir, "history");
  }

  get writeFailures(): number {
    return this.failedWrites;
  }

  appendTick(tick: Tick): void {
    this.enqueue("ticks", tick);
  }

  appendTrade(record: TradeRecord): void {
    this.enqueue("trades", record);
  }

  appendUnreconciled(entry: UnreconciledTrade): void {
    this.enqueue("unreconciled", entry);
  }

  /** Resolves once every write queued so far has finished (or failed). */
  flush(): Promise<void> {
    return this.chain;
  }

  async readTicks(limit: number): Promise<Tick[]> {
    return await this.read("ticks", TickSchema, limit);
  }

  async readTrades(limit: number): Promise<TradeRecord[]> {
    return await this.read("trades", TradeRecordSchema, limit);
  }

  async readUnreconciled(limit: number): Promise<UnreconciledTrade[]> {
    return await this.read("unreconciled", UnreconciledTradeSchema, limit);
  }

  private enqueue(kind: HistoryKind, record: unknown): void {
    const filePath = path.join(this.dir, HISTORY_FILES[kind]);
    const line = `${JSON.stringify(record)}\n`;
    this.chain = this.chain
      .then(async () => {
        await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
        await fs.promises.appendFile(filePath, line, { encoding: "utf-8" });
      })
      .catch((err: unknown) => {
        this.failedWrites += 1;
        this.logger.warn({ msg: "History write failed", kind, err: errorMessage(err) });
      });
  }

  private async read<S extends z.ZodTypeAny>(kind: HistoryKind, schema: S, limit: number): Promise<Array<z.output<S>>> {
    await this.flush();
    const lines = await readTailLines(path.join(this.dir, HISTORY_FILES[kind]), limit);

    const out: Array<z.output<S>> = [];
    let skipped = 0;
    for (const line of lines) {
      try {
        const parsed = schema.safeParse(JSON.parse(line));
        if (parsed.success) out.push(parsed.data);
        else skipped += 1;
      } catch {
        skipped += 1;
      }
    }
    if (skipped > 0) {
      this.logger.debug({ msg: "Skipped unreadable history lines", kind, skipped });
    }
    return out;
  }
}
