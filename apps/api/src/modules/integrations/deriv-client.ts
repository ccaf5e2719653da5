import WebSocket from "ws";

import { errorMessage } from "../engine/engine-errors";
import type { AppLogger } from "../logging/pino-logger";
import { DerivApiError, DerivAuthorizeSchema, DerivEnvelopeSchema, type DerivAuthorize, type DerivEnvelope } from "./deriv-messages";

export type DerivSocketHandlers = {
  onOpen(): void;
  onMessage(text: string): void;
  onClose(): void;
  onError(err: Error): void;
};

export type DerivSocket = {
  readonly isOpen: boolean;
  send(data: string): void;
  close(): void;
};

export type DerivSocketFactory = (url: string, handlers: DerivSocketHandlers) => DerivSocket;

function rawDataToText(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf-8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  return Buffer.from(data).toString("utf-8");
}

export const wsSocketFactory: DerivSocketFactory = (url, handlers) => {
  const ws = new WebSocket(url);
  ws.on("open", () => handlers.onOpen());
  ws.on("message", (data) => handlers.onMessage(rawDataToText(data)));
  ws.on("close", () => handlers.onClose());
  ws.on("error", (err) => handlers.onError(err));
  return {
    get isOpen() {
      return ws.readyState === WebSocket.OPEN;
    },
    send: (data) => ws.send(data),
    close: () => ws.close()
  };
};

export type DerivClientOptions = {
  url: string;
  appId: number;
  apiToken?: string;
  logger: AppLogger;
  requestTimeoutMs?: number;
  reconnectBaseMs?: number;
  reconnectMaxMs?: number;
  socketFactory?: DerivSocketFactory;
};

export type DerivRequest = Record<string, unknown>;

export type DerivStream = {
  readonly id: number;
  close(): Promise<void>;
};

type PendingRequest = {
  resolve(message: DerivEnvelope): void;
  reject(err: Error): void;
  timer: NodeJS.Timeout;
};

type StreamEntry = {
  payload: DerivRequest;
  onMessage(message: DerivEnvelope): void;
  subscriptionId?: string;
};

/**
 * Request/response and subscription multiplexing over one Deriv WebSocket. Requests are matched
 * by `req_id`; subscriptions are re-sent after every reconnect.
 */
export class DerivClient {
  private readonly logger: AppLogger;
  private readonly requestTimeoutMs: number;
  private readonly socketFactory: DerivSocketFactory;

  private socket: DerivSocket | null = null;
  private connecting: Promise<void> | null = null;
  private nextReqId = 1;
  private readonly pending = new Map<number, PendingRequest>();
  private readonly streams = new Map<number, StreamEntry>();
  private reconnectTimer: NodeJS.Timeout | null = null;
  private reconnectAttempts = 0;
  private closedByUser = false;
  private account: DerivAuthorize | null = null;

  constructor(private readonly options: DerivClientOptions) {
    this.logger = options.logger.child({ module: "deriv" });
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10_000;
    this.socketFactory = options.socketFactory ?? wsSocketFactory;
  }

  get connected(): boolean {
    return Boolean(this.socket?.isOpen);
  }

  /** Account details from the last successful `authorize`, when a token is configured. */
  get authorizedAccount(): DerivAuthorize | null {
    return this.account;
  }

  get activeStreams(): number {
    return this.streams.size;
  }

  async connect(): Promise<void> {
    if (this.socket?.isOpen) return;
    if (!this.connecting) {
      this.closedByUser = false;
      this.connecting = this.open().finally(() => {
        this.connecting = null;
      });
    }
    await this.connecting;
  }

  async request(payload: DerivRequest, timeoutMs = this.requestTimeoutMs): Promise<DerivEnvelope> {
    await this.connect();
    return await this.send(this.nextReqId++, payload, timeoutMs);
  }

  /** Starts a subscription; `onMessage` receives every update, the first one included. */
  async subscribe(payload: DerivRequest, onMessage: (message: DerivEnvelope) => void): Promise<DerivStream> {
    await this.connect();
    const id = this.nextReqId++;
    const entry: StreamEntry = { payload: { ...payload, subscribe: 1 }, onMessage };
    this.streams.set(id, entry);
    try {
      await this.send(id, entry.payload, this.requestTimeoutMs);
    } catch (err) {
      this.streams.delete(id);
      throw err;
    }
    return { id, close: () => this.forget(id) };
  }

  close(): void {
    this.closedByUser = true;
    if (this.reconnectTimer) clearTimeout(this.reconnectTimer);
    this.reconnectTimer = null;
    this.streams.clear();
    const socket = this.socket;
    this.socket = null;
    this.rejectPending(new Error("Deriv connection closed"));
    socket?.close();
  }

  private open(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let settled = false;
      const url = `${this.options.url}?app_id=${this.options.appId}`;
      const socket = this.socketFactory(url, {
        onOpen: () => {
          this.reconnectAttempts = 0;
          this.afterOpen().then(
            () => {
              settled = true;
              resolve();
            },
            (err: unknown) => {
              settled = true;
              reject(err instanceof Error ? err : new Error(String(err)));
            }
          );
        },
        onMessage: (text) => this.handleMessage(text),
        onClose: () => {
          if (!settled) {
            settled = true;
            reject(new Error("Deriv connection closed before it was ready"));
          }
          this.handleClose(socket);
        },
        onError: (err) => {
          this.logger.warn({ msg: "Deriv socket error", err: err.message });
          if (!settled) {
            settled = true;
            reject(err);
          }
        }
      });
      this.socket = socket;
    });
  }

  private async afterOpen(): Promise<void> {
    if (this.options.apiToken) {
      const response = await this.send(this.nextReqId++, { authorize: this.options.apiToken }, this.requestTimeoutMs);
      const parsed = DerivAuthorizeSchema.safeParse(response);
      if (!parsed.success) throw new Error("Unexpected authorize response from Deriv");
      this.account = parsed.data.authorize;
      this.logger.info({ msg: "Deriv authorized", loginid: this.account.loginid, virtual: this.account.is_virtual });
    }

    for (const [id, entry] of this.streams) {
      entry.subscriptionId = undefined;
      this.send(id, entry.payload, this.requestTimeoutMs).catch((err: unknown) => {
        this.logger.warn({ msg: "Deriv resubscribe failed", reqId: id, err: errorMessage(err) });
      });
    }
    if (this.streams.size > 0) {
      this.logger.info({ msg: "Deriv streams resubscribed", count: this.streams.size });
    }
  }

  private send(reqId: number, payload: DerivRequest, timeoutMs: number): Promise<DerivEnvelope> {
    const socket = this.socket;
    if (!socket?.isOpen) {
      return Promise.reject(new Error("Deriv connection is not open"));
    }

    return new Promise<DerivEnvelope>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(reqId);
        reject(new Error(`Deriv request ${Object.keys(payload)[0] ?? "?"} timed out after ${timeoutMs}ms`));
      }, timeoutMs);
      this.pending.set(reqId, { resolve, reject, timer });
      socket.send(JSON.stringify({ ...payload, req_id: reqId }));
    });
  }

  private async forget(id: number): Promise<void> {
    const entry = this.streams.get(id);
    this.streams.delete(id);
    if (!entry?.subscriptionId || !this.connected) return;
    try {
      await this.send(this.nextReqId++, { forget: entry.subscriptionId }, this.requestTimeoutMs);
    } catch (err) {
      this.logger.debug({ msg: "Deriv forget failed", subscriptionId: entry.subscriptionId, err: errorMessage(err) });
    }
  }

  private handleMessage(text: string): void {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      this.logger.warn({ msg: "Unparseable Deriv message", err: errorMessage(err) });
      return;
    }

    const parsed = DerivEnvelopeSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn({ msg: "Unexpected Deriv message shape" });
      return;
    }
    const message = parsed.data;
    const reqId = message.req_id;

    if (reqId !== undefined) {
      const pending = this.pending.get(reqId);
      if (pending) {
        this.pending.delete(reqId);
        clearTimeout(pending.timer);
        if (message.error) pending.reject(new DerivApiError(message.error.code, message.error.message));
        else pending.resolve(message);
      }
    }

    const stream = this.findStream(message);
    if (stream && !message.error) {
      if (message.subscription) stream.subscriptionId = message.subscription.id;
      stream.onMessage(message);
    }
  }

  private findStream(message: DerivEnvelope): StreamEntry | undefined {
    if (message.req_id !== undefined) {
      const byReqId = this.streams.get(message.req_id);
      if (byReqId) return byReqId;
    }
    const subscriptionId = message.subscription?.id;
    if (!subscriptionId) return undefined;
    for (const entry of this.streams.values()) {
      if (entry.subscriptionId === subscriptionId) return entry;
    }
    return undefined;
  }

  private handleClose(socket: DerivSocket): void {
    if (this.socket !== socket) return;
    this.socket = null;
    this.rejectPending(new Error("Deriv connection closed"));
    if (!this.closedByUser) this.scheduleReconnect();
  }

  private rejectPending(err: Error): void {
    for (const pending of this.pending.values()) {
      clearTimeout(pending.timer);
      pending.reject(err);
    }
    this.pending.clear();
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer) return;
    const base = this.options.reconnectBaseMs ?? 1000;
    const max = this.options.reconnectMaxMs ?? 30_000;
    const delay = Math.min(base * 2 ** this.reconnectAttempts, max);
    this.reconnectAttempts += 1;
    this.logger.warn({ msg: "Deriv connection lost, reconnecting", delayMs: delay, attempt: this.reconnectAttempts });

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect().catch((err: unknown) => {
        this.logger.warn({ msg: "Deriv reconnect failed", err: errorMessage(err) });
      });
    }, delay);
  }
}
