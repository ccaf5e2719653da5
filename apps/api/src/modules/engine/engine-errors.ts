import type { EngineErrorKind } from "@digitbot/shared";

export class EngineError extends Error {
  constructor(
    readonly kind: EngineErrorKind,
    message: string
  ) {
    super(message);
    this.name = kind;
  }
}

export class BrokerSubmissionFailedError extends EngineError {
  constructor(message: string) {
    super("BrokerSubmissionFailed", message);
  }
}

export class BrokerResultTimeoutError extends EngineError {
  constructor(
    readonly tradeId: string,
    timeoutMs: number
  ) {
    super("BrokerResultTimeout", `No result for trade ${tradeId} within ${timeoutMs}ms`);
  }
}

export class TradeInFlightError extends EngineError {
  constructor(pendingId: string) {
    super("TradeInFlight", `Trade ${pendingId} is still awaiting its result`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export type LateSettlementHandlers<T> = {
  onLateResult?: (value: T) => void;
  onLateRejection?: (err: unknown) => void;
};

/**
 * Resolves with the promise's value, or rejects with `onTimeout()` once `timeoutMs` elapses.
 * A settlement that arrives after the timeout goes to the matching `late` handler.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
  late: LateSettlementHandlers<T> = {}
): Promise<T> {
  let timedOut = false;
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      timedOut = true;
      reject(onTimeout());
    }, timeoutMs);
  });
  void promise.then(
    (value) => {
      if (timedOut) late.onLateResult?.(value);
    },
    (err: unknown) => {
      if (timedOut) late.onLateRejection?.(err);
    }
  );
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
