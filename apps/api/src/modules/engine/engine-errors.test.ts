import { afterEach, describe, expect, it, vi } from "vitest";

import { BrokerResultTimeoutError, EngineError, TradeInFlightError, errorMessage, withTimeout } from "./engine-errors";

describe("engine errors", () => {
  it("carries the kind on every subclass", () => {
    const err = new BrokerResultTimeoutError("c-9", 500);
    expect(err).toBeInstanceOf(EngineError);
    expect(err.kind).toBe("BrokerResultTimeout");
    expect(err.message).toBe("No result for trade c-9 within 500ms");
    expect(new TradeInFlightError("p-1").message).toBe("Trade p-1 is still awaiting its result");
  });

  it("maps unknown throwables to strings", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
  });
});

describe("withTimeout", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves with the value when it arrives in time", async () => {
    await expect(withTimeout(Promise.resolve(7), 100, () => new Error("late"))).resolves.toBe(7);
  });

  it("rejects with the timeout error and reports a late result", async () => {
    vi.useFakeTimers();
    let resolve: (value: string) => void = () => undefined;
    const pending = new Promise<string>((r) => {
      resolve = r;
    });
    const onLateResult = vi.fn();

    const raced = withTimeout(pending, 1_000, () => new BrokerResultTimeoutError("c-1", 1_000), { onLateResult });
    const assertion = expect(raced).rejects.toThrow("No result for trade c-1 within 1000ms");
    await vi.advanceTimersByTimeAsync(1_000);
    await assertion;

    resolve("done");
    await pending;
    expect(onLateResult).toHaveBeenCalledWith("done");
  });

  it("reports a rejection that arrives after the timeout", async () => {
    vi.useFakeTimers();
    let reject: (err: Error) => void = () => undefined;
    const pending = new Promise<string>((_, r) => {
      reject = r;
    });
    const onLateRejection = vi.fn();

    const raced = withTimeout(pending, 10, () => new Error("timed out"), { onLateRejection });
    const assertion = expect(raced).rejects.toThrow("timed out");
    await vi.advanceTimersByTimeAsync(10);
    await assertion;

    reject(new Error("socket closed"));
    await expect(pending).rejects.toThrow("socket closed");
    expect(onLateRejection).toHaveBeenCalledTimes(1);
  });
});
