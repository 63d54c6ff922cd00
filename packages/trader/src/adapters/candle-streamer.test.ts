import { describe, it, expect, vi } from "vitest";
import { CcxtCandleStreamer } from "./candle-streamer.js";
import type { OhlcvRow, ProExchange, RestExchange } from "./ccxt-exchange.js";

const MIN = 60_000;

function row(t: number, close = 100): OhlcvRow {
  return [t, 100, 105, 95, close, 1000];
}

/** Serves scripted batches (an Error rejects), then waits forever. */
function createMockExchange(batches: Array<OhlcvRow[] | Error>): ProExchange {
  let callIndex = 0;
  return {
    watchOHLCV: vi.fn().mockImplementation(async () => {
      if (callIndex < batches.length) {
        const batch = batches[callIndex++];
        if (batch instanceof Error) throw batch;
        return batch;
      }
      return new Promise<OhlcvRow[]>(() => {});
    }),
    close: vi.fn().mockResolvedValue(undefined),
  };
}

function signal(): AbortSignal {
  return new AbortController().signal;
}

describe("CcxtCandleStreamer", () => {
  it("delivers a bar with its last seen values once a newer bar appears", async () => {
    const exchange = createMockExchange([
      [row(MIN, 100)],
      [row(MIN, 102)],
      [row(2 * MIN, 103)],
    ]);
    const streamer = new CcxtCandleStreamer({ exchange, symbol: "BTC/USD", interval: "1m" });

    const result = await streamer.next(signal());

    expect(result).toEqual({ kind: "candle", candle: { t: MIN, o: 100, h: 105, l: 95, c: 102, v: 1000, n: 0 } });
    expect(exchange.watchOHLCV).toHaveBeenCalledWith("BTC/USD", "1m");
    await streamer.close();
  });

  it("queues closed bars until next takes them", async () => {
    const exchange = createMockExchange([
      [row(MIN)],
      [row(2 * MIN)],
      [row(3 * MIN)],
    ]);
    const streamer = new CcxtCandleStreamer({ exchange, symbol: "BTC/USD", interval: "1m" });

    const first = await streamer.next(signal());
    await vi.waitFor(() => expect(exchange.watchOHLCV).toHaveBeenCalledTimes(4));
    const second = await streamer.next(signal());

    expect(first.kind === "candle" && first.candle.t).toBe(MIN);
    expect(second.kind === "candle" && second.candle.t).toBe(2 * MIN);
    await streamer.close();
  });

  it("times out after the silence window", async () => {
    const exchange = createMockExchange([]);
    const streamer = new CcxtCandleStreamer({ exchange, symbol: "BTC/USD", interval: "1m", silenceTimeoutMs: 10 });

    expect(await streamer.next(signal())).toEqual({ kind: "timeout" });
    await streamer.close();
  });

  it("returns a timeout when the caller aborts", async () => {
    const exchange = createMockExchange([]);
    const streamer = new CcxtCandleStreamer({ exchange, symbol: "BTC/USD", interval: "1m" });
    const ac = new AbortController();

    const pending = streamer.next(ac.signal);
    ac.abort();

    expect(await pending).toEqual({ kind: "timeout" });
    await streamer.close();
  });

  it("surfaces a stream failure as a transport error and reconnects", async () => {
    const exchange = createMockExchange([
      new Error("socket closed"),
      [row(MIN)],
      [row(2 * MIN)],
    ]);
    const streamer = new CcxtCandleStreamer({ exchange, symbol: "BTC/USD", interval: "1m", reconnectBaseMs: 1 });

    const first = await streamer.next(signal());
    const second = await streamer.next(signal());

    expect(first).toEqual({ kind: "error", error: { kind: "feed", reason: "transport", message: "socket closed" } });
    expect(second.kind === "candle" && second.candle.t).toBe(MIN);
    await streamer.close();
  });

  it("ignores a bar at or before the warmup end", async () => {
    const rest: RestExchange = {
      fetchOHLCV: vi.fn().mockResolvedValue([row(MIN), row(2 * MIN)]),
      createOrder: vi.fn(),
    };
    const exchange = createMockExchange([
      [row(2 * MIN)],
      [row(3 * MIN)],
      [row(4 * MIN)],
    ]);
    const streamer = new CcxtCandleStreamer({ exchange, rest, symbol: "BTC/USD", interval: "1m" });

    const warm = await streamer.warmup(5);
    const result = await streamer.next(signal());

    expect(rest.fetchOHLCV).toHaveBeenCalledWith("BTC/USD", "1m", undefined, 6);
    expect(warm.map((c) => c.t)).toEqual([MIN, 2 * MIN]);
    expect(result.kind === "candle" && result.candle.t).toBe(3 * MIN);
    await streamer.close();
  });

  it("closes the underlying exchange", async () => {
    const exchange = createMockExchange([]);
    const streamer = new CcxtCandleStreamer({ exchange, symbol: "BTC/USD", interval: "1m", silenceTimeoutMs: 5 });
    await streamer.next(signal());
    await streamer.close();
    expect(exchange.close).toHaveBeenCalledTimes(1);
  });
});
