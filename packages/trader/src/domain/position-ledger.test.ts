import { describe, it, expect, vi } from "vitest";
import { PositionLedger } from "./position-ledger.js";
import { SandboxOrderGateway } from "../adapters/sandbox-gateway.js";
import type { OrderGateway, OrderResult } from "../types/order-gateway.js";

function failingGateway(message = "exchange unavailable"): OrderGateway {
  return {
    mode: "live",
    placeOrder: vi.fn(async (): Promise<OrderResult> => ({ ok: false, error: { kind: "gateway", message } })),
  };
}

function sandbox(): SandboxOrderGateway {
  return new SandboxOrderGateway(() => 1_700_000_000_000);
}

describe("PositionLedger", () => {
  it("starts flat with no trades", () => {
    const ledger = new PositionLedger(sandbox(), 0.01);
    expect(ledger.getState()).toBe("FLAT");
    expect(ledger.getPositionState()).toBe("flat");
    expect(ledger.getPosition()).toBeNull();
    expect(ledger.getTrades()).toEqual([]);
    expect(ledger.getTotalPnl()).toBe(0);
  });

  it("opens a long with a buy order and records the position", async () => {
    const gateway = sandbox();
    const spy = vi.spyOn(gateway, "placeOrder");
    const ledger = new PositionLedger(gateway, 0.01);

    const result = await ledger.open("long", 120, 1_000, "breakout");

    expect(spy).toHaveBeenCalledWith("buy", 0.01);
    expect(result.ok).toBe(true);
    expect(ledger.getState()).toBe("LONG");
    expect(ledger.getPosition()).toEqual({
      side: "long",
      entryPrice: 120,
      entryTime: 1_000,
      quantity: 0.01,
      orderId: "sandbox-1700000000-1",
      reason: "breakout",
      currentPrice: 120,
      unrealizedPnl: 0,
    });
  });

  it("closes a long with a sell order and books a frozen trade", async () => {
    const gateway = sandbox();
    const spy = vi.spyOn(gateway, "placeOrder");
    const ledger = new PositionLedger(gateway, 2);
    await ledger.open("long", 100, 1_000, "entry");

    const result = await ledger.close("long", 110, 2_000, "overbought");

    expect(spy).toHaveBeenLastCalledWith("sell", 2);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual({
      side: "long",
      entryTime: 1_000,
      exitTime: 2_000,
      entryPrice: 100,
      exitPrice: 110,
      quantity: 2,
      pnl: 20,
      reason: "overbought",
      entryReason: "entry",
      entryOrderId: "sandbox-1700000000-1",
      exitOrderId: "sandbox-1700000000-2",
    });
    expect(Object.isFrozen(result.value)).toBe(true);
    expect(ledger.getState()).toBe("FLAT");
    expect(ledger.getTotalPnl()).toBe(20);
  });

  it("computes short pnl as entry minus exit", async () => {
    const gateway = sandbox();
    const spy = vi.spyOn(gateway, "placeOrder");
    const ledger = new PositionLedger(gateway, 1);
    await ledger.open("short", 100, 1_000, "breakdown");
    expect(spy).toHaveBeenLastCalledWith("sell", 1);

    const result = await ledger.close("short", 105, 2_000, "oversold");
    expect(spy).toHaveBeenLastCalledWith("buy", 1);
    expect(result.ok && result.value.pnl).toBe(-5);
    expect(ledger.getTotalPnl()).toBe(-5);
  });

  it("keeps totalPnl equal to the sum of trade pnls", async () => {
    const ledger = new PositionLedger(sandbox(), 1);
    await ledger.open("long", 100, 1, "a");
    await ledger.close("long", 103, 2, "b");
    await ledger.open("short", 103, 3, "c");
    await ledger.close("short", 101, 4, "d");
    await ledger.open("long", 101, 5, "e");
    await ledger.close("long", 100, 6, "f");

    const sum = ledger.getTrades().reduce((acc, t) => acc + t.pnl, 0);
    expect(ledger.getTotalPnl()).toBe(sum);
    expect(sum).toBe(4);
    expect(ledger.getTrades(2).map((t) => t.entryTime)).toEqual([3, 5]);
    expect(ledger.getTrades(0)).toEqual([]);
    expect(ledger.getTradeCount()).toBe(3);
  });

  it("rejects an exit while flat without calling the gateway", async () => {
    const gateway = sandbox();
    const spy = vi.spyOn(gateway, "placeOrder");
    const ledger = new PositionLedger(gateway, 1);

    const result = await ledger.close("long", 100, 1, "x");

    expect(spy).not.toHaveBeenCalled();
    expect(result).toEqual({
      ok: false,
      error: { kind: "invariant", message: "cannot close long: ledger is FLAT", state: "FLAT", attempted: "close-long" },
    });
  });

  it("rejects a second open and an exit of the wrong side", async () => {
    const gateway = sandbox();
    const spy = vi.spyOn(gateway, "placeOrder");
    const ledger = new PositionLedger(gateway, 1);
    await ledger.open("long", 100, 1, "x");

    const again = await ledger.open("short", 100, 2, "y");
    const wrongSide = await ledger.close("short", 100, 2, "z");

    expect(spy).toHaveBeenCalledTimes(1);
    expect(!again.ok && again.error.kind).toBe("invariant");
    expect(!again.ok && again.error.message).toBe("cannot open short: already LONG");
    expect(!wrongSide.ok && wrongSide.error.message).toBe("cannot close short: ledger is LONG");
    expect(ledger.getState()).toBe("LONG");
  });

  it("stays flat when the entry order fails", async () => {
    const ledger = new PositionLedger(failingGateway(), 1);
    const result = await ledger.open("long", 100, 1, "x");

    expect(result).toEqual({ ok: false, error: { kind: "gateway", message: "exchange unavailable" } });
    expect(ledger.getState()).toBe("FLAT");
    expect(ledger.isPending()).toBe(false);
  });

  it("keeps the position when the exit order fails", async () => {
    const results: OrderResult[] = [
      { ok: true, orderId: "o-1", status: "placed" },
      { ok: false, error: { kind: "gateway", message: "rejected" } },
    ];
    const gateway: OrderGateway = {
      mode: "live",
      placeOrder: async () => results.shift() ?? { ok: false, error: { kind: "gateway", message: "exhausted" } },
    };
    const ledger = new PositionLedger(gateway, 1);
    await ledger.open("long", 100, 1, "x");

    const result = await ledger.close("long", 90, 2, "y");

    expect(result.ok).toBe(false);
    expect(ledger.getState()).toBe("LONG");
    expect(ledger.getTrades()).toEqual([]);
    expect(ledger.getTotalPnl()).toBe(0);
  });

  it("rejects a transition while another is in flight", async () => {
    let release: (r: OrderResult) => void = () => undefined;
    const gateway: OrderGateway = {
      mode: "live",
      placeOrder: () => new Promise<OrderResult>((resolve) => { release = resolve; }),
    };
    const ledger = new PositionLedger(gateway, 1);

    const first = ledger.open("long", 100, 1, "x");
    expect(ledger.isPending()).toBe(true);
    const second = await ledger.open("long", 100, 1, "x");
    expect(!second.ok && second.error.message).toBe("cannot open-long: a transition is already in flight");

    release({ ok: true, orderId: "o-1", status: "placed" });
    expect((await first).ok).toBe(true);
    expect(ledger.isPending()).toBe(false);
  });

  it("marks unrealized pnl for the open position", async () => {
    const ledger = new PositionLedger(sandbox(), 0.5);
    ledger.markPrice(200);
    await ledger.open("short", 100, 1, "x");
    ledger.markPrice(90);

    expect(ledger.getPosition()?.currentPrice).toBe(90);
    expect(ledger.getPosition()?.unrealizedPnl).toBe(5);
  });

  it("hands out copies of the position", async () => {
    const ledger = new PositionLedger(sandbox(), 1);
    await ledger.open("long", 100, 1, "x");
    const pos = ledger.getPosition();
    if (pos) pos.entryPrice = 1;
    expect(ledger.getPosition()?.entryPrice).toBe(100);
  });
});
