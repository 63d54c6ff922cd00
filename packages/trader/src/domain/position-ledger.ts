import type { PositionSide, PositionState } from "@candle-trader/signals";
import type { GatewayError, InvariantViolation } from "../types/errors.js";
import type { LedgerState, Position, Trade } from "../types/ledger.js";
import type { OrderGateway, OrderSide } from "../types/order-gateway.js";
import { logger } from "../lib/logger.js";

const log = logger.createChild("positionLedger");

export type LedgerResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: GatewayError | InvariantViolation };

function entryOrderSide(side: PositionSide): OrderSide {
  return side === "long" ? "buy" : "sell";
}

function exitOrderSide(side: PositionSide): OrderSide {
  return side === "long" ? "sell" : "buy";
}

function pnlOf(side: PositionSide, entry: number, exit: number, quantity: number): number {
  return side === "long" ? (exit - entry) * quantity : (entry - exit) * quantity;
}

/**
 * FLAT → LONG/SHORT → FLAT state machine over a single instrument.
 *
 * Every transition goes through the order gateway first; the ledger only
 * changes once the order succeeded. Illegal transitions are rejected before
 * any order is sent. One transition may be in flight at a time.
 */
export class PositionLedger {
  private position: Position | null = null;
  private trades: Trade[] = [];
  private totalPnl = 0;
  private pending = false;
  private gateway: OrderGateway;
  private quantity: number;

  constructor(gateway: OrderGateway, quantity: number) {
    this.gateway = gateway;
    this.quantity = quantity;
  }

  async open(side: PositionSide, price: number, time: number, reason: string): Promise<LedgerResult<Position>> {
    const attempted = `open-${side}`;
    if (this.pending) return this.inFlight(attempted);
    if (this.position) return this.violation(attempted, `cannot open ${side}: already ${this.getState()}`);

    this.pending = true;
    try {
      const order = await this.gateway.placeOrder(entryOrderSide(side), this.quantity);
      if (!order.ok) {
        log.error({ action: "open", side, price, error: order.error.message }, "Entry order failed, staying flat");
        return order;
      }
      this.position = {
        side,
        entryPrice: price,
        entryTime: time,
        quantity: this.quantity,
        orderId: order.orderId,
        reason,
        currentPrice: price,
        unrealizedPnl: 0,
      };
      log.info({ action: "open", side, price, quantity: this.quantity, orderId: order.orderId }, "Position opened");
      return { ok: true, value: { ...this.position } };
    } finally {
      this.pending = false;
    }
  }

  async close(side: PositionSide, price: number, time: number, reason: string): Promise<LedgerResult<Trade>> {
    const attempted = `close-${side}`;
    if (this.pending) return this.inFlight(attempted);
    const open = this.position;
    if (!open || open.side !== side) {
      return this.violation(attempted, `cannot close ${side}: ledger is ${this.getState()}`);
    }

    this.pending = true;
    try {
      const order = await this.gateway.placeOrder(exitOrderSide(side), open.quantity);
      if (!order.ok) {
        log.error({ action: "close", side, price, error: order.error.message }, "Exit order failed, position kept");
        return order;
      }
      const trade: Trade = Object.freeze({
        side,
        entryTime: open.entryTime,
        exitTime: time,
        entryPrice: open.entryPrice,
        exitPrice: price,
        quantity: open.quantity,
        pnl: pnlOf(side, open.entryPrice, price, open.quantity),
        reason,
        entryReason: open.reason,
        entryOrderId: open.orderId,
        exitOrderId: order.orderId,
      });
      this.trades.push(trade);
      this.totalPnl += trade.pnl;
      this.position = null;
      log.info({ action: "close", side, entryPrice: trade.entryPrice, exitPrice: price, pnl: trade.pnl }, "Position closed");
      return { ok: true, value: trade };
    } finally {
      this.pending = false;
    }
  }

  markPrice(price: number): void {
    const pos = this.position;
    if (!pos) return;
    pos.currentPrice = price;
    pos.unrealizedPnl = pnlOf(pos.side, pos.entryPrice, price, pos.quantity);
  }

  getState(): LedgerState {
    if (!this.position) return "FLAT";
    return this.position.side === "long" ? "LONG" : "SHORT";
  }

  /** The ledger state in the policy's vocabulary. */
  getPositionState(): PositionState {
    return this.position?.side ?? "flat";
  }

  getPosition(): Position | null {
    return this.position ? { ...this.position } : null;
  }

  /** Closed trades, oldest first; the last `limit` when given. */
  getTrades(limit?: number): Trade[] {
    if (limit === undefined) return [...this.trades];
    if (limit <= 0) return [];
    return this.trades.slice(-limit);
  }

  getTradeCount(): number {
    return this.trades.length;
  }

  getTotalPnl(): number {
    return this.totalPnl;
  }

  isPending(): boolean {
    return this.pending;
  }

  private inFlight(attempted: string): LedgerResult<never> {
    return this.violation(attempted, `cannot ${attempted}: a transition is already in flight`);
  }

  private violation(attempted: string, message: string): LedgerResult<never> {
    const error: InvariantViolation = { kind: "invariant", message, state: this.getState(), attempted };
    log.error({ action: attempted, state: error.state }, message);
    return { ok: false, error };
  }
}
