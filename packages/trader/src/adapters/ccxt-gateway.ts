import { positiveOrThrow } from "@candle-trader/kit";
import type { OrderGateway, OrderResult, OrderSide } from "../types/order-gateway.js";
import { gatewayError } from "../types/errors.js";
import type { RestExchange } from "./ccxt-exchange.js";
import { logger } from "../lib/logger.js";

const log = logger.createChild("ccxtGateway");

export interface CcxtOrderGatewayConfig {
  exchange: RestExchange;
  symbol: string;
}

/** Live market orders through ccxt, which signs the requests. */
export class CcxtOrderGateway implements OrderGateway {
  readonly mode = "live" as const;
  private config: CcxtOrderGatewayConfig;

  constructor(config: CcxtOrderGatewayConfig) {
    this.config = config;
  }

  async placeOrder(side: OrderSide, quantity: number): Promise<OrderResult> {
    const { exchange, symbol } = this.config;
    const t0 = performance.now();
    try {
      const amount = positiveOrThrow(quantity, "quantity");
      const order = await exchange.createOrder(symbol, "market", side, amount);
      log.info({ action: "placeOrder", symbol, side, quantity, orderId: order.id, status: order.status, latencyMs: Math.round(performance.now() - t0) }, "Market order placed");
      return { ok: true, orderId: order.id, status: "placed" };
    } catch (err) {
      log.error({ action: "placeOrder", symbol, side, quantity, err, latencyMs: Math.round(performance.now() - t0) }, "Market order failed");
      return { ok: false, error: gatewayError(err) };
    }
  }
}
