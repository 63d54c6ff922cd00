import type { GatewayError } from "./errors.js";
import type { TraderMode } from "./config.js";

export type OrderSide = "buy" | "sell";

export type OrderResult =
  | { ok: true; orderId: string; status: "simulated" | "placed" }
  | { ok: false; error: GatewayError };

export interface OrderGateway {
  readonly mode: TraderMode;
  placeOrder(side: OrderSide, quantity: number): Promise<OrderResult>;
}
