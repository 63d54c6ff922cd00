import type { OrderGateway, OrderResult, OrderSide } from "../types/order-gateway.js";
import { logger } from "../lib/logger.js";

const log = logger.createChild("sandboxGateway");

/** Simulated fills: no network, never fails. */
export class SandboxOrderGateway implements OrderGateway {
  readonly mode = "sandbox" as const;
  private counter = 0;
  private now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  async placeOrder(side: OrderSide, quantity: number): Promise<OrderResult> {
    this.counter++;
    const orderId = `sandbox-${Math.floor(this.now() / 1000)}-${this.counter}`;
    log.info({ action: "SANDBOX", method: "placeOrder", side, quantity, orderId }, "Sandbox: placeOrder");
    return { ok: true, orderId, status: "simulated" };
  }
}
