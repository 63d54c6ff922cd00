import got, { RequestError } from "got";
import type { AlertContext, AlertsClient } from "../types/alerts-client.js";
import type { Position, Trade } from "../types/ledger.js";
import { formatCloseMessage, formatOpenMessage } from "./format-alert-message.js";
import { logger } from "../lib/logger.js";

const log = logger.createChild("alertsClient");

function networkErrorContext(err: unknown): Record<string, unknown> {
  if (!(err instanceof RequestError)) return { err };
  const body = err.response?.body;
  return {
    err,
    endpoint: err.options?.url?.toString(),
    method: err.options?.method,
    statusCode: err.response?.statusCode,
    responseBody: typeof body === "string" ? body.slice(0, 200) : undefined,
    code: err.code,
  };
}

/** Posts `{ text }` to the alert gateway, which relays it to chat. */
export class HttpAlertsClient implements AlertsClient {
  private gatewayUrl: string;

  constructor(gatewayUrl: string) {
    this.gatewayUrl = gatewayUrl;
  }

  async notifyPositionOpened(position: Position, ctx: AlertContext): Promise<void> {
    await this.post("notifyPositionOpened", formatOpenMessage(position, ctx));
  }

  async notifyPositionClosed(trade: Trade, ctx: AlertContext): Promise<void> {
    await this.post("notifyPositionClosed", formatCloseMessage(trade, ctx));
  }

  async sendText(text: string): Promise<void> {
    await this.post("sendText", text);
  }

  private async post(action: string, text: string): Promise<void> {
    const t0 = performance.now();
    try {
      await got.post(this.gatewayUrl, {
        json: { text },
        timeout: { request: 10_000 },
        retry: { limit: 1 },
      });
      log.info({ action, latencyMs: Math.round(performance.now() - t0) }, "Alert sent");
    } catch (err) {
      log.warn({ action, latencyMs: Math.round(performance.now() - t0), ...networkErrorContext(err) }, "Alert send failed");
      throw err;
    }
  }
}

/** Used when no gateway URL is configured. */
export class NoopAlertsClient implements AlertsClient {
  async notifyPositionOpened(): Promise<void> {}
  async notifyPositionClosed(): Promise<void> {}
  async sendText(_text: string): Promise<void> {}
}
