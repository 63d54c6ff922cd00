import type { TraderConfig } from "../types/config.js";
import type { MarketDataSource } from "../types/market-data.js";
import type { OrderGateway } from "../types/order-gateway.js";
import type { AlertsClient } from "../types/alerts-client.js";
import { requireLiveCredentials, type Env } from "../lib/load-env.js";
import { createProExchange, createRestExchange } from "../adapters/ccxt-exchange.js";
import { CcxtCandlePoller } from "../adapters/candle-poller.js";
import { CcxtCandleStreamer } from "../adapters/candle-streamer.js";
import { SandboxOrderGateway } from "../adapters/sandbox-gateway.js";
import { CcxtOrderGateway } from "../adapters/ccxt-gateway.js";
import { HttpAlertsClient, NoopAlertsClient } from "../adapters/alerts-client.js";

export function createMarketDataSource(config: TraderConfig): MarketDataSource {
  const { exchange, symbol, interval } = config;
  const rest = createRestExchange(exchange);
  if (config.feed.kind === "stream") {
    return new CcxtCandleStreamer({ exchange: createProExchange(exchange), rest, symbol, interval });
  }
  return new CcxtCandlePoller({ exchange: rest, symbol, interval });
}

/** Sandbox needs no credentials; live mode refuses to start without them. */
export function createOrderGateway(config: TraderConfig, env: Env): OrderGateway {
  if (config.mode === "sandbox") return new SandboxOrderGateway();
  const credentials = requireLiveCredentials(env);
  return new CcxtOrderGateway({ exchange: createRestExchange(config.exchange, credentials), symbol: config.symbol });
}

export function createAlertsClient(config: TraderConfig): AlertsClient {
  return config.gatewayUrl ? new HttpAlertsClient(config.gatewayUrl) : new NoopAlertsClient();
}
