// Types
export type { TraderConfig, FeedConfig, TraderMode } from "./types/config.js";
export { TraderConfigSchema, FeedConfigSchema } from "./types/config.js";
export type { FeedError, GatewayError, InvariantViolation, TraderError } from "./types/errors.js";
export type { LedgerState, Position, Trade, PerformanceSummary } from "./types/ledger.js";
export type { OrderGateway, OrderResult, OrderSide } from "./types/order-gateway.js";
export type { MarketDataSource, FeedResult } from "./types/market-data.js";
export type { AlertsClient, AlertContext } from "./types/alerts-client.js";
export type { StatusSnapshot, FeedStatus } from "./types/status.js";

// Domain
export { PositionLedger } from "./domain/position-ledger.js";
export type { LedgerResult } from "./domain/position-ledger.js";
export { summarize } from "./domain/performance.js";
export { FeedBackoff } from "./domain/feed-backoff.js";

// Adapters
export { CcxtCandlePoller } from "./adapters/candle-poller.js";
export { CcxtCandleStreamer } from "./adapters/candle-streamer.js";
export { ReplaySource } from "./adapters/replay-source.js";
export { SandboxOrderGateway } from "./adapters/sandbox-gateway.js";
export { CcxtOrderGateway } from "./adapters/ccxt-gateway.js";
export { HttpAlertsClient, NoopAlertsClient } from "./adapters/alerts-client.js";

// Application
export { TradingEngine } from "./application/trading-engine.js";
export type { TradingEngineDeps, CycleResult } from "./application/trading-engine.js";
export { createApp } from "./create-app.js";
