import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { isMainModule } from "@candle-trader/kit";
import { resolvePolicyConfig } from "@candle-trader/signals";
import { loadConfig } from "./lib/load-config.js";
import { loadEnv } from "./lib/load-env.js";
import { logger } from "./lib/logger.js";
import { WsBroker } from "./lib/ws-broker.js";
import { TradingEngine } from "./application/trading-engine.js";
import { createAlertsClient, createMarketDataSource, createOrderGateway } from "./application/build-trader.js";
import { createApp } from "./create-app.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const log = logger.createChild("daemon");

async function main() {
  const config = loadConfig(join(__dirname, "../trader-config.json"));

  // Apply per-module log levels before any child loggers are used
  logger.setLogConfig(config.logLevels);

  const env = loadEnv();
  const port = env.PORT ?? config.port;
  const policy = resolvePolicyConfig(config.strategy, config.policy);
  logger.info({ mode: config.mode, exchange: config.exchange, symbol: config.symbol, interval: config.interval, strategy: config.strategy, feed: config.feed.kind }, "Starting trader daemon");

  const source = createMarketDataSource(config);
  const gateway = createOrderGateway(config, env);
  const alerts = createAlertsClient(config);
  const engine = new TradingEngine({
    config,
    feed: config.feed,
    policy,
    source,
    gateway,
    alerts,
    onCycle: (status) => wsBroker.broadcastEvent("status", status),
    onDecision: (decision, candle) => wsBroker.broadcastEvent("decision", { ...decision, t: candle.t, close: candle.c }),
    onTrade: (trade) => wsBroker.broadcastEvent("trade", trade),
  });

  const wsBroker = new WsBroker(() => engine.getStatus());
  const app = createApp({ engine });
  const server = app.listen(port, () => {
    logger.info({ port }, "Trader server listening");
  });

  wsBroker.attach(server);
  logger.info("WebSocket broker attached on /ws");

  if (config.autoStart || env.AUTO_START) {
    engine.start();
  } else {
    logger.info("Auto-start disabled; POST /api/start to begin trading");
  }

  const shutdown = async () => {
    logger.info("Shutting down...");
    engine.stop();
    await engine.whenStopped();
    await source.close?.();
    wsBroker.close();
    server.close();
    const { totalTrades, totalPnl } = engine.getStatus();
    logger.info({ totalTrades, totalPnl }, "Shutdown complete");
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      log.error({ action: "shutdown", err }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
}

if (isMainModule(import.meta.url)) {
  main().catch((err) => {
    logger.error(err, "Fatal error");
    process.exit(1);
  });
}
