import pino from "pino";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";

const LOG_FILE_BASENAME = "trader";

// Fields that may carry exchange credentials (ccxt echoes its config on some errors)
const REDACT_PATHS = ["apiKey", "secret", "*.apiKey", "*.secret", "err.config.apiKey", "err.config.secret"];

const moduleLevels = new Map<string, string>();
const children = new Map<string, pino.Logger[]>();

function baseLevel(): string {
  return process.env.LOG_LEVEL ?? "info";
}

function logDir(): string {
  if (process.env.LOG_DIR) return process.env.LOG_DIR;
  return join(dirname(fileURLToPath(import.meta.url)), "../../logs");
}

function createRootLogger(): pino.Logger {
  if (process.env.VITEST) {
    return pino({ level: "silent" });
  }

  const level = baseLevel();
  return pino(
    { level, base: { service: LOG_FILE_BASENAME }, redact: { paths: REDACT_PATHS, censor: "[redacted]" } },
    pino.transport({
      targets: [
        { target: "pino/file", level, options: { destination: 1 } },
        {
          target: "pino-roll",
          level,
          options: {
            file: join(logDir(), LOG_FILE_BASENAME),
            frequency: "daily",
            dateFormat: "yyyy-MM-dd",
            extension: ".ndjson",
            mkdir: true,
          },
        },
      ],
    }),
  );
}

const root = createRootLogger();

export const logger = Object.assign(root, {
  /** Per-module level overrides from trader-config.json `logLevels`; also retunes existing children. */
  setLogConfig(overrides: Record<string, string>): void {
    moduleLevels.clear();
    for (const [module, level] of Object.entries(overrides)) moduleLevels.set(module, level);
    for (const [module, loggers] of children) {
      for (const child of loggers) child.level = moduleLevels.get(module) ?? root.level;
    }
  },

  createChild(module: string): pino.Logger {
    const child = root.child({ module });
    const level = moduleLevels.get(module);
    if (level) child.level = level;
    children.set(module, [...(children.get(module) ?? []), child]);
    return child;
  },
});
