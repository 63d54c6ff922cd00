import ccxt from "ccxt";
import { isSanePrice } from "@candle-trader/kit";
import { intervalToMs, isValidCandle, type Candle, type CandleInterval } from "@candle-trader/signals";

/** One ccxt OHLCV row: [t, o, h, l, c, v]. ccxt types each field as possibly undefined. */
export type OhlcvRow = ReadonlyArray<number | undefined>;

export interface PlacedOrder {
  id: string;
  status?: string;
}

/** The slice of a ccxt REST exchange the trader uses. */
export interface RestExchange {
  fetchOHLCV(symbol: string, timeframe: string, since?: number, limit?: number): Promise<OhlcvRow[]>;
  createOrder(symbol: string, type: "market", side: "buy" | "sell", amount: number): Promise<PlacedOrder>;
  close?(): Promise<void>;
}

/** The slice of a ccxt pro exchange the trader uses. */
export interface ProExchange {
  watchOHLCV(symbol: string, timeframe: string, since?: number, limit?: number): Promise<OhlcvRow[]>;
  close?(): Promise<void>;
}

export interface ExchangeCredentials {
  apiKey: string;
  secret: string;
}

type ExchangeCtor<T> = new (config: Record<string, unknown>) => T;

function exchangeConfig(credentials?: ExchangeCredentials): Record<string, unknown> {
  return credentials ? { enableRateLimit: true, ...credentials } : { enableRateLimit: true };
}

export function createRestExchange(id: string, credentials?: ExchangeCredentials): RestExchange {
  const ctors = ccxt as unknown as Record<string, ExchangeCtor<RestExchange> | undefined>;
  const Ctor = ctors[id];
  if (!Ctor) throw new Error(`Unknown ccxt exchange: ${id}`);
  return new Ctor(exchangeConfig(credentials));
}

export function createProExchange(id: string): ProExchange {
  const pro = (ccxt as unknown as { pro: Record<string, ExchangeCtor<ProExchange> | undefined> }).pro;
  const Ctor = pro[id];
  if (!Ctor) throw new Error(`Unknown ccxt pro exchange: ${id}`);
  return new Ctor(exchangeConfig());
}

/** Parse a ccxt OHLCV row; null when a field is missing or the bar is not sane. */
export function parseOhlcvRow(row: OhlcvRow): Candle | null {
  const [t, o, h, l, c, v] = row;
  if (t === undefined || o === undefined || h === undefined || l === undefined || c === undefined) {
    return null;
  }
  const candle: Candle = { t, o, h, l, c, v: v ?? 0, n: 0 };
  if (!Number.isFinite(t) || !isValidCandle(candle) || !isSanePrice(c)) return null;
  return candle;
}

export interface ClosedCandles {
  candles: Candle[];
  /** Rows dropped by `parseOhlcvRow`. */
  malformed: number;
}

/**
 * Split raw rows into valid closed candles. A bar is closed once its interval
 * has fully elapsed at `now`; the in-progress bar is held back.
 */
export function toClosedCandles(rows: readonly OhlcvRow[], interval: CandleInterval, now: number): ClosedCandles {
  const ivlMs = intervalToMs(interval);
  const candles: Candle[] = [];
  let malformed = 0;
  for (const row of rows) {
    const candle = parseOhlcvRow(row);
    if (!candle) {
      malformed++;
      continue;
    }
    if (candle.t + ivlMs <= now) candles.push(candle);
  }
  candles.sort((a, b) => a.t - b.t);
  return { candles, malformed };
}
