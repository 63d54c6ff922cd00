import type { Position, Trade } from "./ledger.js";

export interface AlertContext {
  symbol: string;
  mode: string;
  totalPnl?: number;
}

export interface AlertsClient {
  notifyPositionOpened(position: Position, ctx: AlertContext): Promise<void>;
  notifyPositionClosed(trade: Trade, ctx: AlertContext): Promise<void>;
  sendText(text: string): Promise<void>;
}
