import type { Position, Trade } from "../types/ledger.js";
import type { AlertContext } from "../types/alerts-client.js";

function formatUsd(n: number): string {
  return n.toLocaleString("en-US", { style: "currency", currency: "USD" });
}

function pctChange(entry: number, target: number): string {
  const pct = ((target - entry) / entry) * 100;
  return `${pct >= 0 ? "+" : ""}${pct.toFixed(2)}%`;
}

export function formatOpenMessage(position: Position, ctx: AlertContext): string {
  const emoji = position.side === "long" ? "\u{1F7E2}" : "\u{1F534}";
  return [
    `${emoji} ${ctx.symbol} ${position.side.toUpperCase()} opened`,
    `Entry: ${formatUsd(position.entryPrice)}`,
    `Size: ${position.quantity}`,
    `Reason: ${position.reason}`,
    `Mode: ${ctx.mode}`,
  ].join("\n");
}

export function formatCloseMessage(trade: Trade, ctx: AlertContext): string {
  const emoji = trade.pnl >= 0 ? "✅" : "❌";
  const lines = [
    `${emoji} ${ctx.symbol} ${trade.side.toUpperCase()} closed`,
    `Entry: ${formatUsd(trade.entryPrice)} → Exit: ${formatUsd(trade.exitPrice)} (${pctChange(trade.entryPrice, trade.exitPrice)})`,
    `PnL: ${formatUsd(trade.pnl)}`,
  ];
  if (ctx.totalPnl !== undefined) lines.push(`Total PnL: ${formatUsd(ctx.totalPnl)}`);
  lines.push(`Reason: ${trade.reason}`, `Mode: ${ctx.mode}`);
  return lines.join("\n");
}
