/**
 * Relative Strength Index over the last `period` close-to-close deltas,
 * using plain means of gains and losses (no Wilder smoothing).
 *
 * Saturates to 100 when the average loss is exactly zero, including a
 * perfectly flat series. Returns NaN when fewer than `period + 1` values exist.
 */
export function rsiSimple(values: number[], period: number): number {
  if (period < 1) throw new Error("RSI period must be >= 1");
  if (values.length < period + 1) return NaN;

  let gains = 0;
  let losses = 0;
  for (let i = values.length - period; i < values.length; i++) {
    const delta = values[i] - values[i - 1];
    if (delta > 0) gains += delta;
    else if (delta < 0) losses -= delta;
  }

  const avgGain = gains / period;
  const avgLoss = losses / period;
  if (avgLoss === 0) return 100;

  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}
