/** Range check for quoted prices. Catches feed glitches, not business rules. */
export function isSanePrice(value: number, max: number = 10_000_000): boolean {
  return Number.isFinite(value) && value > 0 && value < max;
}
