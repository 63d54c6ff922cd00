/** Returns `value` when it is a finite number above zero; throws naming `label` otherwise. */
export function positiveOrThrow(value: number, label: string): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${label}: expected a positive finite number, got ${value}`);
  }
  return value;
}
