/**
 * Exponential moving average over `values`, seeded with the SMA of the first
 * `period` values. Returns null when there are not enough values.
 */
export function computeEMA(values: number[], period: number): number | null {
  if (period <= 0 || values.length < period) return null;

  const k = 2 / (period + 1);
  let ema = values.slice(0, period).reduce((a, b) => a + b, 0) / period;
  for (const v of values.slice(period)) {
    ema = v * k + ema * (1 - k);
  }
  return ema;
}

/** EMA for every period that has enough data, keyed by the period as a string. */
export function computeEMAs(values: number[], periods: readonly number[]): Record<string, number> {
  const out: Record<string, number> = {};
  for (const period of periods) {
    const ema = computeEMA(values, period);
    if (ema !== null) out[String(period)] = ema;
  }
  return out;
}
