/** Round half away from zero to `dp` decimals (1.005 → 1.01). */
export function roundTo(value: number, dp: number): number {
  const factor = 10 ** dp;
  const shifted = Math.abs(value) * factor;
  const rounded = Math.round(Number(shifted.toPrecision(12))) / factor;
  return value < 0 ? -rounded : rounded;
}

export const roundCents = (value: number): number => roundTo(value, 2);
