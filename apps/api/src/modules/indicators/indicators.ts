/**
 * Indicator series. Every function returns an array aligned with its input, holding
 * null across the warm-up region where the indicator has no meaningful value.
 */

export function sma(prices: readonly number[], period: number): Array<number | null> {
  const out: Array<number | null> = new Array<number | null>(prices.length).fill(null);
  if (period < 1 || prices.length < period) return out;

  let sum = 0;
  for (let i = 0; i < prices.length; i += 1) {
    sum += prices[i];
    if (i >= period) sum -= prices[i - period];
    if (i >= period - 1) out[i] = sum / period;
  }
  return out;
}

export function ema(prices: readonly number[], period: number): Array<number | null> {
  const out: Array<number | null> = new Array<number | null>(prices.length).fill(null);
  if (period < 1 || prices.length < period) return out;

  const k = 2 / (period + 1);
  let seed = 0;
  for (let i = 0; i < period; i += 1) seed += prices[i];
  let prev = seed / period;
  out[period - 1] = prev;

  for (let i = period; i < prices.length; i += 1) {
    prev = prices[i] * k + prev * (1 - k);
    out[i] = prev;
  }
  return out;
}

/** Wilder-smoothed RSI; the first value lands at index `period`. */
export function rsi(prices: readonly number[], period: number): Array<number | null> {
  const out: Array<number | null> = new Array<number | null>(prices.length).fill(null);
  if (period < 1 || prices.length < period + 1) return out;

  let gain = 0;
  let loss = 0;
  for (let i = 1; i <= period; i += 1) {
    const diff = prices[i] - prices[i - 1];
    if (diff >= 0) gain += diff;
    else loss -= diff;
  }
  let avgGain = gain / period;
  let avgLoss = loss / period;
  out[period] = toRsi(avgGain, avgLoss);

  for (let i = period + 1; i < prices.length; i += 1) {
    const diff = prices[i] - prices[i - 1];
    const g = diff > 0 ? diff : 0;
    const l = diff < 0 ? -diff : 0;
    avgGain = (avgGain * (period - 1) + g) / period;
    avgLoss = (avgLoss * (period - 1) + l) / period;
    out[i] = toRsi(avgGain, avgLoss);
  }
  return out;
}

function toRsi(avgGain: number, avgLoss: number): number {
  if (avgLoss === 0) return avgGain === 0 ? 50 : 100;
  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}
