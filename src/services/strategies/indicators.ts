import { Bar } from '../../types/trading';

export class TechnicalIndicators {
  /**
   * Simple Moving Average of the last `period` values. Returns 0 when there are too few.
   */
  static SMA(values: readonly number[], period: number): number {
    if (values.length < period || period <= 0) return 0;
    const slice = values.slice(-period);
    return slice.reduce((sum, value) => sum + value, 0) / period;
  }

  /**
   * Wilder-smoothed RSI. 50 when there is not enough history, 100 with no losses.
   */
  static RSI(prices: readonly number[], period: number = 14): number {
    if (prices.length < period + 1) return 50;

    let gains = 0;
    let losses = 0;
    for (let i = 1; i <= period; i++) {
      const change = prices[i] - prices[i - 1];
      if (change > 0) gains += change;
      else losses -= change;
    }

    let avgGain = gains / period;
    let avgLoss = losses / period;

    for (let i = period + 1; i < prices.length; i++) {
      const change = prices[i] - prices[i - 1];
      avgGain = (avgGain * (period - 1) + Math.max(change, 0)) / period;
      avgLoss = (avgLoss * (period - 1) + Math.max(-change, 0)) / period;
    }

    if (avgLoss === 0) return avgGain === 0 ? 50 : 100;
    const rs = avgGain / avgLoss;
    return 100 - 100 / (1 + rs);
  }

  /**
   * Average True Range over the last `period` bars (simple mean of true ranges).
   */
  static ATR(bars: readonly Bar[], period: number = 14): number {
    if (bars.length < 2) return 0;
    const ranges: number[] = [];
    for (let i = 1; i < bars.length; i++) {
      const { high, low } = bars[i];
      const prevClose = bars[i - 1].close;
      ranges.push(Math.max(high - low, Math.abs(high - prevClose), Math.abs(low - prevClose)));
    }
    const window = ranges.slice(-period);
    return window.reduce((sum, r) => sum + r, 0) / window.length;
  }

  /** Percent change between the close `n` bars ago and the last close. */
  static percentChange(prices: readonly number[], n: number): number {
    if (prices.length <= n || n <= 0) return 0;
    const past = prices[prices.length - 1 - n];
    const last = prices[prices.length - 1];
    return past === 0 ? 0 : ((last - past) / past) * 100;
  }

  /** Last volume over the mean of the `period` volumes before it. */
  static volumeRatio(bars: readonly Bar[], period: number = 20): number {
    if (bars.length < 2) return 0;
    const previous = bars.slice(-period - 1, -1);
    const average = previous.reduce((sum, b) => sum + b.volume, 0) / previous.length;
    return average === 0 ? 0 : bars[bars.length - 1].volume / average;
  }

  /** Standard deviation of bar-to-bar percent returns. */
  static volatility(prices: readonly number[], period: number = 24): number {
    const window = prices.slice(-(period + 1));
    if (window.length < 3) return 0;
    const returns: number[] = [];
    for (let i = 1; i < window.length; i++) {
      returns.push(((window[i] - window[i - 1]) / window[i - 1]) * 100);
    }
    const mean = returns.reduce((sum, r) => sum + r, 0) / returns.length;
    const variance = returns.reduce((sum, r) => sum + (r - mean) ** 2, 0) / (returns.length - 1);
    return Math.sqrt(variance);
  }

  /** Highest high and lowest low over `bars`. */
  static range(bars: readonly Bar[]): { high: number; low: number } {
    let high = -Infinity;
    let low = Infinity;
    for (const bar of bars) {
      high = Math.max(high, bar.high);
      low = Math.min(low, bar.low);
    }
    return { high, low };
  }
}

export const closes = (bars: readonly Bar[]): number[] => bars.map((b) => b.close);
