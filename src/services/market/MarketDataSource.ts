import { Bar } from '../../types/trading';
import { SentimentReading } from '../strategies/Strategy';

export interface MarketDataSource {
  /** Most recent `limit` bars, oldest first. */
  fetchBars(symbol: string, interval: string, limit: number, signal?: AbortSignal): Promise<Bar[]>;
  fetchPrice(symbol: string, signal?: AbortSignal): Promise<number>;
  /** Percent per funding interval, or undefined when the venue has none. */
  fetchFundingRate?(symbol: string, signal?: AbortSignal): Promise<number | undefined>;
}

export interface SentimentSource {
  getScore(symbol: string, at: Date): Promise<SentimentReading | undefined>;
}
