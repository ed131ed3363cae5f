/**
 * Rolling market statistics fetched on demand for the advisor
 */

export interface Ticker {
  instrument: string;
  lastPrice: number;
  high24h: number;
  low24h: number;
  /** Base-asset volume over the last 24 hours */
  baseVolume: number;
  /** Fractional price change since the UTC day open, 0.01 = 1% */
  changeRatio: number;
  timestamp: Date;
}

export interface Candle {
  openTime: Date;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}
