/**
 * Order book data models
 */

export interface BookLevel {
  price: number;
  quantity: number;
}

export interface OrderBookSnapshot {
  instrument: string;
  /** Strictly decreasing by price */
  bids: readonly BookLevel[];
  /** Strictly increasing by price */
  asks: readonly BookLevel[];
  version: number;
  timestamp: Date;
}
