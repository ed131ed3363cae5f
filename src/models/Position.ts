/**
 * Net position per instrument, derived from fills only
 */

export interface Position {
  instrument: string;
  /** Positive for long, negative for short */
  quantity: number;
  averageEntryPrice: number;
  realizedPnl: number;
  unrealizedPnl: number;
  updatedAt: Date;
}

export function emptyPosition(instrument: string): Position {
  return {
    instrument,
    quantity: 0,
    averageEntryPrice: 0,
    realizedPnl: 0,
    unrealizedPnl: 0,
    updatedAt: new Date(0)
  };
}
