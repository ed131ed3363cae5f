/**
 * Account balance per asset
 */

export interface Balance {
  asset: string;
  available: number;
  /** Locked against open orders */
  reserved: number;
  /** Last total reported by the exchange */
  total: number;
  updatedAt: Date;
}
