/**
 * Tradable instrument metadata, sourced from exchange contract listings
 */

export interface Instrument {
  symbol: string;
  baseAsset: string;
  quoteAsset: string;
  /** Decimal places allowed in a price */
  pricePrecision: number;
  /** Decimal places allowed in a quantity */
  quantityPrecision: number;
  minOrderSize: number;
  minNotional: number;
}
