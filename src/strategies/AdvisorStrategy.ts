/**
 * Trades on the advisor's BUY/SELL signal when its confidence clears the threshold
 */

import { OrderIntent } from '../models/Order';
import { Position } from '../models/Position';
import { LedgerView, balanceOf, openOrdersFor } from '../services/OrderLedger';
import { roundDown, roundToPrecision } from '../utils/precision';
import { MarketSnapshot, Strategy } from './Strategy';

export interface AdvisorStrategyOptions {
  /** Minimum confidence (0-10) required to act */
  confidenceThreshold: number;
  /** Share of available balance committed to a new position */
  maxPositionPercent: number;
  /** Absolute cap on a new position's value in the quote asset */
  maxPositionValue: number;
  /** Positions worth less than this are not opened */
  minNotional: number;
  /** Signals older than this are ignored */
  maxSignalAgeMs: number;
  /** Distance of the preset stop-loss from the entry price, in percent; 0 or unset disables it */
  stopLossPercent?: number;
  takeProfitPercent?: number;
}

export class AdvisorStrategy implements Strategy {
  readonly name = 'advisor';
  private readonly options: AdvisorStrategyOptions;

  constructor(options: AdvisorStrategyOptions) {
    this.options = options;
  }

  decide(market: MarketSnapshot, ledger: LedgerView, position: Position): OrderIntent[] {
    const { signal, instrument, book } = market;
    if (!signal || signal.action === 'hold' || signal.confidence < this.options.confidenceThreshold) {
      return [];
    }
    if (market.takenAt.getTime() - signal.receivedAt.getTime() > this.options.maxSignalAgeMs) {
      return [];
    }
    // wait for in-flight orders to settle
    if (openOrdersFor(ledger, instrument.symbol).length > 0) {
      return [];
    }

    const goLong = signal.action === 'buy';
    if ((goLong && position.quantity > 0) || (!goLong && position.quantity < 0)) {
      return [];
    }

    const price = goLong ? book.asks[0]?.price : book.bids[0]?.price;
    if (price === undefined || price <= 0) {
      return [];
    }

    const side = goLong ? 'buy' : 'sell';
    const intents: OrderIntent[] = [];
    if (position.quantity !== 0) {
      intents.push({
        instrument: instrument.symbol,
        side,
        quantity: Math.abs(position.quantity),
        price,
        reduceOnly: true,
        tag: goLong ? 'close_short' : 'close_long'
      });
    }

    const quantity = this.positionSize(balanceOf(ledger, instrument.quoteAsset).available, price, instrument.quantityPrecision);
    if (quantity * price >= this.options.minNotional && quantity >= instrument.minOrderSize) {
      intents.push({
        instrument: instrument.symbol,
        side,
        quantity,
        price,
        ...this.protectiveExits(goLong, price, instrument.pricePrecision),
        tag: goLong ? 'open_long' : 'open_short'
      });
    }

    return intents;
  }

  /**
   * Percentage of available balance, capped by the absolute maximum, rounded down to the lot precision
   */
  positionSize(available: number, price: number, quantityPrecision: number): number {
    const value = Math.min(available * (this.options.maxPositionPercent / 100), this.options.maxPositionValue);
    if (value <= 0) {
      return 0;
    }
    return roundDown(value / price, quantityPrecision);
  }

  /**
   * Stop-loss below and take-profit above a long entry; mirrored for a short
   */
  protectiveExits(
    goLong: boolean,
    entry: number,
    pricePrecision: number
  ): Pick<OrderIntent, 'stopLossPrice' | 'takeProfitPrice'> {
    const exits: Pick<OrderIntent, 'stopLossPrice' | 'takeProfitPrice'> = {};
    const direction = goLong ? 1 : -1;
    const { stopLossPercent, takeProfitPercent } = this.options;
    if (stopLossPercent !== undefined && stopLossPercent > 0) {
      exits.stopLossPrice = roundToPrecision(entry * (1 - (direction * stopLossPercent) / 100), pricePrecision);
    }
    if (takeProfitPercent !== undefined && takeProfitPercent > 0) {
      exits.takeProfitPrice = roundToPrecision(entry * (1 + (direction * takeProfitPercent) / 100), pricePrecision);
    }
    return exits;
  }
}
