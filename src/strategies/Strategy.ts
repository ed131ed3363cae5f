/**
 * Strategy capability: a pure function from market and ledger state to order intents
 */

import { Instrument } from '../models/Instrument';
import { OrderBookSnapshot } from '../models/OrderBook';
import { OrderIntent } from '../models/Order';
import { Position } from '../models/Position';
import { LedgerView } from '../services/OrderLedger';

export type SignalAction = 'buy' | 'sell' | 'hold';

export interface AdvisorSignal {
  action: SignalAction;
  /** 0 to 10 */
  confidence: number;
  reason: string;
  receivedAt: Date;
}

export interface MarketSnapshot {
  instrument: Instrument;
  book: OrderBookSnapshot;
  signal?: AdvisorSignal;
  takenAt: Date;
}

export interface Strategy {
  readonly name: string;
  decide(market: MarketSnapshot, ledger: LedgerView, position: Position): OrderIntent[];
}
