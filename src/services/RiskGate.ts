/**
 * Pre-submission checks for order intents
 */

import { Balance } from '../models/Balance';
import { OrderIntent, signedQuantity } from '../models/Order';
import { RiskLimits } from '../models/RiskLimits';
import { LedgerView, positionOf } from './OrderLedger';
import { TradingSession } from './TradingSession';

export type RiskRejectionReason =
  | 'trading_halted'
  | 'instrument_not_allowed'
  | 'below_min_order_size'
  | 'max_position_exceeded'
  | 'max_order_notional_exceeded'
  | 'max_open_orders_reached'
  | 'min_order_interval'
  | 'insufficient_balance';

export type RiskDecision =
  | { approved: true }
  | { approved: false; reason: RiskRejectionReason; detail: string };

const EPSILON = 1e-9;

/**
 * Checks run in a fixed order and stop at the first failure.
 * The only state kept is the per-instrument time of the last approval.
 */
export class RiskGate {
  private readonly limits: RiskLimits;
  private readonly session: TradingSession;
  private lastApprovedAt: Map<string, number> = new Map();

  constructor(limits: RiskLimits, session: TradingSession) {
    this.limits = Object.freeze({ ...limits });
    this.session = session;
  }

  evaluate(intent: OrderIntent, view: LedgerView, balance: Balance): RiskDecision {
    if (this.session.isHalted()) {
      return reject('trading_halted', this.session.getHaltReason() ?? 'halted');
    }

    if (!this.session.isAllowed(intent.instrument)) {
      return reject('instrument_not_allowed', intent.instrument);
    }
    const instrument = this.session.getInstrument(intent.instrument);
    const minOrderSize = instrument?.minOrderSize ?? 0;
    if (intent.quantity <= 0 || intent.quantity < minOrderSize - EPSILON) {
      return reject('below_min_order_size', `${intent.quantity} < ${minOrderSize}`);
    }

    const position = positionOf(view, intent.instrument);
    const postTrade = position.quantity + signedQuantity(intent.side, intent.quantity);
    if (Math.abs(postTrade) > this.limits.maxPositionPerInstrument + EPSILON) {
      return reject('max_position_exceeded', `post-trade ${postTrade} > ${this.limits.maxPositionPerInstrument}`);
    }

    const notional = intent.price * intent.quantity;
    if (notional > this.limits.maxOrderNotional + EPSILON) {
      return reject('max_order_notional_exceeded', `${notional} > ${this.limits.maxOrderNotional}`);
    }

    const openCount = view.openOrders.length;
    if (openCount >= this.limits.maxOpenOrders) {
      return reject('max_open_orders_reached', `${openCount} open across all instruments`);
    }

    const now = this.session.now();
    const last = this.lastApprovedAt.get(intent.instrument);
    if (last !== undefined && now - last < this.limits.minOrderIntervalMs) {
      return reject('min_order_interval', `${now - last}ms since last order`);
    }

    const required = intent.reduceOnly ? 0 : notional;
    const belowFloor = !intent.reduceOnly && balance.available < this.limits.minAvailableBalance;
    if (required > balance.available + EPSILON || belowFloor) {
      return reject('insufficient_balance', `available ${balance.available}, required ${required}`);
    }

    this.lastApprovedAt.set(intent.instrument, now);
    return { approved: true };
  }
}

function reject(reason: RiskRejectionReason, detail: string): RiskDecision {
  return { approved: false, reason, detail };
}
