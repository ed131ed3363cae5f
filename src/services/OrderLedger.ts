/**
 * Authoritative local view of orders, positions and balances
 * All mutation goes through applyEvent (synchronous) and reconcile (serialized per instrument)
 */

import { randomUUID } from 'crypto';
import { Balance } from '../models/Balance';
import { Fill, Order, OrderIntent, OrderRef, isTerminalState, signedQuantity } from '../models/Order';
import { Position, emptyPosition } from '../models/Position';
import {
  BalanceEvent,
  ExchangeEvent,
  ExchangeOrderState,
  OrderAckEvent,
  OrderCancelledEvent,
  OrderFillEvent,
  OrderRejectedEvent
} from '../models/ExchangeEvent';
import {
  ApplicationError,
  ErrorCategory,
  ErrorSeverity,
  RiskViolation,
  makeContext
} from '../utils/ErrorHandler';
import { KeyedMutex } from '../utils/KeyedMutex';
import { TradingSession } from './TradingSession';

const EPSILON = 1e-9;

export type LedgerOutcome =
  | 'applied'
  | 'duplicate'
  | 'ignored_terminal'
  | 'unknown_order'
  | 'invalid_transition'
  | 'diverged'
  | 'ignored';

/**
 * The exchange reports activity on an order the ledger already settled
 */
export interface LedgerDivergence {
  clientOrderId: string;
  localState: Order['state'];
  localFilled: number;
  /** Null when the report carries no fill total */
  reportedFilled: number | null;
  detail: string;
}

export interface LedgerApplyResult {
  outcome: LedgerOutcome;
  order?: Order;
  divergence?: LedgerDivergence;
}

/**
 * Immutable read model handed to strategies and the risk gate
 */
export interface LedgerView {
  readonly openOrders: readonly Order[];
  readonly positions: Readonly<Record<string, Position>>;
  readonly balances: Readonly<Record<string, Balance>>;
  readonly takenAt: Date;
}

export interface ReconcileReport {
  instrument: string;
  checked: number;
  caughtUp: string[];
  resolved: Array<{ clientOrderId: string; state: Order['state'] }>;
  unresolved: Array<{ clientOrderId: string; reason: string }>;
}

/**
 * The exchange queries reconcile needs
 */
export interface ReconcileSource {
  fetchOpenOrders(instrument?: string): Promise<ExchangeOrderState[]>;
  fetchOrder(ref: OrderRef): Promise<ExchangeOrderState | null>;
}

export interface LedgerSnapshot {
  savedAt: Date;
  lastSequence: number | null;
  orders: Order[];
  positions: Position[];
  balances: Balance[];
}

export interface OrderLedgerOptions {
  /** Terminal orders kept queryable before the oldest are dropped */
  archiveRetention?: number;
  generateClientOrderId?: () => string;
}

export function positionOf(view: LedgerView, instrument: string): Position {
  return view.positions[instrument] ?? emptyPosition(instrument);
}

export function openOrdersFor(view: LedgerView, instrument: string): Order[] {
  return view.openOrders.filter(order => order.instrument === instrument);
}

export function balanceOf(view: LedgerView, asset: string): Balance {
  return view.balances[asset] ?? emptyBalance(asset);
}

function emptyBalance(asset: string): Balance {
  return { asset, available: 0, reserved: 0, total: 0, updatedAt: new Date(0) };
}

function copyOrder(order: Order): Order {
  return Object.freeze({
    ...order,
    createdAt: new Date(order.createdAt.getTime()),
    updatedAt: new Date(order.updatedAt.getTime()),
    fills: order.fills.map(fill => ({ ...fill, timestamp: new Date(fill.timestamp.getTime()) }))
  });
}

export class OrderLedger {
  private orders: Map<string, Order> = new Map();
  private archive: Map<string, Order> = new Map();
  private positions: Map<string, Position> = new Map();
  private balances: Map<string, Balance> = new Map();
  private marks: Map<string, number> = new Map();
  private lastSequence: number | null = null;
  private readonly mutex = new KeyedMutex();
  private readonly session: TradingSession;
  private readonly archiveRetention: number;
  private readonly generateClientOrderId: () => string;

  constructor(session: TradingSession, options: OrderLedgerOptions = {}) {
    this.session = session;
    this.archiveRetention = options.archiveRetention ?? 1000;
    this.generateClientOrderId = options.generateClientOrderId ?? (() => `tc${randomUUID().replace(/-/g, '')}`);
  }

  /**
   * Records an approved intent as Pending and reserves price x quantity of the quote asset
   */
  createOrder(intent: OrderIntent, clientOrderId: string = this.generateClientOrderId()): Order {
    const context = makeContext('createOrder', 'OrderLedger', { instrument: intent.instrument, clientOrderId });
    if (this.orders.has(clientOrderId) || this.archive.has(clientOrderId)) {
      throw new ApplicationError(
        `Client order id ${clientOrderId} already used`,
        'DUPLICATE_CLIENT_ORDER_ID',
        ErrorCategory.VALIDATION,
        ErrorSeverity.MEDIUM,
        context
      );
    }

    const reduceOnly = intent.reduceOnly ?? false;
    const reservation = reduceOnly ? 0 : intent.price * intent.quantity;
    const balance = this.mutableBalance(this.quoteAsset(intent.instrument));
    if (reservation > balance.available + EPSILON) {
      throw new RiskViolation(
        'insufficient_balance',
        `reservation ${reservation} exceeds available ${balance.available}`,
        context
      );
    }

    const now = new Date(this.session.now());
    balance.available -= reservation;
    balance.reserved += reservation;
    balance.updatedAt = now;

    const order: Order = {
      clientOrderId,
      exchangeOrderId: null,
      instrument: intent.instrument,
      side: intent.side,
      price: intent.price,
      quantity: intent.quantity,
      filledQuantity: 0,
      averageFillPrice: 0,
      reservedAmount: reservation,
      reduceOnly,
      state: 'pending',
      createdAt: now,
      updatedAt: now,
      fills: []
    };
    this.orders.set(clientOrderId, order);
    return copyOrder(order);
  }

  /**
   * Applies one stream event; order and balance effects happen in a single step
   */
  applyEvent(event: ExchangeEvent): LedgerApplyResult {
    if (event.sequence !== undefined) {
      this.lastSequence = Math.max(this.lastSequence ?? event.sequence, event.sequence);
    }

    switch (event.type) {
      case 'order_ack':
        return this.applyAck(event);
      case 'order_fill':
        return this.applyFill(event);
      case 'order_cancelled':
        return this.applyCancel(event);
      case 'order_rejected':
        return this.applyReject(event);
      case 'balance':
        this.applyBalance(event);
        return { outcome: 'applied' };
      default:
        return { outcome: 'ignored' };
    }
  }

  /**
   * Diffs local live orders for one instrument against the exchange and resolves every difference
   */
  async reconcile(source: ReconcileSource, instrument: string): Promise<ReconcileReport> {
    return this.mutex.runExclusive(instrument, () => this.reconcileInstrument(source, instrument));
  }

  /**
   * Runs a task while no reconcile can touch the instrument
   */
  withInstrumentLock<T>(instrument: string, task: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(instrument, task);
  }

  getOrder(clientOrderId: string): Order | undefined {
    const order = this.orders.get(clientOrderId) ?? this.archive.get(clientOrderId);
    return order ? copyOrder(order) : undefined;
  }

  openOrders(instrument?: string): Order[] {
    return [...this.orders.values()]
      .filter(order => instrument === undefined || order.instrument === instrument)
      .map(copyOrder);
  }

  position(instrument: string): Position {
    const position = this.positions.get(instrument);
    return Object.freeze(position ? { ...position } : emptyPosition(instrument));
  }

  balance(asset: string): Balance {
    const balance = this.balances.get(asset);
    return Object.freeze(balance ? { ...balance } : emptyBalance(asset));
  }

  /**
   * Updates unrealized P&L from the latest mid price
   */
  markToMarket(instrument: string, midPrice: number): void {
    this.marks.set(instrument, midPrice);
    const position = this.positions.get(instrument);
    if (position) {
      position.unrealizedPnl = position.quantity * (midPrice - position.averageEntryPrice);
    }
  }

  view(): LedgerView {
    const positions: Record<string, Position> = {};
    for (const [instrument, position] of this.positions) {
      positions[instrument] = Object.freeze({ ...position });
    }
    const balances: Record<string, Balance> = {};
    for (const [asset, balance] of this.balances) {
      balances[asset] = Object.freeze({ ...balance });
    }
    return Object.freeze({
      openOrders: Object.freeze(this.openOrders()),
      positions: Object.freeze(positions),
      balances: Object.freeze(balances),
      takenAt: new Date(this.session.now())
    });
  }

  getLastSequence(): number | null {
    return this.lastSequence;
  }

  toSnapshot(): LedgerSnapshot {
    return {
      savedAt: new Date(this.session.now()),
      lastSequence: this.lastSequence,
      orders: [...this.orders.values(), ...this.archive.values()].map(copyOrder),
      positions: [...this.positions.values()].map(position => ({ ...position })),
      balances: [...this.balances.values()].map(balance => ({ ...balance }))
    };
  }

  /**
   * Replaces all state with a previously saved snapshot
   */
  restore(snapshot: LedgerSnapshot): void {
    this.orders.clear();
    this.archive.clear();
    this.positions.clear();
    this.balances.clear();
    for (const saved of snapshot.orders) {
      const order: Order = { ...saved, fills: saved.fills.map(fill => ({ ...fill })) };
      (isTerminalState(order.state) ? this.archive : this.orders).set(order.clientOrderId, order);
    }
    for (const position of snapshot.positions) {
      this.positions.set(position.instrument, { ...position });
    }
    for (const balance of snapshot.balances) {
      this.balances.set(balance.asset, { ...balance });
    }
    this.lastSequence = snapshot.lastSequence;
    this.trimArchive();
  }

  private applyAck(event: OrderAckEvent): LedgerApplyResult {
    const order = this.orders.get(event.clientOrderId);
    if (!order) {
      return this.missing(event.clientOrderId, archived =>
        archived.state === 'rejected' ? 'acknowledged after local rejection' : null
      );
    }
    if (!order.exchangeOrderId) {
      order.exchangeOrderId = event.exchangeOrderId;
    }
    if (order.state === 'pending') {
      order.state = 'acknowledged';
      order.updatedAt = event.timestamp;
      return { outcome: 'applied', order: copyOrder(order) };
    }
    return { outcome: 'duplicate', order: copyOrder(order) };
  }

  private applyFill(event: OrderFillEvent): LedgerApplyResult {
    const order = this.orders.get(event.clientOrderId);
    if (!order) {
      return this.missing(event.clientOrderId, archived => {
        if (archived.fills.some(fill => fill.fillId === event.fillId)) return null;
        if (event.cumulativeFilled !== undefined) {
          return event.cumulativeFilled > archived.filledQuantity + EPSILON
            ? `fill ${event.fillId} raises the fill total to ${event.cumulativeFilled}`
            : null;
        }
        return archived.state === 'rejected' ? `fill ${event.fillId} on a rejected order` : null;
      }, event.cumulativeFilled ?? null);
    }
    if (order.fills.some(fill => fill.fillId === event.fillId)) {
      return { outcome: 'duplicate', order: copyOrder(order) };
    }

    let quantity = Math.min(Math.max(event.quantity, 0), order.quantity - order.filledQuantity);
    if (event.cumulativeFilled !== undefined) {
      // quantity already booked by a reconcile catch-up is not counted again
      quantity = Math.min(quantity, Math.max(0, event.cumulativeFilled - order.filledQuantity));
    }
    if (event.exchangeOrderId && !order.exchangeOrderId) {
      order.exchangeOrderId = event.exchangeOrderId;
    }

    this.bookFill(order, {
      fillId: event.fillId,
      quantity,
      price: event.price,
      fee: event.fee,
      timestamp: event.timestamp
    });
    return { outcome: 'applied', order: copyOrder(order) };
  }

  private applyCancel(event: OrderCancelledEvent): LedgerApplyResult {
    const order = this.orders.get(event.clientOrderId);
    if (!order) {
      return this.missing(
        event.clientOrderId,
        archived =>
          event.filledQuantity > archived.filledQuantity + EPSILON
            ? `cancel reports ${event.filledQuantity} filled`
            : null,
        event.filledQuantity
      );
    }
    if (event.exchangeOrderId && !order.exchangeOrderId) {
      order.exchangeOrderId = event.exchangeOrderId;
    }

    this.catchUpFills(order, event.filledQuantity, event.averageFillPrice, event.timestamp, 'cancel');
    if (!isTerminalState(order.state)) {
      this.releaseReservation(order);
      this.finalize(order, 'cancelled', event.timestamp, event.reason);
    }
    return { outcome: 'applied', order: copyOrder(order) };
  }

  private applyReject(event: OrderRejectedEvent): LedgerApplyResult {
    const order = this.orders.get(event.clientOrderId);
    if (!order) {
      return this.missing(event.clientOrderId);
    }
    if (order.state !== 'pending') {
      return { outcome: 'invalid_transition', order: copyOrder(order) };
    }
    this.releaseReservation(order);
    this.finalize(order, 'rejected', event.timestamp, `${event.code}: ${event.reason}`);
    return { outcome: 'applied', order: copyOrder(order) };
  }

  /**
   * Sets the exchange total; available follows the report and is clamped below total - reserved
   */
  private applyBalance(event: BalanceEvent): void {
    const balance = this.mutableBalance(event.asset);
    const previousTotal = balance.total;
    balance.total = event.total;
    const proposed = event.available ?? balance.available + (event.total - previousTotal);
    const ceiling = Math.max(0, balance.total - balance.reserved);
    balance.available = Math.min(Math.max(0, proposed), ceiling);
    balance.updatedAt = event.timestamp;
  }

  private async reconcileInstrument(source: ReconcileSource, instrument: string): Promise<ReconcileReport> {
    const local = [...this.orders.values()].filter(order => order.instrument === instrument);
    const report: ReconcileReport = { instrument, checked: local.length, caughtUp: [], resolved: [], unresolved: [] };
    if (local.length === 0) {
      return report;
    }

    const remote = await source.fetchOpenOrders(instrument);
    const byClientId = new Map(remote.map(state => [state.clientOrderId, state]));
    const byExchangeId = new Map(remote.map(state => [state.exchangeOrderId, state]));

    for (const order of local) {
      if (isTerminalState(order.state)) {
        continue;
      }
      const open =
        byClientId.get(order.clientOrderId) ??
        (order.exchangeOrderId ? byExchangeId.get(order.exchangeOrderId) : undefined);
      if (open) {
        this.catchUp(order, open);
        report.caughtUp.push(order.clientOrderId);
        continue;
      }

      let reported: ExchangeOrderState | null;
      try {
        reported = await source.fetchOrder({
          instrument,
          clientOrderId: order.clientOrderId,
          exchangeOrderId: order.exchangeOrderId
        });
      } catch (error) {
        if (error instanceof ApplicationError && error.isFatal) {
          throw error;
        }
        report.unresolved.push({
          clientOrderId: order.clientOrderId,
          reason: error instanceof Error ? error.message : String(error)
        });
        continue;
      }

      // the stream may have settled it while the query was in flight
      if (isTerminalState(order.state)) {
        continue;
      }
      this.resolve(order, reported, report);
    }

    return report;
  }

  private resolve(order: Order, reported: ExchangeOrderState | null, report: ReconcileReport): void {
    const at = new Date(this.session.now());

    if (!reported) {
      if (order.state === 'pending') {
        this.releaseReservation(order);
        this.finalize(order, 'rejected', at, 'not_found_on_exchange');
        report.resolved.push({ clientOrderId: order.clientOrderId, state: order.state });
      } else {
        report.unresolved.push({ clientOrderId: order.clientOrderId, reason: 'not_found_on_exchange' });
      }
      return;
    }

    switch (reported.status) {
      case 'open':
      case 'partially_filled':
        this.catchUp(order, reported);
        report.caughtUp.push(order.clientOrderId);
        return;
      case 'filled':
        this.adoptExchangeId(order, reported);
        this.catchUpFills(order, Math.max(reported.filledQuantity, order.quantity), reported.averageFillPrice, at, 'reconcile');
        break;
      case 'cancelled':
      case 'rejected':
        this.adoptExchangeId(order, reported);
        this.catchUpFills(order, reported.filledQuantity, reported.averageFillPrice, at, 'reconcile');
        if (!isTerminalState(order.state)) {
          this.releaseReservation(order);
          const state = reported.status === 'rejected' && order.filledQuantity <= EPSILON ? 'rejected' : 'cancelled';
          this.finalize(order, state, at, `reconciled_${reported.status}`);
        }
        break;
    }
    report.resolved.push({ clientOrderId: order.clientOrderId, state: order.state });
  }

  private catchUp(order: Order, reported: ExchangeOrderState): void {
    this.adoptExchangeId(order, reported);
    if (order.state === 'pending') {
      order.state = 'acknowledged';
      order.updatedAt = reported.updatedAt;
    }
    this.catchUpFills(order, reported.filledQuantity, reported.averageFillPrice, reported.updatedAt, 'reconcile');
  }

  private adoptExchangeId(order: Order, reported: ExchangeOrderState): void {
    if (!order.exchangeOrderId && reported.exchangeOrderId) {
      order.exchangeOrderId = reported.exchangeOrderId;
    }
  }

  /**
   * Books the difference between the exchange's cumulative fill and ours as one synthetic fill
   */
  private catchUpFills(
    order: Order,
    cumulative: number,
    averagePrice: number | undefined,
    at: Date,
    source: string
  ): void {
    const target = Math.min(cumulative, order.quantity);
    const missing = target - order.filledQuantity;
    if (missing <= EPSILON) {
      return;
    }

    let price = order.price;
    if (averagePrice !== undefined && averagePrice > 0) {
      const implied = (averagePrice * target - order.averageFillPrice * order.filledQuantity) / missing;
      price = Number.isFinite(implied) && implied > 0 ? implied : averagePrice;
    }

    this.bookFill(order, {
      fillId: `${source}:${order.clientOrderId}:${target}`,
      quantity: missing,
      price,
      fee: 0,
      timestamp: at
    });
  }

  /**
   * Order, position and balance change together for one fill
   */
  private bookFill(order: Order, fill: Fill): void {
    const balance = this.mutableBalance(this.quoteAsset(order.instrument));

    if (fill.quantity > 0) {
      const release = Math.min(order.reservedAmount, fill.quantity * order.price);
      order.reservedAmount -= release;
      balance.reserved = Math.max(0, balance.reserved - release);
      balance.available += release;

      const filled = order.filledQuantity + fill.quantity;
      order.averageFillPrice = (order.averageFillPrice * order.filledQuantity + fill.price * fill.quantity) / filled;
      order.filledQuantity = filled;
      this.applyToPosition(order.instrument, signedQuantity(order.side, fill.quantity), fill.price, balance, fill.timestamp);
    }

    if (fill.fee !== 0) {
      balance.available -= fill.fee;
      balance.total -= fill.fee;
      this.mutablePosition(order.instrument).realizedPnl -= fill.fee;
    }
    balance.updatedAt = fill.timestamp;

    order.fills.push(fill);
    order.updatedAt = fill.timestamp;

    if (order.filledQuantity >= order.quantity - EPSILON) {
      this.releaseReservation(order);
      this.finalize(order, 'filled', fill.timestamp);
    } else if (order.filledQuantity > 0) {
      order.state = 'partially_filled';
    }
  }

  /**
   * Opening exposure spends available at the fill price; closing returns cost plus realized P&L
   */
  private applyToPosition(instrument: string, signed: number, price: number, balance: Balance, at: Date): void {
    const position = this.mutablePosition(instrument);
    const current = position.quantity;

    if (current === 0 || Math.sign(current) === Math.sign(signed)) {
      const quantity = current + signed;
      position.averageEntryPrice =
        (Math.abs(current) * position.averageEntryPrice + Math.abs(signed) * price) / Math.abs(quantity);
      position.quantity = quantity;
      balance.available -= Math.abs(signed) * price;
    } else {
      const closing = Math.min(Math.abs(signed), Math.abs(current));
      const realized = closing * (price - position.averageEntryPrice) * Math.sign(current);
      position.realizedPnl += realized;
      balance.available += closing * position.averageEntryPrice + realized;
      balance.total += realized;

      const opening = Math.abs(signed) - closing;
      const remaining = current + signed;
      if (opening > EPSILON) {
        position.quantity = remaining;
        position.averageEntryPrice = price;
        balance.available -= opening * price;
      } else if (Math.abs(remaining) <= EPSILON) {
        position.quantity = 0;
        position.averageEntryPrice = 0;
      } else {
        position.quantity = remaining;
      }
    }

    const mark = this.marks.get(instrument);
    position.unrealizedPnl = mark === undefined ? 0 : position.quantity * (mark - position.averageEntryPrice);
    position.updatedAt = at;
  }

  private releaseReservation(order: Order): void {
    if (order.reservedAmount <= 0) {
      return;
    }
    const balance = this.mutableBalance(this.quoteAsset(order.instrument));
    balance.reserved = Math.max(0, balance.reserved - order.reservedAmount);
    balance.available += order.reservedAmount;
    order.reservedAmount = 0;
  }

  private finalize(order: Order, state: 'filled' | 'cancelled' | 'rejected', at: Date, reason?: string): void {
    order.state = state;
    order.updatedAt = at;
    if (reason !== undefined) {
      order.lastReason = reason;
    }
    this.orders.delete(order.clientOrderId);
    this.archive.set(order.clientOrderId, order);
    this.trimArchive();
  }

  private trimArchive(): void {
    while (this.archive.size > this.archiveRetention) {
      const oldest = this.archive.keys().next();
      if (oldest.done) break;
      this.archive.delete(oldest.value);
    }
  }

  /**
   * Events for settled orders are dropped unless the check finds the exchange disagreeing with the archive
   */
  private missing(
    clientOrderId: string,
    check: (archived: Order) => string | null = () => null,
    reportedFilled: number | null = null
  ): LedgerApplyResult {
    const archived = this.archive.get(clientOrderId);
    if (!archived) {
      return { outcome: 'unknown_order' };
    }
    const detail = check(archived);
    if (detail === null) {
      return { outcome: 'ignored_terminal', order: copyOrder(archived) };
    }
    return {
      outcome: 'diverged',
      order: copyOrder(archived),
      divergence: {
        clientOrderId,
        localState: archived.state,
        localFilled: archived.filledQuantity,
        reportedFilled,
        detail
      }
    };
  }

  private quoteAsset(instrument: string): string {
    return this.session.getInstrument(instrument)?.quoteAsset ?? this.session.marginCoin;
  }

  private mutableBalance(asset: string): Balance {
    let balance = this.balances.get(asset);
    if (!balance) {
      balance = emptyBalance(asset);
      this.balances.set(asset, balance);
    }
    return balance;
  }

  private mutablePosition(instrument: string): Position {
    let position = this.positions.get(instrument);
    if (!position) {
      position = emptyPosition(instrument);
      this.positions.set(instrument, position);
    }
    return position;
  }
}
