/**
 * Execution Coordinator
 * Runs the stream loop and the decision loop against the shared cache and ledger
 */

import { IExchangeTransport } from '../connectors/ExchangeConnector';
import { BalanceEvent, ExchangeEvent, OrderEvent, isBookEvent, isOrderEvent } from '../models/ExchangeEvent';
import { OrderIntent, Order } from '../models/Order';
import { OrderBookSnapshot } from '../models/OrderBook';
import { Position } from '../models/Position';
import {
  ApplicationError,
  ConfigurationError,
  ExchangeRejection,
  RiskViolation,
  SequenceGapError,
  makeContext
} from '../utils/ErrorHandler';
import { LedgerStore } from '../utils/LedgerStore';
import { AdvisorSignal, MarketSnapshot, Strategy } from '../strategies/Strategy';
import { AdvisorPromptContext } from './AdvisorClient';
import { AuditService } from './AuditService';
import { MarketDataCache } from './MarketDataCache';
import { OrderLedger } from './OrderLedger';
import { RiskGate } from './RiskGate';
import { TradingSession } from './TradingSession';

export interface SignalSource {
  requestSignal(context: AdvisorPromptContext): Promise<AdvisorSignal>;
}

export interface ExecutionCoordinatorOptions {
  tickIntervalMs: number;
  /** How often the advisor is asked for a fresh signal */
  signalIntervalMs: number;
  /** How long shutdown waits for pending orders to be acknowledged */
  shutdownGraceMs: number;
  /** A book still missing this long after invalidation is requested again */
  bookResyncTimeoutMs: number;
  /** Resting orders older than this are cancelled */
  orderTimeoutMs: number;
  /** Decisions are skipped on a book older than this */
  maxBookAgeMs: number;
  candleGranularity: string;
  /** Candles fetched per signal request */
  candleLimit: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface CoordinatorDependencies {
  session: TradingSession;
  transport: IExchangeTransport;
  ledger: OrderLedger;
  riskGate: RiskGate;
  strategy: Strategy;
  auditService: AuditService;
  signalSource?: SignalSource;
  store?: LedgerStore;
}

export const DEFAULT_COORDINATOR_OPTIONS: ExecutionCoordinatorOptions = {
  tickIntervalMs: 15000,
  signalIntervalMs: 15 * 60 * 1000,
  shutdownGraceMs: 5000,
  bookResyncTimeoutMs: 10000,
  orderTimeoutMs: 10 * 60 * 1000,
  maxBookAgeMs: 30000,
  candleGranularity: '15m',
  candleLimit: 96
};

const SETTLE_POLL_MS = 50;

export class ExecutionCoordinator {
  readonly cache: MarketDataCache;
  private readonly session: TradingSession;
  private readonly transport: IExchangeTransport;
  private readonly ledger: OrderLedger;
  private readonly riskGate: RiskGate;
  private readonly strategy: Strategy;
  private readonly auditService: AuditService;
  private readonly signalSource?: SignalSource;
  private readonly store?: LedgerStore;
  private readonly options: ExecutionCoordinatorOptions;
  private readonly sleep: (ms: number) => Promise<void>;

  private signals: Map<string, AdvisorSignal> = new Map();
  private signalRequestedAt: Map<string, number> = new Map();
  private pendingResync: Map<string, string> = new Map();
  private cancelRequestedAt: Map<string, number> = new Map();
  private resyncTask: Promise<void> | null = null;
  private streamTask: Promise<void> | null = null;
  private tickTask: Promise<void> | null = null;
  private tickTimer: NodeJS.Timeout | null = null;
  private stopping = false;
  private stopped = false;

  constructor(dependencies: CoordinatorDependencies, options: Partial<ExecutionCoordinatorOptions> = {}) {
    this.session = dependencies.session;
    this.transport = dependencies.transport;
    this.ledger = dependencies.ledger;
    this.riskGate = dependencies.riskGate;
    this.strategy = dependencies.strategy;
    this.auditService = dependencies.auditService;
    this.signalSource = dependencies.signalSource;
    this.store = dependencies.store;
    this.options = { ...DEFAULT_COORDINATOR_OPTIONS, ...options };
    this.sleep = this.options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));
    this.cache = new MarketDataCache(this.session, (instrument, gap) => this.handleSequenceGap(instrument, gap));

    this.session.onHalt(reason => {
      this.auditService.notifyOperator('error', `Trading halted: ${reason}`, this.stateSummary());
    });
  }

  /**
   * Bootstraps session state, opens the streams and starts both loops
   */
  async start(): Promise<void> {
    const symbols = this.session.allowedInstruments();

    await this.transport.syncClock();
    this.session.registerInstruments(await this.transport.fetchInstruments(symbols));
    const unknown = symbols.filter(symbol => !this.session.getInstrument(symbol));
    if (unknown.length > 0) {
      throw new ConfigurationError(
        `No contract metadata for ${unknown.join(', ')}`,
        makeContext('start', 'ExecutionCoordinator')
      );
    }

    if (this.store) {
      const saved = await this.store.load();
      if (saved) {
        this.ledger.restore(saved);
      }
    }

    for (const report of await this.transport.fetchBalances()) {
      this.ledger.applyEvent({
        type: 'balance',
        asset: report.asset,
        total: report.total,
        available: report.available,
        timestamp: new Date(this.session.now())
      });
    }

    for (const symbol of symbols) {
      this.cache.invalidate(symbol);
    }
    await this.transport.connect(symbols);
    this.streamTask = this.runStreamLoop();
    for (const symbol of symbols) {
      if (this.ledger.openOrders(symbol).length > 0) {
        this.requestResync(symbol, 'startup');
      }
    }

    this.tickTimer = setInterval(() => this.scheduleTick(), this.options.tickIntervalMs);
    this.auditService.notifyOperator('info', `Trading core started with ${this.strategy.name} strategy`, {
      instruments: symbols,
      clockOffsetMs: this.session.getClockOffset()
    });
  }

  /**
   * Stops decisions, drains acknowledgements, reconciles once, closes the transport and persists the ledger
   */
  async shutdown(reason: string = 'shutdown'): Promise<void> {
    if (this.stopping) return;
    this.stopping = true;
    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = null;
    }
    await this.tickTask;

    await this.waitForPendingAcks(this.options.shutdownGraceMs);
    for (const symbol of this.session.allowedInstruments()) {
      if (this.ledger.openOrders(symbol).length === 0) continue;
      try {
        await this.ledger.reconcile(this.transport, symbol);
      } catch (error) {
        this.recordFailure('shutdown_reconcile', error, symbol);
      }
    }

    await this.transport.close();
    await this.streamTask;
    await this.resyncTask;

    if (this.store) {
      await this.store.save(this.ledger.toSnapshot());
    }
    this.stopped = true;
    this.auditService.notifyOperator('info', `Trading core stopped (${reason})`, this.stateSummary());
  }

  isRunning(): boolean {
    return this.streamTask !== null && !this.stopped;
  }

  /**
   * Queues a resync for one instrument, or all when none is given; runs outside the caller
   */
  requestResync(instrument: string | undefined, reason: string): void {
    const targets = instrument ? [instrument] : this.session.allowedInstruments();
    for (const target of targets) {
      this.pendingResync.set(target, reason);
    }
    this.auditService.logEvent('RESYNC_REQUESTED', { reason, instruments: targets }, { level: 'warn' });

    if (!this.resyncTask) {
      this.resyncTask = this.drainResyncs().finally(() => {
        this.resyncTask = null;
      });
    }
  }

  /**
   * Runs one decision pass over every instrument
   */
  async tick(): Promise<void> {
    for (const symbol of this.session.allowedInstruments()) {
      if (this.session.isHalted() || this.stopping) return;
      try {
        await this.decide(symbol);
      } catch (error) {
        this.recordFailure('decide', error, symbol);
      }
    }
  }

  /**
   * Applies one stream event; order events wait for the instrument lock so they never interleave with a submit
   */
  async handleEvent(event: ExchangeEvent): Promise<void> {
    if (isBookEvent(event)) {
      const outcome = this.cache.applyEvent(event);
      const mid = outcome === 'applied' ? this.cache.midPrice(event.instrument) : null;
      if (mid !== null) {
        this.ledger.markToMarket(event.instrument, mid);
      }
      return;
    }

    if (isOrderEvent(event)) {
      await this.ledger.withInstrumentLock(event.instrument, async () => this.applyLedgerEvent(event));
      return;
    }

    switch (event.type) {
      case 'resync_required':
        this.requestResync(event.instrument, event.reason);
        break;
      case 'stream_error':
        this.auditService.logEvent(
          'STREAM_ERROR',
          { stream: event.stream, code: event.code, message: event.message, fatal: event.fatal },
          { level: event.fatal ? 'error' : 'warn' }
        );
        if (event.fatal) {
          this.session.halt(`${event.stream} stream error ${event.code}: ${event.message}`);
        }
        break;
      case 'balance':
        this.applyLedgerEvent(event);
        break;
      case 'connection':
        this.auditService.logEvent('STREAM_CONNECTION', { stream: event.stream, state: event.state });
        break;
      default:
        break;
    }
  }

  private handleSequenceGap(instrument: string, gap: SequenceGapError): void {
    this.auditService.logEvent(
      'SEQUENCE_GAP',
      { message: gap.message, expected: gap.expected, received: gap.received },
      { level: 'warn', instrument }
    );
    this.requestResync(instrument, gap.message);
  }

  private applyLedgerEvent(event: OrderEvent | BalanceEvent): void {
    const result = this.ledger.applyEvent(event);
    if (result.outcome === 'diverged' && result.divergence && event.type !== 'balance') {
      const divergence = result.divergence;
      this.auditService.logEvent('LEDGER_DIVERGENCE', { ...divergence, eventType: event.type }, {
        level: 'error',
        instrument: event.instrument
      });
      this.session.halt(`Ledger diverged from exchange on ${divergence.clientOrderId}: ${divergence.detail}`);
      return;
    }
    if (result.outcome === 'unknown_order' || result.outcome === 'invalid_transition') {
      this.auditService.logEvent(
        'LEDGER_EVENT_IGNORED',
        { outcome: result.outcome, eventType: event.type, event },
        { level: 'warn', instrument: event.type === 'balance' ? undefined : event.instrument }
      );
    } else if (event.type === 'order_fill' && result.outcome === 'applied') {
      this.auditService.logEvent(
        'ORDER_FILL',
        { clientOrderId: event.clientOrderId, fillId: event.fillId, price: event.price, quantity: event.quantity },
        { instrument: event.instrument }
      );
    }
  }

  private async runStreamLoop(): Promise<void> {
    for await (const event of this.transport.streamEvents()) {
      try {
        await this.handleEvent(event);
      } catch (error) {
        this.recordFailure('handleEvent', error);
      }
    }
  }

  private scheduleTick(): void {
    if (this.tickTask || this.stopping) {
      return;
    }
    this.tickTask = this.tick().finally(() => {
      this.tickTask = null;
    });
  }

  private async decide(symbol: string): Promise<void> {
    const instrument = this.session.getInstrument(symbol);
    if (!instrument) return;

    await this.cancelExpiredOrders(symbol);

    const book = this.cache.snapshot(symbol);
    if (!book) {
      const since = this.cache.awaitingSnapshotSince(symbol);
      if (since !== null && this.session.now() - since > this.options.bookResyncTimeoutMs) {
        this.requestResync(symbol, 'book_missing');
      }
      return;
    }
    const age = this.cache.ageMs(symbol);
    if (age !== null && age > this.options.maxBookAgeMs) {
      this.auditService.logEvent(
        'BOOK_STALE',
        { ageMs: age, maxBookAgeMs: this.options.maxBookAgeMs },
        { level: 'warn', instrument: symbol }
      );
      return;
    }

    const position = this.ledger.position(symbol);
    await this.refreshSignal(symbol, book, position);

    const market: MarketSnapshot = {
      instrument,
      book,
      signal: this.signals.get(symbol),
      takenAt: new Date(this.session.now())
    };
    const intents = this.strategy.decide(market, this.ledger.view(), position);
    for (const intent of intents) {
      if (this.session.isHalted() || this.stopping) return;
      await this.execute(intent);
    }
  }

  private async refreshSignal(symbol: string, book: OrderBookSnapshot, position: Position): Promise<void> {
    if (!this.signalSource) return;
    const now = this.session.now();
    const last = this.signalRequestedAt.get(symbol);
    if (last !== undefined && now - last < this.options.signalIntervalMs) return;

    this.signalRequestedAt.set(symbol, now);
    const context: AdvisorPromptContext = { instrument: symbol, book, position };
    try {
      const [ticker, candles] = await Promise.all([
        this.transport.fetchTicker(symbol),
        this.transport.fetchCandles(symbol, this.options.candleGranularity, this.options.candleLimit)
      ]);
      context.ticker = ticker;
      context.candles = candles;
    } catch (error) {
      if (error instanceof ApplicationError && error.isFatal) {
        throw error;
      }
      this.auditService.logEvent(
        'MARKET_DATA_UNAVAILABLE',
        { message: error instanceof Error ? error.message : String(error) },
        { level: 'warn', instrument: symbol }
      );
    }
    this.signals.set(symbol, await this.signalSource.requestSignal(context));
  }

  /**
   * Cancels resting orders past the order timeout; the stream or a resync settles them
   */
  private async cancelExpiredOrders(symbol: string): Promise<void> {
    const now = this.session.now();
    const openIds = new Set(this.ledger.openOrders().map(order => order.clientOrderId));
    for (const clientOrderId of [...this.cancelRequestedAt.keys()]) {
      if (!openIds.has(clientOrderId)) this.cancelRequestedAt.delete(clientOrderId);
    }
    const expired = this.ledger
      .openOrders(symbol)
      .filter(order => order.state === 'acknowledged' || order.state === 'partially_filled')
      .filter(order => now - order.createdAt.getTime() > this.options.orderTimeoutMs)
      .filter(order => {
        const requested = this.cancelRequestedAt.get(order.clientOrderId);
        return requested === undefined || now - requested > this.options.orderTimeoutMs;
      });
    if (expired.length === 0) return;

    await this.ledger.withInstrumentLock(symbol, async () => {
      for (const order of expired) {
        // settled by the stream while waiting for the lock
        if (this.ledger.openOrders(symbol).every(open => open.clientOrderId !== order.clientOrderId)) continue;
        this.cancelRequestedAt.set(order.clientOrderId, now);
        try {
          await this.transport.cancelOrder({
            instrument: symbol,
            clientOrderId: order.clientOrderId,
            exchangeOrderId: order.exchangeOrderId
          });
          this.auditService.logEvent(
            'ORDER_CANCEL_REQUESTED',
            { clientOrderId: order.clientOrderId, ageMs: now - order.createdAt.getTime(), filled: order.filledQuantity },
            { instrument: symbol }
          );
        } catch (error) {
          if (error instanceof ExchangeRejection) {
            // usually already filled or cancelled on the exchange
            this.auditService.logEvent(
              'ORDER_CANCEL_REJECTED',
              { clientOrderId: order.clientOrderId, code: error.exchangeCode, message: error.message },
              { level: 'warn', instrument: symbol }
            );
            this.requestResync(symbol, 'cancel_rejected');
            continue;
          }
          throw error;
        }
      }
    });
  }

  /**
   * Risk check, pending order, submission and its ack or rejection, under the instrument lock
   */
  private async execute(intent: OrderIntent): Promise<void> {
    const quoteAsset = this.session.getInstrument(intent.instrument)?.quoteAsset ?? this.session.marginCoin;
    const decision = this.riskGate.evaluate(intent, this.ledger.view(), this.ledger.balance(quoteAsset));
    if (!decision.approved) {
      this.auditService.logEvent(
        'RISK_REJECTED',
        { reason: decision.reason, detail: decision.detail, intent },
        { level: 'warn', instrument: intent.instrument }
      );
      return;
    }

    await this.ledger.withInstrumentLock(intent.instrument, async () => {
      let order: Order;
      try {
        order = this.ledger.createOrder(intent);
      } catch (error) {
        if (error instanceof RiskViolation) {
          this.auditService.logEvent(
            'RISK_REJECTED',
            { reason: error.reason, detail: error.message, intent },
            { level: 'warn', instrument: intent.instrument }
          );
          return;
        }
        throw error;
      }

      try {
        const ack = await this.transport.submitOrder({
          clientOrderId: order.clientOrderId,
          instrument: order.instrument,
          side: order.side,
          quantity: order.quantity,
          price: order.price,
          reduceOnly: order.reduceOnly,
          ...(intent.stopLossPrice !== undefined ? { stopLossPrice: intent.stopLossPrice } : {}),
          ...(intent.takeProfitPrice !== undefined ? { takeProfitPrice: intent.takeProfitPrice } : {})
        });
        this.ledger.applyEvent({
          type: 'order_ack',
          instrument: order.instrument,
          clientOrderId: order.clientOrderId,
          exchangeOrderId: ack.exchangeOrderId,
          timestamp: ack.timestamp
        });
        this.auditService.logEvent(
          'ORDER_SUBMITTED',
          { clientOrderId: order.clientOrderId, exchangeOrderId: ack.exchangeOrderId, tag: intent.tag },
          { instrument: order.instrument }
        );
      } catch (error) {
        this.handleSubmitFailure(order, error);
      }
    });
  }

  private handleSubmitFailure(order: Order, error: unknown): void {
    if (error instanceof ExchangeRejection) {
      this.ledger.applyEvent({
        type: 'order_rejected',
        instrument: order.instrument,
        clientOrderId: order.clientOrderId,
        code: error.exchangeCode,
        reason: error.message,
        timestamp: new Date(this.session.now())
      });
      this.auditService.logEvent(
        'ORDER_REJECTED',
        { clientOrderId: order.clientOrderId, code: error.exchangeCode, message: error.message },
        { level: 'warn', instrument: order.instrument }
      );
      return;
    }

    // outcome unknown: the order may exist on the exchange
    this.recordFailure('submitOrder', error, order.instrument);
    this.requestResync(order.instrument, 'submit_outcome_unknown');
  }

  private async drainResyncs(): Promise<void> {
    for (;;) {
      const next = this.pendingResync.entries().next();
      if (next.done) return;
      const [symbol, reason] = next.value;
      this.pendingResync.delete(symbol);
      await this.resync(symbol, reason);
    }
  }

  /**
   * Fresh book, reconciled orders and refreshed balances for one instrument
   */
  private async resync(symbol: string, reason: string): Promise<void> {
    try {
      if (!this.stopping) {
        this.cache.invalidate(symbol);
        await this.transport.requestBookSnapshot(symbol);
      }
      const report = await this.ledger.reconcile(this.transport, symbol);
      for (const balance of await this.transport.fetchBalances()) {
        this.ledger.applyEvent({
          type: 'balance',
          asset: balance.asset,
          total: balance.total,
          available: balance.available,
          timestamp: new Date(this.session.now())
        });
      }
      this.auditService.logEvent(
        'RESYNC_COMPLETED',
        {
          reason,
          checked: report.checked,
          caughtUp: report.caughtUp,
          resolved: report.resolved,
          unresolved: report.unresolved
        },
        { level: report.unresolved.length > 0 ? 'warn' : 'info', instrument: symbol }
      );
    } catch (error) {
      this.recordFailure('resync', error, symbol);
    }
  }

  private async waitForPendingAcks(graceMs: number): Promise<void> {
    let waited = 0;
    while (this.ledger.openOrders().some(order => order.state === 'pending') && waited < graceMs) {
      await this.sleep(SETTLE_POLL_MS);
      waited += SETTLE_POLL_MS;
    }
  }

  /**
   * Fatal errors halt the session; the rest are audited and retried by the next tick or resync
   */
  private recordFailure(operation: string, error: unknown, instrument?: string): void {
    const message = error instanceof Error ? error.message : String(error);
    const fatal = error instanceof ApplicationError && error.isFatal;
    this.auditService.logEvent(
      'OPERATION_FAILED',
      {
        operation,
        message,
        code: error instanceof ApplicationError ? error.code : undefined,
        fatal
      },
      { level: 'error', instrument }
    );
    if (fatal) {
      this.session.halt(`${operation} failed: ${message}`);
    }
  }

  private stateSummary(): Record<string, unknown> {
    const view = this.ledger.view();
    return {
      openOrders: view.openOrders.map(order => ({
        clientOrderId: order.clientOrderId,
        instrument: order.instrument,
        state: order.state,
        filledQuantity: order.filledQuantity
      })),
      positions: Object.values(view.positions).map(position => ({
        instrument: position.instrument,
        quantity: position.quantity,
        averageEntryPrice: position.averageEntryPrice,
        realizedPnl: position.realizedPnl
      })),
      balances: Object.values(view.balances).map(balance => ({
        asset: balance.asset,
        available: balance.available,
        reserved: balance.reserved,
        total: balance.total
      }))
    };
  }
}
