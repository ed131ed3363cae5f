/**
 * Tests for the execution coordinator against an in-process transport
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { AdvisorPromptContext } from './AdvisorClient';
import { ExecutionCoordinator, SignalSource } from './ExecutionCoordinator';
import { AuditService } from './AuditService';
import { OrderLedger } from './OrderLedger';
import { RiskGate } from './RiskGate';
import { TradingSession } from './TradingSession';
import {
  BalanceReport,
  CancelAck,
  IExchangeTransport,
  OrderAck,
  SubmitOrderRequest
} from '../connectors/ExchangeConnector';
import { EventChannel } from '../connectors/EventChannel';
import { ConnectorStatus } from '../models/ConnectorStatus';
import { ExchangeEvent, ExchangeOrderState } from '../models/ExchangeEvent';
import { Instrument } from '../models/Instrument';
import { Candle, Ticker } from '../models/MarketStats';
import { OrderIntent, OrderRef } from '../models/Order';
import { AdvisorSignal, MarketSnapshot, Strategy } from '../strategies/Strategy';
import { AuthError, ConfigurationError, ExchangeRejection, TransientNetworkError, makeContext } from '../utils/ErrorHandler';
import { MemoryLedgerStore } from '../utils/LedgerStore';

const NOW = 1700000000000;

const TICKER: Ticker = {
  instrument: 'BTCUSDT',
  lastPrice: 65000,
  high24h: 66000,
  low24h: 64000,
  baseVolume: 1234.5,
  changeRatio: 0.01,
  timestamp: new Date(NOW)
};

const CANDLE: Candle = { openTime: new Date(NOW - 900000), open: 64900, high: 65100, low: 64800, close: 65000, volume: 12 };

const BTC: Instrument = {
  symbol: 'BTCUSDT',
  baseAsset: 'BTC',
  quoteAsset: 'USDT',
  pricePrecision: 1,
  quantityPrecision: 3,
  minOrderSize: 0.001,
  minNotional: 5
};

class FakeTransport implements IExchangeTransport {
  readonly channel = new EventChannel({ capacity: 100 });
  instruments: Instrument[] = [BTC];
  balances: BalanceReport[] = [{ asset: 'USDT', available: 1000, locked: 0, total: 1000 }];
  openOrders: ExchangeOrderState[] = [];
  orderStates: Map<string, ExchangeOrderState> = new Map();
  snapshotRequests: string[] = [];
  connectedWith: string[] | null = null;
  closed = false;

  submitOrder = vi.fn(
    async (order: SubmitOrderRequest): Promise<OrderAck> => ({
      clientOrderId: order.clientOrderId,
      exchangeOrderId: `x-${order.clientOrderId}`,
      timestamp: new Date(NOW)
    })
  );

  fetchOpenOrders = vi.fn(async (_instrument?: string): Promise<ExchangeOrderState[]> => this.openOrders);

  syncClock = vi.fn(async (): Promise<number> => 0);

  cancelOrder = vi.fn(
    async (ref: OrderRef): Promise<CancelAck> => ({
      clientOrderId: ref.clientOrderId,
      exchangeOrderId: ref.exchangeOrderId ?? null,
      timestamp: new Date(NOW)
    })
  );

  fetchTicker = vi.fn(async (_instrument: string): Promise<Ticker | null> => TICKER);

  fetchCandles = vi.fn(async (_instrument: string, _granularity: string, _limit: number): Promise<Candle[]> => [CANDLE]);

  streamEvents(): AsyncIterable<ExchangeEvent> {
    return this.channel;
  }

  async fetchOrder(ref: OrderRef): Promise<ExchangeOrderState | null> {
    return this.orderStates.get(ref.clientOrderId) ?? null;
  }

  async requestBookSnapshot(instrument: string): Promise<void> {
    this.snapshotRequests.push(instrument);
  }

  async fetchBalances(): Promise<BalanceReport[]> {
    return this.balances;
  }

  async fetchInstruments(): Promise<Instrument[]> {
    return this.instruments;
  }

  async connect(instruments: string[]): Promise<void> {
    this.connectedWith = instruments;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.channel.close();
  }

  getStatus(): ConnectorStatus {
    return {
      connectorId: 'fake',
      name: 'Fake',
      status: 'healthy',
      lastHealthCheck: new Date(NOW),
      latency: 0,
      errorRate: 0,
      streams: {},
      capabilities: []
    };
  }
}

/**
 * Hands out a queued batch of intents once and records what it saw
 */
class ScriptedStrategy implements Strategy {
  readonly name = 'scripted';
  queued: OrderIntent[] = [];
  seen: MarketSnapshot[] = [];

  decide(market: MarketSnapshot): OrderIntent[] {
    this.seen.push(market);
    const intents = this.queued;
    this.queued = [];
    return intents;
  }
}

const openLong: OrderIntent = {
  instrument: 'BTCUSDT',
  side: 'buy',
  quantity: 0.01,
  price: 65000,
  tag: 'open_long'
};

function bookSnapshot(version: number = 1, at: number = NOW): ExchangeEvent {
  return {
    type: 'book_snapshot',
    instrument: 'BTCUSDT',
    bids: [{ price: 64990, quantity: 1 }],
    asks: [{ price: 65010, quantity: 1 }],
    version,
    timestamp: new Date(at)
  };
}

function exchangeState(overrides: Partial<ExchangeOrderState> = {}): ExchangeOrderState {
  return {
    instrument: 'BTCUSDT',
    clientOrderId: 'c1',
    exchangeOrderId: 'x-c1',
    side: 'buy',
    price: 65000,
    quantity: 0.01,
    filledQuantity: 0,
    averageFillPrice: 0,
    status: 'open',
    updatedAt: new Date(NOW),
    ...overrides
  };
}

describe('ExecutionCoordinator', () => {
  let clock: number;
  let session: TradingSession;
  let transport: FakeTransport;
  let ledger: OrderLedger;
  let strategy: ScriptedStrategy;
  let auditService: AuditService;
  let store: MemoryLedgerStore;
  let coordinator: ExecutionCoordinator;
  let nextId: number;

  const createCoordinator = (signalSource?: SignalSource) =>
    new ExecutionCoordinator(
      {
        session,
        transport,
        ledger,
        riskGate: new RiskGate(
          {
            maxPositionPerInstrument: 1,
            maxOrderNotional: 1000,
            maxOpenOrders: 2,
            minOrderIntervalMs: 0,
            minAvailableBalance: 10
          },
          session
        ),
        strategy,
        auditService,
        signalSource,
        store
      },
      {
        tickIntervalMs: 60000,
        signalIntervalMs: 60000,
        shutdownGraceMs: 200,
        bookResyncTimeoutMs: 10000,
        orderTimeoutMs: 300000,
        maxBookAgeMs: 120000,
        sleep: async () => undefined
      }
    );

  const details = (eventType: string): Record<string, unknown>[] =>
    auditService.getEventsByType(eventType).map(event => event.details);

  const startWithBook = async () => {
    await coordinator.start();
    transport.channel.push(bookSnapshot());
    await vi.waitFor(() => expect(coordinator.cache.snapshot('BTCUSDT')).not.toBeNull());
  };

  beforeEach(() => {
    clock = NOW;
    nextId = 0;
    session = new TradingSession({
      credentials: { apiKey: 'test-key', secret: 'test-secret', passphrase: 'test-passphrase' },
      productType: 'USDT-FUTURES',
      marginCoin: 'USDT',
      allowedInstruments: ['BTCUSDT'],
      maxClockSkewMs: 5000,
      now: () => clock
    });
    transport = new FakeTransport();
    ledger = new OrderLedger(session, { generateClientOrderId: () => `c${++nextId}` });
    strategy = new ScriptedStrategy();
    auditService = new AuditService({ console: { log: vi.fn(), warn: vi.fn(), error: vi.fn() } });
    store = new MemoryLedgerStore();
    coordinator = createCoordinator();
  });

  afterEach(async () => {
    if (coordinator.isRunning()) {
      await coordinator.shutdown('test_cleanup');
    }
  });

  describe('start', () => {
    it('should sync the clock, load balances and open the streams', async () => {
      await coordinator.start();

      expect(transport.syncClock).toHaveBeenCalledTimes(1);
      expect(transport.connectedWith).toEqual(['BTCUSDT']);
      expect(session.getInstrument('BTCUSDT')).toEqual(BTC);
      expect(ledger.balance('USDT')).toMatchObject({ available: 1000, reserved: 0, total: 1000 });
      expect(coordinator.cache.awaitingSnapshotSince('BTCUSDT')).toBe(NOW);
      expect(coordinator.isRunning()).toBe(true);
      expect(details('OPERATOR_NOTICE')[0]).toMatchObject({
        message: 'Trading core started with scripted strategy',
        instruments: ['BTCUSDT']
      });
    });

    it('should refuse to start without contract metadata', async () => {
      transport.instruments = [];

      const attempt = coordinator.start();

      await expect(attempt).rejects.toBeInstanceOf(ConfigurationError);
      await expect(attempt).rejects.toMatchObject({ message: 'No contract metadata for BTCUSDT' });
      expect(transport.connectedWith).toBeNull();
    });

    it('should restore the saved ledger and reconcile its open orders', async () => {
      const previous = new OrderLedger(session, { generateClientOrderId: () => 'old-1' });
      previous.applyEvent({ type: 'balance', asset: 'USDT', total: 1000, available: 1000, timestamp: new Date(NOW) });
      session.registerInstruments([BTC]);
      previous.createOrder(openLong);
      previous.applyEvent({
        type: 'order_ack',
        instrument: 'BTCUSDT',
        clientOrderId: 'old-1',
        exchangeOrderId: 'x-old-1',
        timestamp: new Date(NOW)
      });
      await store.save(previous.toSnapshot());
      transport.orderStates.set('old-1', exchangeState({ clientOrderId: 'old-1', exchangeOrderId: 'x-old-1', status: 'cancelled' }));

      await coordinator.start();

      await vi.waitFor(() => expect(details('RESYNC_COMPLETED')).toHaveLength(1));
      expect(details('RESYNC_COMPLETED')[0]).toMatchObject({
        reason: 'startup',
        checked: 1,
        resolved: [{ clientOrderId: 'old-1', state: 'cancelled' }],
        unresolved: []
      });
      expect(transport.snapshotRequests).toEqual(['BTCUSDT']);
      expect(ledger.getOrder('old-1')?.state).toBe('cancelled');
      expect(ledger.balance('USDT')).toMatchObject({ available: 1000, reserved: 0 });
    });
  });

  describe('stream events', () => {
    it('should apply book snapshots and mark positions to the mid price', async () => {
      await startWithBook();

      expect(coordinator.cache.midPrice('BTCUSDT')).toBe(65000);
      expect(coordinator.cache.awaitingSnapshotSince('BTCUSDT')).toBeNull();
    });

    it('should resync an instrument whose book sequence breaks', async () => {
      await startWithBook();

      transport.channel.push({
        type: 'book_delta',
        instrument: 'BTCUSDT',
        bids: [],
        asks: [],
        version: 5,
        prevVersion: 3,
        timestamp: new Date(NOW)
      });

      await vi.waitFor(() => expect(details('RESYNC_COMPLETED')).toHaveLength(1));
      expect(details('SEQUENCE_GAP')).toEqual([{ message: 'book_gap: expected prev 1, got 3', expected: 1, received: 3 }]);
      expect(details('RESYNC_REQUESTED')[0]).toEqual({
        reason: 'book_gap: expected prev 1, got 3',
        instruments: ['BTCUSDT']
      });
      expect(coordinator.cache.snapshot('BTCUSDT')).toBeNull();
      expect(transport.snapshotRequests).toEqual(['BTCUSDT']);
    });

    it('should book fills from the order stream', async () => {
      await startWithBook();
      strategy.queued = [openLong];
      await coordinator.tick();

      transport.channel.push({
        type: 'order_fill',
        instrument: 'BTCUSDT',
        clientOrderId: 'c1',
        exchangeOrderId: 'x-c1',
        fillId: 't1',
        price: 65000,
        quantity: 0.01,
        fee: 0.1,
        cumulativeFilled: 0.01,
        timestamp: new Date(NOW)
      });

      await vi.waitFor(() => expect(ledger.getOrder('c1')?.state).toBe('filled'));
      expect(ledger.position('BTCUSDT').quantity).toBeCloseTo(0.01, 10);
      expect(ledger.position('BTCUSDT').averageEntryPrice).toBe(65000);
      expect(ledger.balance('USDT').total).toBeCloseTo(999.9, 9);
      expect(ledger.balance('USDT').reserved).toBe(0);
      expect(details('ORDER_FILL')).toEqual([{ clientOrderId: 'c1', fillId: 't1', price: 65000, quantity: 0.01 }]);
    });

    it('should audit events for orders it does not know', async () => {
      await coordinator.start();

      transport.channel.push({
        type: 'order_ack',
        instrument: 'BTCUSDT',
        clientOrderId: 'someone-else',
        exchangeOrderId: 'x-9',
        timestamp: new Date(NOW)
      });

      await vi.waitFor(() => expect(details('LEDGER_EVENT_IGNORED')).toHaveLength(1));
      expect(details('LEDGER_EVENT_IGNORED')[0]).toMatchObject({ outcome: 'unknown_order', eventType: 'order_ack' });
    });

    it('should halt when the exchange reports fills on a settled order', async () => {
      await startWithBook();
      strategy.queued = [openLong];
      await coordinator.tick();
      transport.channel.push({
        type: 'order_cancelled',
        instrument: 'BTCUSDT',
        clientOrderId: 'c1',
        exchangeOrderId: 'x-c1',
        filledQuantity: 0,
        reason: 'canceled',
        timestamp: new Date(NOW)
      });
      await vi.waitFor(() => expect(ledger.getOrder('c1')?.state).toBe('cancelled'));

      transport.channel.push({
        type: 'order_fill',
        instrument: 'BTCUSDT',
        clientOrderId: 'c1',
        exchangeOrderId: 'x-c1',
        fillId: 't7',
        price: 65000,
        quantity: 0.004,
        fee: 0,
        cumulativeFilled: 0.004,
        timestamp: new Date(NOW)
      });

      await vi.waitFor(() => expect(session.isHalted()).toBe(true));
      expect(session.getHaltReason()).toBe('Ledger diverged from exchange on c1: fill t7 raises the fill total to 0.004');
      const divergences = auditService.getEventsByType('LEDGER_DIVERGENCE');
      expect(divergences).toHaveLength(1);
      expect(divergences[0].level).toBe('error');
      expect(divergences[0].details).toEqual({
        clientOrderId: 'c1',
        localState: 'cancelled',
        localFilled: 0,
        reportedFilled: 0.004,
        detail: 'fill t7 raises the fill total to 0.004',
        eventType: 'order_fill'
      });
      const notices = details('OPERATOR_NOTICE');
      expect(notices[notices.length - 1].message).toBe(
        'Trading halted: Ledger diverged from exchange on c1: fill t7 raises the fill total to 0.004'
      );
      expect(ledger.position('BTCUSDT').quantity).toBe(0);
    });

    it('should request a resync when the venue reconnects', async () => {
      await coordinator.start();

      transport.channel.push({ type: 'resync_required', reason: 'public_stream_reconnected', timestamp: new Date(NOW) });

      await vi.waitFor(() => expect(details('RESYNC_COMPLETED')).toHaveLength(1));
      expect(details('RESYNC_REQUESTED')[0]).toEqual({
        reason: 'public_stream_reconnected',
        instruments: ['BTCUSDT']
      });
      expect(transport.snapshotRequests).toEqual(['BTCUSDT']);
    });

    it('should halt on a fatal stream error', async () => {
      await coordinator.start();

      transport.channel.push({
        type: 'stream_error',
        stream: 'private',
        fatal: true,
        code: '30005',
        message: 'Invalid sign',
        timestamp: new Date(NOW)
      });

      await vi.waitFor(() => expect(session.isHalted()).toBe(true));
      expect(session.getHaltReason()).toBe('private stream error 30005: Invalid sign');
      const notices = auditService.getEventsByType('OPERATOR_NOTICE');
      expect(notices[notices.length - 1].level).toBe('error');
      expect(notices[notices.length - 1].details.message).toBe('Trading halted: private stream error 30005: Invalid sign');

      strategy.queued = [openLong];
      await coordinator.tick();
      expect(transport.submitOrder).not.toHaveBeenCalled();
    });

    it('should keep trading after a non-fatal stream error', async () => {
      await coordinator.start();

      transport.channel.push({
        type: 'stream_error',
        stream: 'public',
        fatal: false,
        code: '30001',
        message: 'channel does not exist',
        timestamp: new Date(NOW)
      });

      await vi.waitFor(() => expect(auditService.getEventsByType('STREAM_ERROR')).toHaveLength(1));
      expect(auditService.getEventsByType('STREAM_ERROR')[0].level).toBe('warn');
      expect(session.isHalted()).toBe(false);
    });
  });

  describe('decisions', () => {
    it('should submit an approved intent and apply the acknowledgement', async () => {
      await startWithBook();
      strategy.queued = [openLong];

      await coordinator.tick();

      expect(transport.submitOrder).toHaveBeenCalledWith({
        clientOrderId: 'c1',
        instrument: 'BTCUSDT',
        side: 'buy',
        quantity: 0.01,
        price: 65000,
        reduceOnly: false
      });
      expect(ledger.getOrder('c1')).toMatchObject({ state: 'acknowledged', exchangeOrderId: 'x-c1' });
      expect(ledger.balance('USDT').available).toBeCloseTo(350, 9);
      expect(ledger.balance('USDT').reserved).toBeCloseTo(650, 9);
      expect(details('ORDER_SUBMITTED')).toEqual([{ clientOrderId: 'c1', exchangeOrderId: 'x-c1', tag: 'open_long' }]);
    });

    it('should hand the strategy an immutable snapshot of the book', async () => {
      await startWithBook();

      await coordinator.tick();

      expect(strategy.seen).toHaveLength(1);
      expect(strategy.seen[0].instrument.symbol).toBe('BTCUSDT');
      expect(strategy.seen[0].book.bids).toEqual([{ price: 64990, quantity: 1 }]);
      expect(Object.isFrozen(strategy.seen[0].book)).toBe(true);
      expect(strategy.seen[0].takenAt).toEqual(new Date(NOW));
    });

    it('should drop intents the risk gate rejects', async () => {
      await startWithBook();
      strategy.queued = [{ ...openLong, quantity: 2 }];

      await coordinator.tick();

      expect(transport.submitOrder).not.toHaveBeenCalled();
      expect(ledger.openOrders()).toEqual([]);
      expect(details('RISK_REJECTED')[0]).toMatchObject({
        reason: 'max_position_exceeded',
        detail: 'post-trade 2 > 1'
      });
    });

    it('should mark the order rejected when the exchange refuses it', async () => {
      await startWithBook();
      transport.submitOrder.mockRejectedValueOnce(
        new ExchangeRejection('Bitget 40762: The order amount exceeds the balance', '40762', makeContext('submitOrder', 'Fake'))
      );
      strategy.queued = [openLong];

      await coordinator.tick();

      expect(ledger.getOrder('c1')).toMatchObject({
        state: 'rejected',
        lastReason: '40762: Bitget 40762: The order amount exceeds the balance'
      });
      expect(ledger.balance('USDT')).toMatchObject({ available: 1000, reserved: 0 });
      expect(details('ORDER_REJECTED')[0]).toMatchObject({ clientOrderId: 'c1', code: '40762' });
      expect(session.isHalted()).toBe(false);
    });

    it('should resync when a submission outcome is unknown', async () => {
      await startWithBook();
      transport.submitOrder.mockRejectedValueOnce(
        new TransientNetworkError('Bitget request failed: socket hang up', makeContext('submitOrder', 'Fake'))
      );
      transport.openOrders = [exchangeState({ exchangeOrderId: 'x-9' })];
      strategy.queued = [openLong];

      await coordinator.tick();

      expect(details('OPERATION_FAILED')[0]).toMatchObject({
        operation: 'submitOrder',
        message: 'Bitget request failed: socket hang up',
        code: 'NETWORK_ERROR',
        fatal: false
      });
      await vi.waitFor(() => expect(details('RESYNC_COMPLETED')).toHaveLength(1));
      expect(details('RESYNC_COMPLETED')[0]).toMatchObject({
        reason: 'submit_outcome_unknown',
        checked: 1,
        caughtUp: ['c1'],
        unresolved: []
      });
      expect(ledger.getOrder('c1')).toMatchObject({ state: 'acknowledged', exchangeOrderId: 'x-9' });
      expect(ledger.balance('USDT').available).toBeCloseTo(350, 9);
      expect(session.isHalted()).toBe(false);
    });

    it('should halt when a submission fails authentication', async () => {
      await startWithBook();
      transport.submitOrder.mockRejectedValueOnce(
        new AuthError('Bitget 40009: sign signature error', makeContext('submitOrder', 'Fake'), '40009')
      );
      strategy.queued = [openLong, { ...openLong, price: 64000 }];

      await coordinator.tick();

      expect(session.getHaltReason()).toBe('submitOrder failed: Bitget 40009: sign signature error');
      expect(transport.submitOrder).toHaveBeenCalledTimes(1);
    });

    it('should re-request a book that stays missing', async () => {
      await coordinator.start();

      clock += 10001;
      await coordinator.tick();

      expect(details('RESYNC_REQUESTED')[0]).toEqual({ reason: 'book_missing', instruments: ['BTCUSDT'] });
      expect(strategy.seen).toEqual([]);
    });

    it('should ask the signal source at most once per interval', async () => {
      const signal: AdvisorSignal = { action: 'buy', confidence: 8, reason: 'momentum', receivedAt: new Date(NOW) };
      const requestSignal = vi.fn(async () => signal);
      coordinator = createCoordinator({ requestSignal });
      await startWithBook();

      await coordinator.tick();
      await coordinator.tick();
      expect(requestSignal).toHaveBeenCalledTimes(1);
      expect(strategy.seen[1].signal).toEqual(signal);

      clock += 60000;
      await coordinator.tick();
      expect(requestSignal).toHaveBeenCalledTimes(2);
    });

    it('should give the signal source the 24h ticker and recent candles', async () => {
      const requestSignal = vi.fn(
        async (_context: AdvisorPromptContext): Promise<AdvisorSignal> => ({
          action: 'hold',
          confidence: 0,
          reason: '',
          receivedAt: new Date(NOW)
        })
      );
      coordinator = createCoordinator({ requestSignal });
      await startWithBook();

      await coordinator.tick();

      expect(transport.fetchTicker).toHaveBeenCalledWith('BTCUSDT');
      expect(transport.fetchCandles).toHaveBeenCalledWith('BTCUSDT', '15m', 96);
      expect(requestSignal).toHaveBeenCalledTimes(1);
      const context = requestSignal.mock.calls[0][0];
      expect(context.ticker).toEqual(TICKER);
      expect(context.candles).toEqual([CANDLE]);
      expect(context.book.version).toBe(1);
    });

    it('should still ask the signal source when market statistics are unavailable', async () => {
      const requestSignal = vi.fn(
        async (_context: AdvisorPromptContext): Promise<AdvisorSignal> => ({
          action: 'hold',
          confidence: 0,
          reason: '',
          receivedAt: new Date(NOW)
        })
      );
      transport.fetchCandles.mockRejectedValueOnce(
        new TransientNetworkError('Bitget request failed: timeout', makeContext('fetchCandles', 'Fake'))
      );
      coordinator = createCoordinator({ requestSignal });
      await startWithBook();

      await coordinator.tick();

      expect(requestSignal).toHaveBeenCalledTimes(1);
      expect(requestSignal.mock.calls[0][0].candles).toBeUndefined();
      expect(details('MARKET_DATA_UNAVAILABLE')).toEqual([{ message: 'Bitget request failed: timeout' }]);
      expect(session.isHalted()).toBe(false);
    });

    it('should send preset exits with the order', async () => {
      await startWithBook();
      strategy.queued = [{ ...openLong, stopLossPrice: 63700, takeProfitPrice: 68900 }];

      await coordinator.tick();

      expect(transport.submitOrder).toHaveBeenCalledWith({
        clientOrderId: 'c1',
        instrument: 'BTCUSDT',
        side: 'buy',
        quantity: 0.01,
        price: 65000,
        reduceOnly: false,
        stopLossPrice: 63700,
        takeProfitPrice: 68900
      });
    });

    it('should skip decisions while the book is older than the limit', async () => {
      await startWithBook();
      clock += 120001;
      strategy.queued = [openLong];

      await coordinator.tick();

      expect(transport.submitOrder).not.toHaveBeenCalled();
      expect(strategy.seen).toEqual([]);
      expect(details('BOOK_STALE')).toEqual([{ ageMs: 120001, maxBookAgeMs: 120000 }]);

      transport.channel.push(bookSnapshot(2, clock));
      await vi.waitFor(() => expect(coordinator.cache.snapshot('BTCUSDT')?.version).toBe(2));
      await coordinator.tick();

      expect(transport.submitOrder).toHaveBeenCalledTimes(1);
    });
  });

  describe('order timeout', () => {
    it('should cancel an order resting past the timeout once and trade again after it settles', async () => {
      await startWithBook();
      strategy.queued = [openLong];
      await coordinator.tick();

      clock += 300001;
      await coordinator.tick();
      await coordinator.tick();

      expect(transport.cancelOrder).toHaveBeenCalledTimes(1);
      expect(transport.cancelOrder).toHaveBeenCalledWith({
        instrument: 'BTCUSDT',
        clientOrderId: 'c1',
        exchangeOrderId: 'x-c1'
      });
      expect(details('ORDER_CANCEL_REQUESTED')).toEqual([{ clientOrderId: 'c1', ageMs: 300001, filled: 0 }]);

      transport.channel.push({
        type: 'order_cancelled',
        instrument: 'BTCUSDT',
        clientOrderId: 'c1',
        exchangeOrderId: 'x-c1',
        filledQuantity: 0,
        reason: 'canceled',
        timestamp: new Date(clock)
      });
      await vi.waitFor(() => expect(ledger.getOrder('c1')?.state).toBe('cancelled'));
      expect(ledger.balance('USDT')).toMatchObject({ available: 1000, reserved: 0 });

      transport.channel.push(bookSnapshot(2, clock));
      await vi.waitFor(() => expect(coordinator.cache.snapshot('BTCUSDT')?.version).toBe(2));
      strategy.queued = [openLong];
      await coordinator.tick();

      expect(transport.submitOrder).toHaveBeenCalledTimes(2);
      expect(ledger.getOrder('c2')?.state).toBe('acknowledged');
    });

    it('should leave young orders alone', async () => {
      await startWithBook();
      strategy.queued = [openLong];
      await coordinator.tick();

      clock += 300000;
      await coordinator.tick();

      expect(transport.cancelOrder).not.toHaveBeenCalled();
    });

    it('should resync when the exchange refuses the cancel', async () => {
      await startWithBook();
      strategy.queued = [openLong];
      await coordinator.tick();
      transport.cancelOrder.mockRejectedValueOnce(
        new ExchangeRejection('Bitget 22001: No order to cancel', '22001', makeContext('cancelOrder', 'Fake'))
      );
      transport.orderStates.set('c1', exchangeState({ status: 'filled', filledQuantity: 0.01, averageFillPrice: 65000 }));

      clock += 300001;
      await coordinator.tick();

      expect(details('ORDER_CANCEL_REJECTED')).toEqual([
        { clientOrderId: 'c1', code: '22001', message: 'Bitget 22001: No order to cancel' }
      ]);
      await vi.waitFor(() => expect(details('RESYNC_COMPLETED')).toHaveLength(1));
      expect(details('RESYNC_COMPLETED')[0]).toMatchObject({
        reason: 'cancel_rejected',
        resolved: [{ clientOrderId: 'c1', state: 'filled' }]
      });
      expect(ledger.position('BTCUSDT').quantity).toBeCloseTo(0.01, 10);
      expect(session.isHalted()).toBe(false);
    });
  });

  describe('shutdown', () => {
    it('should reconcile open orders, close the transport and save the ledger', async () => {
      await startWithBook();
      strategy.queued = [openLong];
      await coordinator.tick();
      transport.openOrders = [exchangeState()];

      await coordinator.shutdown('test');

      expect(transport.fetchOpenOrders).toHaveBeenCalledWith('BTCUSDT');
      expect(transport.closed).toBe(true);
      expect(coordinator.isRunning()).toBe(false);
      const saved = await store.load();
      expect(saved?.orders.map(order => [order.clientOrderId, order.state])).toEqual([['c1', 'acknowledged']]);
      const notices = details('OPERATOR_NOTICE');
      expect(notices[notices.length - 1].message).toBe('Trading core stopped (test)');
    });

    it('should stop ticking once shutdown begins', async () => {
      await startWithBook();
      await coordinator.shutdown('test');

      strategy.queued = [openLong];
      await coordinator.tick();

      expect(transport.submitOrder).not.toHaveBeenCalled();
    });
  });
});
