/**
 * Bitget USDT-M futures connector
 * Signed REST v2 calls for orders and queries, two WebSocket streams merged into one event channel
 */

import { createHmac } from 'crypto';
import {
  BaseExchangeConnector,
  BaseConnectorOptions,
  BalanceReport,
  CancelAck,
  DEFAULT_CONNECTOR_OPTIONS,
  OrderAck,
  SubmitOrderRequest
} from '../ExchangeConnector';
import { EndpointClass } from '../RateLimiter';
import { EventChannel } from '../EventChannel';
import { Instrument } from '../../models/Instrument';
import { Candle, Ticker } from '../../models/MarketStats';
import { OrderRef } from '../../models/Order';
import { ExchangeEvent, ExchangeOrderState } from '../../models/ExchangeEvent';
import { StreamState } from '../../models/ConnectorStatus';
import { AuthError, ExchangeRejection, TransientNetworkError, makeContext } from '../../utils/ErrorHandler';
import { formatDecimal } from '../../utils/precision';
import { AuditService } from '../../services/AuditService';
import { TradingSession } from '../../services/TradingSession';
import { BitgetPush, BitgetStream, LoginArgs, SocketFactory, StreamTopic } from './BitgetStream';
import {
  BITGET_ORDER_NOT_FOUND,
  BITGET_SUCCESS_CODE,
  classifyBitgetError,
  isRecord,
  parseAccountPush,
  parseBookPush,
  parseCandle,
  parseContract,
  parseOrderPush,
  parseOrderState,
  parseTicker,
  toNumber,
  toText
} from './bitgetMapping';

export interface BitgetConnectorOptions extends BaseConnectorOptions {
  restBaseUrl: string;
  publicWsUrl: string;
  privateWsUrl: string;
  requestTimeoutMs: number;
  pingIntervalMs: number;
  heartbeatTimeoutMs: number;
  reconnectBaseMs: number;
  reconnectMaxMs: number;
  channelCapacity: number;
  fetchImpl?: typeof fetch;
  socketFactory?: SocketFactory;
  random?: () => number;
  auditService?: AuditService;
}

export const DEFAULT_BITGET_OPTIONS: BitgetConnectorOptions = {
  ...DEFAULT_CONNECTOR_OPTIONS,
  restBaseUrl: 'https://api.bitget.com',
  publicWsUrl: 'wss://ws.bitget.com/v2/ws/public',
  privateWsUrl: 'wss://ws.bitget.com/v2/ws/private',
  requestTimeoutMs: 10000,
  pingIntervalMs: 25000,
  heartbeatTimeoutMs: 60000,
  reconnectBaseMs: 1000,
  reconnectMaxMs: 30000,
  channelCapacity: 10000
};

type HttpMethod = 'GET' | 'POST';

interface RequestSpec {
  method: HttpMethod;
  path: string;
  endpoint: EndpointClass;
  operation: string;
  query?: Record<string, string | undefined>;
  body?: Record<string, unknown>;
  signed?: boolean;
  retryable?: boolean;
}

const PUBLIC_STREAM = 'public';
const PRIVATE_STREAM = 'private';
const ORDER_NOT_FOUND_CODES = new Set([BITGET_ORDER_NOT_FOUND, '40768']);

/**
 * Bitget Exchange Connector
 */
export class BitgetConnector extends BaseExchangeConnector {
  private readonly session: TradingSession;
  private readonly options: BitgetConnectorOptions;
  private readonly fetchImpl: typeof fetch;
  private readonly channel: EventChannel;
  private readonly auditService?: AuditService;
  private publicStream: BitgetStream | null = null;
  private privateStream: BitgetStream | null = null;

  constructor(session: TradingSession, options: Partial<BitgetConnectorOptions> = {}) {
    const merged: BitgetConnectorOptions = { ...DEFAULT_BITGET_OPTIONS, ...options };
    super('bitget', 'Bitget', merged);
    this.session = session;
    this.options = merged;
    this.fetchImpl = merged.fetchImpl ?? fetch;
    this.auditService = merged.auditService;
    this.channel = new EventChannel({
      capacity: merged.channelCapacity,
      onOverflow: dropped => {
        this.auditService?.logEvent(
          'EVENT_CHANNEL_OVERFLOW',
          { droppedType: dropped.type, capacity: merged.channelCapacity },
          { level: 'warn', venueId: this.connectorId }
        );
      }
    });
  }

  /**
   * Place a limit order, priced and sized to the instrument's precision
   */
  async submitOrder(order: SubmitOrderRequest): Promise<OrderAck> {
    const instrument = this.session.getInstrument(order.instrument);
    const pricePlaces = instrument?.pricePrecision ?? 8;
    const sizePlaces = instrument?.quantityPrecision ?? 8;

    const body: Record<string, string> = {
      symbol: order.instrument,
      productType: this.session.productType,
      marginMode: 'crossed',
      marginCoin: this.session.marginCoin,
      size: formatDecimal(order.quantity, sizePlaces),
      price: formatDecimal(order.price, pricePlaces),
      side: order.side,
      orderType: 'limit',
      force: 'gtc',
      clientOid: order.clientOrderId,
      reduceOnly: order.reduceOnly ? 'YES' : 'NO'
    };
    // preset exits ride on the same order and trigger on the position it opens
    if (order.stopLossPrice !== undefined) {
      body.presetStopLossPrice = formatDecimal(order.stopLossPrice, pricePlaces);
    }
    if (order.takeProfitPrice !== undefined) {
      body.presetStopSurplusPrice = formatDecimal(order.takeProfitPrice, pricePlaces);
    }

    const data = await this.request({
      method: 'POST',
      path: '/api/v2/mix/order/place-order',
      endpoint: 'trade',
      operation: 'submitOrder',
      // a lost response must not place the order twice; reconcile resolves it
      retryable: false,
      body
    });

    const exchangeOrderId = isRecord(data) ? toText(data.orderId) : '';
    if (!exchangeOrderId) {
      throw new ExchangeRejection(
        'Bitget place-order response carried no orderId',
        'EMPTY_ACK',
        makeContext('submitOrder', this.name, { instrument: order.instrument, clientOrderId: order.clientOrderId })
      );
    }

    this.auditService?.logTradeExecution(
      { clientOrderId: order.clientOrderId, side: order.side, price: order.price, quantity: order.quantity },
      { exchangeOrderId },
      order.instrument,
      this.connectorId
    );

    return { clientOrderId: order.clientOrderId, exchangeOrderId, timestamp: new Date(this.session.now()) };
  }

  /**
   * Request cancellation; the terminal state arrives on the order stream
   */
  async cancelOrder(ref: OrderRef): Promise<CancelAck> {
    const data = await this.request({
      method: 'POST',
      path: '/api/v2/mix/order/cancel-order',
      endpoint: 'trade',
      operation: 'cancelOrder',
      body: {
        symbol: ref.instrument,
        productType: this.session.productType,
        marginCoin: this.session.marginCoin,
        ...this.orderIdentity(ref)
      }
    });

    const exchangeOrderId = isRecord(data) ? toText(data.orderId) : '';
    return {
      clientOrderId: ref.clientOrderId,
      exchangeOrderId: exchangeOrderId || ref.exchangeOrderId || null,
      timestamp: new Date(this.session.now())
    };
  }

  streamEvents(): AsyncIterable<ExchangeEvent> {
    return this.channel;
  }

  async fetchOpenOrders(instrument?: string): Promise<ExchangeOrderState[]> {
    const data = await this.request({
      method: 'GET',
      path: '/api/v2/mix/order/orders-pending',
      endpoint: 'query',
      operation: 'fetchOpenOrders',
      query: { productType: this.session.productType, symbol: instrument }
    });

    const rows = isRecord(data) && Array.isArray(data.entrustedList) ? data.entrustedList : [];
    const orders: ExchangeOrderState[] = [];
    for (const row of rows) {
      const parsed = parseOrderState(row);
      if (parsed) orders.push(parsed);
    }
    return orders;
  }

  /**
   * Order detail by exchange id when known, otherwise by client id
   */
  async fetchOrder(ref: OrderRef): Promise<ExchangeOrderState | null> {
    try {
      const data = await this.request({
        method: 'GET',
        path: '/api/v2/mix/order/detail',
        endpoint: 'query',
        operation: 'fetchOrder',
        query: {
          symbol: ref.instrument,
          productType: this.session.productType,
          ...this.orderIdentity(ref)
        }
      });
      return parseOrderState(data);
    } catch (error) {
      if (error instanceof ExchangeRejection && ORDER_NOT_FOUND_CODES.has(error.exchangeCode)) {
        return null;
      }
      throw error;
    }
  }

  async requestBookSnapshot(instrument: string): Promise<void> {
    if (!this.publicStream) {
      throw new TransientNetworkError(
        'Book stream is not running',
        makeContext('requestBookSnapshot', this.name, { instrument }),
        'STREAM_NOT_CONNECTED'
      );
    }
    this.publicStream.refresh(this.bookTopic(instrument));
  }

  async fetchBalances(): Promise<BalanceReport[]> {
    const data = await this.request({
      method: 'GET',
      path: '/api/v2/mix/account/accounts',
      endpoint: 'query',
      operation: 'fetchBalances',
      query: { productType: this.session.productType }
    });

    if (!Array.isArray(data)) {
      return [];
    }
    return data.filter(isRecord).map(account => ({
      asset: toText(account.marginCoin),
      available: toNumber(account.available),
      locked: toNumber(account.locked),
      total: toNumber(account.accountEquity, toNumber(account.usdtEquity))
    }));
  }

  async fetchInstruments(symbols?: string[]): Promise<Instrument[]> {
    const data = await this.request({
      method: 'GET',
      path: '/api/v2/mix/market/contracts',
      endpoint: 'market',
      operation: 'fetchInstruments',
      query: { productType: this.session.productType },
      signed: false
    });

    const wanted = symbols ? new Set(symbols) : null;
    const instruments: Instrument[] = [];
    for (const row of Array.isArray(data) ? data : []) {
      const instrument = parseContract(row, this.session.marginCoin);
      if (instrument && (!wanted || wanted.has(instrument.symbol))) {
        instruments.push(instrument);
      }
    }
    return instruments;
  }

  async fetchTicker(instrument: string): Promise<Ticker | null> {
    const data = await this.request({
      method: 'GET',
      path: '/api/v2/mix/market/ticker',
      endpoint: 'market',
      operation: 'fetchTicker',
      query: { symbol: instrument, productType: this.session.productType },
      signed: false
    });
    const row: unknown = Array.isArray(data) ? data[0] : data;
    return parseTicker(row);
  }

  async fetchCandles(instrument: string, granularity: string, limit: number): Promise<Candle[]> {
    const data = await this.request({
      method: 'GET',
      path: '/api/v2/mix/market/candles',
      endpoint: 'market',
      operation: 'fetchCandles',
      query: {
        symbol: instrument,
        productType: this.session.productType,
        granularity,
        limit: String(limit)
      },
      signed: false
    });

    const candles: Candle[] = [];
    for (const row of Array.isArray(data) ? data : []) {
      const candle = parseCandle(row);
      if (candle) candles.push(candle);
    }
    return candles.sort((a, b) => a.openTime.getTime() - b.openTime.getTime());
  }

  /**
   * Measures exchange minus local time and stores it on the session
   */
  async syncClock(): Promise<number> {
    const sentAt = this.session.now();
    const data = await this.request({
      method: 'GET',
      path: '/api/v2/public/time',
      endpoint: 'market',
      operation: 'syncClock',
      signed: false
    });
    const receivedAt = this.session.now();

    const serverTime = isRecord(data) ? toNumber(data.serverTime, NaN) : NaN;
    if (Number.isNaN(serverTime)) {
      throw new TransientNetworkError('Bitget server time missing', makeContext('syncClock', this.name), 'BAD_RESPONSE');
    }

    const offset = serverTime - (sentAt + receivedAt) / 2;
    this.session.setClockOffset(offset);
    if (Math.abs(offset) > this.session.maxClockSkewMs) {
      throw new AuthError(
        `Clock skew ${Math.round(offset)}ms exceeds tolerance of ${this.session.maxClockSkewMs}ms`,
        makeContext('syncClock', this.name, { metadata: { offset } }),
        'CLOCK_SKEW'
      );
    }
    return offset;
  }

  /**
   * Opens the book stream for the given instruments and the private order/account stream
   */
  async connect(instruments: string[]): Promise<void> {
    const problems = this.validateCredentials(this.session.credentials);
    if (problems.length > 0) {
      throw new AuthError(problems.join('; '), makeContext('connect', this.name), 'MISSING_CREDENTIALS');
    }

    if (!this.publicStream) {
      this.publicStream = this.createStream(
        PUBLIC_STREAM,
        this.options.publicWsUrl,
        instruments.map(instrument => this.bookTopic(instrument))
      );
    }
    if (!this.privateStream) {
      this.privateStream = this.createStream(
        PRIVATE_STREAM,
        this.options.privateWsUrl,
        [
          { instType: this.session.productType, channel: 'orders', instId: 'default' },
          { instType: this.session.productType, channel: 'account', coin: 'default' }
        ],
        () => this.loginArgs()
      );
    }

    this.publicStream.start();
    this.privateStream.start();
  }

  async close(): Promise<void> {
    this.publicStream?.stop();
    this.privateStream?.stop();
    this.channel.close();
  }

  protected async performHealthCheck(): Promise<boolean> {
    await this.syncClock();
    return true;
  }

  protected getCapabilities(): string[] {
    return [
      'usdt_futures',
      'limit_orders',
      'reduce_only',
      'preset_stop_loss',
      'preset_take_profit',
      'order_cancellation',
      'order_stream',
      'book_stream',
      'account_stream'
    ];
  }

  /**
   * base64(HMAC-SHA256(secret, prehash))
   */
  sign(prehash: string): string {
    return createHmac('sha256', this.session.credentials.secret).update(prehash).digest('base64');
  }

  private loginArgs(): LoginArgs {
    const timestamp = String(Math.floor(this.session.exchangeTime() / 1000));
    return {
      apiKey: this.session.credentials.apiKey,
      passphrase: this.session.credentials.passphrase,
      timestamp,
      sign: this.sign(`${timestamp}GET/user/verify`)
    };
  }

  private bookTopic(instrument: string): StreamTopic {
    return { instType: this.session.productType, channel: 'books', instId: instrument };
  }

  private orderIdentity(ref: OrderRef): Record<string, string> {
    return ref.exchangeOrderId ? { orderId: ref.exchangeOrderId } : { clientOid: ref.clientOrderId };
  }

  private createStream(
    name: string,
    url: string,
    topics: StreamTopic[],
    login?: () => LoginArgs
  ): BitgetStream {
    this.streamStates[name] = 'disconnected';
    return new BitgetStream({
      url,
      topics,
      login,
      pingIntervalMs: this.options.pingIntervalMs,
      heartbeatTimeoutMs: this.options.heartbeatTimeoutMs,
      reconnectBaseMs: this.options.reconnectBaseMs,
      reconnectMaxMs: this.options.reconnectMaxMs,
      random: this.options.random,
      socketFactory: this.options.socketFactory,
      onData: push => this.handlePush(push),
      onStateChange: state => this.handleStreamState(name, state),
      onReconnected: () => {
        this.emit({ type: 'resync_required', reason: `${name}_stream_reconnected`, timestamp: new Date() });
      },
      onHeartbeatGap: silentMs => {
        this.auditService?.logEvent('STREAM_HEARTBEAT_GAP', { stream: name, silentMs }, { level: 'warn', venueId: this.connectorId });
      },
      onStreamError: (code, message, fatal) => {
        this.emit({ type: 'stream_error', stream: name, fatal, code, message, timestamp: new Date() });
      }
    });
  }

  private handleStreamState(name: string, state: StreamState): void {
    const previous = this.streamStates[name];
    this.streamStates[name] = state;
    if (state === 'connected') {
      this.emit({ type: 'connection', state: 'connected', stream: name, timestamp: new Date() });
    } else if (previous === 'connected') {
      this.emit({ type: 'connection', state: 'disconnected', stream: name, timestamp: new Date() });
    }
  }

  private handlePush(push: BitgetPush): void {
    const timestamp = push.ts === undefined ? new Date() : new Date(push.ts);
    switch (push.arg.channel) {
      case 'books': {
        const event = parseBookPush(push);
        if (event) this.emit(event);
        break;
      }
      case 'orders':
        for (const item of push.data) {
          for (const event of parseOrderPush(item)) {
            this.emit(event);
          }
        }
        break;
      case 'account':
        for (const item of push.data) {
          const event = parseAccountPush(item, timestamp);
          if (event) this.emit(event);
        }
        break;
      default:
        break;
    }
  }

  private emit(event: ExchangeEvent): void {
    this.channel.push(event);
  }

  /**
   * Signed REST call through the rate limiter and retry policy; returns the envelope's data
   */
  private async request(spec: RequestSpec): Promise<unknown> {
    return this.executeWithProtection(
      spec.endpoint,
      () => this.send(spec),
      spec.operation,
      spec.retryable ?? true
    );
  }

  private async send(spec: RequestSpec): Promise<unknown> {
    const context = makeContext(spec.operation, this.name, { metadata: { path: spec.path } });
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(spec.query ?? {})) {
      if (value !== undefined) params.append(key, value);
    }
    const query = params.toString();
    const requestPath = query ? `${spec.path}?${query}` : spec.path;
    const body = spec.body ? JSON.stringify(spec.body) : '';

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      locale: 'en-US'
    };
    if (spec.signed !== false) {
      const timestamp = String(this.session.exchangeTime());
      headers['ACCESS-KEY'] = this.session.credentials.apiKey;
      headers['ACCESS-PASSPHRASE'] = this.session.credentials.passphrase;
      headers['ACCESS-TIMESTAMP'] = timestamp;
      headers['ACCESS-SIGN'] = this.sign(`${timestamp}${spec.method}${requestPath}${body}`);
    }

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.options.restBaseUrl}${requestPath}`, {
        method: spec.method,
        headers,
        body: body || undefined,
        signal: AbortSignal.timeout(this.options.requestTimeoutMs)
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TransientNetworkError(`Bitget request failed: ${message}`, context, 'NETWORK_ERROR', error);
    }

    let payload: unknown = null;
    try {
      payload = await response.json();
    } catch (error) {
      if (response.ok) {
        throw new TransientNetworkError('Bitget returned a non-JSON body', context, 'BAD_RESPONSE', error);
      }
    }

    const code = isRecord(payload) ? toText(payload.code) : '';
    const message = isRecord(payload) ? toText(payload.msg) : response.statusText;
    if (!response.ok || code !== BITGET_SUCCESS_CODE) {
      throw classifyBitgetError(response.status, code, message, context);
    }
    return isRecord(payload) ? payload.data : undefined;
  }
}
