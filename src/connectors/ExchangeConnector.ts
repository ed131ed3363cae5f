/**
 * Exchange transport contract and base implementation
 * Provides the standardized interface the trading core uses to reach an exchange
 */

import { Instrument } from '../models/Instrument';
import { Candle, Ticker } from '../models/MarketStats';
import { OrderRef, OrderSide } from '../models/Order';
import { ExchangeEvent, ExchangeOrderState } from '../models/ExchangeEvent';
import { ConnectorStatus, StreamState } from '../models/ConnectorStatus';
import { ErrorHandler, RecoveryStrategy, makeContext } from '../utils/ErrorHandler';
import { EndpointClass, RateLimiter, TokenBucketConfig } from './RateLimiter';

export interface ExchangeCredentials {
  apiKey: string;
  secret: string;
  passphrase: string;
}

export interface SubmitOrderRequest {
  clientOrderId: string;
  instrument: string;
  side: OrderSide;
  quantity: number;
  price: number;
  reduceOnly: boolean;
  stopLossPrice?: number;
  takeProfitPrice?: number;
}

export interface OrderAck {
  clientOrderId: string;
  exchangeOrderId: string;
  timestamp: Date;
}

export interface CancelAck {
  clientOrderId: string;
  exchangeOrderId: string | null;
  timestamp: Date;
}

export interface BalanceReport {
  asset: string;
  available: number;
  locked: number;
  total: number;
}

/**
 * Everything the trading core needs from an exchange
 */
export interface IExchangeTransport {
  /**
   * Places an order; throws ExchangeRejection, AuthError or TransientNetworkError
   */
  submitOrder(order: SubmitOrderRequest): Promise<OrderAck>;

  /**
   * Requests cancellation; the terminal transition arrives as a stream event
   */
  cancelOrder(ref: OrderRef): Promise<CancelAck>;

  /**
   * Infinite sequence of normalized events that continues across reconnects
   */
  streamEvents(): AsyncIterable<ExchangeEvent>;

  /**
   * Authoritative list of open orders, used during resync
   */
  fetchOpenOrders(instrument?: string): Promise<ExchangeOrderState[]>;

  /**
   * Final or current state of one order; null if the exchange does not know it
   */
  fetchOrder(ref: OrderRef): Promise<ExchangeOrderState | null>;

  /**
   * Asks the venue for a fresh book; it arrives on the stream as a book_snapshot event
   */
  requestBookSnapshot(instrument: string): Promise<void>;

  fetchBalances(): Promise<BalanceReport[]>;

  fetchInstruments(symbols?: string[]): Promise<Instrument[]>;

  /**
   * 24h statistics for one instrument; null when the venue has none
   */
  fetchTicker(instrument: string): Promise<Ticker | null>;

  /**
   * Most recent candles of the given granularity, oldest first
   */
  fetchCandles(instrument: string, granularity: string, limit: number): Promise<Candle[]>;

  /**
   * Measures the offset between local and exchange clocks
   */
  syncClock(): Promise<number>;

  connect(instruments: string[]): Promise<void>;

  close(): Promise<void>;

  getStatus(): ConnectorStatus;
}

export interface RetryConfig {
  maxRetries: number;
  baseDelay: number;
  maxDelay: number;
}

export interface BaseConnectorOptions {
  rateLimits: Record<EndpointClass, TokenBucketConfig>;
  maxRateLimitWaitMs: number;
  retry: RetryConfig;
  errorHandler?: ErrorHandler;
  rateLimiter?: RateLimiter;
}

export const DEFAULT_CONNECTOR_OPTIONS: BaseConnectorOptions = {
  rateLimits: {
    trade: { requestsPerSecond: 10, burstSize: 10 },
    query: { requestsPerSecond: 10, burstSize: 20 },
    market: { requestsPerSecond: 20, burstSize: 20 }
  },
  maxRateLimitWaitMs: 2000,
  retry: {
    maxRetries: 3,
    baseDelay: 500,
    maxDelay: 10000
  }
};

/**
 * Base exchange connector with rate limiting, retry and status tracking
 */
export abstract class BaseExchangeConnector implements IExchangeTransport {
  protected readonly connectorId: string;
  protected readonly name: string;
  protected readonly errorHandler: ErrorHandler;
  protected readonly rateLimiter: RateLimiter;
  private readonly retryConfig: RetryConfig;

  // Status tracking
  private lastHealthCheck: Date = new Date(0);
  private latency: number = 0;
  private requestCount: number = 0;
  private failureCount: number = 0;
  protected streamStates: Record<string, StreamState> = {};

  constructor(connectorId: string, name: string, options: BaseConnectorOptions = DEFAULT_CONNECTOR_OPTIONS) {
    this.connectorId = connectorId;
    this.name = name;
    this.retryConfig = options.retry;
    this.errorHandler = options.errorHandler ?? new ErrorHandler();
    this.rateLimiter = options.rateLimiter ?? new RateLimiter({
      buckets: options.rateLimits,
      maxWaitMs: options.maxRateLimitWaitMs
    });
  }

  /**
   * Executes a request through the rate limiter with retry on transient failures
   */
  protected async executeWithProtection<T>(
    endpoint: EndpointClass,
    operation: () => Promise<T>,
    operationName: string,
    retryable: boolean = true
  ): Promise<T> {
    const context = makeContext(operationName, this.name);
    const attempt = async (): Promise<T> => {
      await this.rateLimiter.acquire(endpoint);
      const startTime = Date.now();
      this.requestCount++;
      try {
        const result = await operation();
        this.latency = Date.now() - startTime;
        return result;
      } catch (error) {
        this.failureCount++;
        throw error;
      }
    };

    return this.errorHandler.execute(attempt, context, {
      strategy: retryable ? RecoveryStrategy.RETRY : RecoveryStrategy.FAIL_FAST,
      maxAttempts: this.retryConfig.maxRetries,
      backoffMs: this.retryConfig.baseDelay,
      maxBackoffMs: this.retryConfig.maxDelay
    });
  }

  abstract submitOrder(order: SubmitOrderRequest): Promise<OrderAck>;
  abstract cancelOrder(ref: OrderRef): Promise<CancelAck>;
  abstract streamEvents(): AsyncIterable<ExchangeEvent>;
  abstract fetchOpenOrders(instrument?: string): Promise<ExchangeOrderState[]>;
  abstract fetchOrder(ref: OrderRef): Promise<ExchangeOrderState | null>;
  abstract requestBookSnapshot(instrument: string): Promise<void>;
  abstract fetchBalances(): Promise<BalanceReport[]>;
  abstract fetchInstruments(symbols?: string[]): Promise<Instrument[]>;
  abstract fetchTicker(instrument: string): Promise<Ticker | null>;
  abstract fetchCandles(instrument: string, granularity: string, limit: number): Promise<Candle[]>;
  abstract syncClock(): Promise<number>;
  abstract connect(instruments: string[]): Promise<void>;
  abstract close(): Promise<void>;

  /**
   * Default health check implementation
   */
  async healthCheck(): Promise<boolean> {
    try {
      const startTime = Date.now();
      const isHealthy = await this.performHealthCheck();
      this.lastHealthCheck = new Date();
      this.latency = Date.now() - startTime;
      return isHealthy;
    } catch (error) {
      this.failureCount++;
      return false;
    }
  }

  protected abstract performHealthCheck(): Promise<boolean>;

  protected abstract getCapabilities(): string[];

  /**
   * Get current connector status
   */
  getStatus(): ConnectorStatus {
    const errorRate = this.requestCount > 0 ? this.failureCount / this.requestCount : 0;
    const streamsDown = Object.values(this.streamStates).some(state => state !== 'connected');
    let status: ConnectorStatus['status'];

    if (this.errorHandler.hasOpenCircuit()) {
      status = 'offline';
    } else if (streamsDown || errorRate > 0.1) {
      status = 'degraded';
    } else {
      status = 'healthy';
    }

    return {
      connectorId: this.connectorId,
      name: this.name,
      status,
      lastHealthCheck: this.lastHealthCheck,
      latency: this.latency,
      errorRate,
      streams: { ...this.streamStates },
      capabilities: this.getCapabilities()
    };
  }

  /**
   * Validate credentials are present before any signed call
   */
  protected validateCredentials(credentials: ExchangeCredentials): string[] {
    const problems: string[] = [];
    if (!credentials.apiKey) problems.push('API key is required');
    if (!credentials.secret) problems.push('API secret is required');
    if (!credentials.passphrase) problems.push('API passphrase is required');
    return problems;
  }
}
