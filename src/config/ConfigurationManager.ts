/**
 * Configuration Manager for the trading core
 * Reads environment variables (a .env file is loaded by the entry point) into a typed, validated config
 */

import { ExchangeCredentials } from '../connectors/ExchangeConnector';
import { EndpointClass, TokenBucketConfig } from '../connectors/RateLimiter';
import { RiskLimits } from '../models/RiskLimits';
import { ConfigurationError } from '../utils/ErrorHandler';

export interface ExchangeConfig {
  credentials: ExchangeCredentials;
  restBaseUrl: string;
  publicWsUrl: string;
  privateWsUrl: string;
  productType: string;
  marginCoin: string;
  requestTimeoutMs: number;
  maxClockSkewMs: number;
}

export interface StreamConfig {
  pingIntervalMs: number;
  heartbeatTimeoutMs: number;
  reconnectBaseMs: number;
  reconnectMaxMs: number;
  channelCapacity: number;
}

export type StrategyName = 'advisor' | 'hold';

export interface StrategyConfig {
  name: StrategyName;
  confidenceThreshold: number;
  maxPositionPercent: number;
  maxPositionValue: number;
  minNotional: number;
  maxSignalAgeMs: number;
  /** Percent from entry; 0 disables the preset exit */
  stopLossPercent: number;
  takeProfitPercent: number;
}

export interface AdvisorConfig {
  baseUrl: string;
  model: string;
  timeoutMs: number;
}

export interface LoopConfig {
  tickIntervalMs: number;
  signalIntervalMs: number;
  shutdownGraceMs: number;
  bookResyncTimeoutMs: number;
  orderTimeoutMs: number;
  maxBookAgeMs: number;
}

export interface BotConfig {
  exchange: ExchangeConfig;
  stream: StreamConfig;
  rateLimits: Record<EndpointClass, TokenBucketConfig>;
  instruments: string[];
  risk: RiskLimits;
  strategy: StrategyConfig;
  advisor: AdvisorConfig;
  loop: LoopConfig;
  /** Where the ledger snapshot is kept; null disables persistence */
  ledgerPath: string | null;
  auditSigningKey?: string;
}

export interface ConfigValidationError {
  path: string;
  message: string;
}

export interface ConfigValidationResult {
  isValid: boolean;
  errors: ConfigValidationError[];
}

export type EnvironmentVariables = Record<string, string | undefined>;

const REDACTED = '[REDACTED]';

export class ConfigurationManager {
  private readonly env: EnvironmentVariables;
  private config: BotConfig;
  private parseErrors: ConfigValidationError[] = [];

  constructor(env: EnvironmentVariables = process.env) {
    this.env = env;
    this.config = ConfigurationManager.getDefaultConfiguration();
  }

  /**
   * Builds the configuration from the environment and validates it; throws ConfigurationError when invalid
   */
  loadConfiguration(): BotConfig {
    this.parseErrors = [];
    const config = this.loadConfigurationFromEnvironment();
    const validation = this.validateConfiguration(config);
    const errors = [...this.parseErrors, ...validation.errors];
    if (errors.length > 0) {
      throw new ConfigurationError(
        `Configuration validation failed: ${errors.map(e => `${e.path} ${e.message}`).join(', ')}`
      );
    }
    this.config = config;
    return config;
  }

  getConfiguration(): BotConfig {
    return this.config;
  }

  /**
   * Validates the entire configuration
   */
  validateConfiguration(config: BotConfig): ConfigValidationResult {
    const errors: ConfigValidationError[] = [
      ...this.validateExchangeConfig(config.exchange),
      ...this.validateStreamConfig(config.stream),
      ...this.validateRiskConfig(config.risk),
      ...this.validateStrategyConfig(config.strategy),
      ...this.validateLoopConfig(config.loop)
    ];

    if (config.instruments.length === 0) {
      errors.push({ path: 'instruments', message: 'must list at least one instrument' });
    }

    for (const [endpoint, bucket] of Object.entries(config.rateLimits)) {
      if (bucket.requestsPerSecond <= 0 || bucket.burstSize < 1) {
        errors.push({ path: `rateLimits.${endpoint}`, message: 'must allow at least one request' });
      }
    }

    return {
      isValid: errors.length === 0,
      errors
    };
  }

  /**
   * Configuration with credentials masked, safe to log
   */
  toSafeObject(config: BotConfig = this.config): Record<string, unknown> {
    return {
      ...config,
      exchange: {
        ...config.exchange,
        credentials: {
          apiKey: mask(config.exchange.credentials.apiKey),
          secret: REDACTED,
          passphrase: REDACTED
        }
      },
      auditSigningKey: config.auditSigningKey ? REDACTED : undefined
    };
  }

  /**
   * Gets default configuration
   */
  static getDefaultConfiguration(): BotConfig {
    return {
      exchange: {
        credentials: { apiKey: '', secret: '', passphrase: '' },
        restBaseUrl: 'https://api.bitget.com',
        publicWsUrl: 'wss://ws.bitget.com/v2/ws/public',
        privateWsUrl: 'wss://ws.bitget.com/v2/ws/private',
        productType: 'USDT-FUTURES',
        marginCoin: 'USDT',
        requestTimeoutMs: 10000,
        maxClockSkewMs: 5000
      },
      stream: {
        pingIntervalMs: 25000,
        heartbeatTimeoutMs: 60000,
        reconnectBaseMs: 1000,
        reconnectMaxMs: 30000,
        channelCapacity: 10000
      },
      rateLimits: {
        trade: { requestsPerSecond: 10, burstSize: 10 },
        query: { requestsPerSecond: 10, burstSize: 20 },
        market: { requestsPerSecond: 20, burstSize: 20 }
      },
      instruments: ['BTCUSDT'],
      risk: {
        maxPositionPerInstrument: 1,
        maxOrderNotional: 1000,
        maxOpenOrders: 2,
        minOrderIntervalMs: 1000,
        minAvailableBalance: 10
      },
      strategy: {
        name: 'advisor',
        confidenceThreshold: 6,
        maxPositionPercent: 5,
        maxPositionValue: 1000,
        minNotional: 5,
        maxSignalAgeMs: 30 * 60 * 1000,
        stopLossPercent: 2,
        takeProfitPercent: 6
      },
      advisor: {
        baseUrl: 'http://localhost:1234',
        model: 'gpt-4o-mini.gguf',
        timeoutMs: 30000
      },
      loop: {
        tickIntervalMs: 15000,
        signalIntervalMs: 15 * 60 * 1000,
        shutdownGraceMs: 5000,
        bookResyncTimeoutMs: 10000,
        orderTimeoutMs: 10 * 60 * 1000,
        maxBookAgeMs: 30000
      },
      ledgerPath: './data/ledger.json'
    };
  }

  private loadConfigurationFromEnvironment(): BotConfig {
    const defaults = ConfigurationManager.getDefaultConfiguration();
    const env = this.env;

    return {
      exchange: {
        credentials: {
          apiKey: env.BITGET_API_KEY ?? '',
          secret: env.BITGET_API_SECRET ?? '',
          passphrase: env.BITGET_API_PASSPHRASE ?? ''
        },
        restBaseUrl: env.BITGET_REST_URL ?? defaults.exchange.restBaseUrl,
        publicWsUrl: env.BITGET_PUBLIC_WS_URL ?? defaults.exchange.publicWsUrl,
        privateWsUrl: env.BITGET_PRIVATE_WS_URL ?? defaults.exchange.privateWsUrl,
        productType: env.PRODUCT_TYPE ?? defaults.exchange.productType,
        marginCoin: env.MARGIN_COIN ?? defaults.exchange.marginCoin,
        requestTimeoutMs: this.readNumber('REQUEST_TIMEOUT_MS', defaults.exchange.requestTimeoutMs),
        maxClockSkewMs: this.readNumber('MAX_CLOCK_SKEW_MS', defaults.exchange.maxClockSkewMs)
      },
      stream: {
        pingIntervalMs: this.readNumber('WS_PING_INTERVAL_MS', defaults.stream.pingIntervalMs),
        heartbeatTimeoutMs: this.readNumber('WS_HEARTBEAT_TIMEOUT_MS', defaults.stream.heartbeatTimeoutMs),
        reconnectBaseMs: this.readNumber('WS_RECONNECT_BASE_MS', defaults.stream.reconnectBaseMs),
        reconnectMaxMs: this.readNumber('WS_RECONNECT_MAX_MS', defaults.stream.reconnectMaxMs),
        channelCapacity: this.readNumber('EVENT_CHANNEL_CAPACITY', defaults.stream.channelCapacity)
      },
      rateLimits: {
        trade: {
          requestsPerSecond: this.readNumber('RATE_LIMIT_TRADE_PER_SECOND', defaults.rateLimits.trade.requestsPerSecond),
          burstSize: defaults.rateLimits.trade.burstSize
        },
        query: {
          requestsPerSecond: this.readNumber('RATE_LIMIT_QUERY_PER_SECOND', defaults.rateLimits.query.requestsPerSecond),
          burstSize: defaults.rateLimits.query.burstSize
        },
        market: defaults.rateLimits.market
      },
      instruments: env.INSTRUMENTS
        ? env.INSTRUMENTS.split(',').map(symbol => symbol.trim().toUpperCase()).filter(symbol => symbol.length > 0)
        : defaults.instruments,
      risk: {
        maxPositionPerInstrument: this.readNumber('MAX_POSITION_PER_INSTRUMENT', defaults.risk.maxPositionPerInstrument),
        maxOrderNotional: this.readNumber('MAX_ORDER_NOTIONAL', defaults.risk.maxOrderNotional),
        maxOpenOrders: this.readNumber('MAX_OPEN_ORDERS', defaults.risk.maxOpenOrders),
        minOrderIntervalMs: this.readNumber('MIN_ORDER_INTERVAL_MS', defaults.risk.minOrderIntervalMs),
        minAvailableBalance: this.readNumber('MIN_BALANCE', defaults.risk.minAvailableBalance)
      },
      strategy: {
        name: this.readStrategyName(env.STRATEGY, defaults.strategy.name),
        confidenceThreshold: this.readNumber('CONFIDENCE_THRESHOLD', defaults.strategy.confidenceThreshold),
        maxPositionPercent: this.readNumber('MAX_POSITION_PERCENT', defaults.strategy.maxPositionPercent),
        maxPositionValue: this.readNumber('MAX_POSITION_VALUE', defaults.strategy.maxPositionValue),
        minNotional: this.readNumber('MIN_NOTIONAL', defaults.strategy.minNotional),
        maxSignalAgeMs: this.readNumber('MAX_SIGNAL_AGE_MS', defaults.strategy.maxSignalAgeMs),
        stopLossPercent: this.readNumber('STOP_LOSS_PERCENT', defaults.strategy.stopLossPercent),
        takeProfitPercent: this.readNumber('TAKE_PROFIT_PERCENT', defaults.strategy.takeProfitPercent)
      },
      advisor: {
        baseUrl: env.LM_STUDIO_URL ?? defaults.advisor.baseUrl,
        model: env.LM_STUDIO_MODEL ?? defaults.advisor.model,
        timeoutMs: this.readNumber('LM_STUDIO_TIMEOUT_MS', defaults.advisor.timeoutMs)
      },
      loop: {
        tickIntervalMs: this.readNumber('TICK_INTERVAL_MS', defaults.loop.tickIntervalMs),
        // minutes, as operators set it
        signalIntervalMs: this.readNumber('CHECK_INTERVAL', defaults.loop.signalIntervalMs / 60000) * 60000,
        shutdownGraceMs: this.readNumber('SHUTDOWN_GRACE_MS', defaults.loop.shutdownGraceMs),
        bookResyncTimeoutMs: this.readNumber('BOOK_RESYNC_TIMEOUT_MS', defaults.loop.bookResyncTimeoutMs),
        orderTimeoutMs: this.readNumber('ORDER_TIMEOUT_MS', defaults.loop.orderTimeoutMs),
        maxBookAgeMs: this.readNumber('MAX_BOOK_AGE_MS', defaults.loop.maxBookAgeMs)
      },
      ledgerPath: env.LEDGER_PATH === undefined ? defaults.ledgerPath : env.LEDGER_PATH.trim() || null,
      auditSigningKey: env.AUDIT_SIGNING_KEY
    };
  }

  private readNumber(key: string, fallback: number): number {
    const raw = this.env[key];
    if (raw === undefined || raw.trim() === '') {
      return fallback;
    }
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      this.parseErrors.push({ path: key, message: `must be a number, got "${raw}"` });
      return fallback;
    }
    return value;
  }

  private readStrategyName(raw: string | undefined, fallback: StrategyName): StrategyName {
    if (raw === undefined) return fallback;
    if (raw === 'advisor' || raw === 'hold') return raw;
    this.parseErrors.push({ path: 'STRATEGY', message: `must be advisor or hold, got "${raw}"` });
    return fallback;
  }

  /**
   * Validates exchange configuration
   */
  private validateExchangeConfig(config: ExchangeConfig): ConfigValidationError[] {
    const errors: ConfigValidationError[] = [];
    const { credentials } = config;

    if (!credentials.apiKey || !credentials.secret || !credentials.passphrase) {
      errors.push({
        path: 'exchange.credentials',
        message: 'BITGET_API_KEY, BITGET_API_SECRET and BITGET_API_PASSPHRASE are required'
      });
    }

    for (const [path, url, protocols] of [
      ['exchange.restBaseUrl', config.restBaseUrl, ['https:', 'http:']],
      ['exchange.publicWsUrl', config.publicWsUrl, ['wss:', 'ws:']],
      ['exchange.privateWsUrl', config.privateWsUrl, ['wss:', 'ws:']]
    ] as const) {
      if (!isUrlWithProtocol(url, protocols)) {
        errors.push({ path, message: `must be a ${protocols[0]}// URL` });
      }
    }

    if (config.requestTimeoutMs < 1000) {
      errors.push({ path: 'exchange.requestTimeoutMs', message: 'must be at least 1000ms' });
    }

    if (config.maxClockSkewMs <= 0) {
      errors.push({ path: 'exchange.maxClockSkewMs', message: 'must be positive' });
    }

    return errors;
  }

  private validateStreamConfig(config: StreamConfig): ConfigValidationError[] {
    const errors: ConfigValidationError[] = [];

    if (config.heartbeatTimeoutMs <= config.pingIntervalMs) {
      errors.push({ path: 'stream.heartbeatTimeoutMs', message: 'must be longer than the ping interval' });
    }

    if (config.reconnectBaseMs <= 0 || config.reconnectMaxMs < config.reconnectBaseMs) {
      errors.push({ path: 'stream.reconnectMaxMs', message: 'must be at least the positive reconnect base delay' });
    }

    if (config.channelCapacity < 1) {
      errors.push({ path: 'stream.channelCapacity', message: 'must be at least 1' });
    }

    return errors;
  }

  /**
   * Validates risk limits
   */
  private validateRiskConfig(config: RiskLimits): ConfigValidationError[] {
    const errors: ConfigValidationError[] = [];

    if (config.maxPositionPerInstrument <= 0) {
      errors.push({ path: 'risk.maxPositionPerInstrument', message: 'must be positive' });
    }
    if (config.maxOrderNotional <= 0) {
      errors.push({ path: 'risk.maxOrderNotional', message: 'must be positive' });
    }
    if (!Number.isInteger(config.maxOpenOrders) || config.maxOpenOrders < 1) {
      errors.push({ path: 'risk.maxOpenOrders', message: 'must be a positive integer' });
    }
    if (config.minOrderIntervalMs < 0) {
      errors.push({ path: 'risk.minOrderIntervalMs', message: 'must be non-negative' });
    }
    if (config.minAvailableBalance < 0) {
      errors.push({ path: 'risk.minAvailableBalance', message: 'must be non-negative' });
    }

    return errors;
  }

  private validateStrategyConfig(config: StrategyConfig): ConfigValidationError[] {
    const errors: ConfigValidationError[] = [];

    if (config.confidenceThreshold < 0 || config.confidenceThreshold > 10) {
      errors.push({ path: 'strategy.confidenceThreshold', message: 'must be between 0 and 10' });
    }
    if (config.maxPositionPercent <= 0 || config.maxPositionPercent > 100) {
      errors.push({ path: 'strategy.maxPositionPercent', message: 'must be between 0 and 100' });
    }
    if (config.maxPositionValue <= 0) {
      errors.push({ path: 'strategy.maxPositionValue', message: 'must be positive' });
    }
    if (config.minNotional < 0) {
      errors.push({ path: 'strategy.minNotional', message: 'must be non-negative' });
    }
    for (const [path, percent] of [
      ['strategy.stopLossPercent', config.stopLossPercent],
      ['strategy.takeProfitPercent', config.takeProfitPercent]
    ] as const) {
      if (percent < 0 || percent >= 100) {
        errors.push({ path, message: 'must be at least 0 and below 100' });
      }
    }

    return errors;
  }

  private validateLoopConfig(config: LoopConfig): ConfigValidationError[] {
    const errors: ConfigValidationError[] = [];

    if (config.tickIntervalMs < 100) {
      errors.push({ path: 'loop.tickIntervalMs', message: 'must be at least 100ms' });
    }
    if (config.signalIntervalMs < config.tickIntervalMs) {
      errors.push({ path: 'loop.signalIntervalMs', message: 'must not be shorter than the tick interval' });
    }
    if (config.shutdownGraceMs < 0) {
      errors.push({ path: 'loop.shutdownGraceMs', message: 'must be non-negative' });
    }
    if (config.orderTimeoutMs < config.tickIntervalMs) {
      errors.push({ path: 'loop.orderTimeoutMs', message: 'must not be shorter than the tick interval' });
    }
    if (config.maxBookAgeMs <= 0) {
      errors.push({ path: 'loop.maxBookAgeMs', message: 'must be positive' });
    }

    return errors;
  }
}

function isUrlWithProtocol(value: string, protocols: readonly string[]): boolean {
  try {
    return protocols.includes(new URL(value).protocol);
  } catch {
    return false;
  }
}

function mask(value: string): string {
  return value.length <= 4 ? REDACTED : `${value.slice(0, 4)}...`;
}
