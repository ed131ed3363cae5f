/**
 * Translation between Bitget v2 payloads and the normalized trading models
 */

import { BookLevel } from '../../models/OrderBook';
import { Instrument } from '../../models/Instrument';
import { Candle, Ticker } from '../../models/MarketStats';
import { OrderSide } from '../../models/Order';
import {
  BalanceEvent,
  BookEvent,
  ExchangeEvent,
  ExchangeOrderState
} from '../../models/ExchangeEvent';
import {
  ApplicationError,
  AuthError,
  ErrorContext,
  ExchangeRejection,
  TransientNetworkError
} from '../../utils/ErrorHandler';
import { BitgetPush } from './BitgetStream';

export const BITGET_SUCCESS_CODE = '00000';
export const BITGET_ORDER_NOT_FOUND = '40109';

/**
 * Credential, permission, signature and timestamp failures
 */
const AUTH_CODES = new Set(['40001', '40002', '40003', '40004', '40005', '40006', '40008', '40009', '40011', '40012', '40037']);

/**
 * Throttling and venue-side busy responses
 */
const TRANSIENT_CODES = new Set(['429', '40010', '40015', '45001']);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toNumber(value: unknown, fallback: number = 0): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : fallback;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : fallback;
  }
  return fallback;
}

export function toText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return '';
}

function toDate(value: unknown, fallback: Date): Date {
  const millis = toNumber(value, NaN);
  return Number.isNaN(millis) ? fallback : new Date(millis);
}

function toSide(value: unknown): OrderSide {
  return toText(value).toLowerCase() === 'sell' ? 'sell' : 'buy';
}

/**
 * Maps an HTTP status and envelope code to the error taxonomy
 */
export function classifyBitgetError(
  httpStatus: number,
  code: string,
  message: string,
  context: ErrorContext
): ApplicationError {
  const text = `Bitget ${code || httpStatus}: ${message}`;
  if (AUTH_CODES.has(code) || httpStatus === 401 || httpStatus === 403) {
    return new AuthError(text, context, code || `HTTP_${httpStatus}`);
  }
  if (TRANSIENT_CODES.has(code) || httpStatus === 429 || httpStatus >= 500) {
    return new TransientNetworkError(text, context, code || `HTTP_${httpStatus}`);
  }
  return new ExchangeRejection(text, code || `HTTP_${httpStatus}`, context);
}

export function mapOrderStatus(state: string): ExchangeOrderState['status'] {
  switch (state) {
    case 'live':
    case 'new':
    case 'init':
      return 'open';
    case 'partially_filled':
      return 'partially_filled';
    case 'filled':
      return 'filled';
    case 'canceled':
    case 'cancelled':
      return 'cancelled';
    default:
      return 'rejected';
  }
}

export function parseLevels(raw: unknown): BookLevel[] {
  if (!Array.isArray(raw)) {
    return [];
  }
  const levels: BookLevel[] = [];
  for (const entry of raw) {
    if (Array.isArray(entry) && entry.length >= 2) {
      levels.push({ price: toNumber(entry[0]), quantity: toNumber(entry[1]) });
    }
  }
  return levels;
}

/**
 * books channel: snapshot replaces, update patches with seq/pseq versioning
 */
export function parseBookPush(push: BitgetPush): BookEvent | null {
  const item = push.data[0];
  const instrument = push.arg.instId;
  if (!isRecord(item) || !instrument) {
    return null;
  }

  const timestamp = toDate(item.ts ?? push.ts, new Date());
  const version = toNumber(item.seq, toNumber(item.ts));
  const bids = parseLevels(item.bids);
  const asks = parseLevels(item.asks);

  if (push.action === 'snapshot') {
    return { type: 'book_snapshot', instrument, bids, asks, version, timestamp };
  }
  const prevVersion = item.pseq === undefined ? undefined : toNumber(item.pseq);
  return { type: 'book_delta', instrument, bids, asks, version, prevVersion, timestamp };
}

/**
 * orders channel: one push item can carry an ack, a fill and a terminal status
 */
export function parseOrderPush(item: unknown): ExchangeEvent[] {
  if (!isRecord(item)) {
    return [];
  }

  const instrument = toText(item.instId);
  const clientOrderId = toText(item.clientOid);
  const exchangeOrderId = toText(item.orderId);
  if (!instrument || !clientOrderId) {
    return [];
  }

  const timestamp = toDate(item.uTime ?? item.cTime, new Date());
  const status = toText(item.status);
  const events: ExchangeEvent[] = [];

  if (exchangeOrderId) {
    events.push({ type: 'order_ack', instrument, clientOrderId, exchangeOrderId, timestamp });
  }

  const tradeId = toText(item.tradeId);
  if (tradeId) {
    events.push({
      type: 'order_fill',
      instrument,
      clientOrderId,
      exchangeOrderId: exchangeOrderId || undefined,
      fillId: tradeId,
      side: toSide(item.side),
      price: toNumber(item.fillPrice, toNumber(item.priceAvg)),
      quantity: toNumber(item.baseVolume),
      fee: Math.abs(toNumber(item.fillFee)),
      cumulativeFilled: item.accBaseVolume === undefined ? undefined : toNumber(item.accBaseVolume),
      timestamp: toDate(item.fillTime, timestamp)
    });
  }

  if (status === 'canceled' || status === 'cancelled') {
    events.push({
      type: 'order_cancelled',
      instrument,
      clientOrderId,
      exchangeOrderId: exchangeOrderId || undefined,
      filledQuantity: toNumber(item.accBaseVolume),
      averageFillPrice: item.priceAvg === undefined ? undefined : toNumber(item.priceAvg),
      reason: toText(item.cancelReason) || 'cancelled_by_exchange',
      timestamp
    });
  }

  return events;
}

/**
 * account channel: equity is the exchange-reported total
 */
export function parseAccountPush(item: unknown, timestamp: Date): BalanceEvent | null {
  if (!isRecord(item)) {
    return null;
  }
  const asset = toText(item.marginCoin);
  if (!asset) {
    return null;
  }
  return {
    type: 'balance',
    asset,
    total: toNumber(item.equity, toNumber(item.usdtEquity)),
    available: item.available === undefined ? undefined : toNumber(item.available),
    timestamp
  };
}

/**
 * Order detail and pending-list rows share this shape
 */
export function parseOrderState(raw: unknown): ExchangeOrderState | null {
  if (!isRecord(raw)) {
    return null;
  }
  const instrument = toText(raw.symbol);
  const exchangeOrderId = toText(raw.orderId);
  if (!instrument || !exchangeOrderId) {
    return null;
  }
  return {
    instrument,
    clientOrderId: toText(raw.clientOid),
    exchangeOrderId,
    side: toSide(raw.side),
    price: toNumber(raw.price),
    quantity: toNumber(raw.size),
    filledQuantity: toNumber(raw.baseVolume),
    averageFillPrice: toNumber(raw.priceAvg),
    status: mapOrderStatus(toText(raw.state ?? raw.status)),
    updatedAt: toDate(raw.uTime ?? raw.cTime, new Date())
  };
}

/**
 * Contract metadata; precisions are decimal places
 */
export function parseContract(raw: unknown, quoteAsset: string): Instrument | null {
  if (!isRecord(raw)) {
    return null;
  }
  const symbol = toText(raw.symbol);
  if (!symbol) {
    return null;
  }
  return {
    symbol,
    baseAsset: toText(raw.baseCoin),
    quoteAsset: toText(raw.quoteCoin) || quoteAsset,
    pricePrecision: toNumber(raw.pricePlace),
    quantityPrecision: toNumber(raw.volumePlace),
    minOrderSize: toNumber(raw.minTradeNum),
    minNotional: toNumber(raw.minTradeUSDT, 5)
  };
}

/**
 * One row of /api/v2/mix/market/ticker
 */
export function parseTicker(raw: unknown): Ticker | null {
  if (!isRecord(raw)) return null;
  const instrument = toText(raw.symbol);
  const lastPrice = toNumber(raw.lastPr, toNumber(raw.last, NaN));
  if (!instrument || Number.isNaN(lastPrice)) return null;
  return {
    instrument,
    lastPrice,
    high24h: toNumber(raw.high24h),
    low24h: toNumber(raw.low24h),
    baseVolume: toNumber(raw.baseVolume),
    changeRatio: toNumber(raw.chgUtc, toNumber(raw.change24h)),
    timestamp: toDate(raw.ts, new Date(0))
  };
}

/**
 * [openTime, open, high, low, close, baseVolume, quoteVolume] as strings
 */
export function parseCandle(raw: unknown): Candle | null {
  if (!Array.isArray(raw) || raw.length < 6) return null;
  const openTime = toNumber(raw[0], NaN);
  const close = toNumber(raw[4], NaN);
  if (Number.isNaN(openTime) || Number.isNaN(close)) return null;
  return {
    openTime: new Date(openTime),
    open: toNumber(raw[1]),
    high: toNumber(raw[2]),
    low: toNumber(raw[3]),
    close,
    volume: toNumber(raw[5])
  };
}
