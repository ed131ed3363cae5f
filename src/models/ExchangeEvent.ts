/**
 * Normalized events delivered by an exchange transport
 */

import { BookLevel } from './OrderBook';
import { OrderSide } from './Order';

interface EventBase {
  timestamp: Date;
  /** Transport-level sequence, if the venue provides one */
  sequence?: number;
}

export interface BookSnapshotEvent extends EventBase {
  type: 'book_snapshot';
  instrument: string;
  bids: BookLevel[];
  asks: BookLevel[];
  version: number;
}

/**
 * Level changes; a quantity of zero removes the level
 */
export interface BookDeltaEvent extends EventBase {
  type: 'book_delta';
  instrument: string;
  bids: BookLevel[];
  asks: BookLevel[];
  version: number;
  prevVersion?: number;
}

export interface OrderAckEvent extends EventBase {
  type: 'order_ack';
  instrument: string;
  clientOrderId: string;
  exchangeOrderId: string;
}

export interface OrderFillEvent extends EventBase {
  type: 'order_fill';
  instrument: string;
  clientOrderId: string;
  exchangeOrderId?: string;
  fillId: string;
  side?: OrderSide;
  price: number;
  quantity: number;
  fee: number;
  /** Exchange-reported filled quantity including this fill */
  cumulativeFilled?: number;
}

export interface OrderCancelledEvent extends EventBase {
  type: 'order_cancelled';
  instrument: string;
  clientOrderId: string;
  exchangeOrderId?: string;
  /** Cumulative quantity the exchange reports as filled before the cancel */
  filledQuantity: number;
  averageFillPrice?: number;
  reason: string;
}

export interface OrderRejectedEvent extends EventBase {
  type: 'order_rejected';
  instrument: string;
  clientOrderId: string;
  code: string;
  reason: string;
}

export interface BalanceEvent extends EventBase {
  type: 'balance';
  asset: string;
  total: number;
  available?: number;
}

export interface HeartbeatEvent extends EventBase {
  type: 'heartbeat';
}

export interface ResyncRequiredEvent extends EventBase {
  type: 'resync_required';
  reason: string;
  instrument?: string;
}

export interface ConnectionEvent extends EventBase {
  type: 'connection';
  state: 'connected' | 'disconnected';
  stream: string;
}

/**
 * Stream-level failure; fatal ones (login rejected) halt trading
 */
export interface StreamErrorEvent extends EventBase {
  type: 'stream_error';
  stream: string;
  fatal: boolean;
  code: string;
  message: string;
}

export type OrderEvent =
  | OrderAckEvent
  | OrderFillEvent
  | OrderCancelledEvent
  | OrderRejectedEvent;

export type BookEvent = BookSnapshotEvent | BookDeltaEvent;

export type ExchangeEvent =
  | BookEvent
  | OrderEvent
  | BalanceEvent
  | HeartbeatEvent
  | ResyncRequiredEvent
  | ConnectionEvent
  | StreamErrorEvent;

export function isOrderEvent(event: ExchangeEvent): event is OrderEvent {
  return (
    event.type === 'order_ack' ||
    event.type === 'order_fill' ||
    event.type === 'order_cancelled' ||
    event.type === 'order_rejected'
  );
}

export function isBookEvent(event: ExchangeEvent): event is BookEvent {
  return event.type === 'book_snapshot' || event.type === 'book_delta';
}

/**
 * Order state as reported by the exchange on query
 */
export interface ExchangeOrderState {
  instrument: string;
  clientOrderId: string;
  exchangeOrderId: string;
  side: OrderSide;
  price: number;
  quantity: number;
  filledQuantity: number;
  averageFillPrice: number;
  status: 'open' | 'partially_filled' | 'filled' | 'cancelled' | 'rejected';
  updatedAt: Date;
}
