/**
 * Order and trading data models
 */

export type OrderSide = 'buy' | 'sell';

export type OrderState =
  | 'pending'
  | 'acknowledged'
  | 'partially_filled'
  | 'filled'
  | 'cancelled'
  | 'rejected';

export const TERMINAL_ORDER_STATES: ReadonlySet<OrderState> = new Set<OrderState>([
  'filled',
  'cancelled',
  'rejected'
]);

export function isTerminalState(state: OrderState): boolean {
  return TERMINAL_ORDER_STATES.has(state);
}

export interface Fill {
  fillId: string;
  quantity: number;
  price: number;
  fee: number;
  timestamp: Date;
}

export interface Order {
  clientOrderId: string;
  exchangeOrderId: string | null;
  instrument: string;
  side: OrderSide;
  price: number;
  quantity: number;
  filledQuantity: number;
  averageFillPrice: number;
  /** Quote amount still locked against the unfilled remainder */
  reservedAmount: number;
  reduceOnly: boolean;
  state: OrderState;
  createdAt: Date;
  updatedAt: Date;
  lastReason?: string;
  fills: Fill[];
}

/**
 * A proposed order produced by a strategy, not yet risk-checked or submitted
 */
export interface OrderIntent {
  instrument: string;
  side: OrderSide;
  quantity: number;
  price: number;
  reduceOnly?: boolean;
  /** Exchange-side protective exits attached to an opening order */
  stopLossPrice?: number;
  takeProfitPrice?: number;
  tag?: string;
}

/**
 * Identifies an order on the exchange by either id
 */
export interface OrderRef {
  instrument: string;
  clientOrderId: string;
  exchangeOrderId?: string | null;
}

export function signedQuantity(side: OrderSide, quantity: number): number {
  return side === 'buy' ? quantity : -quantity;
}
