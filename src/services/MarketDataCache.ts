/**
 * Latest order book per instrument, patched by versioned stream events
 */

import { BookLevel, OrderBookSnapshot } from '../models/OrderBook';
import { BookDeltaEvent, BookEvent, BookSnapshotEvent } from '../models/ExchangeEvent';
import { SequenceGapError, makeContext } from '../utils/ErrorHandler';
import { TradingSession } from './TradingSession';

export type BookApplyResult = 'applied' | 'stale' | 'gap' | 'crossed' | 'ignored';

export type ResyncRequester = (instrument: string, gap: SequenceGapError) => void;

interface BookLevels {
  bids: Map<number, number>;
  asks: Map<number, number>;
  version: number;
  timestamp: Date;
}

interface BookState extends BookLevels {
  frozen: OrderBookSnapshot;
}

export class MarketDataCache {
  private books: Map<string, BookState> = new Map();
  private awaitingSince: Map<string, number> = new Map();
  private readonly session: TradingSession;
  private readonly requestResync: ResyncRequester;

  constructor(session: TradingSession, requestResync: ResyncRequester) {
    this.session = session;
    this.requestResync = requestResync;
  }

  /**
   * Applies a snapshot or delta; stale versions are dropped, gaps invalidate the book
   */
  applyEvent(event: BookEvent): BookApplyResult {
    if (!this.session.isAllowed(event.instrument)) {
      return 'ignored';
    }
    return event.type === 'book_snapshot' ? this.applySnapshot(event) : this.applyDelta(event);
  }

  /**
   * Immutable copy of the current book, or null when none is trusted
   */
  snapshot(instrument: string): OrderBookSnapshot | null {
    return this.books.get(instrument)?.frozen ?? null;
  }

  midPrice(instrument: string): number | null {
    const book = this.snapshot(instrument);
    if (!book || book.bids.length === 0 || book.asks.length === 0) {
      return null;
    }
    return (book.bids[0].price + book.asks[0].price) / 2;
  }

  /**
   * Milliseconds since the book last changed, null without a book
   */
  ageMs(instrument: string): number | null {
    const book = this.books.get(instrument);
    return book ? this.session.now() - book.timestamp.getTime() : null;
  }

  /**
   * Drops the book until the next snapshot arrives
   */
  invalidate(instrument: string): void {
    this.books.delete(instrument);
    if (!this.awaitingSince.has(instrument)) {
      this.awaitingSince.set(instrument, this.session.now());
    }
  }

  /**
   * When the book was invalidated, if it is still waiting for a snapshot
   */
  awaitingSnapshotSince(instrument: string): number | null {
    return this.awaitingSince.get(instrument) ?? null;
  }

  instruments(): string[] {
    return [...this.books.keys()];
  }

  private applySnapshot(event: BookSnapshotEvent): BookApplyResult {
    const current = this.books.get(event.instrument);
    if (current && event.version <= current.version) {
      return 'stale';
    }

    const state: BookLevels = {
      bids: toLevelMap(event.bids),
      asks: toLevelMap(event.asks),
      version: event.version,
      timestamp: event.timestamp
    };
    return this.commit(event.instrument, state);
  }

  private applyDelta(event: BookDeltaEvent): BookApplyResult {
    const current = this.books.get(event.instrument);
    if (!current) {
      return this.gap(event.instrument, 'book_gap: delta_without_snapshot');
    }
    if (event.version <= current.version) {
      return 'stale';
    }
    if (event.prevVersion !== undefined && event.prevVersion !== current.version) {
      return this.gap(
        event.instrument,
        `book_gap: expected prev ${current.version}, got ${event.prevVersion}`,
        current.version,
        event.prevVersion
      );
    }

    const state: BookLevels = {
      bids: new Map(current.bids),
      asks: new Map(current.asks),
      version: event.version,
      timestamp: event.timestamp
    };
    patch(state.bids, event.bids);
    patch(state.asks, event.asks);
    return this.commit(event.instrument, state);
  }

  private commit(instrument: string, state: BookLevels): BookApplyResult {
    const bids = sortedLevels(state.bids, 'desc');
    const asks = sortedLevels(state.asks, 'asc');
    if (bids.length > 0 && asks.length > 0 && bids[0].price >= asks[0].price) {
      this.gap(instrument, 'crossed_book');
      return 'crossed';
    }

    const frozen: OrderBookSnapshot = Object.freeze({
      instrument,
      bids: Object.freeze(bids),
      asks: Object.freeze(asks),
      version: state.version,
      timestamp: new Date(state.timestamp.getTime())
    });
    this.books.set(instrument, { ...state, frozen });
    this.awaitingSince.delete(instrument);
    return 'applied';
  }

  /**
   * One resync request per invalidation; later deltas wait quietly for the snapshot
   */
  private gap(instrument: string, reason: string, expected?: number, received?: number): BookApplyResult {
    const alreadyWaiting = this.awaitingSince.has(instrument);
    this.invalidate(instrument);
    if (!alreadyWaiting) {
      const context = makeContext('applyEvent', 'MarketDataCache', { instrument });
      this.requestResync(instrument, new SequenceGapError(reason, context, expected, received));
    }
    return 'gap';
  }
}

function toLevelMap(levels: BookLevel[]): Map<number, number> {
  const map = new Map<number, number>();
  patch(map, levels);
  return map;
}

function patch(side: Map<number, number>, levels: BookLevel[]): void {
  for (const level of levels) {
    if (level.quantity <= 0) {
      side.delete(level.price);
    } else {
      side.set(level.price, level.quantity);
    }
  }
}

function sortedLevels(side: Map<number, number>, order: 'asc' | 'desc'): BookLevel[] {
  const levels = [...side.entries()].map(([price, quantity]) => Object.freeze({ price, quantity }));
  levels.sort((a, b) => (order === 'asc' ? a.price - b.price : b.price - a.price));
  return levels;
}

