/**
 * Explicitly owned exchange session: credentials, instrument registry, clock offset and halt state
 */

import { Instrument } from '../models/Instrument';
import { ExchangeCredentials } from '../connectors/ExchangeConnector';

export type HaltListener = (reason: string) => void;

export interface TradingSessionOptions {
  credentials: ExchangeCredentials;
  productType: string;
  marginCoin: string;
  /** Symbols the session may trade */
  allowedInstruments: string[];
  /** Largest tolerated difference between local and exchange clocks */
  maxClockSkewMs: number;
  now?: () => number;
}

export class TradingSession {
  readonly credentials: ExchangeCredentials;
  readonly productType: string;
  readonly marginCoin: string;
  readonly maxClockSkewMs: number;
  private readonly allowed: ReadonlySet<string>;
  private readonly clock: () => number;
  private instruments: Map<string, Instrument> = new Map();
  private clockOffsetMs = 0;
  private haltReason: string | null = null;
  private haltListeners: HaltListener[] = [];

  constructor(options: TradingSessionOptions) {
    this.credentials = options.credentials;
    this.productType = options.productType;
    this.marginCoin = options.marginCoin;
    this.maxClockSkewMs = options.maxClockSkewMs;
    this.allowed = new Set(options.allowedInstruments);
    this.clock = options.now ?? Date.now;
  }

  /**
   * Local wall clock in milliseconds
   */
  now(): number {
    return this.clock();
  }

  /**
   * Local clock corrected by the last measured offset, used for request timestamps
   */
  exchangeTime(): number {
    return Math.round(this.clock() + this.clockOffsetMs);
  }

  setClockOffset(offsetMs: number): void {
    this.clockOffsetMs = offsetMs;
  }

  getClockOffset(): number {
    return this.clockOffsetMs;
  }

  /**
   * Stores contract metadata for allowed symbols; others are ignored
   */
  registerInstruments(instruments: Instrument[]): void {
    for (const instrument of instruments) {
      if (this.allowed.has(instrument.symbol)) {
        this.instruments.set(instrument.symbol, Object.freeze({ ...instrument }));
      }
    }
  }

  getInstrument(symbol: string): Instrument | undefined {
    return this.instruments.get(symbol);
  }

  isAllowed(symbol: string): boolean {
    return this.allowed.has(symbol);
  }

  allowedInstruments(): string[] {
    return [...this.allowed];
  }

  /**
   * Stops new submissions for the rest of the session; the first reason wins
   */
  halt(reason: string): void {
    if (this.haltReason !== null) {
      return;
    }
    this.haltReason = reason;
    for (const listener of this.haltListeners) {
      listener(reason);
    }
  }

  isHalted(): boolean {
    return this.haltReason !== null;
  }

  getHaltReason(): string | null {
    return this.haltReason;
  }

  onHalt(listener: HaltListener): () => void {
    this.haltListeners.push(listener);
    return () => {
      this.haltListeners = this.haltListeners.filter(existing => existing !== listener);
    };
  }
}
