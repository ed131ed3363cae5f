/**
 * Market advisor backed by a local OpenAI-compatible chat server (LM Studio)
 */

import { Candle, Ticker } from '../models/MarketStats';
import { OrderBookSnapshot } from '../models/OrderBook';
import { Position } from '../models/Position';
import { AdvisorSignal, SignalAction } from '../strategies/Strategy';
import { AuditService } from './AuditService';

export interface AdvisorClientOptions {
  baseUrl: string;
  model: string;
  timeoutMs: number;
  temperature?: number;
  maxTokens?: number;
  fetchImpl?: typeof fetch;
  auditService?: AuditService;
  now?: () => number;
}

export interface AdvisorPromptContext {
  instrument: string;
  book: OrderBookSnapshot;
  position: Position;
  ticker?: Ticker | null;
  /** Oldest first */
  candles?: Candle[];
}

const PROMPT_CANDLES = 20;

const SYSTEM_PROMPT =
  'You are an experienced cryptocurrency trading analyst. Analyse the data and give a clear recommendation.';

/**
 * Reads ACTION, CONFIDENCE and REASON lines; anything unreadable falls back to hold with zero confidence
 */
export function parseAdvisorResponse(text: string, receivedAt: Date): AdvisorSignal {
  const signal: AdvisorSignal = { action: 'hold', confidence: 0, reason: '', receivedAt };

  for (const line of text.split('\n')) {
    const match = /^\s*\**\s*(ACTION|CONFIDENCE|REASON)\s*\**\s*:\s*(.*)$/i.exec(line);
    if (!match) continue;
    const field = match[1].toUpperCase();
    const value = match[2].trim();

    if (field === 'ACTION') {
      signal.action = parseAction(value);
    } else if (field === 'CONFIDENCE') {
      const digits = /\d+/.exec(value);
      signal.confidence = digits ? Math.min(Math.max(parseInt(digits[0], 10), 0), 10) : 0;
    } else {
      signal.reason = value;
    }
  }

  return signal;
}

function parseAction(value: string): SignalAction {
  const upper = value.toUpperCase();
  if (upper.includes('BUY')) return 'buy';
  if (upper.includes('SELL')) return 'sell';
  return 'hold';
}

function tickerLines(ticker: Ticker | null | undefined): string[] {
  if (!ticker) return [];
  return [
    `Last price: ${ticker.lastPrice}`,
    `24h change: ${(ticker.changeRatio * 100).toFixed(2)}%`,
    `24h high/low: ${ticker.high24h} / ${ticker.low24h}`,
    `24h volume: ${ticker.baseVolume}`
  ];
}

function candleLines(candles: Candle[] | undefined): string[] {
  if (!candles || candles.length === 0) return [];
  const recent = candles.slice(-PROMPT_CANDLES);
  return [
    '',
    `Last ${recent.length} candles (time, open, high, low, close, volume):`,
    ...recent.map(
      candle =>
        `${candle.openTime.toISOString()}, ${candle.open}, ${candle.high}, ${candle.low}, ${candle.close}, ${candle.volume}`
    )
  ];
}

export function buildAdvisorPrompt(context: AdvisorPromptContext): string {
  const { book, position } = context;
  const bestBid = book.bids[0]?.price;
  const bestAsk = book.asks[0]?.price;
  const mid = bestBid !== undefined && bestAsk !== undefined ? (bestBid + bestAsk) / 2 : undefined;
  const spread = bestBid !== undefined && bestAsk !== undefined ? bestAsk - bestBid : undefined;
  const depth = (levels: OrderBookSnapshot['bids']) =>
    levels.slice(0, 5).map(level => `${level.price} x ${level.quantity}`).join(', ') || 'none';

  return [
    `Analyse the market for ${context.instrument}:`,
    '',
    `Best bid: ${bestBid ?? 'n/a'}`,
    `Best ask: ${bestAsk ?? 'n/a'}`,
    `Mid price: ${mid ?? 'n/a'}`,
    `Spread: ${spread ?? 'n/a'}`,
    `Top bids: ${depth(book.bids)}`,
    `Top asks: ${depth(book.asks)}`,
    `Current position: ${position.quantity} at ${position.averageEntryPrice}`,
    ...tickerLines(context.ticker),
    ...candleLines(context.candles),
    '',
    'Answer in exactly this format:',
    'ACTION: [BUY/SELL/HOLD]',
    'CONFIDENCE: [1-10]',
    'REASON: [short justification]'
  ].join('\n');
}

export class AdvisorClient {
  private readonly options: AdvisorClientOptions;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;

  constructor(options: AdvisorClientOptions) {
    this.options = options;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? Date.now;
  }

  /**
   * True when the server lists its models
   */
  async checkHealth(): Promise<boolean> {
    try {
      const response = await this.fetchImpl(`${this.options.baseUrl}/v1/models`, {
        signal: AbortSignal.timeout(this.options.timeoutMs)
      });
      return response.ok;
    } catch (error) {
      this.audit('ADVISOR_UNREACHABLE', error);
      return false;
    }
  }

  /**
   * Asks for a recommendation; failures produce a hold signal and an audit entry
   */
  async requestSignal(context: AdvisorPromptContext): Promise<AdvisorSignal> {
    try {
      const response = await this.fetchImpl(`${this.options.baseUrl}/v1/chat/completions`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.options.model,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: buildAdvisorPrompt(context) }
          ],
          temperature: this.options.temperature ?? 0.3,
          max_tokens: this.options.maxTokens ?? 500
        }),
        signal: AbortSignal.timeout(this.options.timeoutMs)
      });

      if (!response.ok) {
        throw new Error(`Advisor returned HTTP ${response.status}`);
      }

      const content = extractContent(await response.json());
      if (content === null) {
        throw new Error('Advisor response had no message content');
      }

      const signal = parseAdvisorResponse(content, new Date(this.now()));
      this.options.auditService?.logEvent(
        'ADVISOR_SIGNAL',
        { action: signal.action, confidence: signal.confidence, reason: signal.reason },
        { instrument: context.instrument }
      );
      return signal;
    } catch (error) {
      this.audit('ADVISOR_FAILURE', error, context.instrument);
      return { action: 'hold', confidence: 0, reason: 'advisor_unavailable', receivedAt: new Date(this.now()) };
    }
  }

  private audit(eventType: string, error: unknown, instrument?: string): void {
    this.options.auditService?.logEvent(
      eventType,
      { error: error instanceof Error ? error.message : String(error) },
      { level: 'warn', instrument }
    );
  }
}

function extractContent(payload: unknown): string | null {
  if (typeof payload !== 'object' || payload === null || !('choices' in payload)) {
    return null;
  }
  const choices = payload.choices;
  if (!Array.isArray(choices) || choices.length === 0) {
    return null;
  }
  const first: unknown = choices[0];
  if (typeof first !== 'object' || first === null || !('message' in first)) {
    return null;
  }
  const message = first.message;
  if (typeof message !== 'object' || message === null || !('content' in message)) {
    return null;
  }
  return typeof message.content === 'string' ? message.content : null;
}
