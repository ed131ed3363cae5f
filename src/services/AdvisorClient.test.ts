/**
 * Tests for the LM Studio advisor client
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AdvisorClient, buildAdvisorPrompt, parseAdvisorResponse } from './AdvisorClient';
import { AuditService } from './AuditService';
import { emptyPosition } from '../models/Position';
import { OrderBookSnapshot } from '../models/OrderBook';

const book: OrderBookSnapshot = {
  instrument: 'BTCUSDT',
  bids: [{ price: 99, quantity: 1 }],
  asks: [{ price: 101, quantity: 2 }],
  version: 1,
  timestamp: new Date(0)
};

const completion = (content: string) =>
  new Response(JSON.stringify({ choices: [{ message: { role: 'assistant', content } }] }), { status: 200 });

describe('parseAdvisorResponse', () => {
  const receivedAt = new Date(5000);

  it('should read action, confidence and reason lines', () => {
    expect(parseAdvisorResponse('ACTION: BUY\nCONFIDENCE: 8/10\nREASON: Strong bid support', receivedAt)).toEqual({
      action: 'buy',
      confidence: 8,
      reason: 'Strong bid support',
      receivedAt
    });
  });

  it('should accept markdown emphasis and mixed case', () => {
    const signal = parseAdvisorResponse('Some preamble\n**Action**: sell\n**Confidence**: 7', receivedAt);

    expect(signal.action).toBe('sell');
    expect(signal.confidence).toBe(7);
  });

  it('should clamp confidence to ten', () => {
    expect(parseAdvisorResponse('ACTION: BUY\nCONFIDENCE: 15', receivedAt).confidence).toBe(10);
  });

  it('should hold with zero confidence when nothing is readable', () => {
    expect(parseAdvisorResponse('I am not sure.', receivedAt)).toEqual({
      action: 'hold',
      confidence: 0,
      reason: '',
      receivedAt
    });
  });
});

describe('buildAdvisorPrompt', () => {
  it('should include best prices, spread and position', () => {
    const prompt = buildAdvisorPrompt({ instrument: 'BTCUSDT', book, position: emptyPosition('BTCUSDT') });

    expect(prompt).toContain('Best bid: 99');
    expect(prompt).toContain('Best ask: 101');
    expect(prompt).toContain('Mid price: 100');
    expect(prompt).toContain('Spread: 2');
    expect(prompt).toContain('Top asks: 101 x 2');
    expect(prompt).toContain('Current position: 0 at 0');
    expect(prompt).not.toContain('24h change');
  });

  it('should add the 24h ticker and the most recent candles', () => {
    const candles = Array.from({ length: 25 }, (_, index) => ({
      openTime: new Date(index * 900000),
      open: 100 + index,
      high: 101 + index,
      low: 99 + index,
      close: 100.5 + index,
      volume: 10
    }));
    const prompt = buildAdvisorPrompt({
      instrument: 'BTCUSDT',
      book,
      position: emptyPosition('BTCUSDT'),
      ticker: {
        instrument: 'BTCUSDT',
        lastPrice: 100,
        high24h: 105,
        low24h: 95,
        baseVolume: 1234.5,
        changeRatio: -0.0123,
        timestamp: new Date(0)
      },
      candles
    });
    const lines = prompt.split('\n');

    expect(lines).toContain('Last price: 100');
    expect(lines).toContain('24h change: -1.23%');
    expect(lines).toContain('24h high/low: 105 / 95');
    expect(lines).toContain('24h volume: 1234.5');
    expect(lines).toContain('Last 20 candles (time, open, high, low, close, volume):');
    expect(lines).not.toContain('1970-01-01T01:00:00.000Z, 104, 105, 103, 104.5, 10');
    expect(lines).toContain('1970-01-01T01:15:00.000Z, 105, 106, 104, 105.5, 10');
    expect(lines).toContain('1970-01-01T06:00:00.000Z, 124, 125, 123, 124.5, 10');
  });
});

describe('AdvisorClient', () => {
  let auditService: AuditService;

  beforeEach(() => {
    auditService = new AuditService({ console: { log: vi.fn(), warn: vi.fn(), error: vi.fn() } });
  });

  it('should post a chat completion and parse the reply', async () => {
    const fetchImpl = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      completion('ACTION: SELL\nCONFIDENCE: 7\nREASON: Heavy asks')
    );
    const client = new AdvisorClient({
      baseUrl: 'http://localhost:1234',
      model: 'test-model',
      timeoutMs: 1000,
      fetchImpl,
      auditService,
      now: () => 9000
    });

    const signal = await client.requestSignal({ instrument: 'BTCUSDT', book, position: emptyPosition('BTCUSDT') });

    expect(signal).toEqual({ action: 'sell', confidence: 7, reason: 'Heavy asks', receivedAt: new Date(9000) });
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('http://localhost:1234/v1/chat/completions');
    const body = JSON.parse(String(init?.body));
    expect(body.model).toBe('test-model');
    expect(body.temperature).toBe(0.3);
    expect(body.max_tokens).toBe(500);
    expect(body.messages).toHaveLength(2);
    expect(auditService.getEventsByType('ADVISOR_SIGNAL')[0].details).toEqual({
      action: 'sell',
      confidence: 7,
      reason: 'Heavy asks'
    });
  });

  it('should hold when the server fails', async () => {
    const client = new AdvisorClient({
      baseUrl: 'http://localhost:1234',
      model: 'test-model',
      timeoutMs: 1000,
      fetchImpl: vi.fn(async () => new Response('busy', { status: 503 })),
      auditService,
      now: () => 9000
    });

    const signal = await client.requestSignal({ instrument: 'BTCUSDT', book, position: emptyPosition('BTCUSDT') });

    expect(signal).toEqual({ action: 'hold', confidence: 0, reason: 'advisor_unavailable', receivedAt: new Date(9000) });
    const failure = auditService.getEventsByType('ADVISOR_FAILURE')[0];
    expect(failure.details).toEqual({ error: 'Advisor returned HTTP 503' });
    expect(failure.level).toBe('warn');
  });

  it('should hold when the reply has no message content', async () => {
    const client = new AdvisorClient({
      baseUrl: 'http://localhost:1234',
      model: 'test-model',
      timeoutMs: 1000,
      fetchImpl: vi.fn(async () => new Response(JSON.stringify({ choices: [] }), { status: 200 })),
      auditService
    });

    const signal = await client.requestSignal({ instrument: 'BTCUSDT', book, position: emptyPosition('BTCUSDT') });

    expect(signal.reason).toBe('advisor_unavailable');
    expect(auditService.getEventsByType('ADVISOR_FAILURE')[0].details).toEqual({
      error: 'Advisor response had no message content'
    });
  });

  it('should report health from the models endpoint', async () => {
    const healthy = new AdvisorClient({
      baseUrl: 'http://localhost:1234',
      model: 'test-model',
      timeoutMs: 1000,
      fetchImpl: vi.fn(async () => new Response('{"data":[]}', { status: 200 }))
    });
    const unreachable = new AdvisorClient({
      baseUrl: 'http://localhost:1234',
      model: 'test-model',
      timeoutMs: 1000,
      fetchImpl: vi.fn(async () => {
        throw new TypeError('fetch failed');
      }),
      auditService
    });

    expect(await healthy.checkHealth()).toBe(true);
    expect(await unreachable.checkHealth()).toBe(false);
    expect(auditService.getEventsByType('ADVISOR_UNREACHABLE')).toHaveLength(1);
  });
});
