/**
 * Tests for the Bitget WebSocket stream lifecycle
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { BitgetPush, BitgetStream, BitgetStreamOptions, SocketHandle, SocketHandlers } from './BitgetStream';
import { StreamState } from '../../models/ConnectorStatus';

class FakeSocket implements SocketHandle {
  sent: string[] = [];
  closed = false;

  constructor(
    readonly url: string,
    private readonly handlers: SocketHandlers
  ) {}

  send(data: string): void {
    this.sent.push(data);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.handlers.onClose(1000, '');
  }

  terminate(): void {
    this.close();
  }

  open(): void {
    this.handlers.onOpen();
  }

  fail(error: Error): void {
    this.handlers.onError(error);
    this.close();
  }

  receive(message: unknown): void {
    this.handlers.onMessage(typeof message === 'string' ? message : JSON.stringify(message));
  }

  sentJson(): unknown[] {
    return this.sent.filter(text => text !== 'ping').map(text => JSON.parse(text));
  }
}

const booksTopic = { instType: 'USDT-FUTURES', channel: 'books', instId: 'BTCUSDT' };

describe('BitgetStream', () => {
  let sockets: FakeSocket[];
  let states: StreamState[];
  let pushes: BitgetPush[];
  let streamErrors: Array<[string, string, boolean]>;

  const createStream = (overrides: Partial<BitgetStreamOptions> = {}) =>
    new BitgetStream({
      url: 'wss://stream.test/public',
      topics: [booksTopic],
      pingIntervalMs: 1000,
      heartbeatTimeoutMs: 2500,
      reconnectBaseMs: 1000,
      reconnectMaxMs: 8000,
      random: () => 0,
      socketFactory: (url, handlers) => {
        const socket = new FakeSocket(url, handlers);
        sockets.push(socket);
        return socket;
      },
      onData: push => pushes.push(push),
      onStateChange: state => states.push(state),
      onStreamError: (code, message, fatal) => streamErrors.push([code, message, fatal]),
      ...overrides
    });

  const lastSocket = (): FakeSocket => {
    const socket = sockets[sockets.length - 1];
    if (!socket) throw new Error('no socket opened');
    return socket;
  };

  beforeEach(() => {
    vi.useFakeTimers();
    sockets = [];
    states = [];
    pushes = [];
    streamErrors = [];
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should subscribe to every topic once a public socket opens', () => {
    const stream = createStream();
    stream.start();
    lastSocket().open();

    expect(lastSocket().url).toBe('wss://stream.test/public');
    expect(lastSocket().sentJson()).toEqual([{ op: 'subscribe', args: [booksTopic] }]);
    expect(states).toEqual(['connecting', 'connected']);
    stream.stop();
  });

  it('should log in before subscribing on a private socket', () => {
    const login = { apiKey: 'test-key', passphrase: 'test-passphrase', timestamp: '1700000000', sign: 'test-sign' };
    const stream = createStream({ login: () => login });
    stream.start();
    lastSocket().open();

    expect(lastSocket().sentJson()).toEqual([{ op: 'login', args: [login] }]);
    expect(stream.getState()).toBe('connecting');

    lastSocket().receive({ event: 'login', code: 0 });

    expect(lastSocket().sentJson()[1]).toEqual({ op: 'subscribe', args: [booksTopic] });
    expect(stream.getState()).toBe('connected');
    stream.stop();
  });

  it('should stop for good when the login is rejected', () => {
    const stream = createStream({
      login: () => ({ apiKey: 'test-key', passphrase: 'test-passphrase', timestamp: '1', sign: 'bad' })
    });
    stream.start();
    lastSocket().open();

    lastSocket().receive({ event: 'error', code: 30005, msg: 'Invalid sign' });
    vi.advanceTimersByTime(60000);

    expect(streamErrors).toEqual([['30005', 'Invalid sign', true]]);
    expect(stream.getState()).toBe('disconnected');
    expect(sockets).toHaveLength(1);
  });

  it('should report non-fatal error frames once connected', () => {
    const stream = createStream();
    stream.start();
    lastSocket().open();

    lastSocket().receive({ event: 'error', code: 30001, msg: 'channel does not exist' });

    expect(streamErrors).toEqual([['30001', 'channel does not exist', false]]);
    expect(stream.getState()).toBe('connected');
    stream.stop();
  });

  it('should report socket errors before reconnecting', () => {
    const stream = createStream();
    stream.start();
    lastSocket().open();

    lastSocket().fail(new Error('read ECONNRESET'));

    expect(streamErrors).toEqual([['SOCKET_ERROR', 'read ECONNRESET', false]]);
    expect(stream.getState()).toBe('reconnecting');
    vi.advanceTimersByTime(500);
    expect(sockets).toHaveLength(2);
    stream.stop();
  });

  it('should forward data pushes and ignore pongs and garbage', () => {
    const stream = createStream();
    stream.start();
    lastSocket().open();

    lastSocket().receive('pong');
    lastSocket().receive('not json');
    lastSocket().receive({ event: 'subscribe', arg: booksTopic });
    lastSocket().receive({ action: 'snapshot', arg: booksTopic, data: [{ seq: 1 }], ts: 1700000000000 });

    expect(pushes).toEqual([{ action: 'snapshot', arg: { ...booksTopic, coin: undefined }, data: [{ seq: 1 }], ts: 1700000000000 }]);
    stream.stop();
  });

  it('should reconnect with backoff and resubscribe', () => {
    const onReconnected = vi.fn();
    const stream = createStream({ onReconnected });
    stream.start();
    lastSocket().open();

    lastSocket().close();
    expect(stream.getState()).toBe('reconnecting');

    vi.advanceTimersByTime(499);
    expect(sockets).toHaveLength(1);
    vi.advanceTimersByTime(1);
    expect(sockets).toHaveLength(2);

    lastSocket().open();
    expect(lastSocket().sentJson()).toEqual([{ op: 'subscribe', args: [booksTopic] }]);
    expect(onReconnected).toHaveBeenCalledTimes(1);
    expect(stream.getState()).toBe('connected');
    stream.stop();
  });

  it('should ping and recycle a silent socket', () => {
    const onHeartbeatGap = vi.fn();
    const stream = createStream({ onHeartbeatGap });
    stream.start();
    const first = lastSocket();
    first.open();

    vi.advanceTimersByTime(2000);
    expect(first.sent.filter(text => text === 'ping')).toHaveLength(2);

    vi.advanceTimersByTime(1000);
    expect(onHeartbeatGap).toHaveBeenCalledWith(3000);
    expect(first.closed).toBe(true);

    vi.advanceTimersByTime(500);
    expect(sockets).toHaveLength(2);
    stream.stop();
  });

  it('should resubscribe a topic to obtain a fresh snapshot', () => {
    const stream = createStream();
    stream.start();
    lastSocket().open();

    stream.refresh(booksTopic);

    expect(lastSocket().sentJson().slice(1)).toEqual([
      { op: 'unsubscribe', args: [booksTopic] },
      { op: 'subscribe', args: [booksTopic] }
    ]);
    expect(stream.getTopics()).toEqual([booksTopic]);
    stream.stop();
  });

  it('should double the reconnect delay up to the cap with jitter', () => {
    const stream = createStream({ random: () => 0.5 });

    expect(stream.reconnectDelay(0)).toBe(750);
    expect(stream.reconnectDelay(1)).toBe(1500);
    expect(stream.reconnectDelay(5)).toBe(6000);
  });
});
