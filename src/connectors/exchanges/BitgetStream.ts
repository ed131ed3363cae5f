/**
 * Long-lived Bitget WebSocket connection with login, subscriptions, heartbeat and reconnect
 */

import WebSocket from 'ws';
import { StreamState } from '../../models/ConnectorStatus';

export interface StreamTopic {
  instType: string;
  channel: string;
  instId?: string;
  coin?: string;
}

export interface SocketHandlers {
  onOpen(): void;
  onMessage(text: string): void;
  onClose(code: number, reason: string): void;
  onError(error: Error): void;
}

export interface SocketHandle {
  send(data: string): void;
  close(): void;
  terminate(): void;
}

export type SocketFactory = (url: string, handlers: SocketHandlers) => SocketHandle;

export interface LoginArgs {
  apiKey: string;
  passphrase: string;
  timestamp: string;
  sign: string;
}

export interface BitgetStreamOptions {
  url: string;
  topics: StreamTopic[];
  /** Builds fresh login arguments for each connection; omit for public streams */
  login?: () => LoginArgs;
  pingIntervalMs: number;
  /** No inbound frame for this long means the socket is dead */
  heartbeatTimeoutMs: number;
  reconnectBaseMs: number;
  reconnectMaxMs: number;
  random?: () => number;
  socketFactory?: SocketFactory;
  onData(message: BitgetPush): void;
  onStateChange?(state: StreamState): void;
  /** Subscriptions restored after a dropped connection */
  onReconnected?(): void;
  /** Heartbeat timeout detected; the socket is being recycled */
  onHeartbeatGap?(silentMs: number): void;
  /** Error frame from the venue; login rejections are fatal */
  onStreamError?(code: string, message: string, fatal: boolean): void;
}

/**
 * Data push as sent by Bitget v2 streams
 */
export interface BitgetPush {
  action?: string;
  arg: StreamTopic;
  data: unknown[];
  ts?: number;
}

function rawToText(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

/**
 * Default socket factory backed by the ws client
 */
export const openWebSocket: SocketFactory = (url, handlers) => {
  const ws = new WebSocket(url);
  ws.on('open', () => handlers.onOpen());
  ws.on('message', data => handlers.onMessage(rawToText(data)));
  ws.on('close', (code, reason) => handlers.onClose(code, reason.toString('utf8')));
  ws.on('error', error => handlers.onError(error));
  return {
    send: data => ws.send(data),
    close: () => ws.close(),
    terminate: () => ws.terminate()
  };
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class BitgetStream {
  private socket: SocketHandle | null = null;
  private state: StreamState = 'disconnected';
  private topics: StreamTopic[];
  private reconnectAttempt = 0;
  private hasConnectedBefore = false;
  private stopped = true;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private pingTimer: NodeJS.Timeout | null = null;
  private lastMessageAt = 0;
  private readonly options: BitgetStreamOptions;
  private readonly random: () => number;
  private readonly socketFactory: SocketFactory;

  constructor(options: BitgetStreamOptions) {
    this.options = options;
    this.topics = [...options.topics];
    this.random = options.random ?? Math.random;
    this.socketFactory = options.socketFactory ?? openWebSocket;
  }

  start(): void {
    if (!this.stopped) return;
    this.stopped = false;
    this.open();
  }

  stop(): void {
    this.stopped = true;
    this.clearTimers();
    if (this.socket) {
      const socket = this.socket;
      this.socket = null;
      socket.close();
    }
    this.setState('disconnected');
  }

  getState(): StreamState {
    return this.state;
  }

  getTopics(): StreamTopic[] {
    return [...this.topics];
  }

  /**
   * Unsubscribes and subscribes a topic again so the venue pushes a fresh snapshot
   */
  refresh(topic: StreamTopic): void {
    if (!this.topics.some(existing => sameTopic(existing, topic))) {
      this.topics.push(topic);
    }
    if (this.state !== 'connected' || !this.socket) {
      return;
    }
    this.send({ op: 'unsubscribe', args: [topic] });
    this.send({ op: 'subscribe', args: [topic] });
  }

  /**
   * Delay before the given reconnect attempt: doubling from base up to the cap, with jitter
   */
  reconnectDelay(attempt: number): number {
    const capped = Math.min(this.options.reconnectBaseMs * Math.pow(2, attempt), this.options.reconnectMaxMs);
    return Math.round(capped / 2 + (this.random() * capped) / 2);
  }

  private open(): void {
    this.setState(this.hasConnectedBefore ? 'reconnecting' : 'connecting');
    this.socket = this.socketFactory(this.options.url, {
      onOpen: () => this.handleOpen(),
      onMessage: text => this.handleMessage(text),
      onClose: () => this.handleClose(),
      // close follows every error on ws sockets; reconnect is driven from there
      onError: error => this.options.onStreamError?.('SOCKET_ERROR', error.message, false)
    });
  }

  private handleOpen(): void {
    this.lastMessageAt = Date.now();
    this.startHeartbeat();
    if (this.options.login) {
      this.send({ op: 'login', args: [this.options.login()] });
    } else {
      this.subscribeAll();
    }
  }

  private subscribeAll(): void {
    if (this.topics.length > 0) {
      this.send({ op: 'subscribe', args: this.topics });
    }
    const reconnected = this.hasConnectedBefore;
    this.hasConnectedBefore = true;
    this.reconnectAttempt = 0;
    this.setState('connected');
    if (reconnected) {
      this.options.onReconnected?.();
    }
  }

  private handleMessage(text: string): void {
    this.lastMessageAt = Date.now();
    if (text === 'pong') {
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      return;
    }
    if (!isRecord(parsed)) {
      return;
    }

    const event = typeof parsed.event === 'string' ? parsed.event : undefined;
    const code = parsed.code === undefined ? 'unknown' : String(parsed.code);
    const msg = typeof parsed.msg === 'string' ? parsed.msg : undefined;

    if (event === 'login') {
      if (code === '0') {
        this.subscribeAll();
      } else {
        this.fail(code, msg ?? 'login rejected');
      }
      return;
    }
    if (event === 'error') {
      if (this.options.login && this.state !== 'connected') {
        this.fail(code, msg ?? 'login rejected');
      } else {
        this.options.onStreamError?.(code, msg ?? 'stream error', false);
      }
      return;
    }
    if (event !== undefined) {
      return;
    }

    const arg = parsed.arg;
    const data = parsed.data;
    if (isRecord(arg) && typeof arg.channel === 'string' && Array.isArray(data)) {
      this.options.onData({
        action: typeof parsed.action === 'string' ? parsed.action : undefined,
        arg: {
          instType: String(arg.instType ?? ''),
          channel: arg.channel,
          instId: typeof arg.instId === 'string' ? arg.instId : undefined,
          coin: typeof arg.coin === 'string' ? arg.coin : undefined
        },
        data,
        ts: typeof parsed.ts === 'number' ? parsed.ts : undefined
      });
    }
  }

  private fail(code: string, message: string): void {
    this.options.onStreamError?.(code, message, true);
    this.stop();
  }

  private handleClose(): void {
    this.clearTimers();
    this.socket = null;
    if (this.stopped) {
      this.setState('disconnected');
      return;
    }

    const delay = this.reconnectDelay(this.reconnectAttempt);
    this.reconnectAttempt++;
    this.setState('reconnecting');
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (!this.stopped) {
        this.open();
      }
    }, delay);
  }

  private startHeartbeat(): void {
    this.stopHeartbeat();
    this.pingTimer = setInterval(() => {
      const silentMs = Date.now() - this.lastMessageAt;
      if (silentMs > this.options.heartbeatTimeoutMs) {
        this.options.onHeartbeatGap?.(silentMs);
        const socket = this.socket;
        if (socket) {
          socket.terminate();
        }
        return;
      }
      this.socket?.send('ping');
    }, this.options.pingIntervalMs);
  }

  private stopHeartbeat(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
  }

  private clearTimers(): void {
    this.stopHeartbeat();
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private send(message: Record<string, unknown>): void {
    this.socket?.send(JSON.stringify(message));
  }

  private setState(state: StreamState): void {
    if (this.state !== state) {
      this.state = state;
      this.options.onStateChange?.(state);
    }
  }
}

function sameTopic(a: StreamTopic, b: StreamTopic): boolean {
  return a.instType === b.instType && a.channel === b.channel && a.instId === b.instId && a.coin === b.coin;
}
