import WebSocket from 'ws';
import { getLogger } from '../../utils/logger.js';
import { ConnectionError } from '../../utils/errors.js';
import type { ConnectionStats, DisconnectReason } from '../../types/market-data.types.js';
import type { SubscriptionRegistry } from './subscription-registry.js';

export type ConnectionOptions = {
  url: string;
  channel: string;
  connectTimeoutMs: number;
  receiveTimeoutMs: number;
  heartbeatIntervalMs: number;
  reconnectBaseMs: number;
  reconnectMaxMs: number;
};

type FrameHandler = (payload: string) => void;

export type ConnectionCounters = Omit<ConnectionStats, 'updatesProcessed' | 'droppedUpdates'>;

/**
 * Owns the single physical connection to the market stream. Every new
 * connection is subscribed to the full instrument set of the registry.
 */
export class ClobConnectionManager {
  private options: ConnectionOptions;
  private registry: SubscriptionRegistry;
  private ws: WebSocket | null = null;
  private logger = getLogger();
  private subscribed = new Set<string>();
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private receiveTimer: NodeJS.Timeout | null = null;
  private awaitingPong = false;
  private handler: FrameHandler | null = null;
  private pendingConnect: ((error: ConnectionError) => void) | null = null;
  private disconnectWaiters: Array<(reason: DisconnectReason) => void> = [];
  private lastDisconnectReason: DisconnectReason = 'closed';
  private lastError: Error | null = null;
  private reconnectAttempts = 0;
  private counters: ConnectionCounters = {
    messagesReceived: 0,
    bytesReceived: 0,
    reconnectCount: 0,
    totalMessagesReceived: 0,
    totalBytesReceived: 0,
  };

  constructor(options: ConnectionOptions, registry: SubscriptionRegistry) {
    this.options = options;
    this.registry = registry;
  }

  onFrame(handler: FrameHandler): void {
    this.handler = handler;
  }

  async connect(): Promise<void> {
    if (this.ws) {
      return;
    }

    this.logger.info({ url: this.options.url }, 'Connecting to market stream');
    this.lastError = null;
    const ws = new WebSocket(this.options.url, {
      handshakeTimeout: this.options.connectTimeoutMs,
    });
    this.ws = ws;

    ws.on('error', (error) => {
      this.lastError = error;
      this.logger.error({ err: error }, 'Market stream error');
    });

    ws.on('close', (code, reason) => {
      this.logger.warn({ code, reason: reason.toString() }, 'Market stream closed');
      this.finish(ws, this.lastError ? 'error' : 'closed');
    });

    ws.on('unexpected-response', (_req, res) => {
      this.logger.error({ statusCode: res.statusCode }, 'Market stream unexpected response');
      ws.terminate();
    });

    await new Promise<void>((resolve, reject) => {
      this.pendingConnect = reject;
      ws.once('open', () => {
        this.pendingConnect = null;
        resolve();
      });
    });

    this.onOpen(ws);
  }

  /**
   * Resolves once the current connection is gone, with the reason it ended.
   * Never rejects; frames are delivered to the frame handler meanwhile.
   */
  receiveLoop(): Promise<DisconnectReason> {
    if (!this.ws) {
      return Promise.resolve(this.lastDisconnectReason);
    }
    return new Promise((resolve) => {
      this.disconnectWaiters.push(resolve);
    });
  }

  /** Sends a subscribe frame for the ids this connection has not subscribed yet. */
  subscribe(ids: string[]): void {
    const fresh = Array.from(new Set(ids)).filter((id) => !this.subscribed.has(id));
    if (fresh.length === 0) {
      return;
    }
    this.sendSubscribe(fresh);
  }

  disconnect(): void {
    const ws = this.ws;
    if (!ws) {
      return;
    }
    this.logger.info('Closing market stream');
    this.finish(ws, 'stopped');
    if (ws.readyState === WebSocket.CONNECTING) {
      ws.terminate();
    } else {
      ws.close();
    }
  }

  /** Backoff before the next attempt: base * 2^attempt, capped. */
  nextReconnectDelay(): number {
    const delay = Math.min(
      this.options.reconnectBaseMs * 2 ** this.reconnectAttempts,
      this.options.reconnectMaxMs,
    );
    this.reconnectAttempts += 1;
    this.counters.reconnectCount += 1;
    return delay;
  }

  get attempts(): number {
    return this.reconnectAttempts;
  }

  get isConnected(): boolean {
    return this.ws !== null && this.ws.readyState === WebSocket.OPEN;
  }

  get error(): Error | null {
    return this.lastError;
  }

  getCounters(): ConnectionCounters {
    return { ...this.counters };
  }

  private onOpen(ws: WebSocket): void {
    this.reconnectAttempts = 0;
    this.subscribed.clear();
    this.counters = {
      ...this.counters,
      connectedAt: Date.now(),
      messagesReceived: 0,
      bytesReceived: 0,
      lastMessageAt: undefined,
    };

    ws.on('message', (data) => this.handleMessage(data));
    ws.on('pong', () => {
      this.awaitingPong = false;
    });

    this.startHeartbeat();
    this.armReceiveTimer();

    const ids = this.registry.instrumentIds();
    if (ids.length > 0) {
      this.sendSubscribe(ids);
    }
    this.logger.info({ instruments: ids.length }, 'Market stream connected');
  }

  private handleMessage(data: WebSocket.RawData): void {
    const payload = data.toString();
    const bytes = Buffer.byteLength(payload);
    const now = Date.now();

    this.counters.messagesReceived += 1;
    this.counters.totalMessagesReceived += 1;
    this.counters.bytesReceived += bytes;
    this.counters.totalBytesReceived += bytes;
    this.counters.lastMessageAt = now;
    this.armReceiveTimer();

    this.handler?.(payload);
  }

  private sendSubscribe(ids: string[]): void {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      return;
    }
    ids.forEach((id) => this.subscribed.add(id));
    const payload = {
      assets_ids: ids,
      type: this.options.channel,
    };
    ws.send(JSON.stringify(payload), (error) => {
      if (error && this.ws === ws) {
        this.logger.error({ err: error, count: ids.length }, 'Failed to send subscribe frame');
        this.drop('send_failed');
      }
    });
    this.logger.debug({ count: ids.length }, 'Sent subscribe frame');
  }

  private startHeartbeat(): void {
    this.stopHeartbeat();
    this.awaitingPong = false;
    this.heartbeatTimer = setInterval(() => {
      const ws = this.ws;
      if (!ws || ws.readyState !== WebSocket.OPEN) {
        return;
      }
      if (this.awaitingPong) {
        this.drop('heartbeat');
        return;
      }
      this.awaitingPong = true;
      ws.ping();
    }, this.options.heartbeatIntervalMs);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  private armReceiveTimer(): void {
    this.clearReceiveTimer();
    this.receiveTimer = setTimeout(() => {
      this.drop('timeout');
    }, this.options.receiveTimeoutMs);
  }

  private clearReceiveTimer(): void {
    if (this.receiveTimer) {
      clearTimeout(this.receiveTimer);
      this.receiveTimer = null;
    }
  }

  private drop(reason: DisconnectReason): void {
    const ws = this.ws;
    if (!ws) {
      return;
    }
    this.logger.warn({ reason }, 'Dropping market stream connection');
    this.finish(ws, reason);
    ws.terminate();
  }

  private finish(ws: WebSocket, reason: DisconnectReason): void {
    if (this.ws !== ws) {
      return;
    }
    this.ws = null;
    this.stopHeartbeat();
    this.clearReceiveTimer();
    this.subscribed.clear();
    this.lastDisconnectReason = reason;

    ws.removeAllListeners();
    ws.on('error', (error) => {
      this.logger.debug({ err: error }, 'Error on discarded market stream socket');
    });

    const rejectConnect = this.pendingConnect;
    this.pendingConnect = null;
    rejectConnect?.(
      new ConnectionError(this.options.url, this.lastError?.message ?? `connection ${reason}`),
    );

    for (const resolve of this.disconnectWaiters.splice(0)) {
      resolve(reason);
    }
  }
}
