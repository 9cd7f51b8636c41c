import { getEnvironment, type Environment } from '../../config/environment.js';
import { getLogger } from '../../utils/logger.js';
import {
  ConnectionError,
  InvalidStateError,
  ValidationError,
  errorMessage,
} from '../../utils/errors.js';
import { validateTokenId, validateMarketSlug } from '../../utils/validators.js';
import type {
  ConnectionStats,
  DisconnectReason,
  MarketState,
  PriceUpdate,
} from '../../types/market-data.types.js';
import { ClobConnectionManager, type ConnectionOptions } from './clob-connection.manager.js';
import { decodeFrame } from './clob-message.codec.js';
import { MarketStateStore } from './market-state.store.js';
import { MarketDataPubSub } from './market-pubsub.service.js';
import { SubscriptionRegistry } from './subscription-registry.js';
import { UpdateChannel } from './update-channel.js';

export type MarketFeedOptions = ConnectionOptions & {
  autoReconnect: boolean;
  /** 0 = unlimited */
  maxReconnectAttempts: number;
  updateQueueSize: number;
};

export function feedOptionsFromEnvironment(env: Environment = getEnvironment()): MarketFeedOptions {
  return {
    url: env.FEED_WS_URL,
    channel: env.FEED_CHANNEL,
    connectTimeoutMs: env.FEED_CONNECT_TIMEOUT_MS,
    receiveTimeoutMs: env.FEED_RECEIVE_TIMEOUT_MS,
    heartbeatIntervalMs: env.FEED_HEARTBEAT_MS,
    reconnectBaseMs: env.FEED_RECONNECT_BASE_MS,
    reconnectMaxMs: env.FEED_RECONNECT_MAX_MS,
    autoReconnect: env.FEED_AUTO_RECONNECT,
    maxReconnectAttempts: env.FEED_MAX_RECONNECT_ATTEMPTS,
    updateQueueSize: env.FEED_UPDATE_QUEUE_SIZE,
  };
}

/**
 * Streams best bid/ask for many up/down markets over one connection.
 *
 * `start()` runs the connect/receive/reconnect loop until `stop()` is called
 * or the reconnect ceiling is reached. Updates are delivered through
 * `onUpdate` listeners and, for pull consumers, `updates()`.
 */
export class MarketFeedService {
  private options: MarketFeedOptions;
  private logger = getLogger();
  private registry = new SubscriptionRegistry();
  private store = new MarketStateStore();
  private pubsub = new MarketDataPubSub();
  private connection: ClobConnectionManager;
  private channel: UpdateChannel<PriceUpdate> | null = null;
  private running = false;
  private generation = 0;
  private wakeBackoff: (() => void) | null = null;
  private updatesProcessed = 0;
  private droppedUpdates = 0;

  constructor(options: Partial<MarketFeedOptions> = {}) {
    this.options = { ...feedOptionsFromEnvironment(), ...options };
    this.connection = new ClobConnectionManager(this.options, this.registry);
    this.connection.onFrame((payload) => this.handleFrame(payload));
  }

  addMarket(slug: string, yesTokenId: string, noTokenId: string): void {
    validateMarketSlug(slug);
    validateTokenId(yesTokenId);
    validateTokenId(noTokenId);
    if (yesTokenId === noTokenId) {
      throw new ValidationError(`Market ${slug} needs two distinct outcome tokens`);
    }

    this.registry.register(slug, yesTokenId, noTokenId);
    const created = this.store.create(slug, yesTokenId, noTokenId);
    this.connection.subscribe([yesTokenId, noTokenId]);

    this.logger.info({ slug, created }, created ? 'Added market' : 'Market already tracked');
  }

  removeMarket(slug: string): boolean {
    const removed = this.store.delete(slug);
    this.registry.unregister(slug);
    if (removed) {
      // the stream has no unsubscribe; routing simply stops for these tokens
      this.logger.info({ slug }, 'Removed market');
    }
    return removed;
  }

  getMarket(slug: string): MarketState | undefined {
    return this.store.get(slug);
  }

  getAllMarkets(): MarketState[] {
    return this.store.all();
  }

  onUpdate(listener: (update: PriceUpdate) => void): () => void {
    return this.pubsub.subscribe('update', listener);
  }

  onConnect(listener: () => void): () => void {
    return this.pubsub.subscribe('connected', listener);
  }

  onDisconnect(listener: (reason: DisconnectReason) => void): () => void {
    return this.pubsub.subscribe('disconnected', listener);
  }

  /**
   * Pull interface. All callers share one bounded channel; when it is full
   * new updates are dropped (and counted) until a consumer catches up.
   * Iteration ends when the feed stops.
   */
  updates(): AsyncIterableIterator<PriceUpdate> {
    if (!this.channel || this.channel.isClosed) {
      this.channel = new UpdateChannel<PriceUpdate>(this.options.updateQueueSize);
    }
    return this.channel;
  }

  getStats(): ConnectionStats {
    return {
      ...this.connection.getCounters(),
      updatesProcessed: this.updatesProcessed,
      droppedUpdates: this.droppedUpdates,
    };
  }

  get isConnected(): boolean {
    return this.connection.isConnected;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get marketCount(): number {
    return this.store.size;
  }

  async start(): Promise<void> {
    if (this.running) {
      throw new InvalidStateError('Market feed is already running');
    }
    this.running = true;
    // a run started after stop() owns the connection; an older run only exits
    const run = ++this.generation;
    const active = (): boolean => this.running && this.generation === run;
    this.logger.info({ markets: this.store.size }, 'Market feed starting');

    try {
      while (active()) {
        let failure: Error;
        try {
          await this.connection.connect();
          if (!active()) {
            break;
          }
          this.pubsub.publish('connected');
          const reason = await this.connection.receiveLoop();
          if (!active()) {
            break;
          }
          this.pubsub.publish('disconnected', reason);
          failure =
            this.connection.error ??
            new ConnectionError(this.options.url, `stream disconnected (${reason})`);
        } catch (error) {
          if (!active()) {
            break;
          }
          failure = error instanceof Error ? error : new Error(errorMessage(error));
          this.logger.error({ err: failure }, 'Market stream connection failed');
        }

        if (!this.options.autoReconnect) {
          throw failure;
        }

        const max = this.options.maxReconnectAttempts;
        if (max > 0 && this.connection.attempts >= max) {
          this.logger.error({ attempts: this.connection.attempts }, 'Max reconnection attempts reached');
          break;
        }

        const delay = this.connection.nextReconnectDelay();
        this.logger.info(
          { delayMs: delay, attempt: this.connection.attempts },
          'Reconnecting to market stream',
        );
        await this.sleep(delay);
      }
    } finally {
      if (this.generation === run) {
        this.running = false;
        this.wakeBackoff = null;
        this.connection.disconnect();
        this.channel?.close();
      }
      this.logger.info({ run }, 'Market feed stopped');
    }
  }

  /** Safe to call at any time; unblocks a pending receive or backoff wait. */
  stop(): void {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.connection.disconnect();
    this.wakeBackoff?.();
    this.channel?.close();
  }

  private handleFrame(payload: string): void {
    const decoded = decodeFrame(payload);
    if (decoded.malformed > 0) {
      this.logger.warn(
        { malformed: decoded.malformed, payload: payload.slice(0, 200) },
        'Dropped malformed market stream records',
      );
    }

    const now = Date.now();
    for (const update of decoded.updates) {
      const route = this.registry.lookup(update.assetId);
      if (!route) {
        this.logger.debug({ assetId: update.assetId }, 'Ignoring update for untracked instrument');
        continue;
      }
      const priceUpdate = this.store.apply(route, update, now);
      if (!priceUpdate) {
        continue;
      }
      this.updatesProcessed += 1;
      this.dispatch(priceUpdate);
    }
  }

  private dispatch(update: PriceUpdate): void {
    this.pubsub.publish('update', update);
    if (this.channel && !this.channel.push(update) && !this.channel.isClosed) {
      this.droppedUpdates += 1;
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wakeBackoff = null;
        resolve();
      }, ms);
      this.wakeBackoff = () => {
        clearTimeout(timer);
        this.wakeBackoff = null;
        resolve();
      };
    });
  }
}
