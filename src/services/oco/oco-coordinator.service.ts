import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { BrokerAdapter } from '../../adapters/broker/broker.adapter.js';
import type {
  OcoAction,
  OcoActionLogEntry,
  OcoConfig,
  OcoLeg,
  OcoMarketTarget,
  OcoResult,
  OcoState,
  WinnerSide,
} from '../../types/oco.types.js';
import type {
  OrderLifecycleEvent,
  OrderStatus,
  PlaceOrderResult,
} from '../../types/order.types.js';
import {
  InvalidStateError,
  OrderPlacementError,
  ValidationError,
  errorMessage,
} from '../../utils/errors.js';
import { getLogger } from '../../utils/logger.js';
import { currentSlug, slotEnd } from '../../utils/market-slug.js';
import { validateMarketSlug, validateTokenId } from '../../utils/validators.js';

const ocoConfigSchema = z.object({
  asset: z.enum(['btc', 'eth']),
  horizon: z.enum(['15m', '1h', '4h', '1d']),
  size: z.number().finite().positive(),
  threshold: z.number().gt(0).lt(1).default(0.8),
  dryRun: z.boolean().default(false),
  timeoutMs: z.number().int().positive().optional(),
});

export type OcoConfigInput = z.input<typeof ocoConfigSchema>;

interface LegState {
  orderId?: string;
  orderStatus?: OrderStatus;
  tradeIds: string[];
  mined: boolean;
}

interface MinedEvent {
  leg: OcoLeg;
  event: OrderLifecycleEvent;
}

interface Settlement {
  winner: WinnerSide;
  winningOrderId?: string;
  winningTradeId?: string;
  losingOrderId?: string;
  cancelSuccess: boolean;
  anomaly: boolean;
  anomalyReason?: string;
}

/**
 * One-cancels-other over two limit BUY orders, one per outcome of an
 * up/down market. The first leg whose trade reaches MINED wins and the
 * other leg is cancelled.
 *
 * Not internally locked: `onOrderUpdate`/`processBatch` must be called
 * serially. Events that arrive while a cancel is in flight are still
 * recorded and taken into account when the coordinator finishes.
 */
export class OcoCoordinator {
  private config: OcoConfig;
  private broker?: BrokerAdapter;
  private logger: Logger;

  private currentState: OcoState = 'INIT';
  private starting = false;
  private settling = false;
  private market?: Required<OcoMarketTarget>;
  private firstMined?: MinedEvent;
  private legs: Record<OcoLeg, LegState> = {
    UP: { tradeIds: [], mined: false },
    DOWN: { tradeIds: [], mined: false },
  };
  private startedAt = 0;
  private finalResult?: OcoResult;
  private actions: OcoActionLogEntry[] = [];
  private deadline?: NodeJS.Timeout;
  private done: Promise<OcoResult>;
  private resolveDone: (result: OcoResult) => void = () => undefined;

  constructor(config: OcoConfigInput, broker?: BrokerAdapter) {
    const parsed = ocoConfigSchema.safeParse(config);
    if (!parsed.success) {
      throw new ValidationError('Invalid OCO configuration', parsed.error.flatten().fieldErrors);
    }
    if (!parsed.data.dryRun && !broker) {
      throw new ValidationError('A broker is required unless dryRun is enabled');
    }

    this.config = parsed.data;
    this.broker = broker;
    this.logger = getLogger().child({ component: 'oco', asset: this.config.asset });
    this.done = new Promise((resolve) => {
      this.resolveDone = resolve;
    });
  }

  get state(): OcoState {
    return this.currentState;
  }

  get isDone(): boolean {
    return this.currentState === 'DONE';
  }

  get result(): OcoResult | undefined {
    return this.finalResult;
  }

  get settings(): OcoConfig {
    return this.config;
  }

  get upOrderId(): string | undefined {
    return this.legs.UP.orderId;
  }

  get downOrderId(): string | undefined {
    return this.legs.DOWN.orderId;
  }

  get actionLog(): OcoActionLogEntry[] {
    return this.actions.map((entry) => ({ ...entry, details: { ...entry.details } }));
  }

  waitForDone(): Promise<OcoResult> {
    return this.done;
  }

  /**
   * Places both legs at the threshold price. Without a slug the market
   * currently trading for the configured asset and horizon is assumed.
   * If either placement fails the coordinator stays in INIT and the error
   * is rethrown.
   */
  async start(market: OcoMarketTarget): Promise<void> {
    if (this.currentState !== 'INIT' || this.starting) {
      throw new InvalidStateError(`Cannot start OCO in state ${this.currentState}`);
    }
    const slug = market.slug ?? currentSlug(this.config.asset, this.config.horizon);
    validateMarketSlug(slug);
    validateTokenId(market.upTokenId);
    validateTokenId(market.downTokenId);

    this.starting = true;
    try {
      this.market = { ...market, slug };
      this.startedAt = Date.now();
      this.logger.info(
        {
          slug,
          closesAt: slotEnd(slug, this.config.horizon),
          threshold: this.config.threshold,
          size: this.config.size,
          dryRun: this.config.dryRun,
        },
        'OCO starting',
      );

      const upOrderId = await this.placeLeg('UP', market.upTokenId);
      let downOrderId: string;
      try {
        downOrderId = await this.placeLeg('DOWN', market.downTokenId);
      } catch (error) {
        // never leave a single leg resting
        await this.cancelLeg('UP', upOrderId);
        throw error;
      }

      this.legs.UP = { orderId: upOrderId, orderStatus: 'LIVE', tradeIds: [], mined: false };
      this.legs.DOWN = { orderId: downOrderId, orderStatus: 'LIVE', tradeIds: [], mined: false };
      this.currentState = 'LIVE';
      this.armDeadline();

      this.logger.info({ upOrderId, downOrderId }, 'OCO orders placed, waiting for MINED');
    } finally {
      this.starting = false;
    }
  }

  async onOrderUpdate(event: OrderLifecycleEvent): Promise<void> {
    await this.processBatch([event]);
  }

  /**
   * Applies a batch of lifecycle events without a state check between them.
   * Every MINED event is recorded before the winner is settled, so two legs
   * mined within one batch are detected as an anomaly. While a cancel is in
   * flight events are only recorded; the pending settlement picks them up.
   */
  async processBatch(events: readonly OrderLifecycleEvent[]): Promise<void> {
    if (this.currentState !== 'LIVE') {
      this.logger.debug({ state: this.currentState, events: events.length }, 'Ignoring order events');
      return;
    }

    let trigger: MinedEvent | undefined;
    for (const event of events) {
      const leg = this.legFor(event.orderId);
      if (!leg) {
        this.logger.debug({ orderId: event.orderId }, 'Ignoring event for unknown order');
        continue;
      }

      const legState = this.legs[leg];
      legState.orderStatus = event.orderStatus;
      if (event.tradeId && !legState.tradeIds.includes(event.tradeId)) {
        legState.tradeIds.push(event.tradeId);
      }
      this.record('order_update', {
        side: leg,
        orderId: event.orderId,
        orderStatus: event.orderStatus,
        tradeId: event.tradeId,
        tradeStatus: event.tradeStatus,
      });

      if (event.tradeStatus === 'MINED' && !legState.mined) {
        legState.mined = true;
        this.firstMined ??= { leg, event };
        trigger ??= { leg, event };
      }
    }

    if (this.settling) {
      if (trigger) {
        this.logger.warn({ side: trigger.leg, tradeId: trigger.event.tradeId }, 'Trade MINED during cancel');
      }
      return;
    }

    if (trigger) {
      this.logger.info({ side: trigger.leg, tradeId: trigger.event.tradeId }, 'Trade MINED');
      await this.settle(trigger.leg, trigger.event);
    }
  }

  /**
   * Cancels both legs best-effort and ends with no winner. A leg mined
   * before the cancels complete still wins, flagged as an anomaly.
   */
  async cancelAll(reason = 'manual'): Promise<void> {
    if (this.currentState !== 'LIVE' || this.settling) {
      return;
    }
    this.settling = true;
    this.logger.info({ reason }, 'Cancelling all OCO orders');

    const upCancelled = await this.cancelLeg('UP', this.legs.UP.orderId);
    const downCancelled = await this.cancelLeg('DOWN', this.legs.DOWN.orderId);

    const mined = this.firstMined;
    if (mined) {
      const loser = otherLeg(mined.leg);
      const both = this.legs[loser].mined;
      this.logger.error({ winner: mined.leg, reason }, 'OCO leg mined while cancelling');
      this.finalize({
        winner: mined.leg,
        winningOrderId: mined.event.orderId,
        winningTradeId: mined.event.tradeId,
        losingOrderId: this.legs[loser].orderId,
        cancelSuccess: loser === 'UP' ? upCancelled : downCancelled,
        anomaly: true,
        anomalyReason: both ? 'both_legs_mined' : 'mined_during_cancel',
      });
      return;
    }

    this.finalize({
      winner: 'NONE',
      cancelSuccess: upCancelled && downCancelled,
      anomaly: false,
      anomalyReason: `cancelled:${reason}`,
    });
  }

  private async settle(winner: OcoLeg, event: OrderLifecycleEvent): Promise<void> {
    this.settling = true;
    const loser = otherLeg(winner);
    const losingOrderId = this.legs[loser].orderId;
    const cancelSuccess = await this.cancelLeg(loser, losingOrderId);

    // the loser may have been mined in this batch or while the cancel was pending
    const race = this.legs[loser].mined;
    if (race) {
      this.logger.error({ winner, loser }, 'Both OCO legs reached MINED');
    }

    this.finalize({
      winner,
      winningOrderId: event.orderId,
      winningTradeId: event.tradeId,
      losingOrderId,
      cancelSuccess,
      anomaly: race,
      anomalyReason: race ? 'both_legs_mined' : undefined,
    });
  }

  private async placeLeg(side: OcoLeg, tokenId: string): Promise<string> {
    this.record('place_order', {
      side,
      tokenId,
      price: this.config.threshold,
      size: this.config.size,
    });

    if (this.config.dryRun) {
      const orderId = `dry-run-${side.toLowerCase()}-${randomUUID()}`;
      this.logger.info({ side, orderId }, '[dry run] would place order');
      return orderId;
    }

    const broker = this.requireBroker();
    let result: PlaceOrderResult;
    try {
      result = await broker.placeOrder({
        tokenId,
        side: 'BUY',
        price: this.config.threshold,
        size: this.config.size,
      });
    } catch (error) {
      throw new OrderPlacementError(side, errorMessage(error));
    }

    if (!result.success || !result.orderId) {
      throw new OrderPlacementError(side, result.errorMessage ?? 'no order id returned');
    }
    this.logger.info({ side, orderId: result.orderId }, 'Placed order');
    return result.orderId;
  }

  /** Resolves true when the cancel succeeded or there was nothing to cancel. */
  private async cancelLeg(side: OcoLeg, orderId: string | undefined): Promise<boolean> {
    if (!orderId) {
      return true;
    }
    this.record('cancel_order', { side, orderId });

    if (this.config.dryRun) {
      this.logger.info({ side, orderId }, '[dry run] would cancel order');
      return true;
    }

    try {
      const cancelled = await this.requireBroker().cancelOrder(orderId);
      if (cancelled) {
        this.logger.info({ side, orderId }, 'Cancelled order');
      } else {
        this.logger.warn({ side, orderId }, 'Cancel was refused');
        this.record('cancel_failed', { side, orderId, error: 'refused' });
      }
      return cancelled;
    } catch (error) {
      this.logger.error({ err: error, side, orderId }, 'Cancel request failed');
      this.record('cancel_failed', { side, orderId, error: errorMessage(error) });
      return false;
    }
  }

  private finalize(settlement: Settlement): void {
    this.clearDeadline();
    const endedAt = Date.now();
    const result: OcoResult = Object.freeze({
      ...settlement,
      slug: this.market?.slug ?? '',
      upOrderId: this.legs.UP.orderId ?? '',
      downOrderId: this.legs.DOWN.orderId ?? '',
      dryRun: this.config.dryRun,
      startedAt: this.startedAt,
      endedAt,
      durationMs: endedAt - this.startedAt,
    });

    this.finalResult = result;
    this.currentState = 'DONE';
    this.settling = false;
    this.record('finalize', {
      winner: result.winner,
      winningOrderId: result.winningOrderId,
      slug: result.slug,
      anomaly: result.anomaly,
      durationMs: result.durationMs,
    });
    this.logger.info(
      {
        winner: result.winner,
        slug: result.slug,
        orderId: result.winningOrderId,
        cancelSuccess: result.cancelSuccess,
        anomaly: result.anomalyReason,
        durationMs: result.durationMs,
      },
      'OCO done',
    );
    this.resolveDone(result);
  }

  private legFor(orderId: string): OcoLeg | undefined {
    if (orderId === this.legs.UP.orderId) return 'UP';
    if (orderId === this.legs.DOWN.orderId) return 'DOWN';
    return undefined;
  }

  private requireBroker(): BrokerAdapter {
    if (!this.broker) {
      throw new InvalidStateError('No broker configured');
    }
    return this.broker;
  }

  private armDeadline(): void {
    const timeoutMs = this.config.timeoutMs;
    if (timeoutMs === undefined) {
      return;
    }
    this.deadline = setTimeout(() => {
      this.deadline = undefined;
      this.logger.warn({ timeoutMs }, 'OCO deadline reached');
      this.cancelAll('timeout').catch((error: unknown) => {
        this.logger.error({ err: error }, 'Deadline cancellation failed');
      });
    }, timeoutMs);
  }

  private clearDeadline(): void {
    if (this.deadline) {
      clearTimeout(this.deadline);
      this.deadline = undefined;
    }
  }

  private record(action: OcoAction, details: Record<string, unknown>): void {
    this.actions.push({
      timestamp: Date.now(),
      action,
      dryRun: this.config.dryRun,
      details,
    });
    this.logger.debug({ action, ...details }, 'OCO action');
  }
}

function otherLeg(leg: OcoLeg): OcoLeg {
  return leg === 'UP' ? 'DOWN' : 'UP';
}
