export type Asset = 'btc' | 'eth';

export type MarketHorizon = '15m' | '1h' | '4h' | '1d';

export type OcoState = 'INIT' | 'LIVE' | 'DONE';

export type OcoLeg = 'UP' | 'DOWN';

export type WinnerSide = OcoLeg | 'NONE';

export interface OcoConfig {
  readonly asset: Asset;
  readonly horizon: MarketHorizon;
  readonly size: number;
  readonly threshold: number;
  readonly dryRun: boolean;
  readonly timeoutMs?: number;
}

export interface OcoMarketTarget {
  /** Defaults to the market currently trading for the configured asset and horizon. */
  slug?: string;
  upTokenId: string;
  downTokenId: string;
}

export interface OcoResult {
  readonly slug: string;
  readonly upOrderId: string;
  readonly downOrderId: string;
  readonly winner: WinnerSide;
  readonly winningOrderId?: string;
  readonly winningTradeId?: string;
  readonly losingOrderId?: string;
  readonly cancelSuccess: boolean;
  readonly anomaly: boolean;
  readonly anomalyReason?: string;
  readonly dryRun: boolean;
  readonly startedAt: number;
  readonly endedAt: number;
  readonly durationMs: number;
}

export type OcoAction =
  | 'place_order'
  | 'order_update'
  | 'cancel_order'
  | 'cancel_failed'
  | 'finalize';

export interface OcoActionLogEntry {
  timestamp: number;
  action: OcoAction;
  dryRun: boolean;
  details: Record<string, unknown>;
}
