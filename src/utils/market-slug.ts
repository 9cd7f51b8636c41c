import type { Asset, MarketHorizon } from '../types/oco.types.js';
import { ValidationError } from './errors.js';

export const HORIZON_SECONDS: Record<MarketHorizon, number> = {
  '15m': 900,
  '1h': 3600,
  '4h': 14400,
  '1d': 86400,
};

// Up/down markets are scheduled on US Eastern time, fixed at UTC-5.
const ET_OFFSET_SECONDS = 5 * 3600;

const MONTHS = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

const ASSET_NAMES: Record<Asset, string> = {
  btc: 'bitcoin',
  eth: 'ethereum',
};

/**
 * Start of the slot containing `nowMs`, in unix seconds. 4h slots start on
 * ET boundaries (0, 4, 8, ... ET).
 */
export function currentSlotTimestamp(horizon: MarketHorizon, nowMs: number = Date.now()): number {
  const now = Math.floor(nowMs / 1000);
  const length = HORIZON_SECONDS[horizon];

  if (horizon === '4h') {
    const nowEt = now - ET_OFFSET_SECONDS;
    return Math.floor(nowEt / length) * length + ET_OFFSET_SECONDS;
  }
  return Math.floor(now / length) * length;
}

/** Timestamp slugs only exist for 15m and 4h markets. */
export function timestampToSlug(asset: Asset, horizon: MarketHorizon, timestamp: number): string {
  if (horizon !== '15m' && horizon !== '4h') {
    throw new ValidationError(`Timestamp slugs are not used for ${horizon} markets`);
  }
  return `${asset}-updown-${horizon}-${timestamp}`;
}

export function slugToTimestamp(slug: string): number | undefined {
  const last = slug.split('-').pop() ?? '';
  return /^\d+$/.test(last) ? Number(last) : undefined;
}

/** End of the slot a timestamp slug refers to, in unix seconds. */
export function slotEnd(slug: string, horizon: MarketHorizon): number | undefined {
  const start = slugToTimestamp(slug);
  return start === undefined ? undefined : start + HORIZON_SECONDS[horizon];
}

/** Slug of the market currently trading for an asset and horizon. */
export function currentSlug(asset: Asset, horizon: MarketHorizon, nowMs: number = Date.now()): string {
  if (horizon === '15m' || horizon === '4h') {
    return timestampToSlug(asset, horizon, currentSlotTimestamp(horizon, nowMs));
  }

  const et = new Date(nowMs - ET_OFFSET_SECONDS * 1000);
  const name = ASSET_NAMES[asset];

  if (horizon === '1h') {
    // hourly markets are named after the hour they resolve at
    const resolution = new Date(
      Date.UTC(et.getUTCFullYear(), et.getUTCMonth(), et.getUTCDate(), et.getUTCHours() + 1),
    );
    return `${name}-up-or-down-${MONTHS[resolution.getUTCMonth()]}-${resolution.getUTCDate()}-${formatHour(resolution.getUTCHours())}-et`;
  }

  // daily markets resolve at noon ET
  const dayOffset = et.getUTCHours() < 12 ? 0 : 1;
  const resolution = new Date(
    Date.UTC(et.getUTCFullYear(), et.getUTCMonth(), et.getUTCDate() + dayOffset, 12),
  );
  return `${name}-up-or-down-on-${MONTHS[resolution.getUTCMonth()]}-${resolution.getUTCDate()}`;
}

function formatHour(hour: number): string {
  if (hour === 0) return '12am';
  if (hour < 12) return `${hour}am`;
  if (hour === 12) return '12pm';
  return `${hour - 12}pm`;
}
