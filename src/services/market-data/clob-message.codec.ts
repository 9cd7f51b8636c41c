import { z } from 'zod';
import type {
  BookLevel,
  PriceChangeUpdate,
  RawUpdate,
  TradeSide,
} from '../../types/market-data.types.js';

const numericField = z.union([z.number(), z.string()]);

const levelSchema = z.union([
  z.object({ price: numericField, size: numericField }),
  z.tuple([numericField, numericField]).rest(z.unknown()),
]);

const bookSchema = z.object({
  event_type: z.literal('book'),
  asset_id: z.string().min(1),
  bids: z.array(levelSchema).optional(),
  asks: z.array(levelSchema).optional(),
  buys: z.array(levelSchema).optional(),
  sells: z.array(levelSchema).optional(),
  last_trade_price: numericField.optional(),
});

const priceChangeEntrySchema = z.object({
  asset_id: z.string().optional(),
  price: numericField.optional(),
  size: numericField.optional(),
  side: z.string().optional(),
  best_bid: numericField.optional(),
  best_ask: numericField.optional(),
});

const priceChangeSchema = z.object({
  event_type: z.literal('price_change'),
  asset_id: z.string().optional(),
  price_changes: z.array(priceChangeEntrySchema).optional(),
  // older payload shape: one asset per message, level changes under `changes`
  changes: z.array(priceChangeEntrySchema).optional(),
});

const tradeSchema = z.object({
  event_type: z.enum(['last_trade_price', 'trade']),
  asset_id: z.string().min(1),
  price: numericField,
  size: numericField.optional(),
  side: z.string().optional(),
});

const recordSchema = z.discriminatedUnion('event_type', [
  bookSchema,
  priceChangeSchema,
  tradeSchema,
]);

const KNOWN_EVENT_TYPES = new Set(['book', 'price_change', 'last_trade_price', 'trade']);

export interface DecodedFrame {
  updates: RawUpdate[];
  /** Records that claimed a known event type but did not match its shape. */
  malformed: number;
  /** Records with an event type the feed does not track (tick size changes, acks). */
  ignored: number;
}

/**
 * Decodes one text frame from the market channel.
 *
 * A frame is either a single record or an array of independent records
 * (the initial book burst after subscribing). Order within the frame is
 * preserved in `updates`.
 */
export function decodeFrame(payload: string): DecodedFrame {
  const result: DecodedFrame = { updates: [], malformed: 0, ignored: 0 };

  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch {
    result.malformed += 1;
    return result;
  }

  const records = Array.isArray(parsed) ? parsed : [parsed];
  for (const record of records) {
    decodeRecord(record, result);
  }
  return result;
}

function decodeRecord(record: unknown, into: DecodedFrame): void {
  if (!record || typeof record !== 'object') {
    into.malformed += 1;
    return;
  }

  const eventType = 'event_type' in record ? record.event_type : undefined;
  if (typeof eventType !== 'string' || !KNOWN_EVENT_TYPES.has(eventType)) {
    into.ignored += 1;
    return;
  }

  const parsed = recordSchema.safeParse(record);
  if (!parsed.success) {
    into.malformed += 1;
    return;
  }

  const message = parsed.data;
  switch (message.event_type) {
    case 'book': {
      const bids = toLevels(message.bids ?? message.buys ?? []);
      const asks = toLevels(message.asks ?? message.sells ?? []);
      // Bids arrive ascending and asks descending, so the best of each is last.
      into.updates.push({
        kind: 'book',
        assetId: message.asset_id,
        bids,
        asks,
        bestBid: bids.length > 0 ? bids[bids.length - 1].price : undefined,
        bestAsk: asks.length > 0 ? asks[asks.length - 1].price : undefined,
        lastTradePrice: toPositive(message.last_trade_price),
      });
      return;
    }
    case 'price_change': {
      const entries = message.price_changes ?? message.changes ?? [];
      for (const entry of entries) {
        const assetId = entry.asset_id || message.asset_id;
        if (!assetId) {
          into.malformed += 1;
          continue;
        }
        into.updates.push(toPriceChange(assetId, entry));
      }
      return;
    }
    case 'last_trade_price':
    case 'trade': {
      const price = toNumber(message.price);
      if (price === undefined) {
        into.malformed += 1;
        return;
      }
      into.updates.push({
        kind: 'trade',
        assetId: message.asset_id,
        price,
        size: toNumber(message.size),
        side: toTradeSide(message.side),
      });
      return;
    }
  }
}

function toPriceChange(
  assetId: string,
  entry: z.infer<typeof priceChangeEntrySchema>,
): PriceChangeUpdate {
  return {
    kind: 'price_change',
    assetId,
    // a zero or empty best price means "not carried", never "no liquidity"
    bestBid: toPositive(entry.best_bid),
    bestAsk: toPositive(entry.best_ask),
    price: toPositive(entry.price),
    size: toPositive(entry.size),
    side: toTradeSide(entry.side),
  };
}

function toLevels(levels: Array<z.infer<typeof levelSchema>>): BookLevel[] {
  const result: BookLevel[] = [];
  for (const level of levels) {
    const [rawPrice, rawSize] = Array.isArray(level) ? level : [level.price, level.size];
    const price = toNumber(rawPrice);
    const size = toNumber(rawSize);
    if (price !== undefined && size !== undefined) {
      result.push({ price, size });
    }
  }
  return result;
}

function toNumber(value: number | string | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const num = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(num) ? num : undefined;
}

function toPositive(value: number | string | undefined): number | undefined {
  const num = toNumber(value);
  return num !== undefined && num > 0 ? num : undefined;
}

function toTradeSide(value: string | undefined): TradeSide | undefined {
  const upper = value?.toUpperCase();
  return upper === 'BUY' || upper === 'SELL' ? upper : undefined;
}
