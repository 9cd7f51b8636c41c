import { ValidationError } from '../utils/errors.js';

export interface FeedMarketEntry {
  slug: string;
  yesTokenId: string;
  noTokenId: string;
}

/** Parses `slug:yesToken:noToken` entries separated by commas. */
export function parseFeedMarkets(value: string): FeedMarketEntry[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => {
      const parts = entry.split(':').map((part) => part.trim());
      const [slug, yesTokenId, noTokenId] = parts;
      if (parts.length !== 3 || !slug || !yesTokenId || !noTokenId) {
        throw new ValidationError(`Invalid FEED_MARKETS entry "${entry}", expected slug:yesToken:noToken`);
      }
      return { slug, yesTokenId, noTokenId };
    });
}
