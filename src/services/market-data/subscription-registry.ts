import type { MarketRoute } from '../../types/market-data.types.js';
import { ValidationError } from '../../utils/errors.js';

type MarketTokens = { yes: string; no: string };

/**
 * Bidirectional index between instrument (token) ids and the market/outcome
 * they belong to. An instrument maps to at most one market; registering it
 * under a second market is rejected.
 */
export class SubscriptionRegistry {
  private tokenIndex = new Map<string, MarketRoute>();
  private marketIndex = new Map<string, MarketTokens>();

  register(slug: string, yesTokenId: string, noTokenId: string): void {
    for (const tokenId of [yesTokenId, noTokenId]) {
      const owner = this.tokenIndex.get(tokenId);
      if (owner && owner.slug !== slug) {
        throw new ValidationError(`Token ${tokenId} already belongs to market ${owner.slug}`, {
          tokenId,
          market: owner.slug,
        });
      }
    }

    const previous = this.marketIndex.get(slug);
    if (previous) {
      this.dropToken(previous.yes, slug);
      this.dropToken(previous.no, slug);
    }

    this.tokenIndex.set(yesTokenId, { slug, side: 'yes' });
    this.tokenIndex.set(noTokenId, { slug, side: 'no' });
    this.marketIndex.set(slug, { yes: yesTokenId, no: noTokenId });
  }

  unregister(slug: string): boolean {
    const tokens = this.marketIndex.get(slug);
    if (!tokens) {
      return false;
    }
    this.dropToken(tokens.yes, slug);
    this.dropToken(tokens.no, slug);
    this.marketIndex.delete(slug);
    return true;
  }

  lookup(tokenId: string): MarketRoute | undefined {
    return this.tokenIndex.get(tokenId);
  }

  instrumentsFor(slug: string): [string, string] | undefined {
    const tokens = this.marketIndex.get(slug);
    return tokens ? [tokens.yes, tokens.no] : undefined;
  }

  instrumentIds(): string[] {
    return Array.from(this.tokenIndex.keys());
  }

  get size(): number {
    return this.marketIndex.size;
  }

  private dropToken(tokenId: string, slug: string): void {
    if (this.tokenIndex.get(tokenId)?.slug === slug) {
      this.tokenIndex.delete(tokenId);
    }
  }
}
