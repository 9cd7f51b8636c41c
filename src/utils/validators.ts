import { ValidationError } from './errors.js';

export function validateMarketSlug(slug: string): void {
  if (!slug || slug.trim().length === 0) {
    throw new ValidationError('Market slug is required');
  }
}

export function validateTokenId(tokenId: string): void {
  if (!tokenId || tokenId.trim().length === 0) {
    throw new ValidationError('Token ID is required');
  }
}
