import { describe, it, expect, beforeEach } from 'vitest';
import { SubscriptionRegistry } from '../subscription-registry.js';
import { ValidationError } from '../../../utils/errors.js';

describe('SubscriptionRegistry', () => {
  let registry: SubscriptionRegistry;

  beforeEach(() => {
    registry = new SubscriptionRegistry();
  });

  it('routes both outcome tokens to their market', () => {
    registry.register('market-a', 'a-yes', 'a-no');

    expect(registry.lookup('a-yes')).toEqual({ slug: 'market-a', side: 'yes' });
    expect(registry.lookup('a-no')).toEqual({ slug: 'market-a', side: 'no' });
    expect(registry.instrumentsFor('market-a')).toEqual(['a-yes', 'a-no']);
    expect(registry.instrumentIds()).toEqual(['a-yes', 'a-no']);
    expect(registry.size).toBe(1);
  });

  it('replaces the tokens of a market registered again', () => {
    registry.register('market-a', 'a-yes', 'a-no');
    registry.register('market-a', 'a2-yes', 'a2-no');

    expect(registry.lookup('a-yes')).toBeUndefined();
    expect(registry.lookup('a2-no')).toEqual({ slug: 'market-a', side: 'no' });
    expect(registry.size).toBe(1);
  });

  it('rejects a token that belongs to another market', () => {
    registry.register('market-a', 'shared', 'a-no');

    expect(() => registry.register('market-b', 'b-yes', 'shared')).toThrow(ValidationError);
    expect(registry.lookup('shared')).toEqual({ slug: 'market-a', side: 'yes' });
    expect(registry.lookup('b-yes')).toBeUndefined();
    expect(registry.instrumentsFor('market-b')).toBeUndefined();
    expect(registry.size).toBe(1);
  });

  it('lets a market swap its own outcome tokens', () => {
    registry.register('market-a', 'a-yes', 'a-no');
    registry.register('market-a', 'a-no', 'a-yes');

    expect(registry.lookup('a-yes')).toEqual({ slug: 'market-a', side: 'no' });
    expect(registry.lookup('a-no')).toEqual({ slug: 'market-a', side: 'yes' });
  });

  it('stops routing tokens of an unregistered market', () => {
    registry.register('market-a', 'a-yes', 'a-no');

    expect(registry.unregister('market-a')).toBe(true);
    expect(registry.unregister('market-a')).toBe(false);
    expect(registry.lookup('a-yes')).toBeUndefined();
    expect(registry.instrumentIds()).toEqual([]);
    expect(registry.instrumentsFor('market-a')).toBeUndefined();
  });
});
