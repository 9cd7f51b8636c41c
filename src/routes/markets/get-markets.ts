import { FastifyInstance } from 'fastify';
import { NotFoundError } from '../../utils/errors.js';
import { toMarketSnapshot, type MarketSnapshot } from '../../utils/pricing.js';
import type { FeedRouteOptions } from '../health.route.js';

export interface MarketListResponse {
  markets: MarketSnapshot[];
  total: number;
}

export async function getMarketsRoutes(app: FastifyInstance, { feed }: FeedRouteOptions): Promise<void> {
  app.get('/', async (): Promise<MarketListResponse> => {
    const markets = feed.getAllMarkets().map(toMarketSnapshot);
    return { markets, total: markets.length };
  });

  app.get<{ Params: { slug: string } }>(
    '/:slug',
    {
      schema: {
        params: {
          type: 'object',
          properties: {
            slug: { type: 'string', pattern: '^[a-z0-9-]+$' },
          },
          required: ['slug'],
        },
      },
    },
    async (request): Promise<MarketSnapshot> => {
      const { slug } = request.params;
      const state = feed.getMarket(slug);
      if (!state) {
        throw new NotFoundError('Market', slug);
      }
      return toMarketSnapshot(state);
    },
  );
}
