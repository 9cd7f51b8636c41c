import { FastifyInstance } from 'fastify';
import type { MarketFeedService } from '../services/market-data/market-feed.service.js';
import { healthRoute } from './health.route.js';
import { getMarketsRoutes } from './markets/get-markets.js';

export async function registerRoutes(app: FastifyInstance, feed: MarketFeedService): Promise<void> {
  await app.register(healthRoute, { feed });

  // Market routes
  await app.register(getMarketsRoutes, { prefix: '/api/v1/markets', feed });
}
