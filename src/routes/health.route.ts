import { FastifyInstance } from 'fastify';
import type { MarketFeedService } from '../services/market-data/market-feed.service.js';

export type FeedRouteOptions = {
  feed: MarketFeedService;
};

export type HealthStatus = 'healthy' | 'degraded' | 'stopped';

/**
 * Reports stream connectivity. Anything other than a connected stream
 * answers 503 so load balancers and supervisors can act on it.
 */
export async function healthRoute(app: FastifyInstance, { feed }: FeedRouteOptions): Promise<void> {
  app.get('/health', async (_request, reply) => {
    const connected = feed.isConnected;
    let status: HealthStatus = 'healthy';
    if (!feed.isRunning) {
      status = 'stopped';
    } else if (!connected) {
      status = 'degraded';
    }

    if (status !== 'healthy') {
      reply.status(503);
    }
    return {
      status,
      timestamp: new Date().toISOString(),
      connected,
      markets: feed.marketCount,
      stats: feed.getStats(),
    };
  });
}
