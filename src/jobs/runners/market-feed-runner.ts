import { loadEnvironment } from '../../config/environment.js';
import { parseFeedMarkets } from '../../config/feed-markets.js';
import { createLogger } from '../../utils/logger.js';
import { createApp } from '../../server/app.js';
import { registerRoutes } from '../../routes/index.js';
import {
  MarketFeedService,
  feedOptionsFromEnvironment,
} from '../../services/market-data/market-feed.service.js';

/**
 * Market Feed Worker
 *
 * Streams best bid/ask for the configured up/down markets and serves
 * health and market snapshots over HTTP.
 */
async function main(): Promise<void> {
  const env = loadEnvironment();
  const logger = createLogger();

  logger.info('Starting market feed worker...');

  const feed = new MarketFeedService(feedOptionsFromEnvironment(env));
  for (const market of parseFeedMarkets(env.FEED_MARKETS)) {
    feed.addMarket(market.slug, market.yesTokenId, market.noTokenId);
  }
  if (feed.marketCount === 0) {
    logger.warn('FEED_MARKETS is empty, the stream will carry no updates');
  }

  feed.onUpdate((update) => {
    logger.debug(
      { slug: update.slug, side: update.side, bid: update.bestBid, ask: update.bestAsk },
      'Price update',
    );
  });
  feed.onConnect(() => logger.info('Market stream connected'));
  feed.onDisconnect((reason) => logger.warn({ reason }, 'Market stream disconnected'));

  const app = await createApp();
  await registerRoutes(app, feed);
  await app.listen({ port: env.PORT, host: env.HOST });
  logger.info(`Health server listening on http://${env.HOST}:${env.PORT}`);

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`${signal} received, shutting down market feed worker...`);

    feed.stop();
    await app.close();

    logger.info('Market feed worker stopped');
    process.exit(0);
  };

  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((error) => {
      logger.error({ err: error }, 'Shutdown failed');
      process.exit(1);
    });
  });
  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((error) => {
      logger.error({ err: error }, 'Shutdown failed');
      process.exit(1);
    });
  });

  await feed.start();
  logger.info({ stats: feed.getStats() }, 'Market feed ended');
  await app.close();
}

main().catch((error) => {
  console.error('Market feed worker failed:', error);
  process.exit(1);
});
