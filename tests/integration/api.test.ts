import { once } from 'node:events';
import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import { FastifyInstance } from 'fastify';
import { WebSocketServer } from 'ws';
import { createApp } from '../../src/server/app.js';
import { registerRoutes } from '../../src/routes/index.js';
import { MarketFeedService } from '../../src/services/market-data/market-feed.service.js';

describe('API Integration Tests', () => {
  let app: FastifyInstance;
  let server: WebSocketServer;
  let feed: MarketFeedService;
  let running: Promise<void> | undefined;

  beforeAll(async () => {
    server = new WebSocketServer({ host: '127.0.0.1', port: 0 });
    await once(server, 'listening');
    const address = server.address();
    const port = typeof address === 'string' ? 0 : address.port;

    server.on('connection', (socket) => {
      socket.on('message', () => {
        socket.send(
          JSON.stringify({
            event_type: 'book',
            asset_id: 'a-yes',
            bids: [
              { price: '0.40', size: '50' },
              { price: '0.45', size: '100' },
            ],
            asks: [
              { price: '0.60', size: '20' },
              { price: '0.55', size: '80' },
            ],
          }),
        );
      });
    });

    feed = new MarketFeedService({
      url: `ws://127.0.0.1:${port}`,
      heartbeatIntervalMs: 60_000,
      reconnectBaseMs: 10,
    });
    feed.addMarket('market-a', 'a-yes', 'a-no');

    app = await createApp();
    await registerRoutes(app, feed);
    await app.ready();
  });

  afterAll(async () => {
    feed.stop();
    await running;
    await app.close();
    for (const client of server.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
  });

  describe('Health Check', () => {
    it('reports stopped before the feed runs', async () => {
      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(503);
      const body = JSON.parse(response.body);
      expect(body.status).toBe('stopped');
      expect(body.connected).toBe(false);
      expect(body.markets).toBe(1);
    });

    it('reports healthy while connected', async () => {
      running = feed.start();
      await vi.waitFor(() => expect(feed.getMarket('market-a')?.yesBid).toBe(0.45));

      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.status).toBe('healthy');
      expect(body.connected).toBe(true);
      expect(body.stats.messagesReceived).toBe(1);
      expect(body.timestamp).toBeDefined();
    });
  });

  describe('Markets API', () => {
    it('lists market snapshots with derived prices', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/markets' });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.total).toBe(1);
      expect(body.markets[0]).toMatchObject({
        slug: 'market-a',
        yesBid: 0.45,
        yesAsk: 0.55,
        yesMid: expect.closeTo(0.5),
        impliedProbability: expect.closeTo(0.5),
      });
    });

    it('returns one market by slug', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/markets/market-a' });

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body).yesTokenId).toBe('a-yes');
    });

    it('rejects a slug that is not a market slug', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/markets/Market_A' });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error.code).toBe('VALIDATION_ERROR');
    });

    it('returns 404 for an unknown market', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/markets/unknown' });

      expect(response.statusCode).toBe(404);
      expect(JSON.parse(response.body)).toEqual({
        error: {
          code: 'NOT_FOUND',
          message: 'Market with identifier unknown not found',
        },
      });
    });
  });
});
