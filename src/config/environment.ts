import { z } from 'zod';

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const nonNegativeInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().nonnegative());

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform((val) => val === 'true');

const envSchema = z.object({
  // Process
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  HOST: z.string().default('0.0.0.0'),
  PORT: positiveInt('3000'),

  // Market stream
  FEED_WS_URL: z.string().url().default('wss://ws-subscriptions-clob.polymarket.com/ws/market'),
  FEED_CHANNEL: z.string().min(1).default('market'),
  FEED_CONNECT_TIMEOUT_MS: positiveInt('10000'),
  FEED_RECEIVE_TIMEOUT_MS: positiveInt('60000'),
  FEED_HEARTBEAT_MS: positiveInt('30000'),
  FEED_RECONNECT_BASE_MS: positiveInt('1000'),
  FEED_RECONNECT_MAX_MS: positiveInt('30000'),
  // 0 = retry forever
  FEED_MAX_RECONNECT_ATTEMPTS: nonNegativeInt('0'),
  FEED_AUTO_RECONNECT: booleanFlag('true'),
  FEED_UPDATE_QUEUE_SIZE: positiveInt('1000'),
  // slug:yesToken:noToken,slug:yesToken:noToken
  FEED_MARKETS: z.string().default(''),

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type Environment = z.infer<typeof envSchema>;

let _env: Environment | null = null;

export function loadEnvironment(): Environment {
  if (_env) {
    return _env;
  }

  const parsed = envSchema.safeParse(process.env);

  if (!parsed.success) {
    console.error('Invalid environment variables:');
    console.error(parsed.error.format());
    throw new Error('Invalid environment configuration');
  }

  _env = parsed.data;
  return _env;
}

export function getEnvironment(): Environment {
  if (!_env) {
    throw new Error('Environment not loaded. Call loadEnvironment() first.');
  }
  return _env;
}
