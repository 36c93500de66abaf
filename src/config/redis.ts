import Redis from 'ioredis';
import { createLogger } from '../utils/logger';

const logger = createLogger('redis');

export function createRedisClient(url: string): Redis {
  const redis = new Redis(url, {
    maxRetriesPerRequest: 3,
    lazyConnect: true,
    retryStrategy(times) {
      const delay = Math.min(times * 50, 2000);
      return delay;
    },
    reconnectOnError(err) {
      const targetError = 'READONLY';
      if (err.message.includes(targetError)) {
        return true;
      }
      return false;
    },
  });

  redis.on('connect', () => {
    logger.info('✓ Connected to Redis');
  });

  redis.on('error', (err) => {
    logger.error('Redis connection error:', err);
  });

  return redis;
}

export interface Closable {
  quit(): Promise<unknown>;
}

export interface SignalTarget {
  once(signal: NodeJS.Signals, listener: () => void): unknown;
  exit(code: number): void;
}

/**
 * Close the connection and exit when the process is asked to stop.
 */
export function closeOnSignals(
  redis: Closable,
  target: SignalTarget = process,
  signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']
): void {
  const shutdown = async (signal: NodeJS.Signals) => {
    try {
      await redis.quit();
      logger.info(`Redis connection closed (${signal})`);
      target.exit(0);
    } catch (error) {
      logger.error('Failed to close Redis connection:', error);
      target.exit(1);
    }
  };

  for (const signal of signals) {
    target.once(signal, () => {
      void shutdown(signal);
    });
  }
}
