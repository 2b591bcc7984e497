/**
 * Redis Configuration and Client
 * Connection for the shared link-token state (token + pings)
 */

import Redis from 'ioredis';
import { AppConfig } from './settings';
import { SecurityLogger, errorMessage } from '../utils/securityLogger';

const CONNECT_TIMEOUT_MS = 5000;
const COMMAND_TIMEOUT_MS = 2000;

// Key names inside the shared store
export const REDIS_KEYS = {
    // The single current CSS token
    TOKEN: 'link_token.token',

    // Prefix of all ping keys: link_token.ping[<hash>]
    PING: 'link_token.ping',
};

// TTL constants in seconds
export const TTL = {
    TOKEN: 10 * 60,     // 10 minutes
    PING: 60 * 60,      // 1 hour, renewable
};

/**
 * Create the Redis client. The connection is opened by initRedis().
 */
export function createRedisClient(config: Pick<AppConfig, 'redisUrl' | 'redisPassword'>): Redis {
    const client = new Redis(config.redisUrl || 'redis://localhost:6379', {
        password: config.redisPassword,
        lazyConnect: true,
        connectTimeout: CONNECT_TIMEOUT_MS,
        commandTimeout: COMMAND_TIMEOUT_MS,
        maxRetriesPerRequest: 1,
        // An unreachable server must fail fast, not queue commands
        enableOfflineQueue: false,
        retryStrategy: (times: number) => {
            const delay = Math.min(times * 100, 3000);
            return delay;
        },
    });

    client.on('connect', () => {
        SecurityLogger.info('Redis connected');
    });

    client.on('ready', () => {
        SecurityLogger.info('Redis ready');
    });

    client.on('error', (err: Error) => {
        SecurityLogger.error('Redis connection error', { error: err.message });
    });

    client.on('reconnecting', () => {
        SecurityLogger.info('Redis reconnecting');
    });

    client.on('close', () => {
        SecurityLogger.warn('Redis connection closed');
    });

    return client;
}

/**
 * Initialize Redis connection
 */
export async function initRedis(client: Redis): Promise<boolean> {
    try {
        await client.connect();
        await client.ping();
        SecurityLogger.info('Redis ping successful');
        return true;
    } catch (error) {
        SecurityLogger.error('Failed to connect to Redis, link token disabled until it is reachable', {
            error: errorMessage(error),
        });
        return false;
    }
}

/**
 * Check if Redis is connected
 */
export function isRedisConnected(client: Redis): boolean {
    return client.status === 'ready';
}

export async function closeRedis(client: Redis): Promise<void> {
    SecurityLogger.info('Closing Redis connection');
    // quit() needs a writable stream while the offline queue is off
    if (client.status !== 'ready') {
        client.disconnect();
        return;
    }
    await client.quit();
}
