/**
 * Redis-backed KeyValueStore
 * Shared across every instance of the service
 */

import Redis from 'ioredis';
import { KeyValueStore } from '../types/store';
import { isRedisConnected } from '../config/redis';

export class RedisStore implements KeyValueStore {
    constructor(private readonly client: Redis) {}

    isAvailable(): boolean {
        return isRedisConnected(this.client);
    }

    async get(key: string): Promise<string | null> {
        return await this.client.get(key);
    }

    async set(key: string, value: string, ttlSeconds: number): Promise<void> {
        await this.client.set(key, value, 'EX', ttlSeconds);
    }

    /**
     * SET ... EX ttl NX; Redis answers null when the key already exists
     */
    async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
        const result = await this.client.set(key, value, 'EX', ttlSeconds, 'NX');
        return result === 'OK';
    }

    async ttl(key: string): Promise<number> {
        return await this.client.ttl(key);
    }
}

export default RedisStore;
