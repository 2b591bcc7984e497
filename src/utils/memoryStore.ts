/**
 * In-process KeyValueStore for single-instance deployments and tests.
 * Entries expire lazily on access, measured against the injected clock.
 */

import { KeyValueStore } from '../types/store';

interface Entry {
    value: string;
    expiresAt: number;
}

export type Clock = () => number;

export class MemoryStore implements KeyValueStore {
    private entries = new Map<string, Entry>();

    constructor(private readonly clock: Clock = Date.now) {}

    isAvailable(): boolean {
        return true;
    }

    async get(key: string): Promise<string | null> {
        return this.live(key)?.value ?? null;
    }

    async set(key: string, value: string, ttlSeconds: number): Promise<void> {
        this.evictExpired();
        this.entries.set(key, { value, expiresAt: this.clock() + ttlSeconds * 1000 });
    }

    async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
        if (this.live(key)) return false;
        await this.set(key, value, ttlSeconds);
        return true;
    }

    async ttl(key: string): Promise<number> {
        const entry = this.live(key);
        if (!entry) return -2;
        return Math.ceil((entry.expiresAt - this.clock()) / 1000);
    }

    /**
     * Number of entries held, expired ones included until the next write
     */
    size(): number {
        return this.entries.size;
    }

    // Keys of clients that never come back are only ever dropped here
    private evictExpired(): void {
        const now = this.clock();
        for (const [key, entry] of this.entries.entries()) {
            if (entry.expiresAt <= now) {
                this.entries.delete(key);
            }
        }
    }

    private live(key: string): Entry | undefined {
        const entry = this.entries.get(key);
        if (!entry) return undefined;

        if (entry.expiresAt <= this.clock()) {
            this.entries.delete(key);
            return undefined;
        }
        return entry;
    }
}

export default MemoryStore;
