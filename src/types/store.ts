/**
 * Boundary to the shared key-value store holding the token and the pings.
 * Single-key operations only; each one is assumed atomic on the store side.
 */
export interface KeyValueStore {
    /** Liveness check, distinct from "key absent". */
    isAvailable(): boolean;

    get(key: string): Promise<string | null>;

    /** Write `value`, replacing any previous value and expiry. */
    set(key: string, value: string, ttlSeconds: number): Promise<void>;

    /** Write only if `key` is absent. Resolves true when this call created it. */
    setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean>;

    /** Remaining seconds; -2 when absent, -1 when the key never expires. */
    ttl(key: string): Promise<number>;
}
