/**
 * Ping Ledger - proof that a client fetched the CSS link token.
 *
 * A ping is keyed by the client's network plus its Accept-Language and
 * User-Agent headers, which fits (more or less) one browser session within
 * a network. The raw client address is deliberately not part of the key.
 */

import { KeyValueStore } from '../types/store';
import { REDIS_KEYS, TTL } from '../config/redis';
import { secretHash } from '../utils/secretHash';
import { SecurityLogger, errorMessage } from '../utils/securityLogger';

const PING_VALUE = '1';

export type PingLookup = 'found' | 'missing' | 'unavailable';

export class PingLedger {
    constructor(
        private readonly store: KeyValueStore,
        private readonly secret: string
    ) {}

    /**
     * Hash of network + Accept-Language + User-Agent (absent headers are '')
     */
    deriveKey(network: string, acceptLanguage = '', userAgent = ''): string {
        return secretHash(this.secret, network + acceptLanguage + userAgent);
    }

    /**
     * Store key of the ping: link_token.ping[<hash>]
     */
    pingKey(network: string, acceptLanguage = '', userAgent = ''): string {
        return `${REDIS_KEYS.PING}[${this.deriveKey(network, acceptLanguage, userAgent)}]`;
    }

    async recordPing(network: string, acceptLanguage = '', userAgent = ''): Promise<void> {
        if (!this.store.isAvailable()) return;

        const key = this.pingKey(network, acceptLanguage, userAgent);
        try {
            await this.store.set(key, PING_VALUE, TTL.PING);
            SecurityLogger.debug('Stored ping for client network', { network, pingKey: key });
        } catch (error) {
            SecurityLogger.error('Failed to store ping', { network, pingKey: key, error: errorMessage(error) });
        }
    }

    async hasPing(network: string, acceptLanguage = '', userAgent = '', renew = false): Promise<boolean> {
        return (await this.lookup(network, acceptLanguage, userAgent, renew)) === 'found';
    }

    /**
     * Three-way lookup so callers can tell "no ping" from "no store".
     * A store error counts as unavailable.
     */
    async lookup(network: string, acceptLanguage = '', userAgent = '', renew = false): Promise<PingLookup> {
        if (!this.store.isAvailable()) return 'unavailable';

        const key = this.pingKey(network, acceptLanguage, userAgent);
        try {
            if (!await this.store.get(key)) {
                return 'missing';
            }
            if (renew) {
                await this.store.set(key, PING_VALUE, TTL.PING);
            }
            return 'found';
        } catch (error) {
            SecurityLogger.error('Ping lookup failed', { network, pingKey: key, error: errorMessage(error) });
            return 'unavailable';
        }
    }
}

export default PingLedger;
