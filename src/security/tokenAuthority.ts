/**
 * Token Authority - the rotating token embedded in /client<token>.css
 *
 * One current value lives in the shared store under REDIS_KEYS.TOKEN.
 * The first reader after expiry generates the next one.
 */

import crypto from 'crypto';
import { KeyValueStore } from '../types/store';
import { REDIS_KEYS, TTL } from '../config/redis';
import { SecurityLogger, errorMessage } from '../utils/securityLogger';

/**
 * Returned when the store is unavailable so that page rendering keeps working.
 * Not a secret: with no store there are no pings to forge.
 */
export const FALLBACK_TOKEN = '12345678';

export const TOKEN_LENGTH = 16;
const TOKEN_ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789';

export function generateToken(): string {
    let token = '';
    for (let i = 0; i < TOKEN_LENGTH; i++) {
        token += TOKEN_ALPHABET[crypto.randomInt(TOKEN_ALPHABET.length)];
    }
    return token;
}

export class TokenAuthority {
    constructor(
        private readonly store: KeyValueStore,
        private readonly generate: () => string = generateToken
    ) {}

    /**
     * Current token; creates and stores a new one when none is active
     */
    async currentToken(): Promise<string> {
        return (await this.lookupToken()) ?? FALLBACK_TOKEN;
    }

    /**
     * The fallback token is only for rendering; it never validates
     */
    async tokenIsValid(candidate: string): Promise<boolean> {
        const current = await this.lookupToken();
        const valid = current !== null && candidate === current;
        SecurityLogger.debug('Link token checked', { valid });
        return valid;
    }

    // null when the store is unreachable or a command fails
    private async lookupToken(): Promise<string | null> {
        if (!this.store.isAvailable()) {
            return null;
        }

        try {
            const existing = await this.store.get(REDIS_KEYS.TOKEN);
            if (existing) return existing;

            const candidate = this.generate();
            if (await this.store.setIfAbsent(REDIS_KEYS.TOKEN, candidate, TTL.TOKEN)) {
                SecurityLogger.debug('New link token generated');
                return candidate;
            }

            // Another instance won the race, use its token
            const winner = await this.store.get(REDIS_KEYS.TOKEN);
            if (winner) return winner;

            await this.store.set(REDIS_KEYS.TOKEN, candidate, TTL.TOKEN);
            return candidate;
        } catch (error) {
            SecurityLogger.error('Token store failed, serving fallback token', {
                error: errorMessage(error),
            });
            return null;
        }
    }
}

export default TokenAuthority;
