import crypto from 'crypto';

/**
 * HMAC-SHA256 of `value` keyed with the server secret, hex encoded.
 * Keeps client fingerprints out of the store in plain text.
 */
export function secretHash(secret: string, value: string): string {
    return crypto
        .createHmac('sha256', secret)
        .update(value, 'utf8')
        .digest('hex');
}
