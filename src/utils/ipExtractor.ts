/**
 * Real client IP extraction behind reverse proxies.
 *
 * Priority order (when TRUST_PROXY is on):
 * 1. X-Forwarded-For, the entry `xFor` positions from the right
 * 2. X-Real-IP
 * 3. Socket remote address
 */

import { IncomingHttpHeaders } from 'http';
import { RealIpConfig } from '../config/settings';
import { parseAddress } from './networkResolver';
import { SecurityLogger } from './securityLogger';

export interface ClientRequest {
    headers: IncomingHttpHeaders;
    remoteAddress?: string;
}

const warnedOnce = new Set<string>();

function warnOnce(message: string): void {
    if (warnedOnce.has(message)) return;
    warnedOnce.add(message);
    SecurityLogger.warn(message);
}

/**
 * Read a header as a single string; repeated headers are joined with ", "
 */
export function headerValue(headers: IncomingHttpHeaders, name: string): string {
    const value = headers[name.toLowerCase()];
    if (value === undefined) return '';
    return Array.isArray(value) ? value.join(', ') : value;
}

/**
 * Pick the X-Forwarded-For entry added by the outermost trusted proxy.
 * With `xFor` = 1 that is the last entry; a shorter list yields its first entry.
 */
export function pickForwardedFor(forwardedFor: string, xFor: number): string | null {
    const entries = forwardedFor
        .split(',')
        .map(entry => entry.trim())
        .filter(entry => entry.length > 0);
    if (entries.length === 0) return null;

    const index = Math.max(entries.length - xFor, 0);
    return entries[index] ?? null;
}

function normalize(ip: string | null | undefined): string | null {
    if (!ip) return null;
    const addr = parseAddress(ip);
    return addr ? addr.toString() : null;
}

/**
 * Extract the best-effort real client IP, or null when no candidate is a valid address
 */
export function getRealIp(req: ClientRequest, config: Pick<RealIpConfig, 'trustProxy' | 'xFor'>): string | null {
    const remoteAddr = normalize(req.remoteAddress);
    if (!config.trustProxy) {
        return remoteAddr;
    }

    const forwardedHeader = headerValue(req.headers, 'x-forwarded-for');
    const realIpHeader = headerValue(req.headers, 'x-real-ip');

    if (!forwardedHeader) warnOnce('X-Forwarded-For header is not set');
    if (!realIpHeader) warnOnce('X-Real-IP header is not set');

    const forwardedFor = normalize(pickForwardedFor(forwardedHeader, config.xFor));
    const realIp = normalize(realIpHeader);

    if (forwardedFor && realIp && forwardedFor !== realIp) {
        SecurityLogger.debug('IP from X-Real-IP differs from X-Forwarded-For', { realIp, forwardedFor });
    }
    if (forwardedFor && remoteAddr && forwardedFor !== remoteAddr) {
        SecurityLogger.debug('Socket address differs from X-Forwarded-For', { remoteAddr, forwardedFor });
    }

    return forwardedFor ?? realIp ?? remoteAddr;
}
