/**
 * Maps a client address onto the network it is rated by.
 * IPv4 clients are grouped by `ipv4Prefix`, IPv6 clients by `ipv6Prefix`.
 */

import ipaddr from 'ipaddr.js';
import { RealIpConfig } from '../config/settings';

export interface ClientNetwork {
    kind: 'ipv4' | 'ipv6';
    address: string;        // Network address, host bits cleared
    prefixLength: number;
    compressed: string;     // e.g. 203.0.113.0/24 or 2001:db8::/48
}

/**
 * Parse an address, converting IPv4-mapped IPv6 (::ffff:192.0.2.1) to IPv4.
 * Returns null for anything that is not a plain IPv4 or IPv6 address.
 */
export function parseAddress(raw: string): ipaddr.IPv4 | ipaddr.IPv6 | null {
    const candidate = raw.trim();
    if (ipaddr.IPv4.isValidFourPartDecimal(candidate)) {
        return ipaddr.IPv4.parse(candidate);
    }
    if (ipaddr.IPv6.isValid(candidate)) {
        return ipaddr.process(candidate);
    }
    return null;
}

export function getNetwork(ip: string, config: Pick<RealIpConfig, 'ipv4Prefix' | 'ipv6Prefix'>): ClientNetwork | null {
    const addr = parseAddress(ip);
    if (!addr) return null;

    if (addr.kind() === 'ipv4') {
        const prefixLength = config.ipv4Prefix;
        const network = ipaddr.IPv4.networkAddressFromCIDR(`${addr.toString()}/${prefixLength}`);
        const address = network.toString();
        return { kind: 'ipv4', address, prefixLength, compressed: `${address}/${prefixLength}` };
    }

    const prefixLength = config.ipv6Prefix;
    const network = ipaddr.IPv6.networkAddressFromCIDR(`${addr.toString()}/${prefixLength}`);
    const address = network.toRFC5952String();
    return { kind: 'ipv6', address, prefixLength, compressed: `${address}/${prefixLength}` };
}
