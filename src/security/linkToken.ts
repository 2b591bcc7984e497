/**
 * Link Token - rates a request as suspicious when the client never
 * requested /client<token>.css.
 *
 * Pages embed the current token in a stylesheet URL. A browser rendering the
 * page fetches it, which records a ping for its network and headers. Scripts
 * that never load CSS have no ping and are rated suspicious. The random token
 * keeps a bot from pinging a static URL.
 */

import { IncomingHttpHeaders } from 'http';
import { KeyValueStore } from '../types/store';
import { RealIpConfig } from '../config/settings';
import { TokenAuthority } from './tokenAuthority';
import { PingLedger } from './pingLedger';
import { ClientRequest, getRealIp, headerValue } from '../utils/ipExtractor';
import { ClientNetwork, getNetwork } from '../utils/networkResolver';
import { SecurityLogger, errorMessage } from '../utils/securityLogger';

export interface LinkTokenOptions {
    secret: string;
    realIp: RealIpConfig;
    generateToken?: () => string;
}

export class LinkTokenGuard {
    readonly tokens: TokenAuthority;
    readonly pings: PingLedger;
    private readonly realIp: RealIpConfig;

    constructor(private readonly store: KeyValueStore, options: LinkTokenOptions) {
        this.tokens = new TokenAuthority(store, options.generateToken);
        this.pings = new PingLedger(store, options.secret);
        this.realIp = options.realIp;
    }

    isAvailable(): boolean {
        return this.store.isAvailable();
    }

    /**
     * Token for the stylesheet URL of the page being rendered
     */
    async getToken(): Promise<string> {
        return await this.tokens.currentToken();
    }

    /**
     * Network the requesting client is rated by, or null if its address is unusable
     */
    resolveNetwork(req: ClientRequest): ClientNetwork | null {
        const realIp = getRealIp(req, this.realIp);
        if (!realIp) return null;
        return getNetwork(realIp, this.realIp);
    }

    /**
     * Called by a request to /client<token>.css. With a valid token a ping
     * is stored for the client. Never throws: the caller answers the same
     * way whatever happens here.
     */
    async ping(req: ClientRequest, token: string): Promise<void> {
        try {
            if (!this.store.isAvailable()) return;
            if (!await this.tokens.tokenIsValid(token)) return;

            const network = this.resolveNetwork(req);
            if (!network) {
                SecurityLogger.debug('Ping ignored, client network not resolvable', { ip: req.remoteAddress });
                return;
            }

            await this.pings.recordPing(
                network.compressed,
                headerValue(req.headers, 'accept-language'),
                headerValue(req.headers, 'user-agent')
            );
        } catch (error) {
            SecurityLogger.error('Link token ping failed', { error: errorMessage(error) });
        }
    }

    /**
     * Suspicious when the store is reachable and no ping exists for this
     * network and headers. Without a store the check is disabled (false).
     * With `renew` a found ping gets its full TTL back.
     */
    async isSuspicious(network: string, headers: IncomingHttpHeaders, renew = false): Promise<boolean> {
        if (!this.store.isAvailable()) {
            return false;
        }

        const acceptLanguage = headerValue(headers, 'accept-language');
        const userAgent = headerValue(headers, 'user-agent');
        const result = await this.pings.lookup(network, acceptLanguage, userAgent, renew);

        if (result === 'unavailable') {
            return false;
        }

        const pingKey = this.pings.pingKey(network, acceptLanguage, userAgent);
        if (result === 'missing') {
            SecurityLogger.warn('Missing ping for client network', { network, pingKey });
            return true;
        }

        SecurityLogger.debug('Found ping for client network', { network, pingKey });
        return false;
    }
}

export default LinkTokenGuard;
