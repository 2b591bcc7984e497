import { Server } from 'http';
import { describe, expect, it, vi, beforeEach, afterEach } from 'vitest';

import { applyLogging, createApp, createStore, escapeHtml, renderPage } from '../src/server';
import { LinkTokenGuard } from '../src/security/linkToken';
import { FALLBACK_TOKEN } from '../src/security/tokenAuthority';
import { AppConfig } from '../src/config/settings';
import { KeyValueStore } from '../src/types/store';
import { MemoryStore } from '../src/utils/memoryStore';
import { SecurityLogger } from '../src/utils/securityLogger';
import { UnreachableStore, tokenSequence } from './helpers/stores';

const TOKEN = 'abc123def456ghi7';
const BROWSER_HEADERS = {
    'accept-language': 'en-US',
    'user-agent': 'TestBot/1.0',
};

// The test server listens on 127.0.0.1 and proxies are not trusted
const CLIENT_NETWORK = '127.0.0.1/32';

function makeGuard(store: KeyValueStore): LinkTokenGuard {
    return new LinkTokenGuard(store, {
        secret: 'test-secret',
        realIp: { trustProxy: false, xFor: 1, ipv4Prefix: 32, ipv6Prefix: 48 },
        generateToken: tokenSequence(TOKEN),
    });
}

let server: Server | undefined;

async function serve(guard: LinkTokenGuard, storeMode: AppConfig['store'] = 'memory'): Promise<string> {
    const app = createApp(guard, storeMode);
    const listening = app.listen(0, '127.0.0.1');
    server = listening;
    await new Promise<void>((resolve) => listening.once('listening', () => resolve()));
    const address = listening.address();
    if (!address || typeof address === 'string') {
        throw new Error('test server has no TCP address');
    }
    return `http://127.0.0.1:${address.port}`;
}

describe('HTTP routes', () => {
    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(async () => {
        const running = server;
        server = undefined;
        if (!running) return;
        running.closeAllConnections();
        await new Promise<void>((resolve, reject) => running.close((err) => (err ? reject(err) : resolve())));
    });

    it('embeds the current token as a stylesheet link', async () => {
        const base = await serve(makeGuard(new MemoryStore()));

        const res = await fetch(`${base}/`, { headers: BROWSER_HEADERS });

        expect(res.status).toBe(200);
        expect(await res.text()).toContain(`<link rel="stylesheet" href="/client${TOKEN}.css" type="text/css">`);
    });

    it('answers the stylesheet with an empty CSS body and records a ping', async () => {
        const guard = makeGuard(new MemoryStore());
        const base = await serve(guard);
        expect(await guard.isSuspicious(CLIENT_NETWORK, BROWSER_HEADERS)).toBe(true);

        const res = await fetch(`${base}/client${TOKEN}.css`, { headers: BROWSER_HEADERS });

        expect(res.status).toBe(200);
        expect(res.headers.get('content-type')).toBe('text/css; charset=utf-8');
        expect(res.headers.get('cache-control')).toBe('no-store');
        expect(await res.text()).toBe('');
        expect(await guard.isSuspicious(CLIENT_NETWORK, BROWSER_HEADERS)).toBe(false);
    });

    it('accepts POST to the stylesheet', async () => {
        const guard = makeGuard(new MemoryStore());
        const base = await serve(guard);
        await guard.getToken();

        const res = await fetch(`${base}/client${TOKEN}.css`, { method: 'POST', headers: BROWSER_HEADERS });

        expect(res.status).toBe(200);
        expect(await res.text()).toBe('');
        expect(await guard.isSuspicious(CLIENT_NETWORK, BROWSER_HEADERS)).toBe(false);
    });

    it('answers an invalid token exactly like a valid one', async () => {
        const guard = makeGuard(new MemoryStore());
        const base = await serve(guard);

        const res = await fetch(`${base}/clientwrongtoken0000.css`, { headers: BROWSER_HEADERS });

        expect(res.status).toBe(200);
        expect(res.headers.get('content-type')).toBe('text/css; charset=utf-8');
        expect(await res.text()).toBe('');
        expect(await guard.isSuspicious(CLIENT_NETWORK, BROWSER_HEADERS)).toBe(true);
    });

    it('keeps serving pages and stylesheets without a store', async () => {
        const store = new UnreachableStore();
        const base = await serve(makeGuard(store), 'disabled');

        const page = await fetch(`${base}/`, { headers: BROWSER_HEADERS });
        expect(await page.text()).toContain(`href="/client${FALLBACK_TOKEN}.css"`);

        const css = await fetch(`${base}/client${FALLBACK_TOKEN}.css`, { headers: BROWSER_HEADERS });
        expect(css.status).toBe(200);
        expect(await css.text()).toBe('');
        expect(store.calls).toEqual([]);
    });

    it('reports store health', async () => {
        const base = await serve(makeGuard(new UnreachableStore()), 'redis');

        const res = await fetch(`${base}/healthz`);

        expect(res.status).toBe(200);
        expect(await res.json()).toEqual({ status: 'ok', store: 'redis', storeAvailable: false });
    });
});

describe('renderPage', () => {
    it('escapes the stylesheet URL', () => {
        expect(escapeHtml('/client"<x>&.css')).toBe('/client&quot;&lt;x&gt;&amp;.css');
        expect(renderPage('/clientabc.css')).toContain('<link rel="stylesheet" href="/clientabc.css" type="text/css">');
    });
});

describe('createStore', () => {
    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    const base: AppConfig = {
        port: 0,
        store: 'disabled',
        secret: 'test-secret',
        secretGenerated: false,
        realIp: { trustProxy: false, xFor: 1, ipv4Prefix: 32, ipv6Prefix: 48 },
        logLevel: 'info',
    };

    it('builds an in-memory store', () => {
        const { store, redis } = createStore({ ...base, store: 'memory' });
        expect(store).toBeInstanceOf(MemoryStore);
        expect(store.isAvailable()).toBe(true);
        expect(redis).toBeUndefined();
    });

    it('builds a store that is never available when disabled', async () => {
        const { store } = createStore(base);
        expect(store.isAvailable()).toBe(false);
        expect(await store.get('link_token.token')).toBeNull();
    });
});

describe('applyLogging', () => {
    const config: AppConfig = {
        port: 0,
        store: 'disabled',
        secret: 'generated',
        secretGenerated: true,
        realIp: { trustProxy: false, xFor: 1, ipv4Prefix: 32, ipv6Prefix: 48 },
        logLevel: 'info',
    };

    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        SecurityLogger.setLevel('info');
    });

    it('keeps the generated-secret warning under LOG_LEVEL=error', () => {
        applyLogging({ ...config, logLevel: 'error' });
        expect(console.warn).not.toHaveBeenCalled();
    });

    it('warns about a generated secret at the default level', () => {
        applyLogging(config);

        expect(console.warn).toHaveBeenCalledTimes(1);
        const entry = JSON.parse(String(vi.mocked(console.warn).mock.calls[0][0]));
        expect(entry.message).toBe('LINK_TOKEN_SECRET not set, using a random per-process secret');
    });

    it('says nothing when the secret was configured', () => {
        applyLogging({ ...config, secretGenerated: false });
        expect(console.warn).not.toHaveBeenCalled();
    });
});
