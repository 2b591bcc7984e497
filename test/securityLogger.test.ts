import { describe, expect, it, vi, afterEach } from 'vitest';

import { SecurityLogger } from '../src/utils/securityLogger';

describe('SecurityLogger', () => {
    afterEach(() => {
        SecurityLogger.setLevel('info');
    });

    it('writes one JSON line per event to the matching stream', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

        SecurityLogger.warn('Missing ping for client network', { network: '203.0.113.0/24' });

        expect(warn).toHaveBeenCalledTimes(1);
        const entry = JSON.parse(String(warn.mock.calls[0][0]));
        expect(entry).toMatchObject({
            level: 'WARN',
            type: 'SECURITY_EVENT',
            message: 'Missing ping for client network',
            network: '203.0.113.0/24',
        });
        expect(typeof entry.timestamp).toBe('string');
    });

    it('drops events below the configured level', () => {
        const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

        SecurityLogger.debug('hidden');
        expect(debug).not.toHaveBeenCalled();

        SecurityLogger.setLevel('debug');
        SecurityLogger.debug('shown');
        expect(debug).toHaveBeenCalledTimes(1);

        SecurityLogger.setLevel('error');
        SecurityLogger.info('hidden too');
        expect(log).not.toHaveBeenCalled();
    });
});
