/**
 * Application configuration, read once from the environment at start-up.
 */

import crypto from 'crypto';
import { LogLevel, isLogLevel } from '../utils/securityLogger';

const STORE_MODES = ['redis', 'memory', 'disabled'] as const;

export type StoreMode = typeof STORE_MODES[number];

export interface RealIpConfig {
    trustProxy: boolean;
    xFor: number;           // Number of trusted proxies in front of the app
    ipv4Prefix: number;
    ipv6Prefix: number;
}

export interface AppConfig {
    port: number;
    store: StoreMode;
    redisUrl?: string;
    redisPassword?: string;
    secret: string;
    secretGenerated: boolean;   // No LINK_TOKEN_SECRET, random per-process secret
    realIp: RealIpConfig;
    logLevel: LogLevel;
}

export class ConfigError extends Error {
    constructor(public readonly variable: string, message: string) {
        super(`${variable}: ${message}`);
        this.name = 'ConfigError';
    }
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min: number, max: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;

    const value = Number(raw);
    if (!Number.isInteger(value) || value < min || value > max) {
        throw new ConfigError(name, `expected an integer between ${min} and ${max}, got "${raw}"`);
    }
    return value;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;

    switch (raw.trim().toLowerCase()) {
        case 'true':
        case '1':
        case 'yes':
            return true;
        case 'false':
        case '0':
        case 'no':
            return false;
        default:
            throw new ConfigError(name, `expected true or false, got "${raw}"`);
    }
}

function isStoreMode(value: string): value is StoreMode {
    return STORE_MODES.some(mode => mode === value);
}

function readStoreMode(env: Env): StoreMode {
    const raw = env.LINK_TOKEN_STORE?.trim();
    if (!raw) return env.REDIS_URL ? 'redis' : 'disabled';

    if (!isStoreMode(raw)) {
        throw new ConfigError('LINK_TOKEN_STORE', `expected redis, memory or disabled, got "${raw}"`);
    }
    if (raw === 'redis' && !env.REDIS_URL) {
        throw new ConfigError('REDIS_URL', 'required when LINK_TOKEN_STORE=redis');
    }
    return raw;
}

function readSecret(env: Env): string | undefined {
    const secret = env.LINK_TOKEN_SECRET;
    if (secret) return secret;

    if (env.NODE_ENV === 'production') {
        throw new ConfigError('LINK_TOKEN_SECRET', 'required in production');
    }
    return undefined;
}

function readLogLevel(env: Env): LogLevel {
    const raw = env.LOG_LEVEL?.trim().toLowerCase();
    if (!raw) return 'info';
    if (!isLogLevel(raw)) {
        throw new ConfigError('LOG_LEVEL', `expected debug, info, warn or error, got "${env.LOG_LEVEL}"`);
    }
    return raw;
}

export function loadConfig(env: Env = process.env): AppConfig {
    const secret = readSecret(env);
    return {
        port: readInt(env, 'PORT', 3000, 0, 65535),
        store: readStoreMode(env),
        redisUrl: env.REDIS_URL || undefined,
        redisPassword: env.REDIS_PASSWORD || undefined,
        secret: secret ?? crypto.randomBytes(32).toString('hex'),
        secretGenerated: secret === undefined,
        realIp: {
            trustProxy: readBool(env, 'TRUST_PROXY', false),
            xFor: readInt(env, 'REAL_IP_X_FOR', 1, 1, 32),
            ipv4Prefix: readInt(env, 'IPV4_PREFIX', 32, 0, 32),
            ipv6Prefix: readInt(env, 'IPV6_PREFIX', 48, 0, 128),
        },
        logLevel: readLogLevel(env),
    };
}
