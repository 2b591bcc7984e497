/**
 * Security Logging Service
 *
 * Centralized logging for link-token events with structured format.
 * Outputs to console (stdout/stderr) which should be captured by logging aggregator (Datadog/CloudWatch etc.)
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface SecurityEventData {
    ip?: string;
    network?: string;
    pingKey?: string;
    path?: string;
    method?: string;
    error?: string;
    [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
    return value in LEVEL_ORDER;
}

export class SecurityLogger {
    private static threshold: LogLevel = 'info';

    /**
     * Set the lowest level that is written
     */
    static setLevel(level: LogLevel): void {
        this.threshold = level;
    }

    /**
     * Log a diagnostic event (token checks, ping lookups)
     */
    static debug(message: string, data: SecurityEventData = {}): void {
        this.log('debug', message, data);
    }

    /**
     * Log a security info event (lifecycle, audit trail)
     */
    static info(message: string, data: SecurityEventData = {}): void {
        this.log('info', message, data);
    }

    /**
     * Log a security warning (suspicious but handled)
     */
    static warn(message: string, data: SecurityEventData = {}): void {
        this.log('warn', message, data);
    }

    /**
     * Log a security error (store failure or misconfiguration)
     */
    static error(message: string, data: SecurityEventData = {}): void {
        this.log('error', message, data);
    }

    private static log(level: LogLevel, message: string, data: SecurityEventData): void {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.threshold]) return;

        const logEntry = {
            timestamp: new Date().toISOString(),
            level: level.toUpperCase(),
            type: 'SECURITY_EVENT',
            message,
            ...data,
        };

        if (level === 'error') {
            console.error(JSON.stringify(logEntry));
        } else if (level === 'warn') {
            console.warn(JSON.stringify(logEntry));
        } else if (level === 'debug') {
            console.debug(JSON.stringify(logEntry));
        } else {
            console.log(JSON.stringify(logEntry));
        }
    }
}

/**
 * Normalize an unknown thrown value into a log-friendly message
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export default SecurityLogger;
