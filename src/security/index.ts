/**
 * Security Module Exports
 */

// Shared state
export * from './tokenAuthority';
export * from './pingLedger';

// Ping handler + suspicion check
export * from './linkToken';
