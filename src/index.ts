/**
 * Bitget trading core
 * Exchange transport, market data cache, order ledger, risk gate, strategies and the coordinator that runs them
 */

export * from './models';
export * from './services';
export * from './connectors';
export * from './strategies';
export * from './config';
export * from './utils';

export const APP_VERSION = '1.0.0';
export const APP_NAME = 'Bitget Trading Core';
