export * from './ErrorHandler';
export * from './KeyedMutex';
export * from './LedgerStore';
export * from './precision';
