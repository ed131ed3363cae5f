export * from './AdvisorClient';
export * from './AuditService';
export * from './ExecutionCoordinator';
export * from './MarketDataCache';
export * from './OrderLedger';
export * from './RiskGate';
export * from './TradingSession';
