export * from './AuditEvent';
export * from './Balance';
export * from './ConnectorStatus';
export * from './ExchangeEvent';
export * from './Instrument';
export * from './MarketStats';
export * from './Order';
export * from './OrderBook';
export * from './Position';
export * from './RiskLimits';
