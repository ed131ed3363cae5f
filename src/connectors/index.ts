export * from './EventChannel';
export * from './ExchangeConnector';
export * from './RateLimiter';
export * from './exchanges/BitgetConnector';
export * from './exchanges/BitgetStream';
