export * from './Strategy';
export * from './AdvisorStrategy';
export * from './HoldStrategy';
