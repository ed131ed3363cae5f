export * from './ConfigurationManager';
