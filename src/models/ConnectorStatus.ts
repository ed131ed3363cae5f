/**
 * Connector status and health monitoring models
 */

export type ConnectorHealthStatus = 'healthy' | 'degraded' | 'offline';
export type StreamState = 'disconnected' | 'connecting' | 'connected' | 'reconnecting';

export interface ConnectorStatus {
  connectorId: string;
  name: string;
  status: ConnectorHealthStatus;
  lastHealthCheck: Date;
  latency: number;
  errorRate: number;
  streams: Record<string, StreamState>;
  capabilities: string[];
}
