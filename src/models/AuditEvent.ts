/**
 * Audit event and logging models
 */

export type AuditLevel = 'info' | 'warn' | 'error';

export interface AuditEvent {
  eventId: string;
  timestamp: Date;
  eventType: string;
  level: AuditLevel;
  instrument?: string;
  venueId?: string;
  details: Record<string, unknown>;
  signature: string;
}
