import { createHmac, randomBytes } from 'crypto';
import { AuditEvent, AuditLevel } from '../models/AuditEvent';

export interface AuditServiceOptions {
  signingKey?: Buffer;
  /** Oldest events are dropped beyond this count */
  maxEvents?: number;
  /** Sink for operator-facing lines */
  console?: Pick<Console, 'log' | 'warn' | 'error'>;
}

export interface AuditEventOptions {
  level?: AuditLevel;
  instrument?: string;
  venueId?: string;
}

const REDACTED = '[REDACTED]';
const SENSITIVE_FRAGMENTS = ['apikey', 'secret', 'passphrase', 'password', 'privatekey', 'credential', 'token'];
const SENSITIVE_KEYS = new Set(['sign', 'access-sign', 'key']);

/**
 * Audit Service provides tamper-evident logging capabilities
 * with cryptographic signatures and structured event recording
 */
export class AuditService {
  private auditLog: AuditEvent[] = [];
  private readonly signingKey: Buffer;
  private readonly maxEvents: number;
  private readonly output: Pick<Console, 'log' | 'warn' | 'error'>;

  constructor(options: AuditServiceOptions = {}) {
    // Use provided key or generate a new one for this session
    this.signingKey = options.signingKey ?? randomBytes(32);
    this.maxEvents = options.maxEvents ?? 10000;
    this.output = options.console ?? console;
  }

  /**
   * Records a structured event with a tamper-evident signature
   */
  logEvent(eventType: string, details: Record<string, unknown>, options: AuditEventOptions = {}): string {
    const eventId = this.generateEventId();
    const unsigned: Omit<AuditEvent, 'signature'> = {
      eventId,
      timestamp: new Date(),
      eventType,
      level: options.level ?? 'info',
      instrument: options.instrument,
      venueId: options.venueId,
      details: this.redactSensitiveData(details)
    };

    this.auditLog.push({ ...unsigned, signature: this.generateSignature(unsigned) });
    if (this.auditLog.length > this.maxEvents) {
      this.auditLog.splice(0, this.auditLog.length - this.maxEvents);
    }
    return eventId;
  }

  /**
   * Logs an order submission together with its outcome
   */
  logTradeExecution(
    orderDetails: Record<string, unknown>,
    executionResult: Record<string, unknown>,
    instrument?: string,
    venueId?: string
  ): string {
    return this.logEvent(
      'TRADE_EXECUTION',
      { orderDetails, executionResult },
      { instrument, venueId }
    );
  }

  /**
   * Prints a line for the operator and records it
   */
  notifyOperator(level: AuditLevel, message: string, details: Record<string, unknown> = {}): string {
    const line = `[${new Date().toISOString()}] ${message}`;
    if (level === 'error') {
      this.output.error(line);
    } else if (level === 'warn') {
      this.output.warn(line);
    } else {
      this.output.log(line);
    }
    return this.logEvent('OPERATOR_NOTICE', { message, ...details }, { level });
  }

  /**
   * Exports audit log with sensitive data filtering
   */
  exportAuditLog(startDate?: Date, endDate?: Date): AuditEvent[] {
    return this.auditLog
      .filter(event => {
        if (startDate && event.timestamp < startDate) return false;
        if (endDate && event.timestamp > endDate) return false;
        return true;
      })
      .map(event => ({ ...event, details: this.redactSensitiveData(event.details) }));
  }

  /**
   * Verifies the integrity of audit log entries
   */
  verifyLogIntegrity(): boolean {
    return this.auditLog.every(event => {
      const { signature, ...unsigned } = event;
      return signature === this.generateSignature(unsigned);
    });
  }

  getEventsByType(eventType: string): AuditEvent[] {
    return this.auditLog.filter(event => event.eventType === eventType);
  }

  /**
   * Gets all audit events (for testing purposes)
   */
  getAllEvents(): AuditEvent[] {
    return [...this.auditLog];
  }

  /**
   * Clears audit log (for testing purposes only)
   */
  clearLog(): void {
    this.auditLog = [];
  }

  getSigningKey(): Buffer {
    return this.signingKey;
  }

  private generateEventId(): string {
    return randomBytes(16).toString('hex');
  }

  private generateSignature(event: Omit<AuditEvent, 'signature'>): string {
    const signingData = stableStringify({
      eventId: event.eventId,
      timestamp: event.timestamp.toISOString(),
      eventType: event.eventType,
      level: event.level,
      instrument: event.instrument ?? null,
      venueId: event.venueId ?? null,
      details: event.details
    });
    return createHmac('sha256', this.signingKey).update(signingData).digest('hex');
  }

  private redactSensitiveData(data: Record<string, unknown>): Record<string, unknown> {
    const redacted: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      const lowerKey = key.toLowerCase();
      if (SENSITIVE_KEYS.has(lowerKey) || SENSITIVE_FRAGMENTS.some(fragment => lowerKey.includes(fragment))) {
        redacted[key] = REDACTED;
      } else if (isPlainObject(value)) {
        redacted[key] = this.redactSensitiveData(value);
      } else if (Array.isArray(value)) {
        redacted[key] = value.map(item => (isPlainObject(item) ? this.redactSensitiveData(item) : item));
      } else {
        redacted[key] = value;
      }
    }

    return redacted;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * JSON with object keys sorted at every depth
 */
function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(item => stableStringify(item)).join(',')}]`;
  }
  if (isPlainObject(value)) {
    const keys = Object.keys(value).sort();
    return `{${keys.map(key => `${JSON.stringify(key)}:${stableStringify(value[key])}`).join(',')}}`;
  }
  if (value instanceof Date) {
    return JSON.stringify(value.toISOString());
  }
  return JSON.stringify(value) ?? 'null';
}
