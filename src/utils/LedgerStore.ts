/**
 * Ledger persistence
 * Saves the ledger snapshot and last sequence so a restart resumes from known state
 */

import { createHash } from 'crypto';
import { promises as fs } from 'fs';
import * as path from 'path';
import { AuditService } from '../services/AuditService';
import { LedgerSnapshot } from '../services/OrderLedger';
import { ApplicationError, ErrorCategory, ErrorSeverity, makeContext } from './ErrorHandler';

export interface LedgerStore {
  load(): Promise<LedgerSnapshot | null>;
  save(snapshot: LedgerSnapshot): Promise<void>;
}

interface StoredLedger {
  formatVersion: number;
  checksum: string;
  snapshot: LedgerSnapshot;
}

interface SnapshotValidationRule {
  description: string;
  validator: (snapshot: LedgerSnapshot) => boolean;
}

const FORMAT_VERSION = 1;
const DATE_FIELDS = new Set(['savedAt', 'createdAt', 'updatedAt', 'timestamp']);
const ORDER_STATES = new Set(['pending', 'acknowledged', 'partially_filled', 'filled', 'cancelled', 'rejected']);

const VALIDATION_RULES: SnapshotValidationRule[] = [
  {
    description: 'collections are arrays',
    validator: snapshot =>
      Array.isArray(snapshot.orders) && Array.isArray(snapshot.positions) && Array.isArray(snapshot.balances)
  },
  {
    description: 'orders carry an id, a known state and a fill list',
    validator: snapshot =>
      snapshot.orders.every(
        order =>
          typeof order.clientOrderId === 'string' && ORDER_STATES.has(order.state) && Array.isArray(order.fills)
      )
  },
  {
    description: 'filled quantity never exceeds order quantity',
    validator: snapshot => snapshot.orders.every(order => order.filledQuantity <= order.quantity + 1e-9)
  },
  {
    description: 'balances are non-negative',
    validator: snapshot =>
      snapshot.balances.every(balance => balance.available >= 0 && balance.reserved >= 0)
  }
];

export function calculateChecksum(snapshot: LedgerSnapshot): string {
  return createHash('sha256').update(JSON.stringify(snapshot)).digest('hex');
}

export function serializeLedger(snapshot: LedgerSnapshot): string {
  const stored: StoredLedger = {
    formatVersion: FORMAT_VERSION,
    checksum: calculateChecksum(snapshot),
    snapshot
  };
  return JSON.stringify(stored, null, 2);
}

/**
 * Parses and verifies a stored ledger; throws on checksum mismatch or invalid content
 */
export function deserializeLedger(text: string): LedgerSnapshot {
  const context = makeContext('deserializeLedger', 'LedgerStore');
  const stored: StoredLedger = JSON.parse(text, (key, value) =>
    DATE_FIELDS.has(key) && typeof value === 'string' ? new Date(value) : value
  );

  if (stored.formatVersion !== FORMAT_VERSION) {
    throw new ApplicationError(
      `Unsupported ledger format ${stored.formatVersion}`,
      'LEDGER_FORMAT_UNSUPPORTED',
      ErrorCategory.SYSTEM,
      ErrorSeverity.HIGH,
      context
    );
  }

  if (calculateChecksum(stored.snapshot) !== stored.checksum) {
    throw new ApplicationError(
      'Ledger checksum mismatch',
      'LEDGER_CHECKSUM_MISMATCH',
      ErrorCategory.SYSTEM,
      ErrorSeverity.CRITICAL,
      context
    );
  }

  const failed = VALIDATION_RULES.filter(rule => !rule.validator(stored.snapshot));
  if (failed.length > 0) {
    throw new ApplicationError(
      `Ledger snapshot invalid: ${failed.map(rule => rule.description).join(', ')}`,
      'LEDGER_INVALID',
      ErrorCategory.SYSTEM,
      ErrorSeverity.CRITICAL,
      context
    );
  }

  return stored.snapshot;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * JSON file written atomically through a temporary file
 */
export class FileLedgerStore implements LedgerStore {
  private readonly filePath: string;
  private readonly auditService?: AuditService;

  constructor(filePath: string, auditService?: AuditService) {
    this.filePath = filePath;
    this.auditService = auditService;
  }

  async load(): Promise<LedgerSnapshot | null> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }

    const snapshot = deserializeLedger(text);
    this.auditService?.logEvent('LEDGER_LOADED', {
      path: this.filePath,
      orders: snapshot.orders.length,
      savedAt: snapshot.savedAt.toISOString()
    });
    return snapshot;
  }

  async save(snapshot: LedgerSnapshot): Promise<void> {
    const tempPath = `${this.filePath}.tmp`;
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(tempPath, serializeLedger(snapshot), 'utf8');
    await fs.rename(tempPath, this.filePath);
    this.auditService?.logEvent('LEDGER_SAVED', { path: this.filePath, orders: snapshot.orders.length });
  }
}

/**
 * In-process store; round-trips through the same serialization as the file store
 */
export class MemoryLedgerStore implements LedgerStore {
  private stored: string | null = null;

  async load(): Promise<LedgerSnapshot | null> {
    return this.stored === null ? null : deserializeLedger(this.stored);
  }

  async save(snapshot: LedgerSnapshot): Promise<void> {
    this.stored = serializeLedger(snapshot);
  }

  /**
   * Raw stored text (for testing purposes)
   */
  getRaw(): string | null {
    return this.stored;
  }

  setRaw(text: string | null): void {
    this.stored = text;
  }
}
