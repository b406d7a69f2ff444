/**
 * Error Ledger
 * Collects every failure of a run in memory, echoes it to the console as it
 * happens, and writes the whole set to the errors table once at the end.
 */

import { randomUUID } from 'crypto';
import { RunLog } from '../lib/progress-reporter';

export interface ErrorRecord {
  recordId: string;
  recordType: string;
  errors: string;
  timestamp: Date;
}

export interface ErrorSink {
  insertErrors(records: readonly ErrorRecord[]): Promise<void>;
}

export interface ErrorLedgerOptions {
  newId?: () => string;
  clock?: () => Date;
}

export class ErrorLedger {
  private records: ErrorRecord[] = [];
  private readonly newId: () => string;
  private readonly clock: () => Date;

  constructor(private readonly log: Pick<RunLog, 'logError'>, options: ErrorLedgerOptions = {}) {
    this.newId = options.newId ?? randomUUID;
    this.clock = options.clock ?? (() => new Date());
  }

  add(recordId: string, recordType: string, message: string): ErrorRecord {
    const record: ErrorRecord = {
      recordId,
      recordType,
      errors: message,
      timestamp: this.clock(),
    };
    this.log.logError(`Record: ${recordType} - id: ${recordId} - error: ${message}`);
    this.records.push(record);
    return record;
  }

  /**
   * Add a record under a freshly generated id
   */
  report(recordType: string, message: string): ErrorRecord {
    return this.add(this.newId(), recordType, message);
  }

  get size(): number {
    return this.records.length;
  }

  entries(): readonly ErrorRecord[] {
    return this.records;
  }

  /**
   * Persist all pending records in one write. A failure here propagates and
   * leaves the records pending; there is nowhere else to report it.
   */
  async flush(sink: ErrorSink): Promise<number> {
    if (this.records.length === 0) {
      return 0;
    }
    const pending = this.records;
    await sink.insertErrors(pending);
    this.records = [];
    return pending.length;
  }
}
