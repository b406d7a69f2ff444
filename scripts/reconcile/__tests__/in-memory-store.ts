/**
 * In-process stand-in for the SQL Server store. Canonical tables are maps
 * keyed on the primary key so upserts behave like MERGE.
 */

import { Row, TableDescriptor } from '../table-schemas';
import { ErrorRecord } from '../error-ledger';
import { RawRecord, ReconcileStore } from '../reconcile-store';

export class InMemoryReconcileStore implements ReconcileStore {
  readonly rawAttempts: { table: string; record: RawRecord }[] = [];
  readonly raw = new Map<string, RawRecord[]>();
  readonly tables = new Map<string, Map<string, Row>>();
  readonly upsertAttempts: { table: string; row: Row }[] = [];
  readonly errors: ErrorRecord[] = [];
  errorFlushes = 0;

  /** Replace to simulate failures: throw, or return 0 rows affected */
  rawResult: (table: string, record: RawRecord) => number = () => 1;
  upsertResult: (table: string, row: Row) => number = () => 1;
  errorsResult: (records: readonly ErrorRecord[]) => void = () => undefined;

  async insertRaw(rawTable: string, record: RawRecord): Promise<number> {
    this.rawAttempts.push({ table: rawTable, record });
    const affected = this.rawResult(rawTable, record);
    if (affected > 0) {
      const existing = this.raw.get(rawTable) ?? [];
      existing.push(record);
      this.raw.set(rawTable, existing);
    }
    return affected;
  }

  async upsert(descriptor: TableDescriptor, row: Row): Promise<number> {
    this.upsertAttempts.push({ table: descriptor.name, row });
    const affected = this.upsertResult(descriptor.name, row);
    if (affected > 0) {
      const table = this.tables.get(descriptor.name) ?? new Map<string, Row>();
      table.set(String(row[descriptor.primaryKey]), { ...row });
      this.tables.set(descriptor.name, table);
    }
    return affected;
  }

  async insertErrors(records: readonly ErrorRecord[]): Promise<void> {
    this.errorsResult(records);
    this.errorFlushes++;
    this.errors.push(...records);
  }

  rawCount(table: string): number {
    return this.raw.get(table)?.length ?? 0;
  }

  canonical(table: string, key: string): Row | undefined {
    return this.tables.get(table)?.get(key);
  }

  snapshot(table: string): Record<string, Row> {
    return Object.fromEntries(this.tables.get(table) ?? new Map<string, Row>());
  }
}
