/**
 * Dual-Write Reconciler
 * Archive first, then upsert, as two separate transactions. The two writes
 * are not atomic with respect to each other.
 */

import { Row, TableDescriptor } from './table-schemas';
import { ErrorLedger } from './error-ledger';
import { ReconcileStore } from './reconcile-store';
import { leadingValue } from './schema-validator';
import { describeError } from '../lib/error-handler';

export function rawTableName(descriptor: TableDescriptor): string {
  return `raw_${descriptor.name}`;
}

/**
 * Project a row onto the descriptor's columns, in descriptor order
 */
export function canonicalRow(row: Row, descriptor: TableDescriptor): Row {
  const canonical: Row = {};
  for (const name of descriptor.columns.keys()) {
    canonical[name] = row[name] ?? null;
  }
  return canonical;
}

export async function archiveRow(
  row: Row,
  rawTable: string,
  store: ReconcileStore,
  ledger: ErrorLedger,
  clock: () => Date = () => new Date()
): Promise<boolean> {
  try {
    const inserted = await store.insertRaw(rawTable, { payload: { ...row }, timestamp: clock() });
    if (inserted === 0) {
      throw new Error('No rows inserted into raw table.');
    }
    return true;
  } catch (error) {
    ledger.report(rawTable, `Error saving data to raw table ${rawTable}. Error: ${describeError(error)}`);
    return false;
  }
}

/**
 * Last write wins: a key already present gets every non-key column replaced
 */
export async function upsertRow(
  row: Row,
  descriptor: TableDescriptor,
  store: ReconcileStore,
  ledger: ErrorLedger
): Promise<boolean> {
  try {
    const affected = await store.upsert(descriptor, canonicalRow(row, descriptor));
    if (affected === 0) {
      throw new Error('Could not insert row');
    }
    return true;
  } catch (error) {
    ledger.report(descriptor.name, `Error upserting row ${leadingValue(row)}: ${describeError(error)}.`);
    return false;
  }
}
