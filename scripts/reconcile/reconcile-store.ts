/**
 * Reconcile Store
 * Relational writes used by the pipeline. Every call runs in its own
 * transaction; nothing is shared across rows or between the raw archive
 * and the canonical table.
 */

import * as sql from 'mssql';
import { CellValue, ColumnDescriptor, ColumnType, Row, TableDescriptor } from './table-schemas';
import { ErrorRecord, ErrorSink } from './error-ledger';
import { runInTransaction } from '../lib/error-handler';

export interface RawRecord {
  payload: Row;
  timestamp: Date;
}

export interface ReconcileStore extends ErrorSink {
  /** Returns rows affected */
  insertRaw(rawTable: string, record: RawRecord): Promise<number>;
  /** Insert-or-overwrite keyed on descriptor.primaryKey. Returns rows affected */
  upsert(descriptor: TableDescriptor, row: Row): Promise<number>;
}

export const ERRORS_TABLE = 'errors';

export function quoteIdentifier(name: string): string {
  return `[${name.replace(/]/g, ']]')}]`;
}

export function qualifiedName(schema: string, table: string): string {
  return `${quoteIdentifier(schema)}.${quoteIdentifier(table)}`;
}

/**
 * MERGE keyed on the primary key. Parameters are named @p0..@pN in
 * descriptor column order.
 */
export function buildMergeStatement(schema: string, descriptor: TableDescriptor): string {
  const columns = [...descriptor.columns.keys()];
  const key = quoteIdentifier(descriptor.primaryKey);
  const source = columns.map((column, i) => `@p${i} AS ${quoteIdentifier(column)}`).join(', ');
  const updatable = columns.filter(column => column !== descriptor.primaryKey);
  // A key-only table still needs a matched branch so the conflict counts as a write
  const assignments = (updatable.length > 0 ? updatable : [descriptor.primaryKey])
    .map(column => `target.${quoteIdentifier(column)} = source.${quoteIdentifier(column)}`)
    .join(', ');
  const insertColumns = columns.map(quoteIdentifier).join(', ');
  const insertValues = columns.map(column => `source.${quoteIdentifier(column)}`).join(', ');

  return [
    `MERGE ${qualifiedName(schema, descriptor.name)} WITH (HOLDLOCK) AS target`,
    `USING (SELECT ${source}) AS source`,
    `ON target.${key} = source.${key}`,
    `WHEN MATCHED THEN UPDATE SET ${assignments}`,
    `WHEN NOT MATCHED THEN INSERT (${insertColumns}) VALUES (${insertValues});`,
  ].join('\n');
}

export function buildRawInsert(schema: string, rawTable: string): string {
  return `INSERT INTO ${qualifiedName(schema, rawTable)} ([payload], [timestamp]) VALUES (@payload, @timestamp)`;
}

export function buildErrorInsert(schema: string): string {
  return `INSERT INTO ${qualifiedName(schema, ERRORS_TABLE)} ([recordid], [recordtype], [errors], [timestamp]) ` +
    `VALUES (@recordid, @recordtype, @errors, @timestamp)`;
}

const SQL_TYPES: Record<ColumnType, () => sql.ISqlType> = {
  string: () => sql.NVarChar(sql.MAX),
  integer: () => sql.Int(),
  float: () => sql.Float(),
  timestamp: () => sql.DateTime2(),
};

/**
 * Convert a validated cell into the value bound to its SQL parameter
 */
export function toSqlValue(column: ColumnDescriptor, value: CellValue): string | number | Date | null {
  if (value === null) {
    return null;
  }
  if (column.type === 'timestamp') {
    return new Date(String(value));
  }
  return value;
}

export class MssqlReconcileStore implements ReconcileStore {
  constructor(
    private readonly pool: sql.ConnectionPool,
    private readonly schema: string
  ) {}

  async insertRaw(rawTable: string, record: RawRecord): Promise<number> {
    const statement = buildRawInsert(this.schema, rawTable);
    return runInTransaction(this.pool, async transaction => {
      const result = await new sql.Request(transaction)
        .input('payload', sql.NVarChar(sql.MAX), JSON.stringify(record.payload))
        .input('timestamp', sql.DateTime2(), record.timestamp)
        .query(statement);
      return result.rowsAffected[0] ?? 0;
    });
  }

  async upsert(descriptor: TableDescriptor, row: Row): Promise<number> {
    const statement = buildMergeStatement(this.schema, descriptor);
    return runInTransaction(this.pool, async transaction => {
      const request = new sql.Request(transaction);
      [...descriptor.columns.values()].forEach((column, i) => {
        request.input(`p${i}`, SQL_TYPES[column.type](), toSqlValue(column, row[column.name] ?? null));
      });
      const result = await request.query(statement);
      return result.rowsAffected[0] ?? 0;
    });
  }

  async insertErrors(records: readonly ErrorRecord[]): Promise<void> {
    const statement = buildErrorInsert(this.schema);
    await runInTransaction(this.pool, async transaction => {
      for (const record of records) {
        await new sql.Request(transaction)
          .input('recordid', sql.NVarChar(255), record.recordId)
          .input('recordtype', sql.NVarChar(255), record.recordType)
          .input('errors', sql.NVarChar(sql.MAX), record.errors)
          .input('timestamp', sql.DateTime2(), record.timestamp)
          .query(statement);
      }
    });
  }
}
