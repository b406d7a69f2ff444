/**
 * Schema Validator
 * ================
 * validateTable checks whole columns and reports one aggregated error per
 * table. It is advisory: rows still go through validateRow, which is the
 * only gate in front of the canonical upsert.
 */

import { CellValue, ColumnDescriptor, Row, TableDescriptor, matchesColumnType } from './table-schemas';
import { Dataset, isDecimalLiteral } from './csv-loader';
import { ErrorLedger } from './error-ledger';

export type SchemaCheck = 'column_present' | 'dtype' | 'not_nullable' | 'pattern' | 'unique' | 'unique_combination';

export interface SchemaFailure {
  column: string;
  check: SchemaCheck;
  failureCases: CellValue[];
}

export interface TableValidationReport {
  table: string;
  valid: boolean;
  failures: SchemaFailure[];
}

export type FieldViolation = [column: string, value: CellValue];

const MAX_FAILURE_CASES = 10;

function formatCell(value: CellValue): string {
  return JSON.stringify(value);
}

export function formatFailure(failure: SchemaFailure): string {
  const cases = failure.failureCases.slice(0, MAX_FAILURE_CASES).map(formatCell);
  if (failure.failureCases.length > MAX_FAILURE_CASES) {
    cases.push(`... ${failure.failureCases.length - MAX_FAILURE_CASES} more`);
  }
  return `${failure.column} ${failure.check} failed for values [${cases.join(', ')}]`;
}

/**
 * Values that occur more than once, each listed once in first-seen order
 */
function duplicates<T>(values: T[], keyOf: (value: T) => string): T[] {
  const seen = new Set<string>();
  const reported = new Set<string>();
  const repeated: T[] = [];
  for (const value of values) {
    const key = keyOf(value);
    if (seen.has(key) && !reported.has(key)) {
      reported.add(key);
      repeated.push(value);
    }
    seen.add(key);
  }
  return repeated;
}

function cellMatches(column: ColumnDescriptor, row: Row, value: CellValue): boolean {
  return matchesColumnType(column, value, isDecimalLiteral(row, column.name));
}

function checkColumn(column: ColumnDescriptor, rows: Row[]): SchemaFailure[] {
  const failures: SchemaFailure[] = [];
  const values = rows.map(row => row[column.name] ?? null);
  const present = values.filter((value): value is string | number => value !== null);

  if (!column.nullable && present.length < values.length) {
    failures.push({ column: column.name, check: 'not_nullable', failureCases: [null] });
  }

  const wrongType = rows.flatMap(row => {
    const value = row[column.name] ?? null;
    return value !== null && !cellMatches(column, row, value) ? [value] : [];
  });
  if (wrongType.length > 0) {
    failures.push({ column: column.name, check: 'dtype', failureCases: wrongType });
  }

  const { pattern } = column;
  if (pattern) {
    const mismatched = present.filter(value => !pattern.test(String(value)));
    if (mismatched.length > 0) {
      failures.push({ column: column.name, check: 'pattern', failureCases: mismatched });
    }
  }

  if (column.unique) {
    const repeated = duplicates(present, value => JSON.stringify(value));
    if (repeated.length > 0) {
      failures.push({ column: column.name, check: 'unique', failureCases: repeated });
    }
  }

  return failures;
}

function checkUniqueCombination(dataset: Dataset, columns: readonly string[]): SchemaFailure | null {
  const keys = dataset.rows.map(row => columns.map(column => row[column] ?? null));
  const repeated = duplicates(keys, key => JSON.stringify(key));
  if (repeated.length === 0) {
    return null;
  }
  return {
    column: columns.join('+'),
    check: 'unique_combination',
    failureCases: repeated.map(key => (key.length === 1 ? key[0] : JSON.stringify(key))),
  };
}

/**
 * Check every column of the dataset against the descriptor. All failures are
 * recorded as a single error tagged with the table name.
 */
export function validateTable(dataset: Dataset, descriptor: TableDescriptor, ledger: ErrorLedger): TableValidationReport {
  const failures: SchemaFailure[] = [];
  const loaded = new Set(dataset.columns);

  for (const column of descriptor.columns.values()) {
    if (!loaded.has(column.name)) {
      failures.push({ column: column.name, check: 'column_present', failureCases: [] });
      continue;
    }
    failures.push(...checkColumn(column, dataset.rows));
  }

  if (descriptor.unique.length > 0 && descriptor.unique.every(column => loaded.has(column))) {
    const failure = checkUniqueCombination(dataset, descriptor.unique);
    if (failure) {
      failures.push(failure);
    }
  }

  if (failures.length > 0) {
    ledger.report(
      descriptor.name,
      `Error validating schema for ${descriptor.name}: ${failures.map(formatFailure).join('; ')}`
    );
  }

  return { table: descriptor.name, valid: failures.length === 0, failures };
}

/**
 * Leading value of a row, used to identify it in error messages
 */
export function leadingValue(row: Row): string {
  const values = Object.values(row);
  return values.length === 0 ? '<empty row>' : String(values[0]);
}

export function rowViolations(row: Row, descriptor: TableDescriptor): FieldViolation[] {
  const violations: FieldViolation[] = [];
  for (const column of descriptor.columns.values()) {
    const value = row[column.name] ?? null;
    if (value === null && column.nullable) {
      continue;
    }
    if (value !== null && cellMatches(column, row, value)) {
      continue;
    }
    violations.push([column.name, value]);
  }
  return violations;
}

/**
 * Gate a single row before the canonical upsert. Records one error listing
 * every offending column when the row is invalid.
 */
export function validateRow(row: Row, descriptor: TableDescriptor, ledger: ErrorLedger): boolean {
  const violations = rowViolations(row, descriptor);
  if (violations.length === 0) {
    return true;
  }
  const fields = violations.map(([column, value]) => `${column}=${formatCell(value)}`).join(', ');
  ledger.report(descriptor.name, `Invalid fields for columns in row ${leadingValue(row)}: ${fields}`);
  return false;
}
