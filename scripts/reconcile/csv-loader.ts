/**
 * CSV Loader
 * Reads one extract into memory with lower-cased headers and per-cell types.
 * A file that cannot be read or parsed is reported and yields no rows.
 */

import * as fs from 'fs';
import { parse } from 'csv-parse/sync';
import { CellValue, Row } from './table-schemas';
import { ErrorLedger } from './error-ledger';

export interface Dataset {
  columns: string[];
  rows: Row[];
}

const INTEGER_LITERAL = /^[+-]?\d+$/;
const DECIMAL_LITERAL = /^[+-]?(\d+\.\d*|\.\d+|\d+(\.\d*)?[eE][+-]?\d+)$/;

/** Columns of each loaded row whose number was written as a decimal literal */
const decimalLiterals = new WeakMap<Row, ReadonlySet<string>>();

export function emptyDataset(): Dataset {
  return { columns: [], rows: [] };
}

export function normalizeHeader(header: string): string {
  return header.replace(/^\uFEFF/, '').trim().toLowerCase();
}

/**
 * Infer the runtime type of a raw cell. Surrounding whitespace is dropped:
 * blank is null, numeric literals become numbers, everything else stays a
 * string.
 */
export function inferCell(raw: string): CellValue {
  const value = raw.trim();
  if (value === '') {
    return null;
  }
  if (INTEGER_LITERAL.test(value)) {
    const parsed = Number(value);
    return Number.isSafeInteger(parsed) ? parsed : value;
  }
  if (DECIMAL_LITERAL.test(value)) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : value;
  }
  return value;
}

/**
 * Whether the loader read this row's column from a decimal literal
 */
export function isDecimalLiteral(row: Row, column: string): boolean {
  return decimalLiterals.get(row)?.has(column) ?? false;
}

function isStringRecord(value: unknown): value is Record<string, string | undefined> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseCsv(content: string): Dataset {
  let columns: string[] = [];
  const parsed: unknown = parse(content, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count_less: true,
    columns: (header: string[]) => {
      columns = header.map(normalizeHeader);
      return columns;
    },
  });

  const records = Array.isArray(parsed) ? parsed : [];
  const rows = records.filter(isStringRecord).map(record => {
    const row: Row = {};
    const decimals = new Set<string>();
    for (const column of columns) {
      const raw = record[column];
      if (typeof raw !== 'string') {
        row[column] = null;
        continue;
      }
      const value = inferCell(raw);
      if (typeof value === 'number' && DECIMAL_LITERAL.test(raw.trim())) {
        decimals.add(column);
      }
      row[column] = value;
    }
    if (decimals.size > 0) {
      decimalLiterals.set(row, decimals);
    }
    return row;
  });

  return { columns, rows };
}

export function loadTable(filePath: string, ledger: ErrorLedger): Dataset {
  try {
    const content = fs.readFileSync(filePath, 'utf-8');
    return parseCsv(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    ledger.report(filePath, `Error reading CSV file: ${filePath}. Error: ${message}`);
    return emptyDataset();
  }
}
