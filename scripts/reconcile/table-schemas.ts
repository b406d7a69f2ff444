/**
 * Table Descriptors
 * =================
 * Column and table declarations consumed by the validator and the reconciler.
 * Descriptors are frozen once built; nothing in a run mutates them.
 */

export type CellValue = string | number | null;

/** A loaded CSV row, keyed by lower-cased column name in header order */
export type Row = Record<string, CellValue>;

interface ColumnBase {
  name: string;
  nullable: boolean;
  unique?: boolean;
  pattern?: RegExp;
}

export interface StringColumn extends ColumnBase {
  type: 'string';
}

export interface IntegerColumn extends ColumnBase {
  type: 'integer';
}

export interface FloatColumn extends ColumnBase {
  type: 'float';
}

export interface TimestampColumn extends ColumnBase {
  type: 'timestamp';
  pattern: RegExp;
}

export type ColumnDescriptor = StringColumn | IntegerColumn | FloatColumn | TimestampColumn;

export type ColumnType = ColumnDescriptor['type'];

export interface TableDescriptor {
  readonly name: string;
  readonly columns: ReadonlyMap<string, ColumnDescriptor>;
  /** Columns whose combined values must be unique across the dataset */
  readonly unique: readonly string[];
  readonly primaryKey: string;
}

export interface TableDefinition {
  name: string;
  columns: ColumnDescriptor[];
  unique?: string[];
  primaryKey: string;
}

export const ISO_UTC_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/;

/**
 * True when the value names a real UTC instant: Date.parse rolls impossible
 * calendar values (Feb 30, hour 24) into the next period, so the parsed
 * instant must print back as the same text.
 */
function isCalendarTimestamp(value: string): boolean {
  const time = Date.parse(value);
  if (Number.isNaN(time)) {
    return false;
  }
  const printed = new Date(time).toISOString();
  return printed === value || printed.replace('.000Z', 'Z') === value;
}

/**
 * Runtime type check for a non-null cell against the column's variant.
 * A number the loader read from a decimal literal (`10.0`, `1e3`) is a float
 * even when integral; float columns accept both kinds of literal.
 */
export function matchesColumnType(column: ColumnDescriptor, value: CellValue, decimalLiteral = false): boolean {
  switch (column.type) {
    case 'string':
      return typeof value === 'string';
    case 'integer':
      return typeof value === 'number' && !decimalLiteral && Number.isInteger(value);
    case 'float':
      return typeof value === 'number' && Number.isFinite(value);
    case 'timestamp':
      return typeof value === 'string' && column.pattern.test(value) && isCalendarTimestamp(value);
  }
}

/**
 * Build a frozen table descriptor. Column names are lower-cased so that
 * CSV headers match case-insensitively.
 */
export function defineTable(definition: TableDefinition): TableDescriptor {
  const columns = new Map<string, ColumnDescriptor>();
  for (const column of definition.columns) {
    const name = column.name.toLowerCase();
    if (columns.has(name)) {
      throw new Error(`Duplicate column "${name}" in table ${definition.name}`);
    }
    columns.set(name, Object.freeze({ ...column, name }));
  }

  const primaryKey = definition.primaryKey.toLowerCase();
  if (!columns.has(primaryKey)) {
    throw new Error(`Primary key "${primaryKey}" is not a column of table ${definition.name}`);
  }

  const unique = (definition.unique ?? []).map(name => name.toLowerCase());
  for (const name of unique) {
    if (!columns.has(name)) {
      throw new Error(`Unique column "${name}" is not a column of table ${definition.name}`);
    }
  }

  return Object.freeze({
    name: definition.name,
    columns,
    unique: Object.freeze(unique),
    primaryKey,
  });
}

export const PRODUCTS = defineTable({
  name: 'products',
  columns: [
    { name: 'productid', type: 'string', nullable: false },
    { name: 'name', type: 'string', nullable: false },
    { name: 'quantity', type: 'integer', nullable: false },
    { name: 'category', type: 'string', nullable: false },
    { name: 'subcategory', type: 'string', nullable: false },
  ],
  unique: ['productid'],
  primaryKey: 'productid',
});

export const ORDERS = defineTable({
  name: 'orders',
  columns: [
    { name: 'orderid', type: 'string', nullable: false },
    { name: 'productid', type: 'string', nullable: false },
    { name: 'currency', type: 'string', nullable: false },
    { name: 'quantity', type: 'integer', nullable: false },
    { name: 'shippingcost', type: 'float', nullable: false },
    { name: 'amount', type: 'float', nullable: false },
    { name: 'channel', type: 'string', nullable: false },
    { name: 'channelgroup', type: 'string', nullable: false },
    { name: 'campaign', type: 'string', nullable: true },
    { name: 'datetime', type: 'timestamp', nullable: false, pattern: ISO_UTC_TIMESTAMP },
  ],
  unique: ['orderid'],
  primaryKey: 'orderid',
});

/** Declaration order is processing order: orders reference products */
export const TABLE_SCHEMAS: readonly TableDescriptor[] = [PRODUCTS, ORDERS];
