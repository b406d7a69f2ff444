import { ORDERS, PRODUCTS, TABLE_SCHEMAS, defineTable, matchesColumnType } from '../table-schemas';

describe('defineTable', () => {
  test('lower-cases column names, unique columns and the primary key', () => {
    const table = defineTable({
      name: 'customers',
      columns: [
        { name: 'CustomerId', type: 'string', nullable: false },
        { name: 'Email', type: 'string', nullable: true, unique: true },
      ],
      unique: ['CustomerId'],
      primaryKey: 'CustomerId',
    });

    expect([...table.columns.keys()]).toEqual(['customerid', 'email']);
    expect(table.unique).toEqual(['customerid']);
    expect(table.primaryKey).toBe('customerid');
    expect(table.columns.get('email')?.unique).toBe(true);
  });

  test('rejects a primary key that is not a column', () => {
    expect(() =>
      defineTable({
        name: 'broken',
        columns: [{ name: 'id', type: 'integer', nullable: false }],
        primaryKey: 'code',
      })
    ).toThrow('Primary key "code" is not a column of table broken');
  });

  test('rejects an undeclared unique column', () => {
    expect(() =>
      defineTable({
        name: 'broken',
        columns: [{ name: 'id', type: 'integer', nullable: false }],
        unique: ['code'],
        primaryKey: 'id',
      })
    ).toThrow('Unique column "code" is not a column of table broken');
  });

  test('rejects duplicate columns regardless of case', () => {
    expect(() =>
      defineTable({
        name: 'broken',
        columns: [
          { name: 'id', type: 'integer', nullable: false },
          { name: 'ID', type: 'integer', nullable: false },
        ],
        primaryKey: 'id',
      })
    ).toThrow('Duplicate column "id" in table broken');
  });

  test('descriptors are frozen', () => {
    expect(Object.isFrozen(PRODUCTS)).toBe(true);
    expect(Object.isFrozen(PRODUCTS.unique)).toBe(true);
  });
});

describe('matchesColumnType', () => {
  const column = (name: string) => {
    const found = ORDERS.columns.get(name);
    if (!found) throw new Error(`missing column ${name}`);
    return found;
  };

  test('string columns accept only strings', () => {
    expect(matchesColumnType(column('currency'), 'USD')).toBe(true);
    expect(matchesColumnType(column('currency'), 840)).toBe(false);
  });

  test('integer columns reject fractional numbers and strings', () => {
    expect(matchesColumnType(column('quantity'), 3)).toBe(true);
    expect(matchesColumnType(column('quantity'), 2.5)).toBe(false);
    expect(matchesColumnType(column('quantity'), 'ten')).toBe(false);
  });

  test('integer columns reject integral numbers read from decimal literals', () => {
    expect(matchesColumnType(column('quantity'), 10, true)).toBe(false);
    expect(matchesColumnType(column('amount'), 10, true)).toBe(true);
  });

  test('float columns accept integral and fractional numbers', () => {
    expect(matchesColumnType(column('amount'), 12)).toBe(true);
    expect(matchesColumnType(column('amount'), 12.75)).toBe(true);
    expect(matchesColumnType(column('amount'), '12.75')).toBe(false);
  });

  test('timestamp columns require the declared pattern and a real date', () => {
    expect(matchesColumnType(column('datetime'), '2024-03-01T10:15:00Z')).toBe(true);
    expect(matchesColumnType(column('datetime'), '2024-03-01 10:15:00')).toBe(false);
    expect(matchesColumnType(column('datetime'), '2024-13-45T10:15:00Z')).toBe(false);
  });

  test('timestamp columns reject calendar values that would roll over', () => {
    expect(matchesColumnType(column('datetime'), '2024-02-29T00:00:00Z')).toBe(true);
    expect(matchesColumnType(column('datetime'), '2024-02-30T10:00:00Z')).toBe(false);
    expect(matchesColumnType(column('datetime'), '2023-02-29T00:00:00Z')).toBe(false);
    expect(matchesColumnType(column('datetime'), '2024-04-31T00:00:00Z')).toBe(false);
    expect(matchesColumnType(column('datetime'), '2024-01-01T24:00:00Z')).toBe(false);
  });
});

test('products are processed before orders', () => {
  expect(TABLE_SCHEMAS.map(table => table.name)).toEqual(['products', 'orders']);
  expect(ORDERS.primaryKey).toBe('orderid');
  expect(ORDERS.columns.get('campaign')?.nullable).toBe(true);
});
