import { ORDERS, PRODUCTS, defineTable } from '../table-schemas';
import {
  buildErrorInsert,
  buildMergeStatement,
  buildRawInsert,
  qualifiedName,
  quoteIdentifier,
  toSqlValue,
} from '../reconcile-store';

describe('SQL statements', () => {
  test('identifiers are bracket-quoted with closing brackets escaped', () => {
    expect(quoteIdentifier('products')).toBe('[products]');
    expect(quoteIdentifier('odd]name')).toBe('[odd]]name]');
    expect(qualifiedName('company_schema', 'errors')).toBe('[company_schema].[errors]');
  });

  test('upsert merges on the primary key and overwrites every other column', () => {
    expect(buildMergeStatement('company_schema', PRODUCTS)).toBe(
      [
        'MERGE [company_schema].[products] WITH (HOLDLOCK) AS target',
        'USING (SELECT @p0 AS [productid], @p1 AS [name], @p2 AS [quantity], @p3 AS [category], @p4 AS [subcategory]) AS source',
        'ON target.[productid] = source.[productid]',
        'WHEN MATCHED THEN UPDATE SET target.[name] = source.[name], target.[quantity] = source.[quantity], ' +
          'target.[category] = source.[category], target.[subcategory] = source.[subcategory]',
        'WHEN NOT MATCHED THEN INSERT ([productid], [name], [quantity], [category], [subcategory]) ' +
          'VALUES (source.[productid], source.[name], source.[quantity], source.[category], source.[subcategory]);',
      ].join('\n')
    );
  });

  test('a key-only table still has a matched branch', () => {
    const tags = defineTable({
      name: 'tags',
      columns: [{ name: 'tag', type: 'string', nullable: false }],
      primaryKey: 'tag',
    });

    expect(buildMergeStatement('s', tags).split('\n')[3]).toBe(
      'WHEN MATCHED THEN UPDATE SET target.[tag] = source.[tag]'
    );
  });

  test('raw and error inserts target the configured schema', () => {
    expect(buildRawInsert('company_schema', 'raw_orders')).toBe(
      'INSERT INTO [company_schema].[raw_orders] ([payload], [timestamp]) VALUES (@payload, @timestamp)'
    );
    expect(buildErrorInsert('company_schema')).toBe(
      'INSERT INTO [company_schema].[errors] ([recordid], [recordtype], [errors], [timestamp]) ' +
      'VALUES (@recordid, @recordtype, @errors, @timestamp)'
    );
  });
});

describe('toSqlValue', () => {
  const column = (name: string) => {
    const found = ORDERS.columns.get(name);
    if (!found) throw new Error(`missing column ${name}`);
    return found;
  };

  test('timestamps are bound as dates', () => {
    expect(toSqlValue(column('datetime'), '2024-03-01T10:15:00Z')).toEqual(new Date('2024-03-01T10:15:00Z'));
  });

  test('other values pass through unchanged', () => {
    expect(toSqlValue(column('amount'), 19.5)).toBe(19.5);
    expect(toSqlValue(column('currency'), 'USD')).toBe('USD');
    expect(toSqlValue(column('campaign'), null)).toBeNull();
  });
});
