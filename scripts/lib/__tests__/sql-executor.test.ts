import * as fs from 'fs';
import * as path from 'path';
import { splitBatches, substituteSchemaVariables } from '../sql-executor';
import { loadConfig } from '../config-loader';

const config = loadConfig({ database: { schema: 'reporting' } }, { env: {}, configPath: path.join(__dirname, 'none.json') });

describe('sql-executor', () => {
  test('substitutes the schema placeholder everywhere', () => {
    expect(substituteSchemaVariables('SELECT * FROM [$(SCHEMA)].[errors]; -- $(SCHEMA)', config)).toBe(
      'SELECT * FROM [reporting].[errors]; -- reporting'
    );
  });

  test('splits on GO lines regardless of case and drops empty batches', () => {
    expect(splitBatches('CREATE TABLE a (x INT)\nGO\n\ngo\nCREATE TABLE b (y INT)\n  GO  \n')).toEqual([
      'CREATE TABLE a (x INT)',
      'CREATE TABLE b (y INT)',
    ]);
  });

  test('does not split on GO inside a line', () => {
    expect(splitBatches("INSERT INTO t VALUES ('GO')\nGO")).toEqual(["INSERT INTO t VALUES ('GO')"]);
  });

  test('the schema setup script creates every table in the configured schema', () => {
    const script = fs.readFileSync(path.join(__dirname, '..', '..', '..', 'sql', '00-init-schema.sql'), 'utf-8');
    const batches = splitBatches(substituteSchemaVariables(script, config));

    expect(batches).toHaveLength(7);
    expect(batches.join('\n')).not.toContain('$(SCHEMA)');
    for (const table of ['raw_products', 'raw_orders', 'products', 'orders', 'errors']) {
      expect(batches.some(batch => batch.includes(`CREATE TABLE [reporting].[${table}]`))).toBe(true);
    }
  });
});
