/**
 * Create the raw, canonical and errors tables the reconcile run writes to.
 * Safe to rerun: every object is created only when missing.
 *
 * Usage:
 *   npx tsx scripts/setup-schema.ts [path/to/script.sql]
 */

import * as sql from 'mssql';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { assertValidConfig, getSqlConfig, loadConfig } from './lib/config-loader';
import { executeSQLScript } from './lib/sql-executor';
import { closePool, formatError } from './lib/error-handler';

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();
  assertValidConfig(config);

  const scriptPath = process.argv[2] ?? path.join(process.cwd(), 'sql', '00-init-schema.sql');
  console.log(`\n🔧 Setting up schema [${config.database.schema}]`);

  const pool = await new sql.ConnectionPool(getSqlConfig(config)).connect();
  try {
    const result = await executeSQLScript({ config, pool, scriptPath, debugMode: config.debugMode });
    if (!result.success) {
      throw result.error ?? new Error(`Schema setup failed: ${scriptPath}`);
    }
    console.log(
      `   ✅ ${result.batches} batch(es) executed in ${result.duration.toFixed(1)}s` +
      ` (${result.recordsAffected ?? 0} row(s) affected)`
    );
  } finally {
    await closePool(pool, { logError: message => console.error(`   ❌ ${message}`) });
  }
}

main().catch(err => {
  console.error(formatError(err));
  process.exit(1);
});
