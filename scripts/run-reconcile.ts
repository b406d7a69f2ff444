/**
 * CSV Reconcile Run
 * =================
 * Loads each entity extract, validates it, archives every row to raw_<entity>,
 * upserts valid rows into <entity>, and writes all failures to the errors
 * table at the end.
 *
 * Usage:
 *   npx tsx scripts/run-reconcile.ts
 *
 * Configuration (env, .env or appsettings.json):
 *   SQLSERVER             Full connection string, or
 *   SQLSERVER_HOST / SQLSERVER_PORT / SQLSERVER_DATABASE / SQLSERVER_USER / SQLSERVER_PASSWORD
 *   RECONCILE_SCHEMA      Target schema (default: company_schema)
 *   SOURCE_DATA_DIR       Directory holding the CSV extracts (default: source-data)
 *   INPUT_PRODUCTS        Products file name (default: inventory.csv)
 *   INPUT_ORDERS          Orders file name (default: orders.csv)
 *   DEBUG_MODE            "true" for per-entity debug output
 */

import * as sql from 'mssql';
import * as dotenv from 'dotenv';
import { assertValidConfig, getSqlConfig, loadConfig, printConfig } from './lib/config-loader';
import { closePool, formatError } from './lib/error-handler';
import { ProgressReporter } from './lib/progress-reporter';
import { ErrorLedger } from './reconcile/error-ledger';
import { MssqlReconcileStore } from './reconcile/reconcile-store';
import { buildEntitySources, runReconciliation } from './reconcile/reconcile-pipeline';

dotenv.config();

async function main(): Promise<void> {
  const start = Date.now();
  const config = loadConfig();
  const reporter = new ProgressReporter(config.debugMode);
  const ledger = new ErrorLedger(reporter);
  const sources = buildEntitySources(config);
  let pool: sql.ConnectionPool | null = null;
  let errorsRecorded = 0;

  try {
    // Configuration problems are fatal before any entity is touched
    assertValidConfig(config);
    const sqlConfig = getSqlConfig(config);
    printConfig(config);

    reporter.logRunStart(config.env, config.database.schema, sources.length);
    reporter.logInfo(`Connecting to SQL Server ${sqlConfig.server}/${sqlConfig.database}...`);
    pool = await new sql.ConnectionPool(sqlConfig).connect();
    reporter.logInfo('Connected');

    const store = new MssqlReconcileStore(pool, config.database.schema);
    const summary = await runReconciliation(sources, { store, ledger, reporter });
    errorsRecorded = summary.errorsFlushed;
  } catch (error) {
    errorsRecorded = ledger.size;
    reporter.logRunFailure(error instanceof Error ? error : new Error(String(error)));
    throw error;
  } finally {
    if (pool) {
      await closePool(pool, reporter);
    }
    reporter.logRunComplete(sources.length, errorsRecorded, (Date.now() - start) / 1000);
  }
}

main().catch(err => {
  console.error(formatError(err));
  process.exit(1);
});
