/**
 * Reconcile Pipeline
 * ==================
 * For each entity: load → bulk validate → per row {archive → row validate →
 * upsert}. Entities and rows run strictly one after another. The error
 * ledger is flushed once, after the last entity.
 */

import * as path from 'path';
import { TABLE_SCHEMAS, TableDescriptor } from './table-schemas';
import { loadTable } from './csv-loader';
import { validateRow, validateTable } from './schema-validator';
import { archiveRow, rawTableName, upsertRow } from './dual-write';
import { ErrorLedger } from './error-ledger';
import { ReconcileStore } from './reconcile-store';
import { EntityStats, ProgressReporter } from '../lib/progress-reporter';
import { ReconcileConfig } from '../lib/config-loader';

export interface EntitySource {
  descriptor: TableDescriptor;
  filePath: string;
}

export interface ReconcileContext {
  store: ReconcileStore;
  ledger: ErrorLedger;
  reporter: ProgressReporter;
  clock?: () => Date;
}

export interface RunSummary {
  entities: EntityStats[];
  errorsFlushed: number;
  durationSeconds: number;
}

export const NO_DATA_MESSAGE = 'No data found in CSV file.';

/**
 * Pair each table with its input file. Tables without a configured file
 * read <table>.csv from the source directory.
 */
export function buildEntitySources(
  config: ReconcileConfig,
  descriptors: readonly TableDescriptor[] = TABLE_SCHEMAS
): EntitySource[] {
  const files: Record<string, string> = config.inputFiles;
  return descriptors.map(descriptor => ({
    descriptor,
    filePath: path.join(config.sourceDir, files[descriptor.name] ?? `${descriptor.name}.csv`),
  }));
}

export async function reconcileEntity(source: EntitySource, context: ReconcileContext): Promise<EntityStats> {
  const { descriptor, filePath } = source;
  const { store, ledger, reporter } = context;
  const stats: EntityStats = {
    entity: descriptor.name,
    rowsLoaded: 0,
    archived: 0,
    upserted: 0,
    rejected: 0,
    writeFailures: 0,
  };

  reporter.logInfo(`Reading CSV file: ${filePath}`);
  const dataset = loadTable(filePath, ledger);
  if (dataset.rows.length === 0) {
    ledger.report(descriptor.name, NO_DATA_MESSAGE);
    return stats;
  }
  stats.rowsLoaded = dataset.rows.length;

  reporter.logInfo(`Validating schema for ${descriptor.name}`);
  const report = validateTable(dataset, descriptor, ledger);
  if (!report.valid) {
    reporter.logWarning(
      `${descriptor.name}: ${report.failures.length} schema check(s) failed; continuing with row validation`
    );
  }

  const rawTable = rawTableName(descriptor);
  for (const row of dataset.rows) {
    if (await archiveRow(row, rawTable, store, ledger, context.clock)) {
      stats.archived++;
    } else {
      stats.writeFailures++;
    }

    if (!validateRow(row, descriptor, ledger)) {
      stats.rejected++;
      continue;
    }

    if (await upsertRow(row, descriptor, store, ledger)) {
      stats.upserted++;
    } else {
      stats.writeFailures++;
    }
  }

  reporter.logDebug(`${descriptor.name}: ${JSON.stringify(stats)}`);
  return stats;
}

/**
 * Process every entity in order, then flush the ledger. Only a flush failure
 * escapes; everything before it is recorded in the ledger.
 */
export async function runReconciliation(sources: EntitySource[], context: ReconcileContext): Promise<RunSummary> {
  const start = Date.now();
  const entities: EntityStats[] = [];

  for (let i = 0; i < sources.length; i++) {
    const source = sources[i];
    const entityStart = Date.now();
    context.reporter.logEntity(source.descriptor.name, i + 1, sources.length, source.filePath);
    const stats = await reconcileEntity(source, context);
    context.reporter.logEntityComplete(stats, (Date.now() - entityStart) / 1000);
    entities.push(stats);
  }

  context.reporter.logInfo('Saving errors to database');
  const errorsFlushed = await context.ledger.flush(context.store);

  return {
    entities,
    errorsFlushed,
    durationSeconds: (Date.now() - start) / 1000,
  };
}
