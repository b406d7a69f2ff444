import * as sql from 'mssql';
import * as fs from 'fs';
import * as path from 'path';
import { ReconcileConfig } from './config-loader';

export interface SQLExecutionOptions {
  config: ReconcileConfig;
  pool: sql.ConnectionPool;
  scriptPath: string;
  debugMode?: boolean;
}

export interface SQLExecutionResult {
  success: boolean;
  batches: number;
  recordsAffected?: number;
  duration: number;
  error?: Error;
}

/**
 * Substitute schema variable placeholders with the configured schema name
 */
export function substituteSchemaVariables(script: string, config: ReconcileConfig): string {
  return script.replace(/\$\(SCHEMA\)/g, config.database.schema);
}

/**
 * Split SQL by GO batch separator (SQL Server requirement)
 */
export function splitBatches(script: string): string[] {
  return script
    .split(/^\s*GO\s*$/gim)
    .map(batch => batch.trim())
    .filter(batch => batch.length > 0);
}

/**
 * Execute SQL script with schema variable substitution
 * Replaces $(SCHEMA) with the schema name from config
 */
export async function executeSQLScript(options: SQLExecutionOptions): Promise<SQLExecutionResult> {
  const startTime = Date.now();
  let batches: string[] = [];

  try {
    const scriptContent = fs.readFileSync(options.scriptPath, 'utf-8');
    const processedSQL = substituteSchemaVariables(scriptContent, options.config);
    batches = splitBatches(processedSQL);

    if (options.debugMode) {
      console.log('\n🐛 DEBUG: Processed SQL (first 500 chars):');
      console.log(processedSQL.substring(0, 500) + '...\n');
    }

    console.log(`   ⚡ Executing ${batches.length} SQL batch(es) from ${path.basename(options.scriptPath)}...`);
    let totalRowsAffected = 0;

    for (const batch of batches) {
      const result = await options.pool.request().query(batch);
      if (result.rowsAffected?.[0]) {
        totalRowsAffected += result.rowsAffected[0];
      }
    }

    return {
      success: true,
      batches: batches.length,
      recordsAffected: totalRowsAffected,
      duration: (Date.now() - startTime) / 1000,
    };
  } catch (error) {
    return {
      success: false,
      batches: batches.length,
      duration: (Date.now() - startTime) / 1000,
      error: error instanceof Error ? error : new Error(String(error)),
    };
  }
}
