/**
 * Progress Reporter for the Reconcile Run
 * Provides formatted console output for tracking entity and row progress
 */

export interface EntityStats {
  entity: string;
  rowsLoaded: number;
  archived: number;
  upserted: number;
  rejected: number;
  writeFailures: number;
}

export interface RunLog {
  logInfo(message: string): void;
  logWarning(message: string): void;
  logError(message: string): void;
}

export class ProgressReporter implements RunLog {
  private startTime: Date | null = null;
  private currentEntity: string | null = null;

  constructor(private readonly debugMode: boolean = false) {}

  /**
   * Log the start of a reconcile run
   */
  logRunStart(env: string, schema: string, totalEntities: number): void {
    this.startTime = new Date();
    console.log('\n╔════════════════════════════════════════════════════════════════╗');
    console.log(`║  CSV Reconcile Run Started                                     ║`);
    console.log('╚════════════════════════════════════════════════════════════════╝');
    console.log(`  Environment: ${env}`);
    console.log(`  Schema:      ${schema}`);
    console.log(`  Entities:    ${totalEntities}`);
    console.log(`  Started:     ${this.startTime.toISOString()}`);
    console.log('');
  }

  /**
   * Log the start of an entity
   */
  logEntity(entity: string, index: number, total: number, filePath: string): void {
    this.currentEntity = entity;
    console.log('');
    console.log('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━');
    console.log(`📦 Entity ${index}/${total}: ${entity}`);
    console.log(`    File: ${filePath}`);
    console.log('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━');
  }

  logEntityComplete(stats: EntityStats, duration: number): void {
    const marker = stats.rejected + stats.writeFailures > 0 ? '⚠️ ' : '✅';
    console.log(`    ${marker} ${stats.entity} completed in ${this.formatDuration(duration)}`);
    console.log(
      `       Loaded: ${this.formatNumber(stats.rowsLoaded)}` +
      ` | Archived: ${this.formatNumber(stats.archived)}` +
      ` | Upserted: ${this.formatNumber(stats.upserted)}` +
      ` | Rejected: ${this.formatNumber(stats.rejected)}` +
      ` | Write failures: ${this.formatNumber(stats.writeFailures)}`
    );
    console.log('');
    this.currentEntity = null;
  }

  /**
   * Log run completion. Called whether or not the run succeeded.
   */
  logRunComplete(totalEntities: number, errorsRecorded: number, totalDuration: number): void {
    console.log('\n╔════════════════════════════════════════════════════════════════╗');
    console.log(`║  CSV Reconcile Run Finished                                    ║`);
    console.log('╚════════════════════════════════════════════════════════════════╝');
    console.log(`  Entities:        ${totalEntities}`);
    console.log(`  Errors recorded: ${this.formatNumber(errorsRecorded)}`);
    console.log(`  Total Duration:  ${this.formatDuration(totalDuration)}`);
    if (this.startTime) {
      console.log(`  Started:         ${this.startTime.toISOString()}`);
      console.log(`  Completed:       ${new Date().toISOString()}`);
    }
    console.log('');
  }

  logRunFailure(error: Error): void {
    console.log('\n╔════════════════════════════════════════════════════════════════╗');
    console.log(`║  CSV Reconcile Run FAILED                                      ║`);
    console.log('╚════════════════════════════════════════════════════════════════╝');
    console.log(`  Error: ${error.message}`);
    if (this.currentEntity) {
      console.log(`  While processing: ${this.currentEntity}`);
    }
    console.log('');
  }

  logInfo(message: string): void {
    console.log(`[${new Date().toISOString()}]    ℹ️  ${message}`);
  }

  logWarning(message: string): void {
    console.warn(`[${new Date().toISOString()}]    ⚠️  ${message}`);
  }

  logError(message: string): void {
    console.error(`[${new Date().toISOString()}]    ❌ ${message}`);
  }

  /**
   * Log debug message (only if debug mode enabled)
   */
  logDebug(message: string): void {
    if (this.debugMode) {
      console.log(`[${new Date().toISOString()}]    🐛 DEBUG: ${message}`);
    }
  }

  private formatNumber(num: number): string {
    return num.toLocaleString('en-US');
  }

  /**
   * Format duration in human-readable format
   */
  formatDuration(seconds: number): string {
    if (seconds < 60) {
      return `${seconds.toFixed(1)}s`;
    } else if (seconds < 3600) {
      const minutes = Math.floor(seconds / 60);
      const secs = seconds % 60;
      return `${minutes}m ${secs.toFixed(0)}s`;
    } else {
      const hours = Math.floor(seconds / 3600);
      const minutes = Math.floor((seconds % 3600) / 60);
      return `${hours}h ${minutes}m`;
    }
  }
}
