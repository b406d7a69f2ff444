/**
 * Error Handler for the Reconcile Run
 * Classifies database errors and wraps single-statement transactions.
 * Nothing here retries: every failure is reported once.
 */

import * as sql from 'mssql';
import { RunLog } from './progress-reporter';

export interface ErrorClassification {
  category: 'connection' | 'timeout' | 'deadlock' | 'constraint' | 'syntax' | 'unknown';
  message: string;
  suggestion: string;
}

/**
 * Raised for missing or invalid startup configuration
 */
export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
  }
}

interface ErrorDetails {
  message: string;
  code?: string | number;
  number?: number;
  lineNumber?: number;
  procName?: string;
  stack?: string;
}

function field(error: object, key: string): unknown {
  return key in error ? Reflect.get(error, key) : undefined;
}

function numberField(error: object, key: string): number | undefined {
  const value = field(error, key);
  return typeof value === 'number' ? value : undefined;
}

function errorDetails(error: unknown): ErrorDetails {
  if (typeof error !== 'object' || error === null) {
    return { message: String(error) };
  }
  const code = field(error, 'code');
  const procName = field(error, 'procName');
  return {
    message: error instanceof Error ? error.message : String(error),
    code: typeof code === 'string' || typeof code === 'number' ? code : undefined,
    number: numberField(error, 'number'),
    lineNumber: numberField(error, 'lineNumber'),
    procName: typeof procName === 'string' ? procName : undefined,
    stack: error instanceof Error ? error.stack : undefined,
  };
}

/**
 * Classify an error by SQL Server error number or Node error code
 */
export function classifyError(error: unknown): ErrorClassification {
  const { message, code, number } = errorDetails(error);
  const sqlNumber = number ?? code;

  // SQL Server connection errors
  if (
    code === 'ECONNRESET' ||
    code === 'ECONNCLOSED' ||
    code === 'ENOTFOUND' ||
    code === 'ECONNREFUSED' ||
    code === 'ESOCKET' ||
    message.includes('Connection lost') ||
    message.includes('socket hang up')
  ) {
    return {
      category: 'connection',
      message: 'Database connection error',
      suggestion: 'Check server reachability and credentials',
    };
  }

  if (
    sqlNumber === -2 ||
    code === 'ETIMEOUT' ||
    code === 'ETIMEDOUT' ||
    message.toLowerCase().includes('timeout')
  ) {
    return {
      category: 'timeout',
      message: 'Query timeout',
      suggestion: 'Consider increasing requestTimeout',
    };
  }

  if (sqlNumber === 1205 || message.includes('deadlock')) {
    return {
      category: 'deadlock',
      message: 'Transaction deadlock detected',
      suggestion: 'Another writer holds the row; rerun the entity',
    };
  }

  if (
    sqlNumber === 515 || // Cannot insert NULL
    sqlNumber === 547 || // Foreign key constraint
    sqlNumber === 2627 || // Unique constraint
    sqlNumber === 2601 || // Duplicate key
    message.includes('FOREIGN KEY constraint') ||
    message.includes('PRIMARY KEY constraint') ||
    message.includes('UNIQUE constraint')
  ) {
    return {
      category: 'constraint',
      message: 'Database constraint violation',
      suggestion: 'Check data integrity and fix source data',
    };
  }

  if (
    sqlNumber === 102 || // Syntax error
    sqlNumber === 156 || // Incorrect syntax
    sqlNumber === 207 || // Invalid column name
    sqlNumber === 208 || // Invalid object name
    message.includes('Incorrect syntax') ||
    message.includes('Invalid object name') ||
    message.includes('Invalid column name')
  ) {
    return {
      category: 'syntax',
      message: 'SQL syntax or schema error',
      suggestion: 'Verify the target tables exist with the expected columns',
    };
  }

  return {
    category: 'unknown',
    message,
    suggestion: 'Review error details and logs',
  };
}

/**
 * One-line description used in error records: "[category] message"
 */
export function describeError(error: unknown): string {
  const { message } = errorDetails(error);
  const { category } = classifyError(error);
  return `[${category}] ${message}`;
}

/**
 * Run fn inside its own transaction. Rolls back and rethrows on failure.
 */
export async function runInTransaction<T>(
  pool: sql.ConnectionPool,
  fn: (transaction: sql.Transaction) => Promise<T>
): Promise<T> {
  const transaction = pool.transaction();
  await transaction.begin();

  try {
    const result = await fn(transaction);
    await transaction.commit();
    return result;
  } catch (error) {
    try {
      await transaction.rollback();
    } catch (rollbackError) {
      console.error('  ⚠️  Failed to rollback transaction:', describeError(rollbackError));
    }
    throw error;
  }
}

/**
 * Close the pool from a finally block. A close failure is logged, not thrown,
 * so it never replaces the error already propagating.
 */
export async function closePool(
  pool: Pick<sql.ConnectionPool, 'close'>,
  log: Pick<RunLog, 'logError'>
): Promise<void> {
  try {
    await pool.close();
  } catch (error) {
    log.logError(`Failed to close connection pool: ${describeError(error)}`);
  }
}

/**
 * Format error for logging
 */
export function formatError(error: unknown): string {
  const details = errorDetails(error);
  const classification = classifyError(error);

  let formatted = `\n╔════════════════════════════════════════════════════════════════╗\n`;
  formatted += `║  ERROR DETAILS                                                 ║\n`;
  formatted += `╚════════════════════════════════════════════════════════════════╝\n`;
  formatted += `  Category:    ${classification.category}\n`;
  if (classification.category !== 'unknown') {
    formatted += `  Problem:     ${classification.message}\n`;
  }
  formatted += `  Message:     ${details.message}\n`;
  formatted += `  Suggestion:  ${classification.suggestion}\n`;

  if (error instanceof ConfigError) {
    for (const problem of error.problems) {
      formatted += `    - ${problem}\n`;
    }
  }

  if (details.code !== undefined) {
    formatted += `  Error Code:  ${details.code}\n`;
  }

  if (details.number !== undefined) {
    formatted += `  SQL Number:  ${details.number}\n`;
  }

  if (details.lineNumber !== undefined) {
    formatted += `  Line:        ${details.lineNumber}\n`;
  }

  if (details.procName) {
    formatted += `  Procedure:   ${details.procName}\n`;
  }

  formatted += `\n  Stack Trace:\n`;
  formatted += `  ${(details.stack || '').split('\n').join('\n  ')}\n`;

  return formatted;
}
