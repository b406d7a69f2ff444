import * as fs from 'fs';
import * as path from 'path';
import * as sql from 'mssql';
import { ConfigError } from './error-handler';

export interface ReconcileConfig {
  env: string;
  database: {
    connectionString: string;
    schema: string;       // 'company_schema'
  };
  sourceDir: string;      // 'source-data'
  inputFiles: {
    products: string;     // 'inventory.csv'
    orders: string;       // 'orders.csv'
  };
  debugMode: boolean;
}

export type ConfigOverrides = {
  env?: string;
  database?: Partial<ReconcileConfig['database']>;
  sourceDir?: string;
  inputFiles?: Partial<ReconcileConfig['inputFiles']>;
  debugMode?: boolean;
};

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  configPath?: string;
}

/**
 * Parse a SQL Server connection string into mssql config
 * Format: Server=...;Database=...;User Id=...;Password=...;TrustServerCertificate=...;Encrypt=...;
 */
export function parseConnectionString(connStr: string): Partial<sql.config> {
  const parts: Record<string, string> = {};
  connStr.split(';').forEach(part => {
    const [key, ...valueParts] = part.split('=');
    if (key && valueParts.length > 0) {
      parts[key.trim().toLowerCase()] = valueParts.join('=').trim();
    }
  });

  const rawServer = parts['server'] || parts['data source'];
  // "host,port" is the SQL Server convention for a non-default port
  const [server, port] = rawServer ? rawServer.replace(/^tcp:/i, '').split(',') : [undefined, undefined];

  return {
    server,
    port: port ? parseInt(port, 10) : undefined,
    database: parts['database'] || parts['initial catalog'],
    user: parts['user id'] || parts['uid'] || parts['user'],
    password: parts['password'] || parts['pwd'],
    options: {
      encrypt: parts['encrypt']?.toLowerCase() !== 'false',
      trustServerCertificate: parts['trustservercertificate']?.toLowerCase() === 'true',
    }
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringAt(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

function readConfigFile(configPath: string): ConfigOverrides {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    console.warn(`⚠️  Warning: Failed to parse ${path.basename(configPath)}: ${error}`);
    return {};
  }
  if (!isRecord(parsed)) {
    return {};
  }

  const database = isRecord(parsed.database) ? parsed.database : {};
  const inputFiles = isRecord(parsed.inputFiles) ? parsed.inputFiles : {};
  return {
    env: stringAt(parsed, 'env'),
    database: {
      connectionString: stringAt(database, 'connectionString'),
      schema: stringAt(database, 'schema'),
    },
    sourceDir: stringAt(parsed, 'sourceDir'),
    inputFiles: {
      products: stringAt(inputFiles, 'products'),
      orders: stringAt(inputFiles, 'orders'),
    },
    debugMode: typeof parsed.debugMode === 'boolean' ? parsed.debugMode : undefined,
  };
}

/**
 * Load configuration from appsettings.json and environment variables
 *
 * Priority:
 * 1. Overrides (passed as parameter)
 * 2. Environment variables
 * 3. appsettings.json
 * 4. Default values
 */
export function loadConfig(overrides?: ConfigOverrides, options: LoadConfigOptions = {}): ReconcileConfig {
  const env = options.env ?? process.env;
  const fileConfig = readConfigFile(options.configPath ?? path.join(process.cwd(), 'appsettings.json'));

  // Build connection string from individual variables when SQLSERVER is not set
  let connectionString = env.SQLSERVER || '';

  if (!connectionString && (env.SQLSERVER_HOST || env.SQLSERVER_DATABASE)) {
    const server = env.SQLSERVER_HOST;
    const port = env.SQLSERVER_PORT;
    const database = env.SQLSERVER_DATABASE;
    const user = env.SQLSERVER_USER;
    const password = env.SQLSERVER_PASSWORD;

    if (server && database && user && password) {
      const host = port ? `${server},${port}` : server;
      connectionString = `Server=${host};Database=${database};User Id=${user};Password=${password};TrustServerCertificate=True;Encrypt=True;`;
    }
  }

  const config: ReconcileConfig = {
    env: env.ENV || fileConfig.env || 'development',
    database: {
      connectionString: connectionString || fileConfig.database?.connectionString || '',
      schema: env.RECONCILE_SCHEMA || fileConfig.database?.schema || 'company_schema',
    },
    sourceDir: env.SOURCE_DATA_DIR || fileConfig.sourceDir || 'source-data',
    inputFiles: {
      products: env.INPUT_PRODUCTS || fileConfig.inputFiles?.products || 'inventory.csv',
      orders: env.INPUT_ORDERS || fileConfig.inputFiles?.orders || 'orders.csv',
    },
    debugMode: env.DEBUG_MODE === 'true' || fileConfig.debugMode || false,
  };

  if (overrides) {
    config.env = overrides.env ?? config.env;
    config.database.connectionString = overrides.database?.connectionString ?? config.database.connectionString;
    config.database.schema = overrides.database?.schema ?? config.database.schema;
    config.sourceDir = overrides.sourceDir ?? config.sourceDir;
    config.inputFiles.products = overrides.inputFiles?.products ?? config.inputFiles.products;
    config.inputFiles.orders = overrides.inputFiles?.orders ?? config.inputFiles.orders;
    config.debugMode = overrides.debugMode ?? config.debugMode;
  }

  return config;
}

/**
 * Convert config to mssql config
 */
export function getSqlConfig(config: ReconcileConfig): sql.config {
  if (!config.database.connectionString) {
    throw new ConfigError(['Database connection string is required']);
  }

  const parsed = parseConnectionString(config.database.connectionString);

  if (!parsed.server || !parsed.database || !parsed.user || !parsed.password) {
    throw new ConfigError([
      'Invalid connection string. Expected format: Server=...;Database=...;User Id=...;Password=...;TrustServerCertificate=True;Encrypt=True;'
    ]);
  }

  return {
    server: parsed.server,
    port: parsed.port,
    database: parsed.database,
    user: parsed.user,
    password: parsed.password,
    options: {
      encrypt: parsed.options?.encrypt ?? true,
      trustServerCertificate: parsed.options?.trustServerCertificate ?? true,
    },
    requestTimeout: 300000,
    connectionTimeout: 30000,
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: ReconcileConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!config.database.connectionString) {
    errors.push('Database connection string is required (set SQLSERVER or SQLSERVER_HOST/DATABASE/USER/PASSWORD)');
  }
  if (!config.database.schema) errors.push('Schema name is required');
  if (!config.sourceDir) errors.push('Source data directory is required');
  if (!config.inputFiles.products) errors.push('Products input file is required');
  if (!config.inputFiles.orders) errors.push('Orders input file is required');

  return {
    valid: errors.length === 0,
    errors
  };
}

export function assertValidConfig(config: ReconcileConfig): void {
  const { valid, errors } = validateConfig(config);
  if (!valid) {
    throw new ConfigError(errors);
  }
}

export function maskConnectionString(connectionString: string): string {
  return connectionString.replace(/(Password|Pwd)=[^;]+/gi, '$1=***');
}

/**
 * Print configuration (masks sensitive data)
 */
export function printConfig(config: ReconcileConfig): void {
  const masked: ReconcileConfig = {
    ...config,
    database: {
      ...config.database,
      connectionString: maskConnectionString(config.database.connectionString),
    },
  };

  console.log('\n📋 Reconcile Configuration:');
  console.log('════════════════════════════════════════════════════════════════');
  console.log(JSON.stringify(masked, null, 2));
  console.log('════════════════════════════════════════════════════════════════\n');
}
