/**
 * @tickbase/db-simple
 *
 * Minimal database connection and migration runner for SQLite and PostgreSQL
 */

export {
  connect,
  parseConnectionString,
  toPostgresPlaceholders,
  isRetryableError,
  retryDelayMs,
  DEFAULT_RETRY_POLICY,
  type DatabaseTarget,
  type RetryPolicy,
  type DbConnection,
  type Logger,
  type ConnectOptions,
  type Row,
} from './connect.js'
export {
  runMigrations,
  getAppliedMigrations,
  loadMigrations,
  MigrationError,
  type Migration,
  type MigrateOptions,
} from './migrate.js'
