import { fileURLToPath } from 'node:url'
import { runMigrations, type DbConnection, type MigrateOptions } from '@tickbase/db-simple'

/**
 * Directory holding the schema migrations for a database type.
 */
export function migrationsDir(dbType: DbConnection['dbType']): string {
  return fileURLToPath(new URL(`../migrations/${dbType}`, import.meta.url))
}

/**
 * Creates or upgrades the instruments, prices and indicators tables.
 *
 * @returns Names of the migrations applied by this call
 */
export async function migratePriceStore(db: DbConnection, options: MigrateOptions = {}): Promise<string[]> {
  return runMigrations(migrationsDir(db.dbType), db, options)
}
