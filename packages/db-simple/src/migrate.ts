/**
 * Simple file-based migration runner
 *
 * Every `*.sql` file of a directory is applied once, in file name order. Each
 * file runs in its own transaction together with its `_migrations` row, so a
 * failing file leaves neither its changes nor a record behind.
 */

import { readdir, readFile, stat } from 'node:fs/promises'
import * as path from 'node:path'
import type { DbConnection, Logger } from './connect.js'

const noopLogger: Logger = {
  info: () => {},
  error: () => {},
}

export interface Migration {
  name: string
  sql: string
}

export interface MigrateOptions {
  logger?: Logger
}

/**
 * Raised when a migration file fails to apply. Files before it stay applied.
 */
export class MigrationError extends Error {
  constructor(
    readonly migration: string,
    cause: unknown
  ) {
    super(`Migration ${migration} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause })
    this.name = 'MigrationError'
  }
}

const CREATE_MIGRATIONS_TABLE = {
  sqlite: `CREATE TABLE IF NOT EXISTS _migrations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE,
    applied_at TEXT DEFAULT (datetime('now'))
  )`,
  postgres: `CREATE TABLE IF NOT EXISTS _migrations (
    id BIGSERIAL PRIMARY KEY,
    name TEXT NOT NULL UNIQUE,
    applied_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP
  )`,
} as const

/**
 * Names of applied migrations, in the order they were applied
 */
export async function getAppliedMigrations(db: DbConnection): Promise<string[]> {
  await db.exec(CREATE_MIGRATIONS_TABLE[db.dbType])
  const rows = await db.query('SELECT name FROM _migrations ORDER BY id')
  return rows.map((row) => String(row['name']))
}

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await stat(dir)).isDirectory()
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return false
    throw error
  }
}

/**
 * Reads the `*.sql` files of a directory, sorted by name
 */
export async function loadMigrations(migrationsDir: string): Promise<Migration[]> {
  if (!(await isDirectory(migrationsDir))) {
    throw new Error(`Migrations directory not found: ${migrationsDir}`)
  }

  const files = (await readdir(migrationsDir)).filter((file) => file.endsWith('.sql')).sort()
  if (files.length === 0) {
    throw new Error(`No .sql migration files found in: ${migrationsDir}`)
  }

  const migrations: Migration[] = []
  for (const name of files) {
    const sql = await readFile(path.join(migrationsDir, name), 'utf-8')
    if (sql.trim().length === 0) {
      throw new Error(`Migration file is empty: ${name}`)
    }
    migrations.push({ name, sql })
  }
  return migrations
}

/**
 * Run pending migrations from a directory
 *
 * @returns Names of the migrations applied by this call
 * @throws {MigrationError} For the first file that fails
 *
 * @example
 * const db = await connect('sqlite::memory:')
 * await runMigrations('./migrations/sqlite', db)
 */
export async function runMigrations(
  migrationsDir: string,
  db: DbConnection,
  options: MigrateOptions = {}
): Promise<string[]> {
  const logger = options.logger ?? noopLogger

  const applied = new Set(await getAppliedMigrations(db))
  const pending = (await loadMigrations(migrationsDir)).filter((m) => !applied.has(m.name))

  for (const migration of pending) {
    try {
      await db.transaction(async (tx) => {
        await tx.exec(migration.sql)
        await tx.exec('INSERT INTO _migrations (name) VALUES (?)', [migration.name])
      })
    } catch (error) {
      logger.error('Migration failed', { name: migration.name, error: String(error) })
      throw new MigrationError(migration.name, error)
    }
    logger.info('Migration applied', { name: migration.name })
  }

  logger.info(pending.length === 0 ? 'No pending migrations' : 'Migrations applied', {
    dir: migrationsDir,
    applied: pending.length,
  })
  return pending.map((m) => m.name)
}
