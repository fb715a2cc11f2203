/**
 * Auto-migration: applies pending SQL migrations on startup.
 *
 * Migrations are `NNN_name.up.sql` files applied in version order, each in
 * its own transaction, and recorded in `schema_migrations`.
 */

import { readdir, readFile } from "node:fs/promises"
import { join } from "node:path"
import { fileURLToPath } from "node:url"

import type pg from "pg"

const __dirname = fileURLToPath(new URL(".", import.meta.url))
export const MIGRATIONS_DIR = join(__dirname, "../../migrations")

export interface MigrationFile {
  version: number
  name: string
  filename: string
}

export interface MigrationOptions {
  migrationsDir?: string
  log?: (message: string) => void
}

/** Pending `.up.sql` files, sorted by version. */
export function pendingMigrations(files: string[], applied: ReadonlySet<number>): MigrationFile[] {
  const pending: MigrationFile[] = []
  for (const file of files) {
    const match = /^(\d+)_(.+)\.up\.sql$/.exec(file)
    const [, versionText, name] = match ?? []
    if (versionText === undefined || name === undefined) continue
    const version = parseInt(versionText, 10)
    if (applied.has(version)) continue
    pending.push({ version, name, filename: file })
  }
  return pending.sort((a, b) => a.version - b.version)
}

export async function runMigrations(pool: pg.Pool, options: MigrationOptions = {}): Promise<number> {
  const migrationsDir = options.migrationsDir ?? MIGRATIONS_DIR
  const log = options.log ?? ((message: string) => console.log(`[auto-migrate] ${message}`))
  const client = await pool.connect()

  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
      )
    `)

    const applied = await client.query<{ version: number }>(
      "SELECT version FROM schema_migrations ORDER BY version",
    )
    const upMigrations = pendingMigrations(
      await readdir(migrationsDir),
      new Set(applied.rows.map((r) => r.version)),
    )

    if (upMigrations.length === 0) {
      log("No pending migrations.")
      return 0
    }

    for (const migration of upMigrations) {
      const sql = await readFile(join(migrationsDir, migration.filename), "utf-8")
      log(`Applying ${String(migration.version)}_${migration.name}...`)

      await client.query("BEGIN")
      try {
        await client.query(sql)
        await client.query("INSERT INTO schema_migrations (version, name) VALUES ($1, $2)", [
          migration.version,
          migration.name,
        ])
        await client.query("COMMIT")
      } catch (err) {
        await client.query("ROLLBACK")
        throw err
      }
    }

    log(`Applied ${String(upMigrations.length)} migration(s).`)
    return upMigrations.length
  } finally {
    client.release()
  }
}
