// SQLite connection setup for inboxdb.
// One database file per data directory (<data-dir>/messages.db), opened with
// better-sqlite3. Runs idempotent schema setup from src/schema.sql on every open
// and keeps the directory and database files readable by the owner only.

import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import Database from 'better-sqlite3'

const __filename = fileURLToPath(import.meta.url)
const __dirname = path.dirname(__filename)

export const DB_FILE = 'messages.db'

/** In-memory databases (tests) skip the filesystem steps. */
export const IN_MEMORY = ':memory:'

export function dbPathFor(dataDir: string): string {
  return path.join(dataDir, DB_FILE)
}

/** Create the data directory if needed, owner-only. */
export function prepareDataDir(dataDir: string): void {
  if (!fs.existsSync(dataDir)) {
    fs.mkdirSync(dataDir, { recursive: true, mode: 0o700 })
  } else {
    fs.chmodSync(dataDir, 0o700)
  }
}

/**
 * Open (and initialize) the database at dbPath.
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== IN_MEMORY) {
    prepareDataDir(path.dirname(dbPath))
  }

  const db = new Database(dbPath)

  // WAL: readers (a SQL shell on the same file) don't block the sync writer.
  // busy_timeout: wait up to 5s for locks instead of failing instantly.
  db.pragma('journal_mode = WAL')
  db.pragma('synchronous = NORMAL')
  db.pragma('busy_timeout = 5000')

  applySchema(db)

  if (dbPath !== IN_MEMORY) {
    secureDatabase(dbPath)
  }

  return db
}

function applySchema(db: Database.Database): void {
  // From source (vitest/tsx) __dirname is src/; from dist/ the file stays at ../src/schema.sql
  let schemaPath = path.join(__dirname, 'schema.sql')
  if (!fs.existsSync(schemaPath)) {
    schemaPath = path.join(__dirname, '..', 'src', 'schema.sql')
  }

  db.exec(fs.readFileSync(schemaPath, 'utf-8'))
}

/**
 * Set restrictive permissions on database files.
 * WAL mode creates additional -wal and -shm files that also need protection.
 */
function secureDatabase(dbPath: string): void {
  for (const filePath of [dbPath, `${dbPath}-wal`, `${dbPath}-shm`]) {
    if (fs.existsSync(filePath)) {
      fs.chmodSync(filePath, 0o600)
    }
  }
}
