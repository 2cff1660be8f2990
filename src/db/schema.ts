import Database from 'better-sqlite3'
import { mkdirSync } from 'fs'
import { dirname } from 'path'
import { InfrastructureError } from '../utils/errors'
import { logger } from '../utils/logger'

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS users (
    tg_id INTEGER PRIMARY KEY,
    first_name TEXT,
    last_name TEXT,
    username TEXT,
    phone TEXT,
    created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    updated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
  );

  CREATE TABLE IF NOT EXISTS orders (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    public_no TEXT UNIQUE NOT NULL,
    owner_tg_id INTEGER,
    owner_phone TEXT,
    item TEXT NOT NULL,
    services_json TEXT NOT NULL DEFAULT '[]',
    status TEXT NOT NULL,
    price INTEGER,
    comment TEXT,
    is_closed INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    updated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
  );

  CREATE INDEX IF NOT EXISTS idx_orders_owner_tg ON orders(owner_tg_id);
  CREATE INDEX IF NOT EXISTS idx_orders_public_no ON orders(public_no);
`

const MEMORY_PATH = ':memory:'

/**
 * DATABASE_URL -> путь к файлу SQLite.
 * Поддерживаются `sqlite:<path>`, `sqlite://<path>`, `file:<path>`, обычный путь и `:memory:`.
 */
export function resolveDatabasePath(databaseUrl: string): string {
  const trimmed = databaseUrl.trim()
  const match = /^(?:sqlite|file):(?:\/\/)?(.*)$/i.exec(trimmed)
  if (!match) {
    // Чужая схема (postgres://, mysql://): в сообщение попадает только схема, без учётных данных
    const foreignScheme = /^([a-z][a-z0-9+.-]*):\/\//i.exec(trimmed)
    if (foreignScheme) {
      throw new InfrastructureError(
        `DATABASE_URL scheme "${foreignScheme[1]}" is not supported, expected sqlite: or file:`,
      )
    }
  }
  const path = match ? match[1] : trimmed
  if (!path) {
    throw new InfrastructureError(`DATABASE_URL does not name a database file: ${trimmed}`)
  }
  return path
}

export function applySchema(db: Database.Database): void {
  db.exec(SCHEMA_SQL)
}

/**
 * Открывает базу по DATABASE_URL и идемпотентно создаёт таблицы users и orders.
 * Соединение живёт весь процесс: закрывается при остановке сервера.
 */
export function initDatabase(databaseUrl: string): Database.Database {
  const path = resolveDatabasePath(databaseUrl)

  let db: Database.Database
  try {
    if (path !== MEMORY_PATH) {
      mkdirSync(dirname(path), { recursive: true })
    }
    db = new Database(path)
  } catch (error) {
    throw new InfrastructureError(`Failed to open database at ${path}`, { cause: error })
  }

  try {
    // WAL: читатели не блокируют писателя
    if (path !== MEMORY_PATH) {
      db.pragma('journal_mode = WAL')
    }
    db.pragma('busy_timeout = 5000')
    applySchema(db)
  } catch (error) {
    db.close()
    throw new InfrastructureError('Failed to apply database schema', { cause: error })
  }

  logger.info('База данных инициализирована', { path })

  return db
}
