// src/infrastructure/persistence/sqlite/ensureProductSchema.ts
import type Database from "better-sqlite3";

/**
 * Crea la tabla products si no existe. Idempotente; no hay migraciones.
 * price va como TEXT canónico ("19.99") para no perder exactitud.
 */
export function ensureProductSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS products (
      id TEXT PRIMARY KEY NOT NULL,
      name TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      price TEXT NOT NULL,
      available INTEGER NOT NULL CHECK (available IN (0, 1)),
      category TEXT NOT NULL,
      created_at TEXT,
      updated_at TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_products_name ON products(name);
    CREATE INDEX IF NOT EXISTS idx_products_category ON products(category);
  `);
}
