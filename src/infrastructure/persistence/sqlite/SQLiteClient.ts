// src/infrastructure/persistence/sqlite/SQLiteClient.ts
import Database from "better-sqlite3";
import type { AppLogger } from "../../../config/logger";
import { ensureProductSchema } from "./ensureProductSchema";

export type SqlParam = string | number | bigint | Buffer | null;

/**
 * Contexto de persistencia explícito: se abre con init() y se cierra con close().
 * Nada de singletons de módulo; cada unidad de trabajo (o test) tiene el suyo.
 */
export class SQLiteClient {
  private _db: Database.Database | null = null;

  constructor(
    readonly location: string,
    private readonly logger?: AppLogger
  ) {}

  /** Abre la DB una sola vez y garantiza el esquema. */
  init(): this {
    if (this._db) return this;
    const db = new Database(this.location);
    try {
      if (this.location !== ":memory:") {
        db.pragma("journal_mode = WAL");
      }
      ensureProductSchema(db);
    } catch (err) {
      db.close();
      throw err;
    }
    this._db = db;
    this.logger?.debug({ location: this.location }, "[SQLiteClient] DB abierta");
    return this;
  }

  get isOpen(): boolean {
    return this._db !== null;
  }

  close(): void {
    if (!this._db) return;
    this._db.close();
    this._db = null;
    this.logger?.debug({ location: this.location }, "[SQLiteClient] DB cerrada");
  }

  private get db(): Database.Database {
    if (!this._db) {
      throw new Error(`SQLiteClient no inicializado (${this.location}): llamar a init() primero`);
    }
    return this._db;
  }

  /** INSERT/UPDATE/DELETE parametrizado (autocommit) */
  run(sql: string, params: SqlParam[] = []): Database.RunResult {
    return this.db.prepare<SqlParam[]>(sql).run(...params);
  }

  /** Una sola fila o null */
  one<T>(sql: string, params: SqlParam[] = []): T | null {
    const row = this.db.prepare<SqlParam[], T>(sql).get(...params);
    return row ?? null;
  }

  /** Todas las filas ([] si no hay resultados) */
  all<T>(sql: string, params: SqlParam[] = []): T[] {
    return this.db.prepare<SqlParam[], T>(sql).all(...params);
  }
}
