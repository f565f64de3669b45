import Database from 'better-sqlite3';

/**
 * Thin wrapper over a better-sqlite3 connection so the store only deals
 * in SQL text and positional parameters.
 */
export interface RunResult {
  changes: number;
  lastInsertRowid: number;
}

export interface SQLiteDriver {
  run(sql: string, params?: unknown[]): RunResult;
  get<T>(sql: string, params?: unknown[]): T | undefined;
  all<T>(sql: string, params?: unknown[]): T[];
  exec(sql: string): void;
  pragma(source: string): void;
  close(): void;
}

export class BetterSqlite3Driver implements SQLiteDriver {
  private db: Database.Database;

  constructor(filename: string) {
    this.db = new Database(filename);
  }

  run(sql: string, params?: unknown[]): RunResult {
    const result = this.db.prepare(sql).run(...(params ?? []));
    return {
      changes: result.changes,
      lastInsertRowid: Number(result.lastInsertRowid)
    };
  }

  get<T>(sql: string, params?: unknown[]): T | undefined {
    return this.db.prepare(sql).get(...(params ?? [])) as T | undefined;
  }

  all<T>(sql: string, params?: unknown[]): T[] {
    return this.db.prepare(sql).all(...(params ?? [])) as T[];
  }

  exec(sql: string): void {
    this.db.exec(sql);
  }

  pragma(source: string): void {
    this.db.pragma(source);
  }

  close(): void {
    this.db.close();
  }
}
