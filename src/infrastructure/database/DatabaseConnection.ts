import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

/**
 * Database connection manager for batch history
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  /**
   * Relative file names live under `<cwd>/data`; `:memory:` opens an in-memory database
   */
  constructor(dbPath: string = 'batches.db') {
    this.dbPath = resolveDatabasePath(dbPath);

    if (this.dbPath !== ':memory:') {
      // Ensure data directory exists
      fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    }

    this.db = new Database(this.dbPath);
    // Enable WAL mode for better concurrency
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('foreign_keys = ON');

    this.initializeTables();
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS batch_runs (
        id TEXT PRIMARY KEY,
        created_at TEXT NOT NULL,
        workers INTEGER,
        total INTEGER NOT NULL DEFAULT 0,
        successful INTEGER NOT NULL DEFAULT 0,
        failed INTEGER NOT NULL DEFAULT 0,
        wall_time_ms REAL,
        throughput REAL,
        summary TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_batch_created ON batch_runs(created_at);

      CREATE TABLE IF NOT EXISTS batch_results (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        batch_id TEXT NOT NULL,
        job_index INTEGER NOT NULL,
        job_id TEXT,
        outcome TEXT NOT NULL,
        success INTEGER NOT NULL,
        wait_time REAL NOT NULL,
        total_time_ms REAL NOT NULL,
        submitted_at TEXT NOT NULL,
        finished_at TEXT NOT NULL,
        input TEXT NOT NULL,
        output TEXT,
        error TEXT,
        UNIQUE(batch_id, job_index),
        FOREIGN KEY (batch_id) REFERENCES batch_runs(id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_batch_results_batch ON batch_results(batch_id);
    `);
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  getDatabasePath(): string {
    return this.dbPath;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  getStatistics(): { totalBatches: number; totalResults: number; databaseSize: number } {
    const count = (table: 'batch_runs' | 'batch_results') =>
      this.db.prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM ${table}`).get()?.count ?? 0;

    let databaseSize = 0;
    if (this.dbPath !== ':memory:' && fs.existsSync(this.dbPath)) {
      databaseSize = fs.statSync(this.dbPath).size;
    }

    return {
      totalBatches: count('batch_runs'),
      totalResults: count('batch_results'),
      databaseSize,
    };
  }
}

export function resolveDatabasePath(dbPath: string): string {
  if (dbPath === ':memory:' || path.isAbsolute(dbPath)) {
    return dbPath;
  }
  return path.resolve(process.cwd(), 'data', dbPath);
}
