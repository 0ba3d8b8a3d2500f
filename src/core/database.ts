import * as fs from 'fs';
import * as path from 'path';
import * as sqlite3 from 'sqlite3';
import { LogSink } from '../common/logger';

export type SqlParam = string | number | null;

export class Database {
  private db: sqlite3.Database;
  private logger: LogSink;
  private initialized: Promise<void>;

  /**
   * @param dbPath file path, or ':memory:'
   */
  constructor(dbPath: string, logger: LogSink) {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new sqlite3.Database(dbPath);
    this.logger = logger;
    this.initialized = this.initialize();
    this.initialized.catch(error => this.logger.error('Database initialization failed', error, { dbPath }));
  }

  private async initialize(): Promise<void> {
    await this.run(`
      CREATE TABLE IF NOT EXISTS reconcile_runs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        run_id TEXT NOT NULL,
        purpose TEXT NOT NULL,
        started_at TEXT NOT NULL,
        completed_at TEXT,
        first_run INTEGER DEFAULT 0,
        scope TEXT,
        current_identifiers INTEGER DEFAULT 0,
        newly_observed INTEGER DEFAULT 0,
        previously_observed INTEGER DEFAULT 0,
        matched INTEGER DEFAULT 0,
        succeeded INTEGER DEFAULT 0,
        partial INTEGER DEFAULT 0,
        failed INTEGER DEFAULT 0,
        skipped INTEGER DEFAULT 0,
        snapshot_saved INTEGER DEFAULT 0,
        snapshot_error TEXT
      )
    `);

    await this.run(`
      CREATE TABLE IF NOT EXISTS action_outcomes (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        run_id TEXT NOT NULL,
        purpose TEXT NOT NULL,
        item_name TEXT NOT NULL,
        origin TEXT NOT NULL,
        mode TEXT NOT NULL,
        status TEXT NOT NULL,
        method_used TEXT,
        attempts INTEGER DEFAULT 0,
        duration_ms INTEGER,
        error_message TEXT
      )
    `);

    await this.run(`CREATE INDEX IF NOT EXISTS idx_runs_purpose ON reconcile_runs(purpose, started_at)`);
    await this.run(`CREATE INDEX IF NOT EXISTS idx_outcomes_run ON action_outcomes(run_id)`);

    this.logger.debug('Database initialized');
  }

  async ensureInitialized(): Promise<void> {
    await this.initialized;
  }

  async run(sql: string, params: SqlParam[] = []): Promise<{ lastID: number; changes: number }> {
    return new Promise((resolve, reject) => {
      this.db.run(sql, params, function(err) {
        if (err) reject(err);
        else resolve({ lastID: this.lastID, changes: this.changes });
      });
    });
  }

  async all<T>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    await this.ensureInitialized();
    return new Promise((resolve, reject) => {
      this.db.all(sql, params, (err: Error | null, rows: T[]) => {
        if (err) reject(err);
        else resolve(rows);
      });
    });
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.close((err: Error | null) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}
