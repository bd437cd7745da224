import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";

export const IN_MEMORY = ":memory:";

export class AppDatabase {
  readonly connection: Database.Database;

  constructor(dbPath: string, options: { busyTimeoutMs?: number } = {}) {
    if (dbPath !== IN_MEMORY) {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.connection = new Database(dbPath);
    this.connection.pragma("journal_mode = WAL");
    this.connection.pragma(`busy_timeout = ${options.busyTimeoutMs ?? 5000}`);
    this.init();
  }

  private hasColumn(table: string, column: string): boolean {
    const rows = this.connection.prepare(`PRAGMA table_info(${table})`).all() as Array<{ name: string }>;
    return rows.some((row) => row.name === column);
  }

  private ensureColumn(table: string, column: string, columnDef: string): void {
    if (!this.hasColumn(table, column)) {
      this.connection.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${columnDef}`);
    }
  }

  private init(): void {
    this.connection.exec(`
      CREATE TABLE IF NOT EXISTS scheduled_posts (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        job_id TEXT NOT NULL UNIQUE,
        platform TEXT NOT NULL,
        descriptor_json TEXT NOT NULL,
        scheduled_at TEXT NOT NULL,
        ttl_json TEXT NOT NULL,
        status TEXT NOT NULL,
        platform_post_id TEXT,
        error TEXT,
        attempts INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS scheduled_posts_due
        ON scheduled_posts (status, scheduled_at);

      CREATE TABLE IF NOT EXISTS delete_jobs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        platform TEXT NOT NULL,
        platform_post_id TEXT NOT NULL,
        delete_at TEXT NOT NULL,
        status TEXT NOT NULL,
        retry_count INTEGER NOT NULL DEFAULT 0,
        last_error TEXT,
        leased_until TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        UNIQUE (platform, platform_post_id)
      );

      CREATE INDEX IF NOT EXISTS delete_jobs_due
        ON delete_jobs (status, delete_at);

      CREATE TABLE IF NOT EXISTS media_usage (
        identifier TEXT NOT NULL,
        used_at TEXT NOT NULL
      );
    `);

    this.ensureColumn("delete_jobs", "leased_until", "TEXT");
    this.ensureColumn("scheduled_posts", "attempts", "INTEGER NOT NULL DEFAULT 0");
  }

  /**
   * Runs `fn` inside `BEGIN IMMEDIATE`, which takes the database write lock
   * up front. Two processes sweeping the same store serialize here.
   */
  exclusive<T>(fn: () => T): T {
    return this.connection.transaction(fn).immediate();
  }

  recordMediaUse(identifier: string, usedAt: Date): void {
    this.connection
      .prepare("INSERT INTO media_usage (identifier, used_at) VALUES (?, ?)")
      .run(identifier, usedAt.toISOString());
  }

  recentMediaIdentifiers(limit: number): string[] {
    const rows = this.connection
      .prepare("SELECT identifier FROM media_usage ORDER BY used_at DESC, rowid DESC LIMIT ?")
      .all(limit) as Array<{ identifier: string }>;
    return rows.map((row) => row.identifier);
  }

  close(): void {
    this.connection.close();
  }
}
