import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { PRAGMA_SQL, SCHEMA_SQL, SCHEMA_VERSION } from './schema.js';
import { Logger } from '../../shared/Logger.js';

/**
 * SQLite 資料庫管理器
 *
 * 負責：建立資料夾與 DB、設定 PRAGMA、執行 schema，並檢查 schema 版本。
 * `:memory:` 路徑不建立資料夾。
 */
export class DatabaseManager {
  private db: Database.Database;
  private logger: Logger;

  constructor(dbPath: string, logger?: Logger) {
    this.logger = logger ?? new Logger('DatabaseManager');

    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);

    // 設定 PRAGMA（逐行執行，因為 PRAGMA 不支援批次）
    for (const line of PRAGMA_SQL.trim().split('\n')) {
      const trimmed = line.trim();
      if (trimmed && !trimmed.startsWith('--')) {
        this.db.pragma(trimmed.replace('PRAGMA ', '').replace(';', ''));
      }
    }

    this.db.exec(SCHEMA_SQL);
    this.checkSchemaVersion();

    this.logger.info('Database initialized', { dbPath });
  }

  getDb(): Database.Database {
    return this.db;
  }

  close(): void {
    this.db.close();
  }

  /** 首次使用時寫入版本；較新的 schema 版本拒絕開啟 */
  private checkSchemaVersion(): void {
    const row: unknown = this.db.prepare(
      "SELECT value FROM schema_meta WHERE key = 'version'"
    ).get();

    if (!row || typeof row !== 'object' || !('value' in row)) {
      this.db.prepare(
        "INSERT OR REPLACE INTO schema_meta(key, value) VALUES('version', ?)"
      ).run(String(SCHEMA_VERSION));
      return;
    }

    const stored = parseInt(String(row.value), 10);
    if (stored > SCHEMA_VERSION) {
      throw new Error(
        `Database schema version ${stored} is newer than supported version ${SCHEMA_VERSION}. ` +
        'Upgrade focustrack or point sqlite.dbPath at another file.'
      );
    }
  }
}
