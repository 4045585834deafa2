import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DatabaseManager } from '../../src/infrastructure/sqlite/DatabaseManager.js';
import { SCHEMA_VERSION } from '../../src/infrastructure/sqlite/schema.js';
import { Logger } from '../../src/shared/Logger.js';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';

describe('DatabaseManager', () => {
  const silent = new Logger('DatabaseManager', 'error', () => {});
  const tmpDir = path.join(os.tmpdir(), 'focustrack-setup-' + Date.now());
  const dbPath = path.join(tmpDir, 'nested', 'focus.db');
  let mgr: DatabaseManager;

  beforeEach(() => {
    mgr = new DatabaseManager(dbPath, silent);
  });

  afterEach(() => {
    mgr.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should create the database file and enable WAL', () => {
    expect(fs.existsSync(dbPath)).toBe(true);
    expect(mgr.getDb().pragma('journal_mode', { simple: true })).toBe('wal');
    expect(mgr.getDb().pragma('foreign_keys', { simple: true })).toBe(1);
  });

  it('should create the summary and session tables', () => {
    const tables = mgr.getDb()
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
      .all()
      .map((row) => (row && typeof row === 'object' && 'name' in row ? String(row.name) : ''));

    expect(tables).toEqual(expect.arrayContaining(['activity_sessions', 'activity_summaries', 'schema_meta']));
  });

  it('should record the schema version', () => {
    const row = mgr.getDb().prepare("SELECT value FROM schema_meta WHERE key = 'version'").get();
    expect(row).toEqual({ value: String(SCHEMA_VERSION) });
  });

  it('should refuse a database written by a newer schema', () => {
    mgr.getDb().prepare("UPDATE schema_meta SET value = ? WHERE key = 'version'").run(String(SCHEMA_VERSION + 1));
    mgr.close();

    expect(() => new DatabaseManager(dbPath, silent)).toThrow(/newer than supported/);
    mgr = new DatabaseManager(':memory:', silent);
  });

  it('should reject rows that violate the duration checks', () => {
    expect(() => mgr.getDb().prepare(`
      INSERT INTO activity_sessions (start_time, end_time, app_class, window_title, duration_seconds, created_at)
      VALUES (200, 100, 'code', '', 0, 300)
    `).run()).toThrow(/CHECK constraint failed/);
  });
});
