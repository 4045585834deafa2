import type { Command } from 'commander';
import { loadConfig } from '../../config/ConfigLoader.js';
import { DatabaseManager } from '../../infrastructure/sqlite/DatabaseManager.js';
import { SqliteSummarySink } from '../../infrastructure/sinks/sqlite/SqliteSummarySink.js';
import { createLogger, resolvePath } from '../bootstrap.js';
import { SummaryFormatter, parseOutputFormat } from '../formatters/SummaryFormatter.js';

interface HistoryOptions {
  root: string;
  limit: string;
  sessions?: boolean;
  format: string;
}

/** 註冊 history 指令：讀取 SQLite 中最近的紀錄 */
export function registerHistoryCommand(program: Command): void {
  program
    .command('history')
    .description('Show recently stored summaries (or sessions) from the SQLite database')
    .option('--root <path>', 'Directory holding .focustrack.json', '.')
    .option('--limit <n>', 'Number of rows', '20')
    .option('--sessions', 'Show individual sessions instead of summaries')
    .option('--format <format>', 'Output format: json or text', 'text')
    .action((opts: HistoryOptions) => {
      const format = parseOutputFormat(opts.format);
      const limit = parseInt(opts.limit, 10);
      if (!Number.isInteger(limit) || limit <= 0) {
        throw new Error(`--limit must be a positive integer (got "${opts.limit}")`);
      }

      const config = loadConfig(opts.root);
      if (!config.sqlite.dbPath) {
        throw new Error('sqlite.dbPath is not configured (set it in .focustrack.json or FOCUSTRACK_DB_PATH)');
      }
      const logger = createLogger(config);
      const dbMgr = new DatabaseManager(resolvePath(opts.root, config.sqlite.dbPath), logger.child('DatabaseManager'));
      const store = new SqliteSummarySink(dbMgr, {
        minSubmitDurationMs: config.sqlite.minSubmitDurationMs,
        retry: config.sqlite.retry,
      }, logger.child('SqliteSummarySink'));
      const formatter = new SummaryFormatter();

      try {
        const output = opts.sessions
          ? formatter.formatSessions(store.recentSessions(limit), format)
          : formatter.formatStoredSummaries(store.recentSummaries(limit), format);
        process.stdout.write(output + '\n');
      } finally {
        store.close();
      }
    });
}
