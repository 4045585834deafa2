import type { Command } from 'commander';
import { SubmissionUseCase } from '../../application/SubmissionUseCase.js';
import { TrackingLoop } from '../../application/TrackingLoop.js';
import { loadConfig } from '../../config/ConfigLoader.js';
import type { PartialConfig } from '../../config/types.js';
import { GnomeShellFocusSource } from '../../infrastructure/desktop/GnomeShellFocusSource.js';
import { writeSummaryFile } from '../../infrastructure/export/SummaryExporter.js';
import { createLogger, createSinks, createTracker, resolvePath } from '../bootstrap.js';
import { SummaryFormatter, parseOutputFormat } from '../formatters/SummaryFormatter.js';

interface TrackOptions {
  root: string;
  submit?: boolean;
  dryRun?: boolean;
  sqlite: boolean;
  save?: string | boolean;
  pollInterval?: string;
  submitInterval?: string;
  format: string;
}

function parseMs(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const ms = Number(value);
  if (!Number.isFinite(ms)) {
    throw new Error(`${flag} must be a number of milliseconds (got "${value}")`);
  }
  return ms;
}

/** 等到 SIGINT / SIGTERM */
function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

/** 註冊 track 指令 */
export function registerTrackCommand(program: Command, version: string): void {
  program
    .command('track')
    .description('Track focused applications until interrupted')
    .option('--root <path>', 'Directory holding .focustrack.json and the ignore file', '.')
    .option('--submit', 'Submit summaries to the time-tracking API and webhook')
    .option('--dry-run', 'Print the payloads that would be submitted instead of sending them')
    .option('--no-sqlite', 'Do not write to the SQLite database even when sqlite.dbPath is set')
    .option('--save [file]', 'Write a JSON summary file after each submission and on shutdown')
    .option('--poll-interval <ms>', 'Focus polling interval in milliseconds')
    .option('--submit-interval <ms>', 'Submission interval in milliseconds')
    .option('--format <format>', 'Shutdown report format: json or text', 'text')
    .action(async (opts: TrackOptions) => {
      const format = parseOutputFormat(opts.format);
      const tracking: NonNullable<PartialConfig['tracking']> = {};
      const pollIntervalMs = parseMs('--poll-interval', opts.pollInterval);
      const submitIntervalMs = parseMs('--submit-interval', opts.submitInterval);
      if (pollIntervalMs !== undefined) tracking.pollIntervalMs = pollIntervalMs;
      if (submitIntervalMs !== undefined) tracking.submitIntervalMs = submitIntervalMs;

      const config = loadConfig(opts.root, { tracking });
      const logger = createLogger(config);
      const formatter = new SummaryFormatter();

      const tracker = await createTracker(opts.root, config, logger);
      const sinks = createSinks(opts.root, config, {
        submit: opts.submit ?? false,
        dryRun: opts.dryRun ?? false,
        sqlite: opts.sqlite,
        version,
      }, logger);

      const saveTarget = opts.save === true ? config.output.summariesFile ?? 'focustrack-summaries.json'
        : typeof opts.save === 'string' ? opts.save : config.output.summariesFile;
      const savePath = saveTarget ? resolvePath(opts.root, saveTarget) : undefined;

      const loop = new TrackingLoop({
        tracker,
        source: new GnomeShellFocusSource(),
        submission: sinks.length > 0
          ? new SubmissionUseCase(tracker, sinks, logger.child('SubmissionUseCase'))
          : undefined,
        options: {
          pollIntervalMs: config.tracking.pollIntervalMs,
          submitIntervalMs: config.tracking.submitIntervalMs,
          idleThresholdMs: config.tracking.idleThresholdMs,
        },
        persist: savePath
          ? async (summaries) => {
            await writeSummaryFile(savePath, summaries, Date.now());
            logger.debug('Summaries saved', { file: savePath });
          }
          : undefined,
        logger: logger.child('TrackingLoop'),
      });

      try {
        loop.start();
        const signal = await waitForShutdownSignal();
        logger.info('Shutting down', { signal });

        const { pending, report } = await loop.stop();

        process.stdout.write(formatter.formatSummaries(pending, format) + '\n');
        if (report) {
          process.stdout.write(formatter.formatSubmissionReport(report, format) + '\n');
        }
      } finally {
        for (const sink of sinks) sink.close?.();
      }
    });
}
