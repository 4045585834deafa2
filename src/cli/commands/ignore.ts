import type { Command } from 'commander';
import readline from 'node:readline/promises';
import { IgnoreDiscoveryUseCase } from '../../application/IgnoreDiscoveryUseCase.js';
import { loadConfig } from '../../config/ConfigLoader.js';
import { GnomeShellFocusSource } from '../../infrastructure/desktop/GnomeShellFocusSource.js';
import { formatDuration } from '../../shared/formatDuration.js';
import { createLogger, createTracker } from '../bootstrap.js';
import { SummaryFormatter, parseOutputFormat } from '../formatters/SummaryFormatter.js';

interface RootOptions {
  root: string;
}

interface ListOptions extends RootOptions {
  format: string;
}

interface DiscoverOptions extends RootOptions {
  duration: string;
}

const RESTART_HINT = 'Restart a running `focustrack track` for the change to take effect.';

/** 註冊 ignore 指令群組 */
export function registerIgnoreCommand(program: Command): void {
  const ignoreCmd = program
    .command('ignore')
    .description('Manage applications that are never tracked');

  ignoreCmd
    .command('add <applicationId>')
    .description('Add an application (WM_CLASS) to the ignore list')
    .option('--root <path>', 'Directory holding .focustrack.json and the ignore file', '.')
    .action(async (applicationId: string, opts: RootOptions) => {
      const config = loadConfig(opts.root);
      const tracker = await createTracker(opts.root, config, createLogger(config));

      if (tracker.isIgnored(applicationId)) {
        process.stdout.write(`${applicationId} is already ignored.\n`);
        return;
      }
      await tracker.setIgnored(applicationId);
      process.stdout.write(`Ignoring ${applicationId}. ${RESTART_HINT}\n`);
    });

  ignoreCmd
    .command('remove <applicationId>')
    .description('Remove an application from the ignore list')
    .option('--root <path>', 'Directory holding .focustrack.json and the ignore file', '.')
    .action(async (applicationId: string, opts: RootOptions) => {
      const config = loadConfig(opts.root);
      const tracker = await createTracker(opts.root, config, createLogger(config));

      const removed = await tracker.removeIgnored(applicationId);
      process.stdout.write(removed
        ? `${applicationId} removed from the ignore list. ${RESTART_HINT}\n`
        : `${applicationId} is not in the ignore list.\n`);
    });

  ignoreCmd
    .command('list')
    .description('Show ignored applications')
    .option('--root <path>', 'Directory holding .focustrack.json and the ignore file', '.')
    .option('--format <format>', 'Output format: json or text', 'text')
    .action(async (opts: ListOptions) => {
      const format = parseOutputFormat(opts.format);
      const config = loadConfig(opts.root);
      const tracker = await createTracker(opts.root, config, createLogger(config));
      process.stdout.write(new SummaryFormatter().formatIgnoreList(tracker.ignoredApplications(), format) + '\n');
    });

  ignoreCmd
    .command('discover')
    .description('Watch focused windows for a while and pick one to ignore')
    .option('--root <path>', 'Directory holding .focustrack.json and the ignore file', '.')
    .option('--duration <ms>', 'How long to watch', '10000')
    .action(async (opts: DiscoverOptions) => {
      const durationMs = Number(opts.duration);
      if (!Number.isFinite(durationMs) || durationMs <= 0) {
        throw new Error(`--duration must be a positive number of milliseconds (got "${opts.duration}")`);
      }

      const config = loadConfig(opts.root);
      const logger = createLogger(config);
      const tracker = await createTracker(opts.root, config, logger);
      const discovery = new IgnoreDiscoveryUseCase({
        source: new GnomeShellFocusSource(),
        tracker,
        logger: logger.child('IgnoreDiscovery'),
      });

      process.stdout.write(`Switch between the windows you want to ignore for the next ${formatDuration(durationMs)}...\n`);
      let lastReported = -1;
      const seen = await discovery.discover({
        durationMs,
        onProgress: (remainingMs, found) => {
          const seconds = Math.ceil(remainingMs / 1000);
          if (seconds !== lastReported) {
            lastReported = seconds;
            process.stdout.write(`  ${seconds}s remaining... (${found} apps found)\n`);
          }
        },
      });

      if (seen.length === 0) {
        process.stdout.write('No applications were seen.\n');
        return;
      }

      const formatter = new SummaryFormatter();
      process.stdout.write(`\n${formatter.formatSeenApplications(seen)}\n\n`);

      const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
      try {
        const answer = (await rl.question('Number of the application to ignore (0 to cancel): ')).trim();
        const choice = Number(answer);
        if (!Number.isInteger(choice) || choice < 0 || choice > seen.length) {
          throw new Error(`invalid selection "${answer}"`);
        }
        if (choice === 0) {
          process.stdout.write('Cancelled.\n');
          return;
        }

        const app = seen[choice - 1];
        const added = await discovery.choose(app.applicationId);
        process.stdout.write(added
          ? `Ignoring ${app.applicationId}. ${RESTART_HINT}\n`
          : `${app.applicationId} is already ignored.\n`);
      } finally {
        rl.close();
      }
    });
}
