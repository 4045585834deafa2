#!/usr/bin/env node

import { createRequire } from 'node:module';
import { Command, CommanderError } from 'commander';
import { z } from 'zod';
import { errorMessage } from '../domain/errors/DomainErrors.js';
import { registerTrackCommand } from './commands/track.js';
import { registerIgnoreCommand } from './commands/ignore.js';
import { registerHistoryCommand } from './commands/history.js';

// 版本號取自 package.json
const require = createRequire(import.meta.url);
const { version } = z.object({ version: z.string() }).parse(require('../../package.json'));

const program = new Command();

program
  .name('focustrack')
  .description('Track focused desktop applications and submit usage summaries')
  .version(version);

registerTrackCommand(program, version);
registerIgnoreCommand(program);
registerHistoryCommand(program);

/** 全域錯誤處理 */
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      process.exit(err.exitCode);
    }
    process.stderr.write(`Error: ${errorMessage(err)}\n`);
    process.exit(1);
  }
}

void main();
