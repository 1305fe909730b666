#!/usr/bin/env node
/**
 * IWSLT CLI
 *
 * Download, extract and inspect IWSLT parallel corpora.
 */

import { Command } from 'commander';
import { downloadCommand } from './cli/download.js';
import { loadCommand } from './cli/load.js';
import { readCommand } from './cli/read.js';
import { datasetsCommand } from './cli/datasets.js';

const program = new Command()
  .name('iwslt')
  .description('Download and read IWSLT TED-talk parallel corpora')
  .version('0.1.0');

program.addCommand(datasetsCommand);
program.addCommand(downloadCommand);
program.addCommand(loadCommand);
program.addCommand(readCommand);

await program.parseAsync(process.argv);
