#!/usr/bin/env -S npx tsx
/**
 * Reelscope CLI
 *
 * Download short-form videos, analyse them in an AI chat and store the metrics
 */

import { Command } from 'commander';
import { config } from 'dotenv';
import { runCommand } from './commands/run.js';
import { loginCommand } from './commands/login.js';
import { migrateCommand } from './commands/migrate.js';
import { extractCommand } from './commands/extract.js';

// Load environment variables
config();

const program = new Command();

program
  .name('reelscope')
  .description('Analyse short-form videos in an AI chat and store the metrics')
  .version('0.1.0');

// Register commands
program.addCommand(runCommand);
program.addCommand(loginCommand);
program.addCommand(migrateCommand);
program.addCommand(extractCommand);

await program.parseAsync();
