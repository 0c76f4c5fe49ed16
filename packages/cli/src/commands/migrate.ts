/**
 * reelscope migrate - Bring the result store to the current column layout
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { CsvResultStore, type MigrationReport } from '@reelscope/result-store';
import { createRunLogger } from '@reelscope/run-logger';
import { loadCommandConfig, reportError } from './shared.js';

interface MigrateOptions {
  config?: string;
  output?: string;
}

export function describeMigration(report: MigrationReport, filePath: string): string {
  switch (report.kind) {
    case 'none':
      return `${filePath} already uses the current layout`;
    case 'created':
      return `Created ${filePath} with the current header`;
    case 'legacy':
      return `Re-extracted ${report.rows} legacy rows in ${filePath} (backup: ${report.backupPath ?? 'none'})`;
    case 'header':
      return `Rewrote ${report.rows} rows of ${filePath} with the current header (backup: ${report.backupPath ?? 'none'})`;
  }
}

export const migrateCommand = new Command('migrate')
  .description('Migrate a legacy url,message result file to the metric columns')
  .option('-c, --config <file>', 'JSON config file')
  .option('-o, --output <file>', 'Result store CSV')
  .action(async (options: MigrateOptions) => {
    const spinner = ora();

    try {
      const config = loadCommandConfig(options, { outputFile: options.output });
      const logger = createRunLogger({
        logFile: config.logFile,
        minLevel: config.logLevel,
        console: false,
        component: 'migrate',
      });

      try {
        spinner.start(`Checking ${config.outputFile}...`);
        const store = await CsvResultStore.open({ filePath: config.outputFile, logger });
        spinner.succeed(describeMigration(store.migration, config.outputFile));
        console.log(chalk.gray(`${(await store.rows()).length} rows in store`));
      } finally {
        await logger.close();
      }
    } catch (error) {
      if (spinner.isSpinning) spinner.fail('Migration failed');
      reportError(error);
    }
  });
