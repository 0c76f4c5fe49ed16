/**
 * reelscope login - Log in to the chat once and save the session
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createInterface } from 'readline/promises';
import { interactiveLogin } from '@reelscope/chat-surface';
import { createRunLogger } from '@reelscope/run-logger';
import { loadCommandConfig, reportError } from './shared.js';

interface LoginOptions {
  config?: string;
  verbose: boolean;
}

async function waitForEnter(): Promise<void> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    await rl.question(chalk.yellow('Log in inside the browser window, then press Enter here to save the session... '));
  } finally {
    rl.close();
  }
}

export const loginCommand = new Command('login')
  .description('Open the chat in a browser window and save the session after you log in')
  .option('-c, --config <file>', 'JSON config file')
  .option('-v, --verbose', 'Show log entries', false)
  .action(async (options: LoginOptions) => {
    try {
      const config = loadCommandConfig(options);
      const logger = createRunLogger({
        logFile: config.logFile,
        minLevel: config.logLevel,
        console: options.verbose,
        component: 'login',
      });

      try {
        console.log(`Opening ${chalk.cyan(config.chatUrl)}`);
        const saved = await interactiveLogin({
          chatUrl: config.chatUrl,
          sessionFile: config.sessionFile,
          browserChannel: config.browserChannel,
          slowMoMs: config.slowMoMs,
          navigationTimeoutMs: config.navigationTimeoutMs,
          logger,
          confirm: waitForEnter,
        });

        if (saved) {
          console.log(chalk.green(`Session saved to ${config.sessionFile}`));
        } else {
          console.log(chalk.yellow('The browser returned no cookies; run `reelscope login` again once logged in.'));
          process.exitCode = 1;
        }
      } finally {
        await logger.close();
      }
    } catch (error) {
      reportError(error, options.verbose);
    }
  });
