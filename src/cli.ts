#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { tuiCommand } from './commands/tui.js';
import { lsCommand } from './commands/ls.js';
import { execCommand } from './commands/exec.js';
import { containerCommand } from './commands/container.js';
import { resolveConfigPath } from './lib/config-loader.js';
import { ConfigError, errorMessage } from './lib/errors.js';

interface GlobalOptions {
  config?: string;
  verbose?: boolean;
}

const program = new Command();

program
  .name('rcon-deck')
  .description('Terminal dashboard for RCON game servers and their Docker containers')
  .version('1.0.0')
  .option('-c, --config <path>', 'Path to config file (default: ./config.yaml or $RCON_DECK_CONFIG)')
  .option('-v, --verbose', 'Write request/result activity to ~/.rcon-deck/logs/session.log');

function configPath(): string {
  return resolveConfigPath(program.opts<GlobalOptions>().config);
}

function fail(error: unknown): never {
  console.error(chalk.red('❌ Error:'), errorMessage(error));
  if (error instanceof ConfigError) {
    console.error(chalk.dim('Tip: Ensure config.yaml exists and defines at least one server.'));
  }
  process.exit(1);
}

// Interactive dashboard (default)
program
  .command('tui', { isDefault: true })
  .description('Open the server dashboard')
  .action(async () => {
    try {
      await tuiCommand({ config: configPath(), verbose: program.opts<GlobalOptions>().verbose });
    } catch (error) {
      fail(error);
    }
    // In-flight RCON sockets or docker processes must not keep the process alive
    process.exit(0);
  });

// List configured servers
program
  .command('ls')
  .description('List configured servers')
  .action(async () => {
    try {
      await lsCommand(configPath());
    } catch (error) {
      fail(error);
    }
  });

// One-shot RCON command
program
  .command('exec')
  .description('Send a single RCON command to a server')
  .argument('<server>', 'Server name')
  .argument('<command...>', 'RCON command (e.g. "status")')
  .action(async (server: string, words: string[]) => {
    try {
      await execCommand(configPath(), server, words);
    } catch (error) {
      fail(error);
    }
  });

// One-shot container action
program
  .command('container')
  .description('Run a container lifecycle action for a server')
  .argument('<server>', 'Server name')
  .argument('<action>', 'start | stop | restart | status')
  .action(async (server: string, action: string) => {
    try {
      await containerCommand(configPath(), server, action);
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync(process.argv).catch(fail);
