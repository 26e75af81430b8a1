import chalk from 'chalk';
import Table from 'cli-table3';
import { loadConfig } from '../lib/config-loader.js';
import { ServerRegistry } from '../lib/server-registry.js';

export async function lsCommand(configPath: string): Promise<void> {
  const config = await loadConfig(configPath);
  const registry = ServerRegistry.load(config.servers);

  const table = new Table({
    head: ['NAME', 'ADDRESS', 'CONTAINER'],
  });

  for (const server of registry.list()) {
    table.push([
      chalk.bold(server.name),
      server.address,
      server.containerRef ?? chalk.dim('-'),
    ]);
  }

  console.log(table.toString());
  console.log(chalk.dim(`\n${registry.size} server(s) from ${configPath}`));
}
