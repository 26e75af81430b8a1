import chalk from 'chalk';
import { loadConfig } from '../lib/config-loader.js';
import { ServerRegistry } from '../lib/server-registry.js';
import { RconClient, executeRcon } from '../lib/rcon-executor.js';

export async function execCommand(configPath: string, serverName: string, words: string[]): Promise<void> {
  const config = await loadConfig(configPath);
  const registry = ServerRegistry.load(config.servers);

  const server = registry.lookup(serverName);
  if (!server) {
    throw new Error(`Server not found: ${serverName}\n\nUse: rcon-deck ls`);
  }

  const command = words.join(' ').trim();
  if (!command) {
    throw new Error('Command must not be empty');
  }

  console.log(chalk.dim(`[${server.name}] > ${command}`));
  const result = await executeRcon(
    new RconClient({ timeoutMs: config.rcon.timeoutSeconds * 1000 }),
    server,
    command
  );

  if (result.error) {
    throw new Error(result.error.message);
  }

  console.log(result.output ? result.output.trimEnd() : chalk.dim('(no response)'));
}
