import chalk from 'chalk';
import { loadConfig } from '../lib/config-loader.js';
import { ServerRegistry } from '../lib/server-registry.js';
import { DockerRunner, executeContainerAction } from '../lib/container-executor.js';
import { CONTAINER_ACTIONS } from '../types/session-types.js';

export async function containerCommand(configPath: string, serverName: string, action: string): Promise<void> {
  if (!CONTAINER_ACTIONS.some((a) => a === action)) {
    throw new Error(`Unknown action: ${action} (expected one of ${CONTAINER_ACTIONS.join(', ')})`);
  }

  const config = await loadConfig(configPath);
  const registry = ServerRegistry.load(config.servers);

  const server = registry.lookup(serverName);
  if (!server) {
    throw new Error(`Server not found: ${serverName}\n\nUse: rcon-deck ls`);
  }

  console.log(chalk.blue(`🐳 ${action} ${server.containerRef ?? '(no container)'} for ${server.name}`));
  const result = await executeContainerAction(new DockerRunner(), server, action);

  if (result.error) {
    throw new Error(result.error.message);
  }

  const output = result.output ? result.output.trimEnd() : 'success';
  console.log(chalk.green(`✅ ${action}: ${output}`));
}
