import blessed from 'blessed';
import { loadConfig } from '../lib/config-loader.js';
import { ServerRegistry } from '../lib/server-registry.js';
import { RconClient } from '../lib/rcon-executor.js';
import { DockerRunner } from '../lib/container-executor.js';
import { SessionLogger } from '../lib/session-logger.js';
import { createDashboardUI } from '../tui/DashboardApp.js';

export interface TuiOptions {
  config: string;
  verbose?: boolean;
}

export async function tuiCommand(options: TuiOptions): Promise<void> {
  // Config errors surface before the screen takes over the terminal
  const config = await loadConfig(options.config);
  const registry = ServerRegistry.load(config.servers);

  const screen = blessed.screen({
    smartCSR: true,
    title: 'rcon-deck',
    fullUnicode: true,
  });

  await createDashboardUI(screen, {
    registry,
    rconClient: new RconClient({ timeoutMs: config.rcon.timeoutSeconds * 1000 }),
    containerRunner: new DockerRunner(),
    logger: new SessionLogger(options.verbose ?? false),
    statusTimeoutSeconds: config.ui.statusTimeoutSeconds,
  });
}
