import * as fs from 'fs/promises';
import { parse } from 'yaml';
import {
  type AppConfig,
  DEFAULT_CONFIG_PATH,
  DEFAULT_RCON_CONFIG,
  DEFAULT_UI_CONFIG,
  type RconConfig,
  type UiConfig,
} from '../types/app-config.js';
import { type ServerDescriptor, parseAddress } from '../types/server-descriptor.js';
import { ConfigError, errorMessage } from './errors.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(entry: Record<string, unknown>, key: string, where: string): string {
  const value = entry[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(`${where}: "${key}" must be a non-empty string`);
  }
  return value.trim();
}

/**
 * Validate one server entry from the config file
 * Passwords may be empty (some servers run RCON without one), other fields may not.
 */
export function validateServerEntry(entry: unknown, index: number): ServerDescriptor {
  const where = `servers[${index}]`;
  if (!isRecord(entry)) {
    throw new ConfigError(`${where}: expected a mapping`);
  }

  const name = requireString(entry, 'name', where);
  const address = requireString(entry, 'address', where);
  try {
    parseAddress(address);
  } catch (error) {
    throw new ConfigError(`${where}: ${errorMessage(error)}`);
  }

  const password = entry.password ?? '';
  if (typeof password !== 'string' && typeof password !== 'number') {
    throw new ConfigError(`${where}: "password" must be a string`);
  }

  const descriptor: ServerDescriptor = { name, address, secret: String(password) };

  const container = entry.container;
  if (container !== undefined && container !== null) {
    if (typeof container !== 'string') {
      throw new ConfigError(`${where}: "container" must be a string`);
    }
    if (container.trim() !== '') {
      descriptor.containerRef = container.trim();
    }
  }

  return descriptor;
}

function validateUiConfig(raw: unknown): UiConfig {
  if (raw === undefined || raw === null) {
    return { ...DEFAULT_UI_CONFIG };
  }
  if (!isRecord(raw)) {
    throw new ConfigError('ui: expected a mapping');
  }

  const timeout = raw.statusTimeoutSeconds ?? DEFAULT_UI_CONFIG.statusTimeoutSeconds;
  if (typeof timeout !== 'number' || !Number.isFinite(timeout) || timeout < 0) {
    throw new ConfigError('ui: "statusTimeoutSeconds" must be a non-negative number');
  }

  return { statusTimeoutSeconds: timeout };
}

function validateRconConfig(raw: unknown): RconConfig {
  if (raw === undefined || raw === null) {
    return { ...DEFAULT_RCON_CONFIG };
  }
  if (!isRecord(raw)) {
    throw new ConfigError('rcon: expected a mapping');
  }

  const timeout = raw.timeoutSeconds ?? DEFAULT_RCON_CONFIG.timeoutSeconds;
  if (typeof timeout !== 'number' || !Number.isFinite(timeout) || timeout <= 0) {
    throw new ConfigError('rcon: "timeoutSeconds" must be a positive number');
  }

  return { timeoutSeconds: timeout };
}

/**
 * Parse YAML config text into an AppConfig
 * @throws ConfigError on malformed YAML, invalid entries, or an empty server list
 */
export function parseConfig(text: string, source: string): AppConfig {
  let doc: unknown;
  try {
    doc = parse(text);
  } catch (error) {
    throw new ConfigError(`failed to parse YAML: ${errorMessage(error)}`);
  }

  if (doc === null || doc === undefined) {
    throw new ConfigError(`no servers defined in ${source}`);
  }
  if (!isRecord(doc)) {
    throw new ConfigError(`failed to parse YAML: top level of ${source} must be a mapping`);
  }

  const rawServers = doc.servers ?? [];
  if (!Array.isArray(rawServers)) {
    throw new ConfigError(`"servers" in ${source} must be a list`);
  }
  if (rawServers.length === 0) {
    throw new ConfigError(`no servers defined in ${source}`);
  }

  const servers = rawServers.map((entry, i) => validateServerEntry(entry, i));

  const names = new Set<string>();
  for (const server of servers) {
    if (names.has(server.name)) {
      throw new ConfigError(`duplicate server name "${server.name}" in ${source}`);
    }
    names.add(server.name);
  }

  return { servers, ui: validateUiConfig(doc.ui), rcon: validateRconConfig(doc.rcon) };
}

/**
 * Read and validate the config file
 */
export async function loadConfig(configPath: string): Promise<AppConfig> {
  let text: string;
  try {
    text = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`failed to read config file ${configPath}: ${errorMessage(error)}`);
  }
  return parseConfig(text, configPath);
}

/**
 * Resolve which config file to use: --config flag, then RCON_DECK_CONFIG, then ./config.yaml
 */
export function resolveConfigPath(flag: string | undefined, env: NodeJS.ProcessEnv = process.env): string {
  return flag || env.RCON_DECK_CONFIG || DEFAULT_CONFIG_PATH;
}
