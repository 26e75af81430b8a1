import type { ServerDescriptor } from './server-descriptor.js';

export interface UiConfig {
  statusTimeoutSeconds: number;  // 0 = status never expires
}

export interface RconConfig {
  timeoutSeconds: number;  // reply deadline per packet, auth included
}

export interface AppConfig {
  servers: ServerDescriptor[];
  ui: UiConfig;
  rcon: RconConfig;
}

export const DEFAULT_UI_CONFIG: UiConfig = {
  statusTimeoutSeconds: 10,
};

export const DEFAULT_RCON_CONFIG: RconConfig = {
  timeoutSeconds: 10,
};

export const DEFAULT_CONFIG_PATH = 'config.yaml';
