import type { ServerDescriptor } from './server-descriptor.js';

export type ContainerAction = 'start' | 'stop' | 'restart' | 'status';

export const CONTAINER_ACTIONS: readonly ContainerAction[] = ['start', 'stop', 'restart', 'status'];

export type CommandKind = 'rcon' | 'container';

export interface Viewport {
  width: number;
  height: number;
}

export interface SessionState {
  activeServerName?: string;
  log: readonly string[];
  statusText: string;
  statusSetAt: number;       // epoch ms, 0 when no status was ever set
  selectionIndex: number;
  viewport: Viewport;
  pending: number;           // launched requests without a result yet
  quitting: boolean;
}

export type CommandRequest =
  | { kind: 'rcon'; target: ServerDescriptor; payload: string }
  | { kind: 'container'; target: ServerDescriptor; payload: ContainerAction };

export interface ErrorInfo {
  name: string;
  message: string;
}

export type CommandResult =
  | {
      kind: 'rcon';
      serverName: string;
      label: string;         // the command text
      output?: string;
      error?: ErrorInfo;
    }
  | {
      kind: 'container';
      serverName: string;
      label: string;         // the action name as requested
      action: string;
      output?: string;
      error?: ErrorInfo;
    };

export type SessionEvent =
  | { type: 'resize'; width: number; height: number }
  | { type: 'select-next' }
  | { type: 'select-previous' }
  | { type: 'submit-command'; text: string }
  | { type: 'container-action'; action: ContainerAction }
  | { type: 'quit' }
  | { type: 'notice'; text: string }
  | { type: 'command-result'; result: CommandResult };

export type SessionEffect =
  | { type: 'launch'; request: CommandRequest }
  | { type: 'quit' };

export interface Transition {
  state: SessionState;
  effect?: SessionEffect;
}
