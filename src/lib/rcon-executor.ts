import { Rcon } from 'rcon-client';
import { type ServerDescriptor, parseAddress } from '../types/server-descriptor.js';
import type { CommandResult } from '../types/session-types.js';
import { ConnectionError, ExecutionError, errorMessage, toErrorInfo } from './errors.js';

/**
 * An open, authenticated RCON session
 */
export interface RconConnection {
  execute(command: string): Promise<string>;
  close(): Promise<void>;
}

export interface ControlProtocolClient {
  connect(address: string, secret: string): Promise<RconConnection>;
}

export const DEFAULT_RCON_TIMEOUT_MS = 10_000;

export interface RconClientOptions {
  /** Per-packet reply deadline, auth included */
  timeoutMs?: number;
}

/**
 * ControlProtocolClient backed by the rcon-client package (Source RCON protocol)
 */
export class RconClient implements ControlProtocolClient {
  private timeoutMs: number;

  constructor(options: RconClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_RCON_TIMEOUT_MS;
  }

  async connect(address: string, secret: string): Promise<RconConnection> {
    const { host, port } = parseAddress(address);
    const rcon = new Rcon({ host, port, password: secret, timeout: this.timeoutMs });

    // Socket errors are re-emitted here and would otherwise be thrown.
    // The pending packet rejects with "Connection closed" on its own.
    rcon.on('error', () => {});

    try {
      await rcon.connect();
    } catch (error) {
      rcon.socket?.destroy();
      throw error;
    }

    return {
      execute: (command: string) => rcon.send(command),
      close: () => rcon.end(),
    };
  }
}

/**
 * Run one RCON command against a server.
 * Opens a connection, executes once, and always closes it before resolving.
 * Never rejects: failures are reported in the result.
 */
export async function executeRcon(
  client: ControlProtocolClient,
  server: ServerDescriptor,
  command: string
): Promise<CommandResult> {
  const base = { kind: 'rcon' as const, serverName: server.name, label: command };

  let connection: RconConnection;
  try {
    connection = await client.connect(server.address, server.secret);
  } catch (error) {
    return { ...base, error: toErrorInfo(new ConnectionError(server.address, errorMessage(error))) };
  }

  try {
    const output = await connection.execute(command);
    return { ...base, output };
  } catch (error) {
    return { ...base, error: toErrorInfo(new ExecutionError(errorMessage(error))) };
  } finally {
    await connection.close().catch(() => {
      // Connection is discarded either way
    });
  }
}
