import * as fs from 'fs/promises';
import * as path from 'path';
import type { CommandRequest, CommandResult } from '../types/session-types.js';
import { ensureDir, getLogsDir } from '../utils/file-utils.js';
import { errorMessage } from './errors.js';

export type SessionLogEntry =
  | {
      timestamp: string;
      event: 'request';
      kind: CommandRequest['kind'];
      server: string;
      payload: string;
    }
  | {
      timestamp: string;
      event: 'result';
      kind: CommandResult['kind'];
      server: string;
      label: string;
      status: 'success' | 'error';
      output?: string;
      error?: string;
    };

/**
 * Appends request/result activity as JSON lines.
 * The dashboard owns the terminal, so nothing here writes to the console.
 */
export class SessionLogger {
  private logFilePath: string;
  private enabled: boolean;
  private writeChain: Promise<void> = Promise.resolve();
  private failed = false;
  private onFailure?: (message: string) => void;

  constructor(enabled: boolean = false, logFilePath: string = path.join(getLogsDir(), 'session.log')) {
    this.enabled = enabled;
    this.logFilePath = logFilePath;
  }

  /**
   * Called once, on the first failed write
   */
  setFailureHandler(handler: (message: string) => void): void {
    this.onFailure = handler;
  }

  logRequest(request: CommandRequest, now: Date = new Date()): void {
    this.append({
      timestamp: now.toISOString(),
      event: 'request',
      kind: request.kind,
      server: request.target.name,
      payload: request.payload,
    });
  }

  logResult(result: CommandResult, now: Date = new Date()): void {
    this.append({
      timestamp: now.toISOString(),
      event: 'result',
      kind: result.kind,
      server: result.serverName,
      label: result.label,
      status: result.error ? 'error' : 'success',
      output: result.output,
      error: result.error?.message,
    });
  }

  /**
   * Resolves once every queued write has settled
   */
  flush(): Promise<void> {
    return this.writeChain;
  }

  private append(entry: SessionLogEntry): void {
    if (!this.enabled || this.failed) return;

    const line = JSON.stringify(entry) + '\n';
    this.writeChain = this.writeChain
      .then(async () => {
        await ensureDir(path.dirname(this.logFilePath));
        await fs.appendFile(this.logFilePath, line, 'utf-8');
      })
      .catch((error) => {
        if (this.failed) return;
        this.failed = true;
        this.onFailure?.(`Session log disabled, write to ${this.logFilePath} failed: ${errorMessage(error)}`);
      });
  }
}
