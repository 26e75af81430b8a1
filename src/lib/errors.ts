import type { ErrorInfo } from '../types/session-types.js';

/**
 * Configuration could not be read, parsed or validated. Fatal at startup.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ConnectionError extends Error {
  readonly address: string;

  constructor(address: string, cause: string) {
    super(`failed to connect to ${address}: ${cause}`);
    this.name = 'ConnectionError';
    this.address = address;
  }
}

export class ExecutionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExecutionError';
  }
}

export class ContainerConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContainerConfigError';
  }
}

export class ContainerExecutionError extends Error {
  readonly output: string;
  readonly exitCode: number | null;

  constructor(output: string, exitCode: number | null, reason?: string) {
    const outcome = reason ?? (exitCode === null ? 'process did not exit cleanly' : `exit status ${exitCode}`);
    super(output ? `${output} (${outcome})` : outcome);
    this.name = 'ContainerExecutionError';
    this.output = output;
    this.exitCode = exitCode;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function toErrorInfo(error: unknown): ErrorInfo {
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: 'Error', message: String(error) };
}
