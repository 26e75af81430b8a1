import type { ServerDescriptor } from '../types/server-descriptor.js';
import type { CommandResult } from '../types/session-types.js';
import { type ProcessOutput, runProcess } from '../utils/process-utils.js';
import {
  ContainerConfigError,
  ContainerExecutionError,
  ExecutionError,
  errorMessage,
  toErrorInfo,
} from './errors.js';

/**
 * Runs the container management tool with the given arguments
 */
export interface ProcessRunner {
  run(args: string[]): Promise<ProcessOutput>;
}

export class DockerRunner implements ProcessRunner {
  constructor(private readonly binary: string = 'docker') {}

  run(args: string[]): Promise<ProcessOutput> {
    return runProcess(this.binary, args);
  }
}

/**
 * Build docker CLI arguments for a lifecycle action, or null for an unknown action
 */
export function dockerArgs(action: string, containerRef: string): string[] | null {
  switch (action) {
    case 'start':
    case 'stop':
    case 'restart':
      return [action, containerRef];
    case 'status':
      return ['inspect', '--format', '{{.State.Status}}', containerRef];
    default:
      return null;
  }
}

/**
 * Perform a container lifecycle action for a server.
 * Never rejects: failures are reported in the result.
 */
export async function executeContainerAction(
  runner: ProcessRunner,
  server: ServerDescriptor,
  action: string
): Promise<CommandResult> {
  const base = { kind: 'container' as const, serverName: server.name, label: action, action };

  if (!server.containerRef) {
    return { ...base, error: toErrorInfo(new ContainerConfigError('no container configured')) };
  }

  const args = dockerArgs(action, server.containerRef);
  if (!args) {
    return { ...base, error: toErrorInfo(new ExecutionError(`unknown action: ${action}`)) };
  }

  let result: ProcessOutput;
  try {
    result = await runner.run(args);
  } catch (error) {
    return { ...base, error: toErrorInfo(new ContainerExecutionError('', null, errorMessage(error))) };
  }

  if (result.exitCode !== 0) {
    return {
      ...base,
      error: toErrorInfo(new ContainerExecutionError(result.output.trim(), result.exitCode)),
    };
  }

  return { ...base, output: result.output };
}
