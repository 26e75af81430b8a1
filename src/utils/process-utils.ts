import { spawn } from 'child_process';

export interface ProcessOutput {
  output: string;          // stdout and stderr interleaved in arrival order
  exitCode: number | null;
}

/**
 * Run a command without a shell and capture combined output.
 * Rejects only if the process cannot be spawned (e.g. binary not in PATH).
 */
export function runProcess(command: string, args: string[]): Promise<ProcessOutput> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    const chunks: Buffer[] = [];

    child.stdout.on('data', (chunk: Buffer) => chunks.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => chunks.push(chunk));

    child.on('error', reject);
    child.on('close', (code) => {
      resolve({
        output: Buffer.concat(chunks).toString('utf-8'),
        exitCode: code,
      });
    });
  });
}
