import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true, mode: 0o755 });
  } catch (error) {
    // Ignore error if directory already exists
    if ((error as NodeJS.ErrnoException).code !== 'EEXIST') {
      throw error;
    }
  }
}

/**
 * Check if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Get the rcon-deck state directory (~/.rcon-deck)
 */
export function getConfigDir(): string {
  return path.join(os.homedir(), '.rcon-deck');
}

/**
 * Get the logs directory (~/.rcon-deck/logs)
 */
export function getLogsDir(): string {
  return path.join(getConfigDir(), 'logs');
}
