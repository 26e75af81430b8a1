export const MAX_LOG_LINES = 500;

const CONTINUATION_INDENT = '    ';

/**
 * Append lines to a log, keeping only the most recent `max` entries
 */
export function appendLog(
  log: readonly string[],
  lines: string | readonly string[],
  max: number = MAX_LOG_LINES
): string[] {
  const added = typeof lines === 'string' ? [lines] : lines;
  const next = [...log, ...added];
  return next.length > max ? next.slice(next.length - max) : next;
}

/**
 * Turn a head plus possibly multi-line body into log rows.
 * Continuation rows are indented so each row stays one terminal line.
 */
export function formatEntry(head: string, body: string): string[] {
  const rows = body.replace(/\r\n/g, '\n').split('\n');
  return rows.map((row, i) => (i === 0 ? head + row : CONTINUATION_INDENT + row));
}
