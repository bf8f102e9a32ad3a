/**
 * Safe logger that prevents EPIPE errors when stdout/stderr is closed
 * (e.g. `boardgame-graph ... | head`), with a level threshold so
 * `--verbose` can turn on debug output.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function safeWrite(level: Exclude<LogLevel, 'silent'>, fn: (...args: unknown[]) => void, args: unknown[]) {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
  try {
    fn.apply(console, args);
  } catch (error: unknown) {
    // Ignore EPIPE errors - the pipe is closed, nothing we can do
    if (error instanceof Error && 'code' in error && error.code === 'EPIPE') {
      return;
    }
    // For other errors, try to write to stderr as a last resort
    try {
      process.stderr.write(`Logger error: ${error}\n`);
    } catch {
      // Give up silently
    }
  }
}

export const logger = {
  log: (...args: unknown[]) => safeWrite('info', console.log, args),
  error: (...args: unknown[]) => safeWrite('error', console.error, args),
  warn: (...args: unknown[]) => safeWrite('warn', console.warn, args),
  info: (...args: unknown[]) => safeWrite('info', console.info, args),
  debug: (...args: unknown[]) => safeWrite('debug', console.debug, args),
};

/**
 * Swallow EPIPE on the process streams. Called once by the CLI entry point
 * rather than at import time so tests and library callers keep their own
 * stream handlers.
 */
export function installPipeGuards(): void {
  process.stdout.on('error', (err: NodeJS.ErrnoException) => {
    if (err.code === 'EPIPE') return;
    throw err;
  });
  process.stderr.on('error', (err: NodeJS.ErrnoException) => {
    if (err.code === 'EPIPE') return;
    throw err;
  });
}
