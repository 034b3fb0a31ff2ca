// file: src/logger.ts

/** Sink for progress messages. */
export type Logger = (message: string) => void;

/**
 * Writes a progress message directly to stderr, bypassing console.error spies.
 * @param message - The verbose message to log.
 */
export function verboseLog(message: string): void {
  process.stderr.write(`[hunkwise] ${message}\n`);
}

/**
 * Picks the logger for a command-line run: stderr under --verbose, silent otherwise.
 */
export function createLogger(verbose: boolean): Logger {
  return verbose ? verboseLog : () => undefined;
}
