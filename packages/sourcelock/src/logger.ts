/**
 * Stderr logger for human-readable status messages.
 *
 * All messages go to stderr so stdout remains JSON-only.
 */

/**
 * Write a prefixed log message to stderr.
 *
 * @param message - Human-readable message (no newline needed)
 */
export function log(message: string): void {
  process.stderr.write(`[sourcelock] ${message}\n`);
}
