/**
 * Structured JSON logger for the inventory CLI.
 *
 * Uses Pino and writes to stderr: stdout is reserved for the inventory JSON
 * that Ansible parses.
 */

import pino from 'pino';

type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Create and configure a Pino logger instance.
 *
 * Reads LOG_LEVEL from environment variable (supports both lowercase and uppercase).
 * Defaults to 'warn' so a normal run prints nothing besides the inventory.
 *
 * @param name - Logger name
 * @param level - Optional log level override
 * @returns Configured Pino logger
 */
export function setupLogger(name: string = 'cvm-inventory', level?: string): pino.Logger {
  const logLevel: LogLevel = (level?.toLowerCase() ||
    process.env.LOG_LEVEL?.toLowerCase() ||
    'warn') as LogLevel;

  return pino(
    {
      name,
      level: logLevel,
      formatters: {
        level: (label) => ({ level: label.toUpperCase() }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    process.stderr
  );
}
