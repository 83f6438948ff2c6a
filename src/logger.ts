import pino, { type Logger } from 'pino';
import type { LogLevel } from './config.js';

export type { Logger };

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
}

/**
 * JSON logger on stderr. Stdout belongs to the MCP stdio transport, so
 * nothing else may write there.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'info', name = 'investor-analysis-mcp' } = options;
  return pino({ level, name }, pino.destination(2));
}

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
